import { formatHostDateTime } from '../utils/datetime';
import type {
    CheckinRecord,
    HostLedger,
    SyncConfiguration,
    SyncConfigurationPatch,
} from '../types/sync';

export interface TestEmployee {
    id: string;
    employeeId?: string;
    userId?: string;
    attendanceDeviceId?: string;
}

function checkinKey(checkin: CheckinRecord): string {
    return [checkin.employee, formatHostDateTime(checkin.time), checkin.logType, checkin.deviceId].join('|');
}

export function createSyncConfiguration(overrides: SyncConfigurationPatch = {}): SyncConfiguration {
    return {
        serverIp: '10.0.0.5',
        serverPort: 8081,
        token: 'test-token',
        enableSync: true,
        seconds: 300,
        lastSync: null,
        totalSyncedRecords: 0,
        ...overrides,
    };
}

/**
 * In-memory stand-in for the HR system
 */
export class MemoryLedger implements HostLedger {
    readonly checkins: CheckinRecord[] = [];
    readonly configUpdates: SyncConfigurationPatch[] = [];
    settings: SyncConfiguration;

    constructor(
        private readonly employees: TestEmployee[] = [],
        settings: SyncConfigurationPatch = {}
    ) {
        this.settings = createSyncConfiguration(settings);
    }

    async findEmployee(code: string): Promise<string | null> {
        const fields = ['employeeId', 'userId', 'attendanceDeviceId'] as const;
        for (const field of fields) {
            const match = this.employees.find(employee => employee[field] === code);
            if (match) {
                return match.id;
            }
        }
        return null;
    }

    async checkinExists(checkin: CheckinRecord): Promise<boolean> {
        const key = checkinKey(checkin);
        return this.checkins.some(existing => checkinKey(existing) === key);
    }

    async createCheckin(checkin: CheckinRecord): Promise<void> {
        this.checkins.push(checkin);
    }

    async getSyncConfiguration(): Promise<SyncConfiguration> {
        return { ...this.settings };
    }

    async updateSyncConfiguration(patch: SyncConfigurationPatch): Promise<void> {
        this.configUpdates.push(patch);
        this.settings = { ...this.settings, ...patch };
    }
}
