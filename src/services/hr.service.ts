import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import config from '../utils/config';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { formatHostDateTime, parseHostDateTime } from '../utils/datetime';
import type {
    CheckinRecord,
    HostLedger,
    SyncConfiguration,
    SyncConfigurationPatch,
} from '../types/sync';

const CHECKINS_PATH = '/api/employee-checkins';
const EMPLOYEES_PATH = '/api/employees';
const SYNC_CONFIG_PATH = '/api/checkin-sync-config';

const entityListSchema = z.object({
    data: z.array(z.object({ id: z.union([z.number(), z.string()]) }).passthrough()),
});

const syncConfigAttributesSchema = z.object({
    serverIp: z.string().nullish(),
    serverPort: z.coerce.number().int().positive().nullish(),
    token: z.string().nullish(),
    enableSync: z.boolean().nullish(),
    seconds: z.coerce.number().int().positive().nullish(),
    lastSync: z.string().nullish(),
    totalSyncedRecords: z.coerce.number().int().nonnegative().nullish(),
});

const syncConfigResponseSchema = z.object({
    data: z.object({ attributes: syncConfigAttributesSchema }).nullable(),
});

type SyncConfigAttributes = z.infer<typeof syncConfigAttributesSchema>;

export interface HrServiceOptions {
    employeeFields: string[];
}

function defaultEmployeeFields(): string[] {
    const fields = [config.hr.employeeIdField, config.hr.userIdField];
    if (config.hr.deviceIdField) {
        fields.push(config.hr.deviceIdField);
    }
    return fields;
}

/** Defaults used until the host stores its own sync configuration. */
export function defaultSyncConfiguration(): SyncConfiguration {
    return {
        serverIp: config.device.ip ?? null,
        serverPort: config.device.port,
        token: config.device.apiToken ?? null,
        enableSync: config.sync.enabled,
        seconds: config.sync.intervalSeconds,
        lastSync: null,
        totalSyncedRecords: 0,
    };
}

function fromAttributes(attributes: SyncConfigAttributes): SyncConfiguration {
    const defaults = defaultSyncConfiguration();
    return {
        serverIp: attributes.serverIp?.trim() || defaults.serverIp,
        serverPort: attributes.serverPort ?? defaults.serverPort,
        token: attributes.token?.trim() || defaults.token,
        enableSync: attributes.enableSync ?? defaults.enableSync,
        seconds: attributes.seconds ?? defaults.seconds,
        lastSync: parseHostDateTime(attributes.lastSync),
        totalSyncedRecords: attributes.totalSyncedRecords ?? 0,
    };
}

function toAttributes(patch: SyncConfigurationPatch): Record<string, unknown> {
    const data: Record<string, unknown> = { ...patch };
    if (patch.lastSync !== undefined) {
        data.lastSync = patch.lastSync ? formatHostDateTime(patch.lastSync) : null;
    }
    return data;
}

/**
 * REST client for the host HR system: employee lookup, employee checkins and
 * the singleton sync configuration.
 */
export class HrService implements HostLedger {
    private client: AxiosInstance;
    private employeeFields: string[];

    constructor(client?: AxiosInstance, options?: HrServiceOptions) {
        this.client =
            client ??
            axios.create({
                baseURL: config.hr.url,
                timeout: 15000,
                headers: {
                    Authorization: `Bearer ${config.hr.apiToken}`,
                },
            });
        this.employeeFields = options?.employeeFields ?? defaultEmployeeFields();
    }

    /**
     * Find an employee by each configured identifier field in turn
     */
    async findEmployee(code: string): Promise<string | null> {
        for (const field of this.employeeFields) {
            const response = await this.client.get(EMPLOYEES_PATH, {
                params: {
                    [`filters[${field}][$eq]`]: code,
                    'pagination[pageSize]': 1,
                },
            });

            const [employee] = entityListSchema.parse(response.data).data;
            if (employee) {
                return String(employee.id);
            }
        }

        return null;
    }

    async checkinExists(checkin: CheckinRecord): Promise<boolean> {
        const response = await this.client.get(CHECKINS_PATH, {
            params: {
                'filters[employee][id][$eq]': checkin.employee,
                'filters[time][$eq]': formatHostDateTime(checkin.time),
                'filters[logType][$eq]': checkin.logType,
                'filters[deviceId][$eq]': checkin.deviceId,
                'pagination[pageSize]': 1,
            },
        });

        return entityListSchema.parse(response.data).data.length > 0;
    }

    async createCheckin(checkin: CheckinRecord): Promise<void> {
        await this.client.post(CHECKINS_PATH, {
            data: {
                employee: checkin.employee,
                time: formatHostDateTime(checkin.time),
                logType: checkin.logType,
                deviceId: checkin.deviceId,
                skipAutoAttendance: checkin.skipAutoAttendance,
            },
        });
        logger.debug(`Created checkin for employee ${checkin.employee}`, {
            time: formatHostDateTime(checkin.time),
            logType: checkin.logType,
        });
    }

    /**
     * Read the sync configuration singleton, falling back to environment defaults
     */
    async getSyncConfiguration(): Promise<SyncConfiguration> {
        try {
            const response = await this.client.get(SYNC_CONFIG_PATH);
            const { data } = syncConfigResponseSchema.parse(response.data);
            return data ? fromAttributes(data.attributes) : defaultSyncConfiguration();
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return defaultSyncConfiguration();
            }
            logger.error('Failed to read sync configuration', { error: errorMessage(error) });
            throw error;
        }
    }

    async updateSyncConfiguration(patch: SyncConfigurationPatch): Promise<void> {
        try {
            await this.client.put(SYNC_CONFIG_PATH, { data: toAttributes(patch) });
        } catch (error) {
            logger.error('Failed to update sync configuration', { error: errorMessage(error) });
            throw error;
        }
    }
}

export default new HrService();
