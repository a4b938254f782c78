export type Direction = 'IN' | 'OUT';

/**
 * Raw fields that hint at a punch's direction. Device firmware fills these
 * inconsistently, so every field is optional and untyped.
 */
export interface DirectionHints {
    punch_state?: unknown;
    punch_state_display?: unknown;
    log_type?: unknown;
    punch?: unknown;
}

export type PunchOrigin =
    | { kind: 'api'; deviceAlias: string | null; sourceId: string | null }
    | { kind: 'device'; ip: string; port: number };

export interface PunchRecord {
    subjectCode: string | null;
    punchTime: string | Date | null;
    hints: DirectionHints;
    origin: PunchOrigin;
}

export interface CheckinRecord {
    employee: string;
    time: Date;
    logType: Direction;
    deviceId: string;
    skipAutoAttendance: boolean;
}

export interface SyncConfiguration {
    serverIp: string | null;
    serverPort: number;
    token: string | null;
    enableSync: boolean;
    seconds: number;
    lastSync: Date | null;
    totalSyncedRecords: number;
}

export type SyncConfigurationPatch = Partial<SyncConfiguration>;

/** The host HR system as seen by the pipeline. */
export interface HostLedger {
    /** Resolves an employee by primary id, then user id, then device id mapping. */
    findEmployee(code: string): Promise<string | null>;
    checkinExists(checkin: CheckinRecord): Promise<boolean>;
    createCheckin(checkin: CheckinRecord): Promise<void>;
    getSyncConfiguration(): Promise<SyncConfiguration>;
    updateSyncConfiguration(patch: SyncConfigurationPatch): Promise<void>;
}

export type SyncMode = 'api' | 'device';
export type SyncTrigger = 'manual' | 'scheduled';
