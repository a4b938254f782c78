import type ZKLib from 'node-zklib';
import logger from '../utils/logger';
import { DeviceUnavailableError, errorMessage } from '../utils/errors';
import { type AttendanceRecordSize, type DeviceAttendance, decodeAttendanceLog } from '../utils/attendance-log';
import type { PunchRecord } from '../types/sync';

export type { DeviceAttendance } from '../utils/attendance-log';

export const DEVICE_PORT = 4370;

const CONNECT_TIMEOUT_MS = 10000;
const INACTIVITY_TIMEOUT_MS = 4000;

export interface DeviceSession {
    getAttendanceLog(): Promise<DeviceAttendance[]>;
    disconnect(): Promise<void>;
}

export type DeviceConnector = (ip: string, port: number, timeoutMs: number) => Promise<DeviceSession>;

export function isDeviceMode(port: number): boolean {
    return port === DEVICE_PORT;
}

interface ZKLibModule {
    ZKLib: typeof ZKLib;
    attendanceLogRequest: Buffer;
}

// node-zklib is CommonJS and optional at runtime
let zkLib: ZKLibModule | null = null;

async function loadZKLib(): Promise<ZKLibModule> {
    if (!zkLib) {
        try {
            const [loaded, constants] = await Promise.all([import('node-zklib'), import('node-zklib/constants')]);
            zkLib = {
                ZKLib: loaded.default,
                attendanceLogRequest: constants.REQUEST_DATA.GET_ATTENDANCE_LOGS,
            };
        } catch (error) {
            throw new DeviceUnavailableError(`Device library not available: ${errorMessage(error)}`);
        }
    }
    return zkLib;
}

function recordSizeFor(connectionType: ZKLib.ConnectionType | null, reply: ZKLib.BufferReply): AttendanceRecordSize {
    if (connectionType === 'udp') {
        return reply.mode ? 8 : 16;
    }
    return 40;
}

async function deviceCall<T>(action: string, ip: string, port: number, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        throw new DeviceUnavailableError(`Device ${ip}:${port} ${action} failed: ${errorMessage(error)}`);
    }
}

/**
 * Open a node-zklib session to the device. Attendance is read as the raw log
 * buffer, since node-zklib's own decoder drops the punch byte.
 */
export const connectWithZKLib: DeviceConnector = async (ip, port, timeoutMs) => {
    const { ZKLib: ZK, attendanceLogRequest } = await loadZKLib();
    const zk = new ZK(ip, port, timeoutMs, INACTIVITY_TIMEOUT_MS);
    await deviceCall('connect', ip, port, () => zk.createSocket());

    return {
        async getAttendanceLog() {
            const reply = await deviceCall('attendance read', ip, port, async () => {
                await zk.freeData();
                const result = await zk.functionWrapper(
                    () => zk.zklibTcp.readWithBuffer(attendanceLogRequest),
                    () => zk.zklibUdp.readWithBuffer(attendanceLogRequest),
                    'GET_ATTENDANCE_LOGS'
                );
                await zk.freeData();
                return result;
            });

            if (reply.err) {
                throw new DeviceUnavailableError(
                    `Device ${ip}:${port} attendance read incomplete: ${errorMessage(reply.err)}`
                );
            }

            return decodeAttendanceLog(reply.data, recordSizeFor(zk.connectionType, reply));
        },
        disconnect: () => zk.disconnect(),
    };
};

export function toPunchRecord(attendance: DeviceAttendance, ip: string, port: number): PunchRecord {
    return {
        subjectCode: attendance.userId.trim() || null,
        punchTime: attendance.timestamp,
        hints: { punch: attendance.punchFlag },
        origin: { kind: 'device', ip, port },
    };
}

/**
 * Reads the full on-device attendance buffer. The device protocol has no
 * range query, so windowing and deduplication happen downstream.
 */
export class DeviceService {
    constructor(private readonly connect: DeviceConnector = connectWithZKLib) {}

    async fetchAttendance(ip: string, port: number): Promise<PunchRecord[]> {
        const session = await this.connect(ip, port, CONNECT_TIMEOUT_MS);

        try {
            const logs = await session.getAttendanceLog();
            logger.info(`[DEVICE] Retrieved ${logs.length} attendance logs from ${ip}:${port}`);
            return logs.map(log => toPunchRecord(log, ip, port));
        } finally {
            try {
                await session.disconnect();
            } catch (error) {
                logger.warn('[DEVICE] Failed to disconnect cleanly', { ip, port, error: errorMessage(error) });
            }
        }
    }
}

export default new DeviceService();
