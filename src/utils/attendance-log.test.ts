import { describe, it, expect } from 'vitest';
import zkUtils from 'node-zklib/utils';
import { decodeAttendanceLog, decodeDeviceTime } from './attendance-log';

function encodeDeviceTime(date: Date): number {
    const days = (date.getFullYear() - 2000) * 12 * 31 + date.getMonth() * 31 + date.getDate() - 1;
    return days * 86400 + (date.getHours() * 60 + date.getMinutes()) * 60 + date.getSeconds();
}

function withSizePrefix(...records: Buffer[]): Buffer {
    return Buffer.concat([Buffer.alloc(4), ...records]);
}

describe('decodeDeviceTime', () => {
    it('decodes the 31-day-month calendar', () => {
        expect(decodeDeviceTime(0)).toEqual(new Date(2000, 0, 1, 0, 0, 0));
        expect(decodeDeviceTime(encodeDeviceTime(new Date(2024, 1, 29, 23, 59, 58)))).toEqual(
            new Date(2024, 1, 29, 23, 59, 58)
        );
    });
});

describe('decodeAttendanceLog', () => {
    it('reads user, time and punch from 40-byte records', () => {
        const record = Buffer.alloc(40);
        record.writeUInt16LE(3, 0);
        record.write('1001', 2, 'ascii');
        record.writeUInt8(1, 26);
        record.writeUInt32LE(encodeDeviceTime(new Date(2024, 4, 6, 18, 2, 0)), 27);
        record.writeUInt8(1, 31);

        const [decoded] = decodeAttendanceLog(withSizePrefix(record), 40);

        expect(decoded).toEqual({ userId: '1001', timestamp: new Date(2024, 4, 6, 18, 2, 0), punchFlag: 1 });

        const reference = zkUtils.decodeRecordData40(record);
        expect(decoded.userId).toBe(reference.deviceUserId);
        expect(decoded.timestamp).toEqual(reference.recordTime);
    });

    it('reads the punch byte of 16-byte records', () => {
        const record = Buffer.alloc(16);
        record.writeUInt32LE(55, 0);
        record.writeUInt32LE(encodeDeviceTime(new Date(2024, 4, 6, 8, 0, 0)), 4);
        record.writeUInt8(0, 9);

        expect(decodeAttendanceLog(withSizePrefix(record), 16)).toEqual([
            { userId: '55', timestamp: new Date(2024, 4, 6, 8, 0, 0), punchFlag: 0 },
        ]);
    });

    it('has no punch for 8-byte records', () => {
        const record = Buffer.alloc(8);
        record.writeUInt16LE(9, 0);
        record.writeUInt32LE(encodeDeviceTime(new Date(2024, 4, 6, 8, 0, 0)), 4);

        expect(decodeAttendanceLog(withSizePrefix(record), 8)).toEqual([
            { userId: '9', timestamp: new Date(2024, 4, 6, 8, 0, 0), punchFlag: null },
        ]);
    });

    it('ignores a trailing partial record', () => {
        expect(decodeAttendanceLog(withSizePrefix(Buffer.alloc(39)), 40)).toEqual([]);
        expect(decodeAttendanceLog(Buffer.alloc(0), 40)).toEqual([]);
    });
});
