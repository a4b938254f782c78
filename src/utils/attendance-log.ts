/**
 * Decoder for the raw attendance buffer a ZK-protocol terminal returns for
 * CMD_ATTLOG_RRQ. The buffer starts with a 4-byte size prefix, followed by
 * fixed-size records:
 *
 * - 40 bytes (TCP): uid u16 | user id char[24] | verify u8 | time u32 | punch u8 | reserved
 * - 16 bytes (UDP): user id u32 | time u32 | verify u8 | punch u8 | reserved
 * - 8 bytes (UDP, short reply): uid u16 | ... | time u32, no punch byte
 */
export type AttendanceRecordSize = 40 | 16 | 8;

export interface DeviceAttendance {
    userId: string;
    timestamp: Date;
    /** Raw punch byte (0 check-in, 1 check-out, ...), null when the record has none */
    punchFlag: number | null;
}

const SIZE_PREFIX_BYTES = 4;

/**
 * Device clocks count seconds in a calendar of 31-day months since 2000,
 * in device-local time.
 */
export function decodeDeviceTime(encoded: number): Date {
    let time = encoded;
    const second = time % 60;
    time = (time - second) / 60;
    const minute = time % 60;
    time = (time - minute) / 60;
    const hour = time % 24;
    time = (time - hour) / 24;
    const day = (time % 31) + 1;
    time = (time - (day - 1)) / 31;
    const month = time % 12;
    time = (time - month) / 12;

    return new Date(time + 2000, month, day, hour, minute, second);
}

function decodeRecord(record: Buffer, size: AttendanceRecordSize): DeviceAttendance {
    switch (size) {
        case 40:
            return {
                userId: record.subarray(2, 26).toString('ascii').split('\0')[0],
                timestamp: decodeDeviceTime(record.readUInt32LE(27)),
                punchFlag: record.readUInt8(31),
            };
        case 16:
            return {
                userId: String(record.readUInt16LE(0)),
                timestamp: decodeDeviceTime(record.readUInt32LE(4)),
                punchFlag: record.readUInt8(9),
            };
        case 8:
            return {
                userId: String(record.readUInt16LE(0)),
                timestamp: decodeDeviceTime(record.readUInt32LE(4)),
                punchFlag: null,
            };
    }
}

export function decodeAttendanceLog(data: Buffer, size: AttendanceRecordSize): DeviceAttendance[] {
    const records: DeviceAttendance[] = [];
    let remaining = data.subarray(SIZE_PREFIX_BYTES);

    while (remaining.length >= size) {
        records.push(decodeRecord(remaining.subarray(0, size), size));
        remaining = remaining.subarray(size);
    }

    return records;
}
