import { describe, it, expect } from 'vitest';
import { IngestService, buildDeviceId, summarizeOutcomes } from './ingest.service';
import { MemoryLedger } from '../test-utils/memory-ledger';
import { RecordValidationError } from '../utils/errors';
import type { PunchRecord } from '../types/sync';

const now = new Date(2024, 0, 1, 12, 0, 0);

const employees = [
    { id: 'EMP-0001', employeeId: 'E1' },
    { id: 'EMP-0002', userId: 'u.two' },
    { id: 'EMP-0003', attendanceDeviceId: '303' },
];

function apiPunch(overrides: Partial<PunchRecord> = {}): PunchRecord {
    return {
        subjectCode: 'E1',
        punchTime: '2024-01-01 09:00:00',
        hints: { punch_state: 1 },
        origin: { kind: 'api', deviceAlias: 'Front Door', sourceId: '7' },
        ...overrides,
    };
}

class FailingLedger extends MemoryLedger {
    async findEmployee(code: string): Promise<string | null> {
        if (code === 'BOOM') {
            throw new Error('HR API unavailable');
        }
        return super.findEmployee(code);
    }
}

describe('buildDeviceId', () => {
    it('tags API punches with their source id', () => {
        expect(buildDeviceId({ kind: 'api', deviceAlias: 'Front Door', sourceId: '7' })).toBe('Front Door (Source-7)');
        expect(buildDeviceId({ kind: 'api', deviceAlias: null, sourceId: '3' })).toBe('Biometric Device (Source-3)');
    });

    it('falls back to the alias, then a fixed label', () => {
        expect(buildDeviceId({ kind: 'api', deviceAlias: 'Gate', sourceId: null })).toBe('Gate');
        expect(buildDeviceId({ kind: 'api', deviceAlias: null, sourceId: null })).toBe('Biometric Device');
    });

    it('uses ip:port for device punches', () => {
        expect(buildDeviceId({ kind: 'device', ip: '10.0.0.9', port: 4370 })).toBe('10.0.0.9:4370');
    });
});

describe('IngestService', () => {
    it('inserts a new punch once and treats the repeat as a duplicate', async () => {
        const ledger = new MemoryLedger(employees);
        const service = new IngestService(ledger);

        const [first] = await service.ingest([apiPunch()], now);
        expect(first).toEqual({
            status: 'inserted',
            checkin: {
                employee: 'EMP-0001',
                time: new Date(2024, 0, 1, 9, 0, 0),
                logType: 'OUT',
                deviceId: 'Front Door (Source-7)',
                skipAutoAttendance: true,
            },
        });

        const [second] = await service.ingest([apiPunch()], now);
        expect(second.status).toBe('duplicate');
        expect(ledger.checkins).toHaveLength(1);
    });

    it('allows an IN and an OUT at the same time', async () => {
        const ledger = new MemoryLedger(employees);
        const outcomes = await new IngestService(ledger).ingest(
            [apiPunch({ hints: { punch_state: 0 } }), apiPunch({ hints: { punch_state: 1 } })],
            now
        );

        expect(outcomes.map(outcome => outcome.status)).toEqual(['inserted', 'inserted']);
        expect(ledger.checkins.map(checkin => checkin.logType)).toEqual(['IN', 'OUT']);
    });

    it('resolves employees by user id and device id mapping', async () => {
        const ledger = new MemoryLedger(employees);
        await new IngestService(ledger).ingest(
            [
                apiPunch({ subjectCode: 'u.two' }),
                apiPunch({ subjectCode: '303', origin: { kind: 'device', ip: '10.0.0.9', port: 4370 } }),
            ],
            now
        );

        expect(ledger.checkins.map(checkin => [checkin.employee, checkin.deviceId])).toEqual([
            ['EMP-0002', 'Front Door (Source-7)'],
            ['EMP-0003', '10.0.0.9:4370'],
        ]);
    });

    it('rejects punches missing the employee code or time', async () => {
        const ledger = new MemoryLedger(employees);
        const outcomes = await new IngestService(ledger).ingest(
            [apiPunch({ subjectCode: null }), apiPunch({ punchTime: null })],
            now
        );

        expect(outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'rejected']);
        expect(ledger.checkins).toHaveLength(0);
    });

    it('rejects unknown employees and unparseable times', async () => {
        const outcomes = await new IngestService(new MemoryLedger(employees)).ingest(
            [apiPunch({ subjectCode: 'NOPE' }), apiPunch({ punchTime: 'not a time' })],
            now
        );

        const [unknown, badTime] = outcomes;
        expect(unknown.status === 'rejected' && unknown.error.message).toBe('Employee not found for code: NOPE');
        expect(badTime.status === 'rejected' && badTime.error).toBeInstanceOf(RecordValidationError);
    });

    it('rejects a punch 5:00 ahead and accepts one 4:59 ahead', async () => {
        const ledger = new MemoryLedger(employees);
        const outcomes = await new IngestService(ledger).ingest(
            [apiPunch({ punchTime: '2024-01-01 12:05:00' }), apiPunch({ punchTime: '2024-01-01 12:04:59' })],
            now
        );

        expect(outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'inserted']);
        expect(ledger.checkins[0].time).toEqual(new Date(2024, 0, 1, 12, 4, 59));
    });

    it('skips punches older than 90 days without counting an error', async () => {
        const ledger = new MemoryLedger(employees);
        const outcomes = await new IngestService(ledger).ingest(
            [apiPunch({ punchTime: '2023-10-01 12:00:00' }), apiPunch({ punchTime: '2023-10-04 12:00:00' })],
            now
        );

        expect(outcomes.map(outcome => outcome.status)).toEqual(['stale', 'inserted']);
        expect(summarizeOutcomes(outcomes)).toEqual({ total: 2, inserted: 1, duplicates: 0, stale: 1, errors: 0 });
    });

    it('keeps going after a record fails', async () => {
        const ledger = new FailingLedger(employees);
        const outcomes = await new IngestService(ledger).ingest([apiPunch({ subjectCode: 'BOOM' }), apiPunch()], now);

        const [failed, inserted] = outcomes;
        expect(failed.status === 'failed' && failed.error.message).toBe('HR API unavailable');
        expect(inserted.status).toBe('inserted');
        expect(summarizeOutcomes(outcomes)).toEqual({ total: 2, inserted: 1, duplicates: 0, stale: 0, errors: 1 });
    });

    it('accepts Date punch times from the device', async () => {
        const ledger = new MemoryLedger(employees);
        const time = new Date(2024, 0, 1, 8, 15, 0);
        await new IngestService(ledger).ingest(
            [
                {
                    subjectCode: 'E1',
                    punchTime: time,
                    hints: { punch: 0 },
                    origin: { kind: 'device', ip: '10.0.0.9', port: 4370 },
                },
            ],
            now
        );

        expect(ledger.checkins).toEqual([
            { employee: 'EMP-0001', time, logType: 'IN', deviceId: '10.0.0.9:4370', skipAutoAttendance: true },
        ]);
    });
});
