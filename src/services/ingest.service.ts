import { addMinutes, subDays } from 'date-fns';
import hrService from './hr.service';
import logger from '../utils/logger';
import { RecordValidationError, errorMessage } from '../utils/errors';
import { formatHostDateTime, parseHostDateTime } from '../utils/datetime';
import { detectDirection } from '../utils/direction';
import type { CheckinRecord, HostLedger, PunchOrigin, PunchRecord } from '../types/sync';

export const MAX_FUTURE_MINUTES = 5;
export const MAX_PAST_DAYS = 90;
export const FALLBACK_DEVICE_ID = 'Biometric Device';

export type IngestOutcome =
    | { status: 'inserted'; checkin: CheckinRecord }
    | { status: 'duplicate'; checkin: CheckinRecord }
    | { status: 'stale'; subjectCode: string; punchTime: Date }
    | { status: 'rejected'; error: RecordValidationError }
    | { status: 'failed'; error: Error };

export interface IngestSummary {
    total: number;
    inserted: number;
    duplicates: number;
    stale: number;
    errors: number;
}

export function buildDeviceId(origin: PunchOrigin): string {
    if (origin.kind === 'device') {
        return `${origin.ip}:${origin.port}`;
    }
    if (origin.sourceId) {
        return `${origin.deviceAlias ?? FALLBACK_DEVICE_ID} (Source-${origin.sourceId})`;
    }
    return origin.deviceAlias || FALLBACK_DEVICE_ID;
}

export function summarizeOutcomes(outcomes: IngestOutcome[]): IngestSummary {
    const summary: IngestSummary = { total: outcomes.length, inserted: 0, duplicates: 0, stale: 0, errors: 0 };
    for (const outcome of outcomes) {
        switch (outcome.status) {
            case 'inserted':
                summary.inserted++;
                break;
            case 'duplicate':
                summary.duplicates++;
                break;
            case 'stale':
                summary.stale++;
                break;
            case 'rejected':
            case 'failed':
                summary.errors++;
                break;
        }
    }
    return summary;
}

/**
 * Turns fetched punches into employee checkins, once each.
 */
export class IngestService {
    constructor(private readonly ledger: HostLedger = hrService) {}

    async ingest(records: PunchRecord[], now: Date): Promise<IngestOutcome[]> {
        const outcomes: IngestOutcome[] = [];

        // check-then-insert must not interleave
        for (const record of records) {
            const outcome = await this.ingestOne(record, now);
            if (outcome.status === 'rejected' || outcome.status === 'failed') {
                logger.warn(`[INGEST] ${outcome.status === 'rejected' ? 'Rejected' : 'Failed'} punch`, {
                    subjectCode: record.subjectCode,
                    punchTime: record.punchTime,
                    error: outcome.error.message,
                });
            }
            outcomes.push(outcome);
        }

        return outcomes;
    }

    async ingestOne(record: PunchRecord, now: Date): Promise<IngestOutcome> {
        try {
            return await this.process(record, now);
        } catch (error) {
            if (error instanceof RecordValidationError) {
                return { status: 'rejected', error };
            }
            return { status: 'failed', error: error instanceof Error ? error : new Error(errorMessage(error)) };
        }
    }

    private async process(record: PunchRecord, now: Date): Promise<IngestOutcome> {
        const { subjectCode, punchTime } = record;
        if (!subjectCode || !punchTime) {
            throw new RecordValidationError('Missing employee code or punch time', subjectCode);
        }

        const employee = await this.ledger.findEmployee(subjectCode);
        if (!employee) {
            throw new RecordValidationError(`Employee not found for code: ${subjectCode}`, subjectCode);
        }

        const time = parseHostDateTime(punchTime);
        if (!time) {
            throw new RecordValidationError(`Unparseable punch time: ${String(punchTime)}`, subjectCode);
        }

        if (time.getTime() >= addMinutes(now, MAX_FUTURE_MINUTES).getTime()) {
            throw new RecordValidationError(
                `Punch time is in the future: ${formatHostDateTime(time)} (current: ${formatHostDateTime(now)})`,
                subjectCode
            );
        }

        if (time.getTime() < subDays(now, MAX_PAST_DAYS).getTime()) {
            logger.debug(`[INGEST] Skipping punch older than ${MAX_PAST_DAYS} days`, {
                subjectCode,
                punchTime: formatHostDateTime(time),
            });
            return { status: 'stale', subjectCode, punchTime: time };
        }

        const checkin: CheckinRecord = {
            employee,
            time,
            logType: detectDirection(record.hints),
            deviceId: buildDeviceId(record.origin),
            skipAutoAttendance: true,
        };

        if (await this.ledger.checkinExists(checkin)) {
            return { status: 'duplicate', checkin };
        }

        await this.ledger.createCheckin(checkin);
        return { status: 'inserted', checkin };
    }
}

export default new IngestService();
