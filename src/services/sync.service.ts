import { subHours } from 'date-fns';
import hrService from './hr.service';
import transactionsService, { TransactionsService } from './transactions.service';
import deviceService, { DeviceService, isDeviceMode } from './device.service';
import ingestService, { IngestService, IngestSummary, summarizeOutcomes } from './ingest.service';
import leaseStore, { LeaseStore } from './lease.service';
import logger from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { formatHostDateTime } from '../utils/datetime';
import type { HostLedger, PunchRecord, SyncConfiguration, SyncMode, SyncTrigger } from '../types/sync';

export const RUN_LOCK_KEY = 'checkin-sync:run-lock';
export const RUN_LOCK_TTL_SECONDS = 5 * 60;
const DEFAULT_LOOKBACK_HOURS = 1;

export type SkipReason = 'already-running' | 'disabled' | 'misconfigured';

export type SyncReport =
    | { status: 'skipped'; trigger: SyncTrigger; reason: SkipReason; message: string }
    | {
          status: 'completed';
          trigger: SyncTrigger;
          mode: SyncMode;
          window: { start: Date; end: Date };
          fetched: number;
          summary: IngestSummary;
          /** Page failure that cut an API fetch short */
          fetchError: string | null;
          lastSync: Date;
          totalSyncedRecords: number;
      }
    | { status: 'failed'; trigger: SyncTrigger; message: string };

export interface SyncServiceDependencies {
    ledger: HostLedger;
    transactions: Pick<TransactionsService, 'fetchTransactions'>;
    device: Pick<DeviceService, 'fetchAttendance'>;
    ingest: Pick<IngestService, 'ingest'>;
    lease: LeaseStore;
    now: () => Date;
}

function assertConfigured(settings: SyncConfiguration, mode: SyncMode): string {
    if (!settings.serverIp) {
        throw new ConfigurationError('Device address is not configured');
    }
    if (mode === 'api' && !settings.token) {
        throw new ConfigurationError('API token is not configured');
    }
    return settings.serverIp;
}

/**
 * Coordinates one sync run: lease, window, fetch, ingest, watermark.
 */
export class SyncService {
    private deps: SyncServiceDependencies;
    private runs = 0;

    constructor(deps: Partial<SyncServiceDependencies> = {}) {
        this.deps = {
            ledger: deps.ledger ?? hrService,
            transactions: deps.transactions ?? transactionsService,
            device: deps.device ?? deviceService,
            ingest: deps.ingest ?? ingestService,
            lease: deps.lease ?? leaseStore,
            now: deps.now ?? (() => new Date()),
        };
    }

    async run(trigger: SyncTrigger): Promise<SyncReport> {
        const { lease } = this.deps;

        // Identifies this run's lease, so an overrun never releases a newer one
        const token = `${process.pid}:${++this.runs}:${trigger}`;
        const acquired = await lease.setIfAbsent(RUN_LOCK_KEY, token, RUN_LOCK_TTL_SECONDS);
        if (!acquired) {
            logger.info('[SYNC] Sync already running, skipping this execution', { trigger });
            return { status: 'skipped', trigger, reason: 'already-running', message: 'Sync already running' };
        }

        try {
            return await this.execute(trigger);
        } catch (error) {
            logger.error('[SYNC] Sync failed', { trigger, error: errorMessage(error) });
            return { status: 'failed', trigger, message: errorMessage(error) };
        } finally {
            if (!(await lease.release(RUN_LOCK_KEY, token))) {
                logger.warn('[SYNC] Run lease expired before the run finished', { trigger });
            }
        }
    }

    private async execute(trigger: SyncTrigger): Promise<SyncReport> {
        const { ledger, transactions, device, ingest } = this.deps;

        const settings = await ledger.getSyncConfiguration();
        const end = this.deps.now();
        const start = settings.lastSync ?? subHours(end, DEFAULT_LOOKBACK_HOURS);
        const mode: SyncMode = isDeviceMode(settings.serverPort) ? 'device' : 'api';

        if (!settings.enableSync) {
            logger.info('[SYNC] Sync is disabled', { trigger });
            return { status: 'skipped', trigger, reason: 'disabled', message: 'Sync is disabled' };
        }

        let serverIp: string;
        try {
            serverIp = assertConfigured(settings, mode);
        } catch (error) {
            if (error instanceof ConfigurationError) {
                logger.warn(`[SYNC] ${error.message}`, { trigger, mode });
                return { status: 'skipped', trigger, reason: 'misconfigured', message: error.message };
            }
            throw error;
        }

        logger.info('[SYNC] Starting sync', {
            trigger,
            mode,
            start: mode === 'api' ? formatHostDateTime(start) : undefined,
            end: formatHostDateTime(end),
        });

        let records: PunchRecord[];
        let fetchError: string | null = null;
        if (mode === 'device') {
            records = await device.fetchAttendance(serverIp, settings.serverPort);
        } else {
            const fetched = await transactions.fetchTransactions(settings, start, end);
            records = fetched.records;
            fetchError = fetched.error?.message ?? null;
        }

        const summary = summarizeOutcomes(await ingest.ingest(records, end));

        // Advances even when nothing was found
        const totalSyncedRecords = settings.totalSyncedRecords + summary.inserted;
        await ledger.updateSyncConfiguration({ lastSync: end, totalSyncedRecords });

        if (records.length > 0) {
            logger.info('[SYNC] Sync completed', { trigger, mode, ...summary });
        } else {
            logger.info('[SYNC] Sync completed: no new transactions found', { trigger, mode });
        }

        return {
            status: 'completed',
            trigger,
            mode,
            window: { start, end },
            fetched: records.length,
            summary,
            fetchError,
            lastSync: end,
            totalSyncedRecords,
        };
    }
}

export default new SyncService();
