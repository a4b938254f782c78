import cron from 'node-cron';
import hrService from '../services/hr.service';
import syncService, { SyncReport, SyncService } from '../services/sync.service';
import leaseStore, { LeaseStore } from '../services/lease.service';
import logger from '../utils/logger';
import config from '../utils/config';
import { errorMessage } from '../utils/errors';
import type { HostLedger } from '../types/sync';

export const LAST_RUN_KEY = 'checkin-sync:last-run';
const LAST_RUN_TTL_SECONDS = 60 * 60;
const TICK_SECONDS = 60;

/**
 * Lets intervals shorter than the scheduler tick ride on top of it.
 * Intervals of a minute or more run on every tick.
 */
export class ScheduleGate {
    constructor(private readonly store: LeaseStore = leaseStore) {}

    async shouldRun(intervalSeconds: number, now: Date): Promise<boolean> {
        if (intervalSeconds >= TICK_SECONDS) {
            return true;
        }

        const lastRun = await this.store.get(LAST_RUN_KEY);
        if (lastRun !== null) {
            const elapsedSeconds = (now.getTime() - Number(lastRun)) / 1000;
            if (elapsedSeconds < intervalSeconds) {
                return false;
            }
        }

        await this.store.set(LAST_RUN_KEY, String(now.getTime()), LAST_RUN_TTL_SECONDS);
        return true;
    }
}

export interface ScheduledSyncDependencies {
    ledger: HostLedger;
    gate: Pick<ScheduleGate, 'shouldRun'>;
    sync: Pick<SyncService, 'run'>;
    now: () => Date;
}

const defaultDependencies: ScheduledSyncDependencies = {
    ledger: hrService,
    gate: new ScheduleGate(),
    sync: syncService,
    now: () => new Date(),
};

function logReport(report: SyncReport): void {
    switch (report.status) {
        case 'completed':
            logger.info('[CRON] Scheduled sync completed', {
                mode: report.mode,
                fetched: report.fetched,
                ...report.summary,
            });
            break;
        case 'skipped':
            logger.info(`[CRON] Scheduled sync skipped: ${report.message}`);
            break;
        case 'failed':
            logger.error(`[CRON] Scheduled sync failed: ${report.message}`);
            break;
    }
}

/**
 * Scheduled entry point. Never throws; outcomes are only logged.
 */
export async function scheduledSync(deps: ScheduledSyncDependencies = defaultDependencies): Promise<void> {
    try {
        const settings = await deps.ledger.getSyncConfiguration();
        if (!settings.enableSync) {
            return;
        }

        if (!(await deps.gate.shouldRun(settings.seconds, deps.now()))) {
            return;
        }

        logReport(await deps.sync.run('scheduled'));
    } catch (error) {
        logger.error('[CRON] Scheduled sync failed', { error: errorMessage(error) });
    }
}

async function schedulerHeartbeat(): Promise<void> {
    try {
        const settings = await hrService.getSyncConfiguration();
        if (settings.enableSync) {
            logger.info('[CRON] Checkin sync scheduler active', { intervalSeconds: settings.seconds });
        }
    } catch (error) {
        logger.error('[CRON] Scheduler check failed', { error: errorMessage(error) });
    }
}

/**
 * Start checkin sync cron jobs
 */
export function startCheckinSyncJob(): void {
    cron.schedule(config.sync.cron, () => scheduledSync());
    cron.schedule('0 * * * *', schedulerHeartbeat);
    logger.info(`Checkin sync job scheduled (${config.sync.cron})`);
}
