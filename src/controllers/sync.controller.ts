import { Request, Response } from 'express';
import { z } from 'zod';
import hrService from '../services/hr.service';
import syncService, { type SyncReport } from '../services/sync.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { SyncConfiguration } from '../types/sync';

const syncConfigBodySchema = z.object({
    serverIp: z.string().trim().min(1),
    serverPort: z.coerce.number().int().min(1).max(65535),
    enableSync: z.boolean().optional(),
    seconds: z.coerce.number().int().positive().optional(),
    token: z.string().trim().optional(),
});

function statusCodeFor(report: SyncReport): number {
    switch (report.status) {
        case 'completed':
            return 200;
        case 'failed':
            return 500;
        case 'skipped':
            if (report.reason === 'already-running') {
                return 409;
            }
            return report.reason === 'misconfigured' ? 400 : 200;
    }
}

function messageFor(report: SyncReport): string {
    if (report.status === 'completed') {
        const { inserted, duplicates, errors } = report.summary;
        const message = `Sync completed: ${inserted} created, ${duplicates} already present, ${errors} errors`;
        return report.fetchError ? `${message} (fetch stopped early: ${report.fetchError})` : message;
    }
    return report.message;
}

function publicConfiguration(settings: Partial<SyncConfiguration>) {
    const { token, ...rest } = settings;
    return { ...rest, tokenConfigured: Boolean(token) };
}

/**
 * Run a sync now and report the outcome
 */
export async function runSync(req: Request, res: Response): Promise<void> {
    const report = await syncService.run('manual');

    res.status(statusCodeFor(report)).json({
        success: report.status === 'completed',
        message: messageFor(report),
        report,
    });
}

/**
 * Update device address, port, token, enable flag and interval
 */
export async function updateSyncConfig(req: Request, res: Response): Promise<void> {
    const parsed = syncConfigBodySchema.safeParse(req.body);
    if (!parsed.success) {
        res.status(400).json({
            success: false,
            error: 'Invalid sync configuration',
            issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
    }

    try {
        await hrService.updateSyncConfiguration(parsed.data);
        logger.info('Sync configuration updated', publicConfiguration(parsed.data));

        res.json({
            success: true,
            config: publicConfiguration(parsed.data),
        });
    } catch (error) {
        logger.error('Failed to update sync configuration', { error: errorMessage(error) });
        res.status(500).json({
            success: false,
            error: errorMessage(error),
        });
    }
}
