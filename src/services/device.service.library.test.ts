import { describe, it, expect, vi } from 'vitest';
import { DeviceService } from './device.service';
import { IngestService } from './ingest.service';
import { MemoryLeaseStore } from './lease.service';
import { RUN_LOCK_KEY, SyncService } from './sync.service';
import { MemoryLedger } from '../test-utils/memory-ledger';
import { DeviceUnavailableError } from '../utils/errors';

vi.mock('node-zklib', () => {
    throw new Error("Cannot find module 'node-zklib'");
});

describe('device library unavailable', () => {
    it('rejects the fetch with DeviceUnavailableError', async () => {
        const fetch = new DeviceService().fetchAttendance('10.0.0.9', 4370);

        await expect(fetch).rejects.toBeInstanceOf(DeviceUnavailableError);
        await expect(fetch).rejects.toThrow(/^Device library not available: /);
    });

    it('fails the run without moving the watermark and releases the lease', async () => {
        const lastSync = new Date(2024, 0, 1, 11, 0, 0);
        const ledger = new MemoryLedger([], { serverIp: '10.0.0.9', serverPort: 4370, token: null, lastSync });
        const lease = new MemoryLeaseStore();
        const service = new SyncService({
            ledger,
            lease,
            transactions: { fetchTransactions: vi.fn() },
            device: new DeviceService(),
            ingest: new IngestService(ledger),
            now: () => new Date(2024, 0, 1, 12, 0, 0),
        });

        const report = await service.run('scheduled');

        expect(report.status).toBe('failed');
        expect(report.status === 'failed' && report.message).toMatch(/^Device library not available: /);
        expect(ledger.configUpdates).toHaveLength(0);
        expect(ledger.settings.lastSync).toEqual(lastSync);
        expect(await lease.get(RUN_LOCK_KEY)).toBeNull();
    });
});
