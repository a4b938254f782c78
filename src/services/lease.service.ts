/**
 * Short-lived key/value store with per-key expiry.
 *
 * Backs the run lock and the scheduler's last-run marker. Kept behind an
 * interface so a shared store (e.g. Redis) can replace the in-memory one when
 * several bridge processes point at the same device.
 */
export interface LeaseStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    /** Atomically store the value unless an unexpired entry exists. */
    setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
    /** Delete the entry only while it still holds `value`. */
    release(key: string, value: string): Promise<boolean>;
}

interface Entry {
    value: string;
    expiresAt: number;
}

export class MemoryLeaseStore implements LeaseStore {
    private entries = new Map<string, Entry>();

    constructor(private readonly clock: () => number = Date.now) {}

    private read(key: string): Entry | null {
        const entry = this.entries.get(key);
        if (!entry) {
            return null;
        }
        if (entry.expiresAt <= this.clock()) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }

    private write(key: string, value: string, ttlSeconds: number): void {
        this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
    }

    async get(key: string): Promise<string | null> {
        return this.read(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.write(key, value, ttlSeconds);
    }

    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        if (this.read(key)) {
            return false;
        }
        this.write(key, value, ttlSeconds);
        return true;
    }

    async release(key: string, value: string): Promise<boolean> {
        if (this.read(key)?.value !== value) {
            return false;
        }
        this.entries.delete(key);
        return true;
    }
}

export default new MemoryLeaseStore();
