import type { CacheInterface } from './types/index.js';

/** @notice In-process cache keyed by epoch, then by entry key. */
export class MemoryCache implements CacheInterface {
    private readonly epochs = new Map<number, Map<string, unknown>>();

    async get(epoch: number, key: string): Promise<unknown | null> {
        return this.epochs.get(epoch)?.get(key) ?? null;
    }

    async set(epoch: number, key: string, value: unknown): Promise<void> {
        let entries = this.epochs.get(epoch);
        if (!entries) {
            entries = new Map();
            this.epochs.set(epoch, entries);
        }
        entries.set(key, value);
    }

    async delete(epoch: number, key: string): Promise<void> {
        this.epochs.get(epoch)?.delete(key);
    }

    async clear(epoch: number): Promise<void> {
        this.epochs.delete(epoch);
    }
}
