/** @notice Cache contract used by the claim indexer to persist finalized data. */
export interface CacheInterface {
    get(epoch: number, key: string): Promise<unknown | null>;
    set(epoch: number, key: string, value: unknown): Promise<void>;
    delete(epoch: number, key: string): Promise<void>;
    clear(epoch: number): Promise<void>;
}
