import { isHex, type Hex } from 'viem';
import { CLAIM_RESULT, EVENT_NAME, FINALIZED_CLAIM_KEY } from './constants.js';
import { log } from './logger.js';
import type { CacheInterface, ClaimOutcome, ValidatorManagerEvent } from './types/index.js';
import type { ValidatorManager } from './validator_manager.js';

/** @notice Logical phase of the epoch being claimed. */
export const EPOCH_PHASE = {
    AWAITING_FIRST_CLAIM: 'AwaitingFirstClaim',
    AWAITING_CONSENSUS_NO_CONFLICT: 'AwaitingConsensusNoConflict',
    AWAITING_CONSENSUS_AFTER_CONFLICT: 'AwaitingConsensusAfterConflict',
    CONSENSUS_REACHED: 'ConsensusReached',
} as const;
export type EpochPhase = (typeof EPOCH_PHASE)[keyof typeof EPOCH_PHASE];

export interface FinalizedEpoch {
    epoch: number;
    claim: Hex;
}

export interface ClaimIndexState {
    epoch: number;
    phase: EpochPhase;
    consensusClaim: Hex | null;
    conflicts: ClaimOutcome[];
    finalizedEpochs: FinalizedEpoch[];
}

export interface ClaimIndexerOptions {
    initialEpoch?: number;
    cache?: CacheInterface | null;
}

/**
 * @notice Folds the validator-manager event stream into a per-epoch view: which phase the open
 * epoch is in, the conflicts seen so far and the claim each closed epoch finalized with.
 */
export class ClaimIndexer {
    private epoch: number;
    private phase: EpochPhase = EPOCH_PHASE.AWAITING_FIRST_CLAIM;
    private consensusClaim: Hex | null = null;
    private conflicts: ClaimOutcome[] = [];
    private readonly finalizedEpochs: FinalizedEpoch[] = [];
    private readonly cache: CacheInterface | null;
    private writes: Promise<void> = Promise.resolve();
    private writeError: unknown = undefined;

    constructor(options: ClaimIndexerOptions = {}) {
        this.epoch = options.initialEpoch ?? 0;
        this.cache = options.cache ?? null;
    }

    /** @notice Feed every event the manager commits into this indexer. */
    attach(manager: ValidatorManager): () => void {
        return manager.watchEvents(event => this.ingest(event));
    }

    ingest(event: ValidatorManagerEvent): void {
        switch (event.eventName) {
            case EVENT_NAME.CLAIM_RECEIVED:
            case EVENT_NAME.DISPUTE_ENDED:
                this.applyOutcome(event.args);
                break;
            case EVENT_NAME.NEW_EPOCH:
                this.closeEpoch(event.args.claim);
                break;
        }
        log.indexer('epoch %d after %s: %s', this.epoch, event.eventName, this.phase);
    }

    snapshot(): ClaimIndexState {
        return {
            epoch: this.epoch,
            phase: this.phase,
            consensusClaim: this.consensusClaim,
            conflicts: [...this.conflicts],
            finalizedEpochs: [...this.finalizedEpochs],
        };
    }

    /** @notice Claim a closed epoch finalized with, from memory or the cache; `null` if unknown. */
    async getFinalizedClaim(epoch: number): Promise<Hex | null> {
        const known = this.finalizedEpochs.find(entry => entry.epoch === epoch);
        if (known) {
            return known.claim;
        }
        if (!this.cache) {
            return null;
        }
        const cached = await this.cache.get(epoch, FINALIZED_CLAIM_KEY);
        return isHex(cached, { strict: true }) ? cached : null;
    }

    /** @notice Wait for queued cache writes; rethrows the first write failure. */
    async flush(): Promise<void> {
        await this.writes;
        if (this.writeError !== undefined) {
            const error = this.writeError;
            this.writeError = undefined;
            throw error;
        }
    }

    private applyOutcome(outcome: ClaimOutcome): void {
        switch (outcome.result) {
            case CLAIM_RESULT.CONFLICT:
                this.conflicts.push(outcome);
                this.phase = EPOCH_PHASE.AWAITING_CONSENSUS_AFTER_CONFLICT;
                break;
            case CLAIM_RESULT.CONSENSUS:
                this.consensusClaim = outcome.claims[0];
                this.phase = EPOCH_PHASE.CONSENSUS_REACHED;
                break;
            case CLAIM_RESULT.NO_CONFLICT:
                this.phase =
                    this.conflicts.length > 0
                        ? EPOCH_PHASE.AWAITING_CONSENSUS_AFTER_CONFLICT
                        : EPOCH_PHASE.AWAITING_CONSENSUS_NO_CONFLICT;
                break;
        }
    }

    private closeEpoch(claim: Hex): void {
        const epoch = this.epoch;
        this.finalizedEpochs.push({ epoch, claim });
        this.persist(epoch, claim);

        this.epoch = epoch + 1;
        this.phase = EPOCH_PHASE.AWAITING_FIRST_CLAIM;
        this.consensusClaim = null;
        this.conflicts = [];
    }

    private persist(epoch: number, claim: Hex): void {
        const { cache } = this;
        if (!cache) {
            return;
        }
        this.writes = this.writes
            .then(() => cache.set(epoch, FINALIZED_CLAIM_KEY, claim))
            .catch((error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                log.indexer('failed to persist claim for epoch %d: %s', epoch, message);
                if (this.writeError === undefined) {
                    this.writeError = error;
                }
            });
    }
}
