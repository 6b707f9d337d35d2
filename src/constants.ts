import { zeroAddress, zeroHash, type Address, type Hex } from 'viem';

/** @notice Widest roster a bitmask can index. */
export const MAX_VALIDATORS = 32;

/** @notice Claim value meaning "no claim this epoch". */
export const NONE_CLAIM: Hex = zeroHash;

/** @notice Identity value meaning "no validator". */
export const NONE_VALIDATOR: Address = zeroAddress;

// Outcome of a claim submission or dispute resolution
export const CLAIM_RESULT = {
    NO_CONFLICT: 'NoConflict',
    CONSENSUS: 'Consensus',
    CONFLICT: 'Conflict',
} as const;
export type ClaimResult = (typeof CLAIM_RESULT)[keyof typeof CLAIM_RESULT];

// uint8 codes used by the on-chain event encoding, in declaration order
export const CLAIM_RESULT_CODES: readonly ClaimResult[] = [
    CLAIM_RESULT.NO_CONFLICT,
    CLAIM_RESULT.CONSENSUS,
    CLAIM_RESULT.CONFLICT,
];

// What a dispute outcome does when the loser holds no slot
export const UNKNOWN_LOSER_POLICY = {
    SKIP: 'skip',
    REJECT: 'reject',
} as const;
export type UnknownLoserPolicy = (typeof UNKNOWN_LOSER_POLICY)[keyof typeof UNKNOWN_LOSER_POLICY];

export const EVENT_NAME = {
    CLAIM_RECEIVED: 'ClaimReceived',
    DISPUTE_ENDED: 'DisputeEnded',
    NEW_EPOCH: 'NewEpoch',
} as const;

// Cache key under which the indexer stores each finalized claim
export const FINALIZED_CLAIM_KEY = 'finalizedClaim';
