import type { Address, Hex } from 'viem';
import type { ClaimResult } from '../constants.js';

/** @notice Pair of claim values carried by an outcome: `[current, other]`. */
export type ClaimPair = readonly [Hex, Hex];

/** @notice Pair of identities carried by an outcome: `[endorser, other]`. */
export type ValidatorPair = readonly [Address, Address];

/** @notice Result of a claim submission or dispute resolution, mirrored by its event. */
export interface ClaimOutcome {
    result: ClaimResult;
    claims: ClaimPair;
    validators: ValidatorPair;
}

export interface SubmitClaimParameters {
    /** Caller; must be the orchestrator. */
    account: Address;
    validator: Address;
    claim: Hex;
}

export interface ResolveDisputeParameters {
    account: Address;
    winner: Address;
    loser: Address;
    winningClaim: Hex;
}

export interface AdvanceEpochParameters {
    account: Address;
}
