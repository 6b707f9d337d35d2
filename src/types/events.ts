import type { Hex } from 'viem';
import type { ClaimOutcome } from './claim.js';

export interface ClaimReceivedEvent {
    eventName: 'ClaimReceived';
    args: ClaimOutcome;
}

export interface DisputeEndedEvent {
    eventName: 'DisputeEnded';
    args: ClaimOutcome;
}

export interface NewEpochEvent {
    eventName: 'NewEpoch';
    args: { claim: Hex };
}

export type ValidatorManagerEvent = ClaimReceivedEvent | DisputeEndedEvent | NewEpochEvent;

export type ValidatorManagerEventListener = (event: ValidatorManagerEvent) => void;

/** @notice Raw log shape as returned by an RPC node. */
export interface RawEventLog {
    topics: readonly Hex[];
    data: Hex;
}
