export type { CacheInterface } from './common.js';
export type {
    AdvanceEpochParameters,
    ClaimOutcome,
    ClaimPair,
    ResolveDisputeParameters,
    SubmitClaimParameters,
    ValidatorPair,
} from './claim.js';
export type {
    ClaimReceivedEvent,
    DisputeEndedEvent,
    NewEpochEvent,
    RawEventLog,
    ValidatorManagerEvent,
    ValidatorManagerEventListener,
} from './events.js';
