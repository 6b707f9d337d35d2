import type { Address, Hex } from 'viem';

export type ValidatorManagerErrorCode =
    | 'UNAUTHORIZED'
    | 'INVALID_CLAIM'
    | 'UNKNOWN_VALIDATOR'
    | 'INVALID_DISPUTE'
    | 'INVARIANT_VIOLATION'
    | 'INVALID_CONFIG'
    | 'INVALID_EVENT_LOG';

/** @notice Base class for every error raised by this package. */
export class ValidatorManagerError extends Error {
    constructor(
        public readonly code: ValidatorManagerErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'ValidatorManagerError';
    }
}

/** @notice Caller is not the orchestrator fixed at construction. */
export class AuthorizationError extends ValidatorManagerError {
    constructor(
        public readonly caller: Address,
        public readonly orchestrator: Address
    ) {
        super('UNAUTHORIZED', `Caller ${caller} is not the orchestrator ${orchestrator}`);
        this.name = 'AuthorizationError';
    }
}

export class InvalidClaimError extends ValidatorManagerError {
    constructor(
        public readonly claim: string,
        reason = 'empty claim'
    ) {
        super('INVALID_CLAIM', `Invalid claim ${claim}: ${reason}`);
        this.name = 'InvalidClaimError';
    }
}

/** @notice Identity does not match an occupied roster slot. */
export class UnknownValidatorError extends ValidatorManagerError {
    constructor(
        public readonly validator: Address,
        public readonly role: 'sender' | 'winner' | 'loser'
    ) {
        super('UNKNOWN_VALIDATOR', `Unknown ${role} validator ${validator}`);
        this.name = 'UnknownValidatorError';
    }
}

export class InvalidDisputeError extends ValidatorManagerError {
    constructor(message: string) {
        super('INVALID_DISPUTE', message);
        this.name = 'InvalidDisputeError';
    }
}

/** @notice Internal logic error; unreachable while the mask invariants hold. */
export class InvariantViolationError extends ValidatorManagerError {
    constructor(
        message: string,
        public readonly claim: Hex | null = null
    ) {
        super('INVARIANT_VIOLATION', message);
        this.name = 'InvariantViolationError';
    }
}

export class ConfigError extends ValidatorManagerError {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super('INVALID_CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

export class InvalidEventLogError extends ValidatorManagerError {
    constructor(message: string) {
        super('INVALID_EVENT_LOG', message);
        this.name = 'InvalidEventLogError';
    }
}
