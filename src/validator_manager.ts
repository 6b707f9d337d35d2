import { isAddress, isAddressEqual, isHex, size, type Address, type Hex } from 'viem';
import { ValidatorBitmask } from './bitmask.js';
import { parseValidatorManagerConfig, type ValidatorManagerConfig } from './config.js';
import {
    CLAIM_RESULT,
    EVENT_NAME,
    NONE_CLAIM,
    NONE_VALIDATOR,
    UNKNOWN_LOSER_POLICY,
    type UnknownLoserPolicy,
} from './constants.js';
import {
    AuthorizationError,
    InvalidClaimError,
    InvalidDisputeError,
    InvariantViolationError,
    UnknownValidatorError,
} from './errors.js';
import { log } from './logger.js';
import { ValidatorRoster } from './roster.js';
import type {
    AdvanceEpochParameters,
    ClaimOutcome,
    ResolveDisputeParameters,
    SubmitClaimParameters,
    ValidatorManagerEvent,
    ValidatorManagerEventListener,
} from './types/index.js';

type ManagerState = {
    readonly roster: ValidatorRoster;
    readonly goal: ValidatorBitmask;
    readonly agreement: ValidatorBitmask;
    readonly claim: Hex;
};

/** @notice Lower-case a 32-byte claim, rejecting malformed values and the empty claim. */
export const normalizeClaim = (claim: string): Hex => {
    if (!isHex(claim, { strict: true }) || size(claim) !== 32) {
        throw new InvalidClaimError(claim, 'expected 32-byte hex');
    }
    const normalized: Hex = `0x${claim.slice(2).toLowerCase()}`;
    if (normalized === NONE_CLAIM) {
        throw new InvalidClaimError(claim);
    }
    return normalized;
};

const noConflict = (): ClaimOutcome => ({
    result: CLAIM_RESULT.NO_CONFLICT,
    claims: [NONE_CLAIM, NONE_CLAIM],
    validators: [NONE_VALIDATOR, NONE_VALIDATOR],
});

/** @notice Consensus once the agreement mask matches the goal bit for bit, else NoConflict. */
const settle = (
    claim: Hex,
    validator: Address,
    agreement: ValidatorBitmask,
    goal: ValidatorBitmask
): ClaimOutcome =>
    agreement.equals(goal)
        ? {
              result: CLAIM_RESULT.CONSENSUS,
              claims: [claim, NONE_CLAIM],
              validators: [validator, NONE_VALIDATOR],
          }
        : noConflict();

/**
 * @notice Tracks which validators endorse the current epoch claim, detects conflicting claims and
 * consensus, and evicts validators that lose an externally adjudicated dispute.
 *
 * @dev Every mutating call validates its input and computes the full next state before committing
 * it in a single assignment, so a rejected call leaves the state untouched. Only the orchestrator
 * fixed at construction may call the mutating entry points.
 */
export class ValidatorManager {
    public readonly orchestrator: Address;
    public readonly unknownLoserPolicy: UnknownLoserPolicy;
    private state: ManagerState;
    private readonly listeners = new Set<ValidatorManagerEventListener>();

    constructor(config: ValidatorManagerConfig) {
        const roster = ValidatorRoster.create(config.validators);
        this.orchestrator = config.orchestrator;
        this.unknownLoserPolicy = config.unknownLoserPolicy;
        this.state = {
            roster,
            goal: roster.occupiedMask(),
            agreement: ValidatorBitmask.empty(roster.capacity),
            claim: NONE_CLAIM,
        };
    }

    /** @notice Validate a raw config object and build a manager from it. */
    static fromConfig(raw: unknown): ValidatorManager {
        return new ValidatorManager(parseValidatorManagerConfig(raw));
    }

    submitClaim({ account, validator, claim: rawClaim }: SubmitClaimParameters): ClaimOutcome {
        this.assertOrchestrator(account);
        const claim = normalizeClaim(rawClaim);
        const { state } = this;
        const index = state.roster.indexOf(validator);
        if (index === null) {
            throw new UnknownValidatorError(validator, 'sender');
        }
        const sender = this.addressAt(state.roster, index);

        // The first claim of an epoch becomes the baseline
        const current = state.claim === NONE_CLAIM ? claim : state.claim;

        let next: ManagerState;
        let outcome: ClaimOutcome;
        if (claim !== current) {
            outcome = {
                result: CLAIM_RESULT.CONFLICT,
                claims: [current, claim],
                validators: [this.representativeEndorser(state.roster, state.agreement, current), sender],
            };
            next = state;
        } else {
            const agreement = state.agreement.set(index);
            outcome = settle(claim, sender, agreement, state.goal);
            next = { ...state, claim, agreement };
        }

        this.state = next;
        log.claims(
            '%s claimed %s: %s (agreement %s, goal %s)',
            sender,
            claim,
            outcome.result,
            next.agreement.toString(),
            next.goal.toString()
        );
        this.emit({ eventName: EVENT_NAME.CLAIM_RECEIVED, args: outcome });
        return outcome;
    }

    resolveDispute({ account, winner, loser, winningClaim: rawClaim }: ResolveDisputeParameters): ClaimOutcome {
        this.assertOrchestrator(account);
        const winningClaim = normalizeClaim(rawClaim);
        const { state } = this;

        const winnerIndex = state.roster.indexOf(winner);
        if (winnerIndex === null) {
            throw new UnknownValidatorError(winner, 'winner');
        }
        const winnerAddress = this.addressAt(state.roster, winnerIndex);
        if (isAddress(loser, { strict: false }) && isAddressEqual(winnerAddress, loser)) {
            throw new InvalidDisputeError(`Dispute winner and loser are the same validator ${winnerAddress}`);
        }

        let { roster, goal, agreement } = state;
        const loserIndex = roster.indexOf(loser);
        if (loserIndex !== null) {
            roster = roster.remove(loserIndex);
            goal = goal.clear(loserIndex);
            agreement = agreement.clear(loserIndex);
            log.disputes('removed validator %s from slot %d (goal %s)', loser, loserIndex, goal.toString());
        } else if (this.unknownLoserPolicy === UNKNOWN_LOSER_POLICY.REJECT) {
            throw new UnknownValidatorError(loser, 'loser');
        } else {
            log.disputes('loser %s holds no slot, skipping removal', loser);
        }

        let next: ManagerState;
        let outcome: ClaimOutcome;
        if (winningClaim === state.claim) {
            outcome = settle(winningClaim, winnerAddress, agreement, goal);
            next = { roster, goal, agreement, claim: state.claim };
        } else if (!agreement.isEmpty()) {
            // Someone else still endorses the losing claim; the dispute continues against them
            outcome = {
                result: CLAIM_RESULT.CONFLICT,
                claims: [state.claim, winningClaim],
                validators: [this.representativeEndorser(roster, agreement, state.claim), winnerAddress],
            };
            next = { roster, goal, agreement, claim: state.claim };
        } else {
            const adopted = agreement.set(winnerIndex);
            outcome = settle(winningClaim, winnerAddress, adopted, goal);
            next = { roster, goal, agreement: adopted, claim: winningClaim };
        }

        this.state = next;
        log.disputes(
            'dispute won by %s with %s: %s (agreement %s, goal %s)',
            winnerAddress,
            winningClaim,
            outcome.result,
            next.agreement.toString(),
            next.goal.toString()
        );
        this.emit({ eventName: EVENT_NAME.DISPUTE_ENDED, args: outcome });
        return outcome;
    }

    /** @notice Close the epoch, returning its claim (`NONE_CLAIM` if nobody claimed). */
    advanceEpoch({ account }: AdvanceEpochParameters): Hex {
        this.assertOrchestrator(account);
        const { state } = this;
        const finalized = state.claim;

        this.state = {
            ...state,
            claim: NONE_CLAIM,
            agreement: ValidatorBitmask.empty(state.roster.capacity),
        };
        log.epochs('epoch closed with claim %s (agreement was %s)', finalized, state.agreement.toString());
        this.emit({ eventName: EVENT_NAME.NEW_EPOCH, args: { claim: finalized } });
        return finalized;
    }

    agreementMask(): ValidatorBitmask {
        return this.state.agreement;
    }

    consensusGoalMask(): ValidatorBitmask {
        return this.state.goal;
    }

    currentClaim(): Hex {
        return this.state.claim;
    }

    /** @notice Roster slots in bit order; removed validators read as `null`. */
    validators(): readonly (Address | null)[] {
        return this.state.roster.slots;
    }

    /** @notice Subscribe to committed outcomes. Returns a function that unsubscribes. */
    watchEvents(listener: ValidatorManagerEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private assertOrchestrator(account: Address): void {
        if (!isAddress(account, { strict: false }) || !isAddressEqual(account, this.orchestrator)) {
            throw new AuthorizationError(account, this.orchestrator);
        }
    }

    private addressAt(roster: ValidatorRoster, index: number): Address {
        const address = roster.validatorAt(index);
        if (address === null) {
            throw new InvariantViolationError(`Slot ${index} resolved from the lookup is tombstoned`);
        }
        return address;
    }

    /** @notice Lowest-index validator endorsing `claim`. */
    private representativeEndorser(roster: ValidatorRoster, agreement: ValidatorBitmask, claim: Hex): Address {
        const index = agreement.lowestIndex();
        if (index === null) {
            throw new InvariantViolationError(`No validator endorses the current claim ${claim}`, claim);
        }
        return this.addressAt(roster, index);
    }

    private emit(event: ValidatorManagerEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                log.events('listener failed on %s: %s', event.eventName, message);
            }
        }
    }
}
