import {
    AbiEventSignatureNotFoundError,
    decodeEventLog,
    encodeAbiParameters,
    encodeEventTopics,
    type Hex,
} from 'viem';
import { VALIDATOR_MANAGER_ABI } from './abis/index.js';
import { CLAIM_RESULT_CODES, EVENT_NAME, type ClaimResult } from './constants.js';
import { InvalidEventLogError } from './errors.js';
import type { ClaimOutcome, RawEventLog, ValidatorManagerEvent } from './types/index.js';

const OUTCOME_PARAMETERS = [
    { name: 'result', type: 'uint8' },
    { name: 'claims', type: 'bytes32[2]' },
    { name: 'validators', type: 'address[2]' },
] as const;

const NEW_EPOCH_PARAMETERS = [{ name: 'claim', type: 'bytes32' }] as const;

const EVENT_SELECTORS: Record<ValidatorManagerEvent['eventName'], Hex> = {
    ClaimReceived: encodeEventTopics({ abi: VALIDATOR_MANAGER_ABI, eventName: EVENT_NAME.CLAIM_RECEIVED })[0],
    DisputeEnded: encodeEventTopics({ abi: VALIDATOR_MANAGER_ABI, eventName: EVENT_NAME.DISPUTE_ENDED })[0],
    NewEpoch: encodeEventTopics({ abi: VALIDATOR_MANAGER_ABI, eventName: EVENT_NAME.NEW_EPOCH })[0],
};

export const claimResultToCode = (result: ClaimResult): number => CLAIM_RESULT_CODES.indexOf(result);

export const claimResultFromCode = (code: number): ClaimResult => {
    const result = CLAIM_RESULT_CODES[code];
    if (result === undefined) {
        throw new InvalidEventLogError(`Unknown claim result code ${code}`);
    }
    return result;
};

const encodeOutcome = (outcome: ClaimOutcome): Hex =>
    encodeAbiParameters(OUTCOME_PARAMETERS, [
        claimResultToCode(outcome.result),
        outcome.claims,
        outcome.validators,
    ]);

/** @notice ABI-encode an event the way the on-chain validator manager logs it. */
export const encodeValidatorManagerEvent = (event: ValidatorManagerEvent): RawEventLog => {
    const selector = EVENT_SELECTORS[event.eventName];
    switch (event.eventName) {
        case EVENT_NAME.CLAIM_RECEIVED:
        case EVENT_NAME.DISPUTE_ENDED:
            return { topics: [selector], data: encodeOutcome(event.args) };
        case EVENT_NAME.NEW_EPOCH:
            return { topics: [selector], data: encodeAbiParameters(NEW_EPOCH_PARAMETERS, [event.args.claim]) };
    }
};

// Unknown signatures pass through so batch parsing can skip them; malformed payloads become InvalidEventLogError
const decodeKnownEvent = (data: Hex, topics: [Hex, ...Hex[]]) => {
    try {
        return decodeEventLog({ abi: VALIDATOR_MANAGER_ABI, data, topics });
    } catch (error) {
        if (error instanceof AbiEventSignatureNotFoundError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidEventLogError(`Malformed validator manager log: ${message}`);
    }
};

/** @notice Decode a single validator-manager log. */
export const decodeValidatorManagerLog = (log: RawEventLog): ValidatorManagerEvent => {
    const [signature, ...rest] = log.topics;
    if (signature === undefined) {
        throw new InvalidEventLogError('Log has no event signature topic');
    }

    const decoded = decodeKnownEvent(log.data, [signature, ...rest]);

    switch (decoded.eventName) {
        case EVENT_NAME.CLAIM_RECEIVED:
        case EVENT_NAME.DISPUTE_ENDED:
            return {
                eventName: decoded.eventName,
                args: {
                    result: claimResultFromCode(decoded.args.result),
                    claims: decoded.args.claims,
                    validators: decoded.args.validators,
                },
            };
        case EVENT_NAME.NEW_EPOCH:
            return { eventName: decoded.eventName, args: { claim: decoded.args.claim } };
    }
};

/** @notice Decode a batch of logs in order, skipping logs of unrelated events; a malformed log fails the batch. */
export const parseValidatorManagerLogs = (logs: readonly RawEventLog[]): ValidatorManagerEvent[] => {
    const events: ValidatorManagerEvent[] = [];
    for (const log of logs) {
        try {
            events.push(decodeValidatorManagerLog(log));
        } catch (error) {
            if (error instanceof AbiEventSignatureNotFoundError) {
                continue;
            }
            throw error;
        }
    }
    return events;
};
