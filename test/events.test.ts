import { describe, expect, it } from 'vitest';
import { encodeAbiParameters, toEventSelector, zeroAddress, zeroHash } from 'viem';
import { InvalidEventLogError } from '../src/errors.js';
import {
    claimResultFromCode,
    claimResultToCode,
    decodeValidatorManagerLog,
    encodeValidatorManagerEvent,
    parseValidatorManagerLogs,
} from '../src/events.js';
import type { ValidatorManagerEvent } from '../src/types/index.js';
import { ALICE, BOB, CLAIM_X, CLAIM_Y } from './fixtures.js';

const conflict: ValidatorManagerEvent = {
    eventName: 'ClaimReceived',
    args: { result: 'Conflict', claims: [CLAIM_X, CLAIM_Y], validators: [ALICE, BOB] },
};

describe('event log codec', () => {
    it('maps results to their uint8 codes', () => {
        expect(claimResultToCode('NoConflict')).toBe(0);
        expect(claimResultToCode('Consensus')).toBe(1);
        expect(claimResultToCode('Conflict')).toBe(2);
        expect(claimResultFromCode(1)).toBe('Consensus');
        expect(() => claimResultFromCode(3)).toThrow(InvalidEventLogError);
    });

    it('uses the on-chain event signatures as topics', () => {
        expect(encodeValidatorManagerEvent(conflict).topics).toEqual([
            toEventSelector('ClaimReceived(uint8,bytes32[2],address[2])'),
        ]);
        expect(
            encodeValidatorManagerEvent({ eventName: 'NewEpoch', args: { claim: CLAIM_X } }).topics
        ).toEqual([toEventSelector('NewEpoch(bytes32)')]);
    });

    it('encodes a new epoch as the bare claim word', () => {
        expect(encodeValidatorManagerEvent({ eventName: 'NewEpoch', args: { claim: CLAIM_X } }).data).toBe(CLAIM_X);
    });

    it('decodes what it encodes', () => {
        const consensus: ValidatorManagerEvent = {
            eventName: 'DisputeEnded',
            args: { result: 'Consensus', claims: [CLAIM_Y, zeroHash], validators: [BOB, zeroAddress] },
        };

        expect(decodeValidatorManagerLog(encodeValidatorManagerEvent(conflict))).toEqual(conflict);
        expect(decodeValidatorManagerLog(encodeValidatorManagerEvent(consensus))).toEqual(consensus);
    });

    it('rejects unknown result codes and logs without topics', () => {
        const data = encodeAbiParameters(
            [
                { name: 'result', type: 'uint8' },
                { name: 'claims', type: 'bytes32[2]' },
                { name: 'validators', type: 'address[2]' },
            ],
            [7, [CLAIM_X, CLAIM_Y], [ALICE, BOB]]
        );
        const topics = [toEventSelector('ClaimReceived(uint8,bytes32[2],address[2])')];

        expect(() => decodeValidatorManagerLog({ topics, data })).toThrow('Unknown claim result code 7');
        expect(() => decodeValidatorManagerLog({ topics: [], data: '0x' })).toThrow(InvalidEventLogError);
    });

    it('reports truncated payloads of known events as invalid logs', () => {
        const truncated = {
            topics: [toEventSelector('ClaimReceived(uint8,bytes32[2],address[2])')],
            data: '0x1234' as const,
        };

        expect(() => decodeValidatorManagerLog(truncated)).toThrow(InvalidEventLogError);
        expect(() => parseValidatorManagerLogs([encodeValidatorManagerEvent(conflict), truncated])).toThrow(
            InvalidEventLogError
        );
    });

    it('skips logs of unrelated events in a batch', () => {
        const unrelated = {
            topics: [toEventSelector('Transfer(address,address,uint256)')],
            data: '0x' as const,
        };
        const newEpoch: ValidatorManagerEvent = { eventName: 'NewEpoch', args: { claim: CLAIM_Y } };

        expect(
            parseValidatorManagerLogs([
                encodeValidatorManagerEvent(conflict),
                unrelated,
                encodeValidatorManagerEvent(newEpoch),
            ])
        ).toEqual([conflict, newEpoch]);
    });
});
