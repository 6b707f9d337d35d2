import { describe, expect, it } from 'vitest';
import { concat, keccak256, type Hex } from 'viem';
import { computeEpochHash } from '../src/epoch_hash.js';
import { InvalidClaimError } from '../src/errors.js';

const word = (value: number): Hex => `0x${value.toString(16).padStart(64, '0')}`;

describe('computeEpochHash', () => {
    it('hashes the three drive hashes as consecutive 32-byte words', () => {
        const hashes = {
            outputDriveHash: word(0xaa),
            messageDriveHash: word(0xbb),
            machineFinalState: word(0xcc),
        };

        expect(computeEpochHash(hashes)).toBe(keccak256(concat([word(0xaa), word(0xbb), word(0xcc)])));
    });

    it('depends on the order of the drive hashes', () => {
        expect(
            computeEpochHash({ outputDriveHash: word(1), messageDriveHash: word(2), machineFinalState: word(3) })
        ).not.toBe(
            computeEpochHash({ outputDriveHash: word(2), messageDriveHash: word(1), machineFinalState: word(3) })
        );
    });

    it('rejects drive hashes that are not 32 bytes', () => {
        expect(() =>
            computeEpochHash({ outputDriveHash: '0x01', messageDriveHash: word(2), machineFinalState: word(3) })
        ).toThrow(InvalidClaimError);
    });
});
