import { describe, expect, it } from 'vitest';
import { zeroAddress, zeroHash } from 'viem';
import { outcomeBullets, shortHex } from '../examples/example.js';
import { CLAIM_X, CLAIM_Y } from './fixtures.js';

describe('example output', () => {
    it('shortens hex values to the default width', () => {
        expect(shortHex(CLAIM_X)).toBe('0x11111...1111111');
        expect(shortHex('0x1234')).toBe('0x1234');
    });

    it('collapses to an ellipsis when the width leaves no room', () => {
        expect(shortHex(CLAIM_X, 3)).toBe('...');
        expect(shortHex(CLAIM_X, 0)).toBe('...');
    });

    it('renders every claim and validator of an outcome shortened', () => {
        expect(
            outcomeBullets({
                result: 'Conflict',
                claims: [CLAIM_X, CLAIM_Y],
                validators: [zeroAddress, zeroAddress],
            })
        ).toEqual([
            'claims 0x11111...1111111 · 0x22222...2222222',
            'validators 0x00000...0000000 · 0x00000...0000000',
        ]);
        expect(
            outcomeBullets({ result: 'NoConflict', claims: [zeroHash, zeroHash], validators: [zeroAddress, zeroAddress] })[0]
        ).toBe('claims 0x00000...0000000 · 0x00000...0000000');
    });
});
