import { describe, expect, it } from 'vitest';
import { zeroAddress } from 'viem';
import { ConfigError } from '../src/errors.js';
import { ValidatorRoster } from '../src/roster.js';
import { ALICE, BOB, CAROL, DAVE } from './fixtures.js';

describe('ValidatorRoster', () => {
    it('keeps construction order as slot index and checksums entries', () => {
        const roster = ValidatorRoster.create([ALICE.toLowerCase(), BOB, CAROL]);

        expect(roster.slots).toEqual([ALICE, BOB, CAROL]);
        expect(roster.capacity).toBe(3);
        expect(roster.indexOf(ALICE)).toBe(0);
        expect(roster.indexOf(CAROL)).toBe(2);
        expect(roster.validatorAt(1)).toBe(BOB);
    });

    it('looks validators up case-insensitively', () => {
        const roster = ValidatorRoster.create([ALICE, BOB]);

        expect(roster.indexOf('0x00000000000000000000000000000000000000b2')).toBe(1);
        expect(roster.indexOf(DAVE)).toBeNull();
    });

    it('tombstones removed slots without renumbering the others', () => {
        const roster = ValidatorRoster.create([ALICE, BOB, CAROL]);
        const removed = roster.remove(1);

        expect(removed.slots).toEqual([ALICE, null, CAROL]);
        expect(removed.indexOf(BOB)).toBeNull();
        expect(removed.indexOf(CAROL)).toBe(2);
        expect(removed.validatorAt(1)).toBeNull();
        expect(removed.capacity).toBe(3);
        expect(roster.slots).toEqual([ALICE, BOB, CAROL]);
    });

    it('treats removing a tombstone as a no-op', () => {
        const removed = ValidatorRoster.create([ALICE, BOB]).remove(0);

        expect(removed.remove(0)).toBe(removed);
    });

    it('derives the occupied mask', () => {
        const roster = ValidatorRoster.create([ALICE, BOB, CAROL]);

        expect(roster.occupiedMask().toNumber()).toBe(0b111);
        expect(roster.remove(1).occupiedMask().toNumber()).toBe(0b101);
    });

    it('rejects invalid rosters', () => {
        const tooMany = Array.from({ length: 33 }, (_, i) => `0x${(i + 1).toString(16).padStart(40, '0')}`);

        expect(() => ValidatorRoster.create([])).toThrow(ConfigError);
        expect(() => ValidatorRoster.create(tooMany)).toThrow(ConfigError);
        expect(() => ValidatorRoster.create([ALICE, zeroAddress])).toThrow(ConfigError);
        expect(() => ValidatorRoster.create([ALICE, ALICE.toLowerCase()])).toThrow(
            `Duplicate validator ${ALICE}`
        );
        expect(() => ValidatorRoster.create(['not-an-address'])).toThrow(
            'Invalid validator address not-an-address'
        );
    });

    it('accepts a full 32-slot roster', () => {
        const validators = Array.from({ length: 32 }, (_, i) => `0x${(i + 1).toString(16).padStart(40, '0')}`);
        const roster = ValidatorRoster.create(validators);

        expect(roster.occupiedMask().toNumber()).toBe(0xffffffff);
        expect(roster.indexOf(roster.slots[31] ?? zeroAddress)).toBe(31);
    });
});
