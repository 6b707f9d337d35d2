import { getAddress, isAddress, isAddressEqual, zeroAddress, type Address } from 'viem';
import { ValidatorBitmask } from './bitmask.js';
import { MAX_VALIDATORS } from './constants.js';
import { ConfigError } from './errors.js';

const lookupKey = (address: Address): string => address.toLowerCase();

/**
 * @notice Fixed-capacity, ordered validator slots. A slot's position is its permanent bit index;
 * removed validators leave a `null` tombstone that is never reassigned.
 */
export class ValidatorRoster {
    private readonly lookup: ReadonlyMap<string, number>;

    private constructor(public readonly slots: readonly (Address | null)[]) {
        const lookup = new Map<string, number>();
        slots.forEach((slot, index) => {
            if (slot !== null) {
                lookup.set(lookupKey(slot), index);
            }
        });
        this.lookup = lookup;
    }

    static create(validators: readonly string[]): ValidatorRoster {
        if (validators.length === 0) {
            throw new ConfigError('Validator roster must not be empty');
        }
        if (validators.length > MAX_VALIDATORS) {
            throw new ConfigError(
                `Validator roster holds at most ${MAX_VALIDATORS} validators, got ${validators.length}`
            );
        }

        const slots: Address[] = [];
        for (const raw of validators) {
            if (!isAddress(raw, { strict: false })) {
                throw new ConfigError(`Invalid validator address ${raw}`);
            }
            const address = getAddress(raw);
            if (isAddressEqual(address, zeroAddress)) {
                throw new ConfigError('Validator roster must not contain the zero address');
            }
            if (slots.some(existing => isAddressEqual(existing, address))) {
                throw new ConfigError(`Duplicate validator ${address}`);
            }
            slots.push(address);
        }
        return new ValidatorRoster(slots);
    }

    get capacity(): number {
        return this.slots.length;
    }

    /** @notice Slot index of an occupied validator, or `null`. */
    indexOf(validator: Address): number | null {
        return this.lookup.get(lookupKey(validator)) ?? null;
    }

    validatorAt(index: number): Address | null {
        return this.slots[index] ?? null;
    }

    /** @notice Roster with `index` tombstoned; other slots keep their positions. */
    remove(index: number): ValidatorRoster {
        if (this.validatorAt(index) === null) {
            return this;
        }
        return new ValidatorRoster(this.slots.map((slot, position) => (position === index ? null : slot)));
    }

    occupiedMask(): ValidatorBitmask {
        let mask = ValidatorBitmask.empty(this.capacity);
        this.slots.forEach((slot, index) => {
            if (slot !== null) {
                mask = mask.set(index);
            }
        });
        return mask;
    }
}
