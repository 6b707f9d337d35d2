import { MAX_VALIDATORS } from './constants.js';

const bit = (index: number): number => (1 << index) >>> 0;

const assertCapacity = (capacity: number): void => {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_VALIDATORS) {
        throw new RangeError(`Bitmask capacity must be an integer in 1..${MAX_VALIDATORS}, got ${capacity}`);
    }
};

/**
 * @notice Immutable set of validator slot indices with a fixed capacity.
 * @dev Backed by an unsigned 32-bit integer; every mutator returns a new mask.
 */
export class ValidatorBitmask {
    private constructor(
        private readonly value: number,
        public readonly capacity: number
    ) {}

    static empty(capacity: number): ValidatorBitmask {
        assertCapacity(capacity);
        return new ValidatorBitmask(0, capacity);
    }

    /** @notice Mask with every index below `capacity` set. */
    static full(capacity: number): ValidatorBitmask {
        assertCapacity(capacity);
        const value = capacity === MAX_VALIDATORS ? 0xffffffff : bit(capacity) - 1;
        return new ValidatorBitmask(value >>> 0, capacity);
    }

    static fromNumber(value: number, capacity: number): ValidatorBitmask {
        assertCapacity(capacity);
        if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
            throw new RangeError(`Bitmask value must be an unsigned 32-bit integer, got ${value}`);
        }
        const mask = new ValidatorBitmask(value >>> 0, capacity);
        if (!mask.isSubsetOf(ValidatorBitmask.full(capacity))) {
            throw new RangeError(`Bitmask value ${value} has bits beyond capacity ${capacity}`);
        }
        return mask;
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
            throw new RangeError(`Bit index ${index} outside 0..${this.capacity - 1}`);
        }
    }

    set(index: number): ValidatorBitmask {
        this.checkIndex(index);
        return new ValidatorBitmask((this.value | bit(index)) >>> 0, this.capacity);
    }

    clear(index: number): ValidatorBitmask {
        this.checkIndex(index);
        return new ValidatorBitmask((this.value & ~bit(index)) >>> 0, this.capacity);
    }

    has(index: number): boolean {
        this.checkIndex(index);
        return (this.value & bit(index)) !== 0;
    }

    /** @notice Bit-for-bit equality; masks of different capacity are never equal. */
    equals(other: ValidatorBitmask): boolean {
        return this.capacity === other.capacity && this.value === other.value;
    }

    isSubsetOf(other: ValidatorBitmask): boolean {
        return (this.value & ~other.value) >>> 0 === 0;
    }

    isEmpty(): boolean {
        return this.value === 0;
    }

    size(): number {
        return this.indices().length;
    }

    /** @notice Lowest set index, the tie-break for picking a representative endorser. */
    lowestIndex(): number | null {
        for (let index = 0; index < this.capacity; index++) {
            if ((this.value & bit(index)) !== 0) {
                return index;
            }
        }
        return null;
    }

    indices(): number[] {
        const result: number[] = [];
        for (let index = 0; index < this.capacity; index++) {
            if ((this.value & bit(index)) !== 0) {
                result.push(index);
            }
        }
        return result;
    }

    toNumber(): number {
        return this.value;
    }

    toString(): string {
        return `0b${this.value.toString(2).padStart(this.capacity, '0')}`;
    }
}
