import { Alphabet } from '../cipher/alphabet.js';
import { Key } from '../cipher/key.js';
import { InvalidKeyError } from '../errors/cipherErrors.js';

/**
 * Number of keys of the given length over an alphabet of the given size,
 * computed without floating-point overflow.
 */
export function candidateCount(alphabetSize: number, keyLength: number): bigint {
    return BigInt(alphabetSize) ** BigInt(keyLength);
}

/**
 * Every key of a fixed length over an alphabet, in lexicographic order of
 * index tuples (counting in base alphabet size).
 *
 * Nothing is materialized up front: keyAt() expands an enumeration index
 * into base-size digits, so any index range can be handed to a worker.
 */
export class KeySpace implements Iterable<Key> {
    public readonly size: number;

    constructor(
        public readonly alphabet: Alphabet,
        public readonly keyLength: number
    ) {
        if (!Number.isInteger(keyLength) || keyLength < 1) {
            throw new InvalidKeyError('empty');
        }

        const count = candidateCount(alphabet.size, keyLength);
        if (count > BigInt(Number.MAX_SAFE_INTEGER)) {
            throw new RangeError(`Key space of ${count} candidates is not indexable`);
        }
        this.size = Number(count);
    }

    /**
     * Index tuple for the enumeration index; the last digit varies fastest.
     */
    indicesAt(index: number): number[] {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            throw new RangeError(`Key index ${index} is outside 0..${this.size - 1}`);
        }

        const radix = this.alphabet.size;
        const digits = new Array<number>(this.keyLength).fill(0);
        let remainder = index;
        for (let position = this.keyLength - 1; position >= 0 && remainder > 0; position--) {
            digits[position] = remainder % radix;
            remainder = Math.floor(remainder / radix);
        }
        return digits;
    }

    keyAt(index: number): Key {
        return Key.fromIndices(this.indicesAt(index), this.alphabet);
    }

    /**
     * Lazily yields the keys in [start, end).
     */
    *range(start = 0, end = this.size): Generator<Key> {
        for (let index = start; index < end; index++) {
            yield this.keyAt(index);
        }
    }

    [Symbol.iterator](): Iterator<Key> {
        return this.range();
    }
}
