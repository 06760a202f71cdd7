import { Alphabet } from './alphabet.js';
import { InvalidKeyError } from '../errors/cipherErrors.js';

export interface KeyOptions {
    /**
     * When true (default) every key symbol must belong to the alphabet.
     * When false, foreign symbols are dropped; at least one member must remain.
     */
    readonly strict?: boolean;
}

/**
 * Non-empty sequence of alphabet symbols, resolved to alphabet indices
 * once at construction.
 */
export class Key {
    private constructor(
        public readonly alphabet: Alphabet,
        public readonly symbols: readonly string[],
        public readonly indices: readonly number[]
    ) { }

    /**
     * @throws InvalidKeyError when empty, or (strict) when a symbol is not in the alphabet
     */
    static create(value: string | readonly string[], alphabet: Alphabet, options: KeyOptions = {}): Key {
        const strict = options.strict ?? true;
        const list = typeof value === 'string' ? Array.from(value) : [...value];

        if (list.length === 0) {
            throw new InvalidKeyError('empty');
        }

        const symbols: string[] = [];
        const indices: number[] = [];
        list.forEach((symbol, position) => {
            const index = alphabet.indexOf(symbol);
            if (index === undefined) {
                if (strict) {
                    throw new InvalidKeyError('foreign_symbol', symbol, position);
                }
                return;
            }
            symbols.push(symbol);
            indices.push(index);
        });

        // Lenient mode with no member symbols left
        if (indices.length === 0) {
            throw new InvalidKeyError('empty');
        }

        return new Key(alphabet, Object.freeze(symbols), Object.freeze(indices));
    }

    /**
     * Builds a key straight from alphabet indices (reduced modulo the alphabet size).
     */
    static fromIndices(indices: readonly number[], alphabet: Alphabet): Key {
        if (indices.length === 0) {
            throw new InvalidKeyError('empty');
        }
        const size = alphabet.size;
        const normalized = indices.map(index => ((index % size) + size) % size);
        const symbols = normalized.map(index => alphabet.symbolAt(index));
        return new Key(alphabet, Object.freeze(symbols), Object.freeze(normalized));
    }

    get length(): number {
        return this.indices.length;
    }

    /**
     * Returns this key re-validated against another alphabet.
     */
    rebind(alphabet: Alphabet, options: KeyOptions = {}): Key {
        if (alphabet.equals(this.alphabet)) {
            return this;
        }
        return Key.create(this.symbols, alphabet, options);
    }

    toString(): string {
        return this.symbols.join('');
    }
}
