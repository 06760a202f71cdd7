import { InvalidAlphabetError } from '../errors/cipherErrors.js';

const STANDARD_ENGLISH = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const EXTENDED_ENGLISH =
    'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*()_+-=[]{}|;:,.<>?';

/**
 * Ordered, duplicate-free symbol set with O(1) symbol -> index lookup.
 *
 * Symbols are matched exactly: no case folding, no normalization.
 * Immutable once constructed.
 */
export class Alphabet {
    private readonly indexBySymbol: ReadonlyMap<string, number>;
    private readonly text: string;

    private constructor(public readonly symbols: readonly string[]) {
        const index = new Map<string, number>();
        symbols.forEach((symbol, position) => index.set(symbol, position));
        this.indexBySymbol = index;
        this.text = symbols.join('');
    }

    /**
     * Each symbol is one code point; text is transformed code point by code point.
     *
     * @throws InvalidAlphabetError when empty, shorter than 2 symbols, or holding a duplicate or multi-character symbol
     */
    static create(symbols: string | readonly string[]): Alphabet {
        const list = typeof symbols === 'string' ? Array.from(symbols) : [...symbols];

        if (list.length === 0) {
            throw new InvalidAlphabetError('empty');
        }

        const seen = new Set<string>();
        for (const symbol of list) {
            if (Array.from(symbol).length !== 1) {
                throw new InvalidAlphabetError('multi_character', symbol);
            }
            if (seen.has(symbol)) {
                throw new InvalidAlphabetError('duplicate', symbol);
            }
            seen.add(symbol);
        }

        if (list.length < 2) {
            throw new InvalidAlphabetError('too_short');
        }

        return new Alphabet(Object.freeze(list));
    }

    static standardEnglish(): Alphabet {
        return Alphabet.create(STANDARD_ENGLISH);
    }

    static extendedEnglish(): Alphabet {
        return Alphabet.create(EXTENDED_ENGLISH);
    }

    get size(): number {
        return this.symbols.length;
    }

    /**
     * Position of the symbol, or undefined when it is not a member.
     */
    indexOf(symbol: string): number | undefined {
        return this.indexBySymbol.get(symbol);
    }

    has(symbol: string): boolean {
        return this.indexBySymbol.has(symbol);
    }

    /**
     * Total over any integer: the index is reduced modulo the alphabet size.
     */
    symbolAt(index: number): string {
        const size = this.symbols.length;
        return this.symbols[((index % size) + size) % size];
    }

    /**
     * Keeps members only. With preserveSpaces (the default) whitespace between
     * members is kept too, and whitespace after the last member collapses to
     * a single space.
     */
    filterText(text: string, { preserveSpaces = true }: { preserveSpaces?: boolean } = {}): string {
        const chars = Array.from(text);
        if (!preserveSpaces) {
            return chars.filter(char => this.has(char)).join('');
        }

        let lastMember = -1;
        chars.forEach((char, position) => {
            if (this.has(char)) lastMember = position;
        });

        const kept = chars.filter((char, position) =>
            this.has(char) || (isWhitespace(char) && (lastMember < 0 || position < lastMember))
        );
        if (lastMember >= 0 && lastMember + 1 < chars.length && isWhitespace(chars[lastMember + 1])) {
            kept.push(' ');
        }
        return kept.join('');
    }

    /**
     * True when every character is a member or whitespace.
     */
    validateText(text: string): boolean {
        return Array.from(text).every(char => this.has(char) || isWhitespace(char));
    }

    equals(other: Alphabet): boolean {
        if (this === other) return true;
        return this.size === other.size
            && this.symbols.every((symbol, position) => other.symbols[position] === symbol);
    }

    toString(): string {
        return this.text;
    }
}

function isWhitespace(char: string): boolean {
    return /^\s$/u.test(char);
}
