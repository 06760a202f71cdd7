import { Alphabet } from './alphabet.js';
import { InvalidAlphabetError } from '../errors/cipherErrors.js';

export const DEFAULT_BASE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Keyed alphabet: the letters of the words first (upper-cased, each letter
 * once, in order of appearance), then the rest of the base alphabet.
 *
 * @throws InvalidAlphabetError when no word contributes a letter
 */
export function generateKeyedAlphabet(words: readonly string[], base: string = DEFAULT_BASE_ALPHABET): Alphabet {
    const letters = words
        .map(word => word.toUpperCase().replace(/[^A-Z]/g, ''))
        .filter(word => word.length > 0);

    if (letters.length === 0) {
        throw new InvalidAlphabetError('empty');
    }

    const ordered = new Set<string>();
    for (const word of letters) {
        for (const letter of word) {
            ordered.add(letter);
        }
    }
    for (const symbol of base) {
        ordered.add(symbol);
    }

    return Alphabet.create([...ordered]);
}

/**
 * One keyed alphabet per word.
 */
export function keyedAlphabets(words: readonly string[], base: string = DEFAULT_BASE_ALPHABET): Alphabet[] {
    return words.map(word => generateKeyedAlphabet([word], base));
}
