/**
 * Vigenere Cipher Engine
 *
 * One engine per (alphabet, key, mode). The engine holds no per-transform
 * state, so a single instance can serve any number of concurrent trials.
 *
 * Characters outside the alphabet are copied unchanged and do not advance
 * the key cursor. Callers normalize case before calling; membership is an
 * exact symbol match.
 */

import { Alphabet } from './alphabet.js';
import { Key, KeyOptions } from './key.js';
import { CipherMode, TransformDirection, TransformResult } from './types.js';
import { EmptyInputError } from '../errors/cipherErrors.js';
import { describeFailure } from '../errors/sanitizer.js';

/**
 * Left-to-right accumulator threaded through one transform.
 */
interface KeyStreamState {
    /** Alphabet members processed so far (the key cursor before reduction) */
    position: number;
    /** Plaintext indices seen so far; only filled in autokey mode */
    readonly plain: number[];
    readonly output: string[];
}

export class CipherEngine {
    public readonly alphabet: Alphabet;

    constructor(
        public readonly key: Key,
        public readonly mode: CipherMode = 'classic'
    ) {
        this.alphabet = key.alphabet;
    }

    /**
     * Builds an engine from a raw or prebuilt key.
     *
     * @throws InvalidKeyError when the key is empty or does not fit the alphabet
     */
    static create(
        alphabet: Alphabet,
        key: string | Key,
        mode: CipherMode = 'classic',
        keyOptions: KeyOptions = {}
    ): CipherEngine {
        const resolved = typeof key === 'string'
            ? Key.create(key, alphabet, keyOptions)
            : key.rebind(alphabet, keyOptions);
        return new CipherEngine(resolved, mode);
    }

    encrypt(plaintext: string): string {
        return this.transform(plaintext, 'encrypt');
    }

    decrypt(ciphertext: string): string {
        return this.transform(ciphertext, 'decrypt');
    }

    /**
     * @throws EmptyInputError when text is empty
     */
    transform(text: string, direction: TransformDirection): string {
        if (text.length === 0) {
            throw new EmptyInputError();
        }

        const state: KeyStreamState = { position: 0, plain: [], output: [] };
        for (const symbol of text) {
            this.step(state, symbol, direction);
        }
        return state.output.join('');
    }

    /**
     * Non-throwing form of transform(): failures are reported in the result
     * with empty output.
     */
    execute(text: string, direction: TransformDirection): TransformResult {
        const echo = {
            alphabet: this.alphabet.toString(),
            key: this.key.toString(),
            mode: this.mode,
            direction
        };

        try {
            return { ...echo, text: this.transform(text, direction), success: true };
        } catch (err) {
            return { ...echo, text: '', success: false, error: describeFailure(err) };
        }
    }

    private step(state: KeyStreamState, symbol: string, direction: TransformDirection): void {
        const index = this.alphabet.indexOf(symbol);
        if (index === undefined) {
            state.output.push(symbol);
            return;
        }

        const size = this.alphabet.size;
        const shift = this.shiftAt(state);
        const outputIndex = direction === 'encrypt'
            ? (index + shift) % size
            : (index - shift + size) % size;

        state.output.push(this.alphabet.symbolAt(outputIndex));

        if (this.mode === 'autokey') {
            // Decrypt extends the stream with the plaintext it has just recovered
            state.plain.push(direction === 'encrypt' ? index : outputIndex);
        }
        state.position += 1;
    }

    private shiftAt(state: KeyStreamState): number {
        const keyIndices = this.key.indices;
        const keyLength = keyIndices.length;

        switch (this.mode) {
            case 'classic':
                return keyIndices[state.position % keyLength];
            case 'autokey':
                return state.position < keyLength
                    ? keyIndices[state.position]
                    : state.plain[state.position - keyLength];
        }
    }
}
