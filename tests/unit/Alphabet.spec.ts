/**
 * Unit Tests: Alphabet
 *
 * @see libs/cipher/alphabet.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Alphabet } from '../../libs/cipher/alphabet.js';
import { InvalidAlphabetError } from '../../libs/errors/cipherErrors.js';

describe('Alphabet', () => {
    const latin = Alphabet.create('ABCDEFGHIJKLMNOPQRSTUVWXYZ');

    describe('create', () => {
        it('should keep symbols in the given order', () => {
            const alphabet = Alphabet.create('QWERTY');

            assert.strictEqual(alphabet.size, 6);
            assert.deepStrictEqual(alphabet.symbols, ['Q', 'W', 'E', 'R', 'T', 'Y']);
            assert.strictEqual(alphabet.toString(), 'QWERTY');
        });

        it('should accept a symbol array', () => {
            const alphabet = Alphabet.create(['α', 'β', 'γ']);

            assert.strictEqual(alphabet.size, 3);
            assert.strictEqual(alphabet.indexOf('γ'), 2);
        });

        it('should reject an empty alphabet', () => {
            assert.throws(
                () => Alphabet.create(''),
                (err: unknown) => err instanceof InvalidAlphabetError && err.reason === 'empty'
            );
        });

        it('should reject duplicate symbols and name the duplicate', () => {
            assert.throws(
                () => Alphabet.create('ABCA'),
                (err: unknown) => {
                    assert.ok(err instanceof InvalidAlphabetError);
                    assert.strictEqual(err.reason, 'duplicate');
                    assert.strictEqual(err.symbol, 'A');
                    assert.strictEqual(err.code, 'INVALID_ALPHABET');
                    return true;
                }
            );
        });

        it('should reject symbols longer than one character', () => {
            assert.throws(
                () => Alphabet.create(['AB', 'C']),
                (err: unknown) => {
                    assert.ok(err instanceof InvalidAlphabetError);
                    assert.strictEqual(err.reason, 'multi_character');
                    assert.strictEqual(err.symbol, 'AB');
                    assert.strictEqual(err.message, 'Alphabet symbols must be single characters (got "AB")');
                    return true;
                }
            );
        });

        it('should reject an empty symbol', () => {
            assert.throws(
                () => Alphabet.create(['A', '', 'C']),
                (err: unknown) => err instanceof InvalidAlphabetError && err.reason === 'multi_character'
            );
        });

        it('should accept astral-plane symbols as single characters', () => {
            const alphabet = Alphabet.create(['😀', '😁', '😂']);

            assert.strictEqual(alphabet.size, 3);
            assert.strictEqual(alphabet.indexOf('😂'), 2);
        });

        it('should reject a single-symbol alphabet', () => {
            assert.throws(
                () => Alphabet.create('A'),
                (err: unknown) => err instanceof InvalidAlphabetError && err.reason === 'too_short'
            );
        });
    });

    describe('indexOf', () => {
        it('should return the position of a member', () => {
            assert.strictEqual(latin.indexOf('A'), 0);
            assert.strictEqual(latin.indexOf('C'), 2);
            assert.strictEqual(latin.indexOf('Z'), 25);
        });

        it('should signal non-members with undefined', () => {
            assert.strictEqual(latin.indexOf(' '), undefined);
            assert.strictEqual(latin.indexOf('7'), undefined);
        });

        it('should match symbols exactly, without case folding', () => {
            assert.strictEqual(latin.indexOf('c'), undefined);
            assert.strictEqual(latin.has('c'), false);
            assert.strictEqual(latin.has('C'), true);
        });
    });

    describe('symbolAt', () => {
        it('should reduce any index modulo the size', () => {
            assert.strictEqual(latin.symbolAt(0), 'A');
            assert.strictEqual(latin.symbolAt(27), 'B');
            assert.strictEqual(latin.symbolAt(52), 'A');
        });

        it('should wrap negative indices', () => {
            assert.strictEqual(latin.symbolAt(-1), 'Z');
            assert.strictEqual(latin.symbolAt(-27), 'Z');
        });
    });

    describe('built-in alphabets', () => {
        it('should provide the standard English alphabet', () => {
            assert.strictEqual(Alphabet.standardEnglish().toString(), 'ABCDEFGHIJKLMNOPQRSTUVWXYZ');
        });

        it('should provide the extended English alphabet', () => {
            const extended = Alphabet.extendedEnglish();

            assert.strictEqual(extended.size, 88);
            assert.strictEqual(extended.indexOf('a'), 26);
            assert.strictEqual(extended.indexOf('0'), 52);
            assert.strictEqual(extended.indexOf('?'), 87);
        });

        it('should compare alphabets by content', () => {
            assert.ok(Alphabet.standardEnglish().equals(latin));
            assert.ok(!Alphabet.create('BA').equals(Alphabet.create('AB')));
        });

        it('should not treat alphabets of different sizes as equal', () => {
            assert.ok(!Alphabet.create('ABC').equals(Alphabet.create('ABCD')));
            assert.ok(!Alphabet.create('ABCD').equals(Alphabet.create('ABC')));
        });
    });
});
