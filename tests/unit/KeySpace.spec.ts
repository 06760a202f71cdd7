/**
 * Unit Tests: KeySpace
 *
 * Lazy, indexable enumeration of fixed-length keys.
 *
 * @see libs/search/keySpace.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Alphabet } from '../../libs/cipher/alphabet.js';
import { KeySpace, candidateCount } from '../../libs/search/keySpace.js';
import { InvalidKeyError } from '../../libs/errors/cipherErrors.js';

describe('KeySpace', () => {
    const ab = Alphabet.create('AB');
    const abc = Alphabet.create('ABC');

    it('should size the space as alphabet size ^ key length', () => {
        assert.strictEqual(new KeySpace(ab, 2).size, 4);
        assert.strictEqual(new KeySpace(abc, 3).size, 27);
    });

    it('should enumerate keys lexicographically by index tuple', () => {
        const keys = [...new KeySpace(ab, 2)].map(key => key.toString());

        assert.deepStrictEqual(keys, ['AA', 'AB', 'BA', 'BB']);
    });

    it('should expand an index into base-size digits', () => {
        const space = new KeySpace(abc, 3);

        assert.deepStrictEqual(space.indicesAt(0), [0, 0, 0]);
        assert.deepStrictEqual(space.indicesAt(5), [0, 1, 2]);
        assert.strictEqual(space.keyAt(5).toString(), 'ABC');
        assert.strictEqual(space.keyAt(26).toString(), 'CCC');
    });

    it('should reject indices outside the space', () => {
        const space = new KeySpace(abc, 3);

        assert.throws(() => space.keyAt(27), RangeError);
        assert.throws(() => space.keyAt(-1), RangeError);
        assert.throws(() => space.keyAt(1.5), RangeError);
    });

    it('should yield a sub-range lazily', () => {
        const space = new KeySpace(ab, 2);
        const keys = [...space.range(1, 3)].map(key => key.toString());

        assert.deepStrictEqual(keys, ['AB', 'BA']);
    });

    it('should reject non-positive key lengths', () => {
        assert.throws(() => new KeySpace(ab, 0), InvalidKeyError);
    });

    it('should refuse spaces too large to index', () => {
        assert.throws(() => new KeySpace(Alphabet.standardEnglish(), 20), RangeError);
    });

    it('should count candidates without overflow', () => {
        assert.strictEqual(candidateCount(26, 3), 17576n);
        assert.strictEqual(candidateCount(26, 20), 26n ** 20n);
    });
});
