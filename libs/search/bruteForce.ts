/**
 * Brute-Force Key Search
 *
 * Decrypts one ciphertext under every key of a fixed length. Keys are
 * produced lazily from the KeySpace, one per trial, and results come back
 * in enumeration order.
 *
 * `success` on a trial only means the decryption ran; ranking candidate
 * plaintexts is left to the caller.
 */

import { Alphabet } from '../cipher/alphabet.js';
import { CipherEngine } from '../cipher/engine.js';
import { BruteForceResultSet, CipherMode, KeyIndexRange, TrialResult } from '../cipher/types.js';
import { CombinatorialLimitExceededError, InvalidKeyError } from '../errors/cipherErrors.js';
import { EngineConfig, loadEngineConfig } from '../bootstrap/config/engine-config.js';
import { runTrials } from '../execution/trialScheduler.js';
import { getComponentLogger } from '../logging/logger.js';
import { KeySpace, candidateCount } from './keySpace.js';

const logger = getComponentLogger('BruteForceSearch');

export interface BruteForceOptions {
    readonly signal?: AbortSignal;
    /**
     * Restrict the run to part of the key space; defaults to all of it.
     * The ceiling still applies to the whole space.
     */
    readonly range?: KeyIndexRange;
}

export class BruteForceSearch {
    private readonly config: EngineConfig;

    constructor(config?: EngineConfig) {
        this.config = config ?? loadEngineConfig();
    }

    /**
     * @throws CombinatorialLimitExceededError before any trial when the key space is larger than the ceiling
     * @throws InvalidKeyError when keyLength is not a positive integer
     */
    async run(
        ciphertext: string,
        alphabet: Alphabet,
        keyLength: number,
        mode: CipherMode = 'classic',
        options: BruteForceOptions = {}
    ): Promise<BruteForceResultSet> {
        if (!Number.isInteger(keyLength) || keyLength < 1) {
            throw new InvalidKeyError('empty');
        }

        const total = candidateCount(alphabet.size, keyLength);
        if (total > BigInt(this.config.maxCandidates)) {
            throw new CombinatorialLimitExceededError(total, this.config.maxCandidates);
        }

        const space = new KeySpace(alphabet, keyLength);
        const bounds = resolveRange(options.range, space.size);
        const count = bounds.end - bounds.start;

        logger.info({
            alphabetSize: alphabet.size,
            keyLength,
            mode,
            candidates: count,
            concurrency: this.config.concurrency
        }, 'Brute-force search started');

        const outcome = await runTrials<TrialResult>(
            count,
            offset => {
                const index = bounds.start + offset;
                const engine = new CipherEngine(space.keyAt(index), mode);
                return { ...engine.execute(ciphertext, 'decrypt'), index };
            },
            {
                concurrency: this.config.concurrency,
                yieldEvery: this.config.yieldEvery,
                signal: options.signal
            }
        );

        const successCount = outcome.results.filter(result => result.success).length;

        logger.info({
            keyLength,
            completed: outcome.completed,
            successCount,
            cancelled: outcome.cancelled
        }, 'Brute-force search finished');

        return {
            alphabet: alphabet.toString(),
            keyLength,
            mode,
            candidateCount: space.size,
            range: bounds,
            results: outcome.results,
            successCount,
            complete: !outcome.cancelled,
            cancelled: outcome.cancelled
        };
    }

    /**
     * Runs every key length from 1 to maxKeyLength. The ceiling applies to
     * the combined candidate count. Stops after the first cancelled length.
     */
    async runUpTo(
        ciphertext: string,
        alphabet: Alphabet,
        maxKeyLength: number,
        mode: CipherMode = 'classic',
        options: Pick<BruteForceOptions, 'signal'> = {}
    ): Promise<BruteForceResultSet[]> {
        if (!Number.isInteger(maxKeyLength) || maxKeyLength < 1) {
            throw new InvalidKeyError('empty');
        }

        let total = 0n;
        for (let length = 1; length <= maxKeyLength; length++) {
            total += candidateCount(alphabet.size, length);
        }
        if (total > BigInt(this.config.maxCandidates)) {
            throw new CombinatorialLimitExceededError(total, this.config.maxCandidates);
        }

        const sets: BruteForceResultSet[] = [];
        for (let length = 1; length <= maxKeyLength; length++) {
            const set = await this.run(ciphertext, alphabet, length, mode, options);
            sets.push(set);
            if (set.cancelled) break;
        }
        return sets;
    }
}

function resolveRange(range: KeyIndexRange | undefined, size: number): KeyIndexRange {
    if (!range) {
        return { start: 0, end: size };
    }
    const { start, end } = range;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > size || start > end) {
        throw new RangeError(`Key range [${start}, ${end}) is outside the key space of ${size} keys`);
    }
    return { start, end };
}
