/**
 * Alphabet x Key Orchestrator
 *
 * Decrypts one ciphertext under every (alphabet, key) pair, alphabet-major
 * then key-minor. Each pair is validated on its own: a key that does not fit
 * one alphabet is recorded as a failed entry and the run moves on.
 */

import { Alphabet } from '../cipher/alphabet.js';
import { CipherEngine } from '../cipher/engine.js';
import { Key, KeyOptions } from '../cipher/key.js';
import { CipherMode, OrchestrationResultSet, OrchestrationTrialResult } from '../cipher/types.js';
import { describeFailure } from '../errors/sanitizer.js';
import { EngineConfig, loadEngineConfig } from '../bootstrap/config/engine-config.js';
import { runTrials } from '../execution/trialScheduler.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('Orchestrator');

export interface OrchestrationOptions extends KeyOptions {
    readonly signal?: AbortSignal;
}

export class Orchestrator {
    private readonly config: EngineConfig;

    constructor(config?: EngineConfig) {
        this.config = config ?? loadEngineConfig();
    }

    async run(
        ciphertext: string,
        alphabets: readonly Alphabet[],
        keys: readonly (string | Key)[],
        mode: CipherMode = 'classic',
        options: OrchestrationOptions = {}
    ): Promise<OrchestrationResultSet> {
        const keyCount = keys.length;
        const expectedCount = alphabets.length * keyCount;
        const keyOptions: KeyOptions = { strict: options.strict };

        logger.info({
            alphabetCount: alphabets.length,
            keyCount,
            mode,
            concurrency: this.config.concurrency
        }, 'Orchestration started');

        const outcome = await runTrials<OrchestrationTrialResult>(
            expectedCount,
            index => {
                const alphabetIndex = Math.floor(index / keyCount);
                const keyIndex = index % keyCount;
                return this.runPair(ciphertext, alphabets[alphabetIndex], keys[keyIndex], mode, keyOptions, {
                    index,
                    alphabetIndex,
                    keyIndex
                });
            },
            {
                concurrency: this.config.concurrency,
                yieldEvery: this.config.yieldEvery,
                signal: options.signal
            }
        );

        const successCount = outcome.results.filter(result => result.success).length;
        const failureCount = outcome.results.length - successCount;

        logger.info({
            completed: outcome.completed,
            successCount,
            failureCount,
            cancelled: outcome.cancelled
        }, 'Orchestration finished');

        return {
            mode,
            alphabetCount: alphabets.length,
            keyCount,
            expectedCount,
            maxKeyLength: keys.reduce((max, key) => Math.max(max, keyLength(key)), 0),
            results: outcome.results,
            successCount,
            failureCount,
            complete: !outcome.cancelled,
            cancelled: outcome.cancelled
        };
    }

    private runPair(
        ciphertext: string,
        alphabet: Alphabet,
        key: string | Key,
        mode: CipherMode,
        keyOptions: KeyOptions,
        position: { index: number; alphabetIndex: number; keyIndex: number }
    ): OrchestrationTrialResult {
        let engine: CipherEngine;
        try {
            engine = CipherEngine.create(alphabet, key, mode, keyOptions);
        } catch (err) {
            const error = describeFailure(err);
            logger.warn({ ...position, errorCode: error.code }, 'Pair rejected');
            return {
                ...position,
                text: '',
                success: false,
                error,
                alphabet: alphabet.toString(),
                key: key.toString(),
                mode,
                direction: 'decrypt'
            };
        }

        const result = engine.execute(ciphertext, 'decrypt');
        if (result.error) {
            logger.warn({ ...position, errorCode: result.error.code }, 'Pair failed');
        }
        return { ...result, ...position };
    }
}

function keyLength(key: string | Key): number {
    return typeof key === 'string' ? Array.from(key).length : key.length;
}
