/**
 * Trial Scheduler
 *
 * Runs independent, synchronous trials across a fixed number of cooperative
 * workers. Workers pull the next enumeration index from a shared cursor and
 * write each result into its pre-sized slot, so the returned order is the
 * enumeration order regardless of which worker finished first.
 *
 * Cancellation is checked between trials, never inside one.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

export interface TrialRunOptions {
    /** Number of cooperative workers (default 1) */
    readonly concurrency?: number;
    /** Trials a worker runs before yielding to the event loop (default 256) */
    readonly yieldEvery?: number;
    readonly signal?: AbortSignal;
}

export interface TrialRunOutcome<T> {
    /** Filled slots, in enumeration order */
    readonly results: T[];
    readonly completed: number;
    readonly cancelled: boolean;
}

/**
 * Run `trial(index)` for every index in [0, count).
 * Resolves with partial results when the signal aborts; never rejects on abort.
 * A trial that throws rejects the run and stops the other workers.
 */
export async function runTrials<T>(
    count: number,
    trial: (index: number) => T,
    options: TrialRunOptions = {}
): Promise<TrialRunOutcome<T>> {
    const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, Math.max(count, 1)));
    const yieldEvery = Math.max(1, options.yieldEvery ?? 256);
    const { signal } = options;

    const slots = new Array<T>(count);
    const filled = new Uint8Array(count);
    let cursor = 0;
    let completed = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
        let sinceYield = 0;
        while (cursor < count) {
            if (failed || signal?.aborted) return;

            const index = cursor;
            cursor += 1;
            try {
                slots[index] = trial(index);
            } catch (err) {
                failed = true;
                throw err;
            }
            filled[index] = 1;
            completed += 1;

            sinceYield += 1;
            if (sinceYield >= yieldEvery) {
                sinceYield = 0;
                await yieldToEventLoop();
            }
        }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const cancelled = completed < count;
    const results: T[] = [];
    for (let index = 0; index < count; index++) {
        if (filled[index] === 1) {
            results.push(slots[index]);
        }
    }

    return { results, completed, cancelled };
}
