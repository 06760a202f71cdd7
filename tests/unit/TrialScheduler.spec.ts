/**
 * Unit Tests: Trial Scheduler
 *
 * @see libs/execution/trialScheduler.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setImmediate as nextTick } from 'node:timers/promises';
import { runTrials } from '../../libs/execution/trialScheduler.js';

describe('runTrials', () => {
    it('should return results in index order', async () => {
        const outcome = await runTrials(5, index => index * index, { concurrency: 3, yieldEvery: 1 });

        assert.deepStrictEqual(outcome.results, [0, 1, 4, 9, 16]);
        assert.strictEqual(outcome.completed, 5);
        assert.strictEqual(outcome.cancelled, false);
    });

    it('should place results by index, not completion order', async () => {
        const calls: number[] = [];
        const outcome = await runTrials(6, index => {
            calls.push(index);
            return `trial-${index}`;
        }, { concurrency: 4, yieldEvery: 1 });

        assert.strictEqual(calls.length, 6);
        assert.deepStrictEqual(outcome.results, ['trial-0', 'trial-1', 'trial-2', 'trial-3', 'trial-4', 'trial-5']);
    });

    it('should handle an empty run', async () => {
        const outcome = await runTrials(0, () => 1);

        assert.deepStrictEqual(outcome.results, []);
        assert.strictEqual(outcome.cancelled, false);
    });

    it('should run nothing when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        let calls = 0;

        const outcome = await runTrials(10, () => ++calls, { signal: controller.signal });

        assert.strictEqual(calls, 0);
        assert.deepStrictEqual(outcome.results, []);
        assert.strictEqual(outcome.cancelled, true);
    });

    it('should stop between trials and keep finished results', async () => {
        const controller = new AbortController();

        const pending = runTrials(10, index => index, {
            concurrency: 2,
            yieldEvery: 1,
            signal: controller.signal
        });
        controller.abort();
        const outcome = await pending;

        assert.deepStrictEqual(outcome.results, [0, 1]);
        assert.strictEqual(outcome.completed, 2);
        assert.strictEqual(outcome.cancelled, true);
    });

    it('should reject and stop every worker when a trial throws', async () => {
        const calls: number[] = [];

        await assert.rejects(
            () => runTrials(10, index => {
                calls.push(index);
                if (index === 1) throw new Error('trial failed');
                return index;
            }, { concurrency: 2, yieldEvery: 1 }),
            { message: 'trial failed' }
        );

        // let the surviving worker resume from its yield
        await nextTick();
        await nextTick();

        assert.deepStrictEqual(calls, [0, 1]);
    });

    it('should keep undefined results in their slots', async () => {
        const outcome = await runTrials(3, index => (index === 1 ? undefined : index));

        assert.deepStrictEqual(outcome.results, [0, undefined, 2]);
    });
});
