import assert from 'node:assert/strict';
import { test } from 'node:test';

import { runWithConcurrency } from '../src/scheduler/pool';
import { withTimeout } from '../src/scheduler/timeout';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

test('never runs more than the limit at once', async () => {
  let active = 0;
  let peak = 0;
  const seen: number[] = [];
  await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
    active += 1;
    peak = Math.max(peak, active);
    await delay(5);
    seen.push(item);
    active -= 1;
  });
  assert.equal(peak, 2);
  assert.deepEqual([...seen].sort(), [1, 2, 3, 4, 5]);
});

test('stops launching after a failure and rethrows once in-flight work settles', async () => {
  const started: number[] = [];
  const finished: number[] = [];
  const failure = new Error('boom');
  await assert.rejects(
    runWithConcurrency([1, 2, 3, 4], 2, async (item) => {
      started.push(item);
      if (item === 1) {
        throw failure;
      }
      await delay(10);
      finished.push(item);
    }),
    (err: unknown) => err === failure
  );
  assert.deepEqual(started, [1, 2]);
  assert.deepEqual(finished, [2]);
});

test('handles an empty batch', async () => {
  await runWithConcurrency([], 4, async () => {
    throw new Error('never called');
  });
});

test('resolves with the result when work finishes in time', async () => {
  const value = await withTimeout(async () => 'done', 1_000, () => new Error('late'));
  assert.equal(value, 'done');
});

test('rejects and aborts the signal when the timer fires first', async () => {
  const observed: { signal?: AbortSignal } = {};
  const timeoutError = new Error('late');
  await assert.rejects(
    withTimeout(
      (signal) => {
        observed.signal = signal;
        return new Promise<string>((resolve) => setTimeout(() => resolve('too late'), 200));
      },
      10,
      () => timeoutError
    ),
    (err: unknown) => err === timeoutError
  );
  assert.equal(observed.signal?.aborted, true);
  assert.equal(observed.signal?.reason, timeoutError);
});
