import { describe, it, expect } from 'vitest';

import { runBounded } from '@/transfer/parallel.js';

function deferred() {
  const handle = { resolve: (): void => undefined };
  const promise = new Promise<void>((r) => {
    handle.resolve = r;
  });
  return { promise, resolve: () => handle.resolve() };
}

describe('runBounded', () => {
  it('never runs more than the given number of workers at once', async () => {
    let running = 0;
    let peak = 0;

    await runBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running -= 1;
    });

    expect(peak).toBe(3);
  });

  it('visits every item exactly once', async () => {
    const seen: number[] = [];

    await runBounded([3, 1, 2], 2, async (item) => {
      seen.push(item);
    });

    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it('stops starting items after a failure and rethrows the first error', async () => {
    const started: number[] = [];
    const gate = deferred();

    const promise = runBounded([1, 2, 3, 4], 2, async (item) => {
      started.push(item);
      if (item === 1) {
        throw new Error('first');
      }
      await gate.promise;
      if (item === 2) {
        throw new Error('second');
      }
    });
    gate.resolve();

    await expect(promise).rejects.toThrow('first');
    expect(started).toEqual([1, 2]);
  });

  it('waits for workers already running before rejecting', async () => {
    let finished = false;

    const promise = runBounded(['fail', 'slow'], 2, async (item) => {
      if (item === 'fail') {
        throw new Error('boom');
      }
      await new Promise((r) => setTimeout(r, 10));
      finished = true;
    });

    await expect(promise).rejects.toThrow('boom');
    expect(finished).toBe(true);
  });

  it('resolves immediately for no items', async () => {
    await expect(runBounded([], 4, async () => undefined)).resolves.toBeUndefined();
  });
});
