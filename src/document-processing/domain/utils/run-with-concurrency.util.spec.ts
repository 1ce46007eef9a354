import { runWithConcurrency } from './run-with-concurrency.util';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await runWithConcurrency([5, 1, 3, 2, 4, 1, 2], 3, async (ms) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(ms);
      inFlight--;
      return ms;
    });

    expect(peak).toBe(3);
  });

  it('should return results in input order', async () => {
    const results = await runWithConcurrency([30, 5, 15], 2, async (ms, i) => {
      await tick(ms);
      return `item-${i}`;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'item-0' },
      { status: 'fulfilled', value: 'item-1' },
      { status: 'fulfilled', value: 'item-2' },
    ]);
  });

  it('should isolate rejected tasks', async () => {
    const failure = new Error('boom');

    const results = await runWithConcurrency([1, 2, 3], 2, async (n) => {
      if (n === 2) {
        throw failure;
      }
      return n;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 1 },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 3 },
    ]);
  });

  it('should handle an empty input', async () => {
    await expect(runWithConcurrency([], 4, async () => 1)).resolves.toEqual(
      [],
    );
  });

  it('should reject a non-positive limit', async () => {
    await expect(runWithConcurrency([1], 0, async () => 1)).rejects.toThrow(
      RangeError,
    );
  });
});
