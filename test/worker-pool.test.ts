import { runWithConcurrency } from '../src/utilities/worker-pool';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('runWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await runWithConcurrency([3, 1, 2], 2, async item => item * 10);

    expect(results).toEqual([30, 10, 20]);
  });

  it('should never run more workers than allowed at once', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await Promise.resolve();
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should start the next item as soon as a worker frees up', async () => {
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const run = runWithConcurrency([0, 1, 2], 2, async index => {
      started.push(index);
      await gates[index].promise;
    });

    await Promise.resolve();
    expect(started).toEqual([0, 1]);

    gates[1].resolve();
    await new Promise(resolve => setImmediate(resolve));
    expect(started).toEqual([0, 1, 2]);

    gates[0].resolve();
    gates[2].resolve();
    await run;
  });

  it('should leave items unstarted once the signal aborts', async () => {
    const controller = new AbortController();

    const results = await runWithConcurrency(['a', 'b', 'c'], 1, async item => {
      controller.abort();
      return item.toUpperCase();
    }, controller.signal);

    expect(results).toEqual(['A', undefined, undefined]);
  });

  it('should return an empty list for no items', async () => {
    await expect(runWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });

  it('should refuse a concurrency that is not a positive integer', async () => {
    await expect(runWithConcurrency([1], 0, async () => 1)).rejects.toBeInstanceOf(RangeError);
    await expect(runWithConcurrency([1], 1.5, async () => 1)).rejects.toBeInstanceOf(RangeError);
  });
});
