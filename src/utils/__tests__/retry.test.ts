import { calculateDelay, DEFAULT_RETRY_OPTIONS, mapWithConcurrency, withRetry } from '../retry';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('withRetry', () => {
  it('should return the first successful attempt', async () => {
    const operation = jest.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return 'done';
    });

    await expect(withRetry(operation, 'flaky', { baseDelayMs: 1, jitterMs: 0 })).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should give up after maxAttempts with the last error', async () => {
    const operation = jest.fn(async (attempt: number) => {
      throw new Error(`attempt ${attempt} failed`);
    });

    await expect(withRetry(operation, 'doomed', { maxAttempts: 2, baseDelayMs: 1, jitterMs: 0 })).rejects.toThrow(
      'attempt 2 failed'
    );
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not repeat errors the predicate rejects', async () => {
    const operation = jest.fn(async () => {
      throw new TypeError('bad input');
    });

    await expect(
      withRetry(operation, 'strict', { baseDelayMs: 1, isRetryable: error => !(error instanceof TypeError) })
    ).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('calculateDelay', () => {
  it('should grow exponentially up to the cap', () => {
    const options = { ...DEFAULT_RETRY_OPTIONS, baseDelayMs: 100, jitterMs: 0, maxDelayMs: 350 };

    expect(calculateDelay(1, options)).toBe(100);
    expect(calculateDelay(2, options)).toBe(200);
    expect(calculateDelay(3, options)).toBe(350);
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order and respect the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight--;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('should stop starting work after a failure and wait for work in flight', async () => {
    const started: number[] = [];
    const finished: number[] = [];

    await expect(
      mapWithConcurrency([1, 2, 3, 4], 2, async item => {
        started.push(item);
        if (item === 1) {
          throw new Error('item 1 failed');
        }
        await delay(20);
        finished.push(item);
        return item;
      })
    ).rejects.toThrow('item 1 failed');

    expect(started).toEqual([1, 2]);
    expect(finished).toEqual([2]);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async (item: number) => item)).resolves.toEqual([]);
  });
});
