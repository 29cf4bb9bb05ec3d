import { describe, it, expect } from 'vitest';
import { withConcurrency } from '../../src/utils/index.js';

describe('withConcurrency', () => {
  it('should return results in task order', async () => {
    const delays = [30, 5, 20, 1];
    const tasks = delays.map(
      (delay, i) => () => new Promise<number>((resolve) => setTimeout(() => resolve(i), delay))
    );

    expect(await withConcurrency(tasks, 2)).toEqual([0, 1, 2, 3]);
  });

  it('should not run more tasks at once than allowed', async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 8 }, () => async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });

    await withConcurrency(tasks, 3);

    expect(peak).toBe(3);
  });

  it('should accept synchronous tasks', async () => {
    expect(await withConcurrency([() => 'a', () => 'b'], 4)).toEqual(['a', 'b']);
  });

  it('should handle an empty task list', async () => {
    expect(await withConcurrency([], 2)).toEqual([]);
  });
});
