/**
 * Utility functions
 */

/**
 * Run tasks with limited concurrency using worker pool pattern
 *
 * @param tasks - Array of functions that return (or resolve to) a value
 * @param concurrency - Maximum concurrent executions
 * @returns Array of results in same order as tasks
 */
export async function withConcurrency<T>(
  tasks: (() => T | Promise<T>)[],
  concurrency: number
): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length) {
      const currentIndex = nextIndex++;
      const task = tasks[currentIndex];
      if (task) {
        results[currentIndex] = await task();
      }
    }
  }

  // Create worker pool
  const workerCount = Math.max(1, Math.min(concurrency, tasks.length));
  const workers = Array.from({ length: workerCount }, () => worker());

  await Promise.all(workers);
  return results;
}
