/**
 * Runs tasks with at most `concurrency` in flight. Results keep the order of `tasks`.
 * `shouldContinue` is checked before each task is started; tasks never started resolve to undefined.
 */
export async function runParallel<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number,
  shouldContinue: () => boolean = () => true
): Promise<Array<T | undefined>> {
  const results: Array<T | undefined> = new Array<T | undefined>(tasks.length).fill(undefined);
  let next = 0;

  const workerCount = Math.max(0, Math.min(Math.max(1, Math.floor(concurrency)), tasks.length));
  if (workerCount === 0) return [];

  const workers = Array(workerCount)
    .fill(null)
    .map(async () => {
      while (next < tasks.length && shouldContinue()) {
        const index = next;
        next += 1;
        results[index] = await tasks[index]();
      }
    });
  await Promise.all(workers);
  return results;
}
