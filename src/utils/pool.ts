export type PoolResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

/**
 * Runs `task` over `inputs` with at most `size` tasks in flight. Results keep
 * input order. Once `signal` aborts no new task starts; unstarted inputs come
 * back as `skipped`.
 */
export async function runPool<I, O>(
  inputs: readonly I[],
  size: number,
  task: (input: I, index: number) => Promise<O>,
  signal?: AbortSignal,
): Promise<PoolResult<O>[]> {
  const results = inputs.map((): PoolResult<O> => ({ status: 'skipped' }));
  let next = 0;

  const worker = async () => {
    while (next < inputs.length) {
      if (signal?.aborted) return;
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await task(inputs[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(size, inputs.length));
  await Promise.all(Array.from({ length: lanes }, worker));
  return results;
}
