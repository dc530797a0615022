export type Enqueue<T> = (task: T) => void;
export type Worker<T> = (task: T, enqueue: Enqueue<T>) => Promise<void>;

/**
 * Run `worker` over `initial` and every task it enqueues, with at most
 * `concurrency` workers in flight. Resolves once the queue is drained and
 * all workers have settled; rejects with the first worker failure.
 */
export async function drainWorkQueue<T>(
  initial: readonly T[],
  concurrency: number,
  worker: Worker<T>,
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const pending: T[] = [...initial];
  let active = 0;
  let failed = false;

  await new Promise<void>((resolve, reject) => {
    const pump = (): void => {
      if (failed) {
        return;
      }
      while (active < concurrency && pending.length > 0) {
        const task = pending.shift();
        if (task === undefined) {
          break;
        }
        active += 1;
        worker(task, enqueue).then(
          () => {
            active -= 1;
            pump();
          },
          (error: unknown) => {
            failed = true;
            reject(error);
          },
        );
      }
      if (active === 0 && pending.length === 0) {
        resolve();
      }
    };

    const enqueue = (task: T): void => {
      pending.push(task);
      pump();
    };

    pump();
  });
}
