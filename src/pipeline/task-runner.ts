import pLimit from 'p-limit';
import { describeError } from '../errors.js';
import { logger, type Logger } from '../utils/logger.js';

export interface BoundedRunOptions<T> {
  /** Maximum tasks in flight at once. */
  concurrency: number;
  /** Progress and failure logs are bound to this phase name. */
  label: string;
  /** Identifier logged when the task for `item` fails. */
  describe: (item: T) => string;
  log?: Logger;
}

export interface TaskFailure {
  item: string;
  error: string;
}

export interface BoundedRunResult<R> {
  /** Every task's output, in the order tasks finished. */
  results: R[];
  succeeded: number;
  failures: TaskFailure[];
}

/**
 * Run one task per item with at most `concurrency` in flight.
 *
 * A task that throws contributes nothing: the error is logged with the item's
 * identifier and counted, and sibling tasks carry on. The returned promise
 * never rejects because of a task.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  task: (item: T) => Promise<Iterable<R>>,
  options: BoundedRunOptions<T>,
): Promise<BoundedRunResult<R>> {
  const limit = pLimit(options.concurrency);
  const log = (options.log ?? logger).child({ phase: options.label });
  const total = items.length;
  const progressEvery = Math.max(1, Math.ceil(total / 10));

  const results: R[] = [];
  const failures: TaskFailure[] = [];
  let done = 0;

  log.info({ total, concurrency: options.concurrency }, 'Dispatching tasks');

  await Promise.all(
    items.map((item) =>
      limit(async () => {
        try {
          // Materialize first so a parser failing halfway adds nothing.
          const produced = [...(await task(item))];
          results.push(...produced);
        } catch (err) {
          const failure = { item: options.describe(item), error: describeError(err) };
          failures.push(failure);
          log.warn(failure, 'Task failed, skipping');
        } finally {
          done++;
          if (done % progressEvery === 0 || done === total) {
            log.info({ done, total }, 'Progress');
          }
        }
      }),
    ),
  );

  return { results, succeeded: total - failures.length, failures };
}
