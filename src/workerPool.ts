/**
 * Fixed-size worker pool for independent file tasks
 */

import { ConfigurationError } from './errors';
import { FileTaskOptions, runFileTask } from './fileTask';
import { FileTask, RecordTransform, Reporter, RunSummary } from './types';
import { describeTask } from './utils';

/**
 * Process items with exactly `workerCount` concurrent workers. Each worker takes the next
 * unstarted item until none remain. A rejected handler does not stop the other workers;
 * results come back in input order regardless of completion order.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  workerCount: number,
  handler: (item: T, workerId: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new ConfigurationError(`worker count must be a positive integer, got ${workerCount}`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (workerId: number): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await handler(items[index], workerId) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, (_, workerId) => worker(workerId)));
  return results;
}

export interface DispatchOptions extends FileTaskOptions {
  workerCount: number;
  outputDir: string;
  transform: RecordTransform;
  reporter: Reporter;
}

/**
 * Fold resolved tasks into a run summary
 */
export function summarize(tasks: FileTask[], outputDir: string): RunSummary {
  const summary: RunSummary = {
    outputDir,
    total: tasks.length,
    successCount: 0,
    errorCount: 0,
    skippedCount: 0,
    failures: [],
    tasks
  };

  for (const task of tasks) {
    if (task.status === 'succeeded') {
      summary.successCount++;
    } else if (task.status === 'skipped') {
      summary.skippedCount++;
    } else if (task.status === 'failed') {
      summary.errorCount++;
      summary.failures.push({ inputPath: task.inputPath, error: task.error ?? 'unknown error' });
    }
  }

  return summary;
}

/**
 * Run every file task through the pool and collect a run summary.
 * Per-file failures are recorded, never thrown.
 */
export async function dispatchFileTasks(tasks: readonly FileTask[], options: DispatchOptions): Promise<RunSummary> {
  const { transform, reporter, workerCount, outputDir, skipExisting } = options;

  const settled = await runWorkerPool(tasks, workerCount, async task => {
    const resolved = await runFileTask(task, transform, { skipExisting });
    const line = describeTask(resolved);
    if (resolved.status === 'failed') {
      reporter.error(line);
    } else {
      reporter.info(line);
    }
    return resolved;
  });

  const resolvedTasks = settled.map((result, index): FileTask =>
    result.status === 'fulfilled'
      ? result.value
      : { ...tasks[index], status: 'failed', error: String(result.reason) }
  );

  return summarize(resolvedTasks, outputDir);
}
