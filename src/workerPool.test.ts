import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from './errors';
import { createFileTask } from './fileTask';
import { createPolicy } from './sanitizer';
import { createRecordTransform } from './transforms';
import { Reporter } from './types';
import { dispatchFileTasks, runWorkerPool, summarize } from './workerPool';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

function collectingReporter(): Reporter & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    info: message => lines.push(message),
    warn: message => lines.push(message),
    error: message => errors.push(message)
  };
}

describe('runWorkerPool', () => {
  test('never runs more than the configured number of handlers at once', async () => {
    let active = 0;
    let peak = 0;

    const results = await runWorkerPool([1, 2, 3, 4, 5, 6, 7], 3, async item => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return item * 10;
    });

    expect(peak).toBe(3);
    expect(results).toEqual([10, 20, 30, 40, 50, 60, 70].map(value => ({ status: 'fulfilled', value })));
  });

  test('starts exactly the configured number of workers', async () => {
    const workers = new Set<number>();
    await runWorkerPool(['a', 'b', 'c', 'd'], 4, async (_item, workerId) => {
      workers.add(workerId);
      await tick();
    });

    expect([...workers].sort()).toEqual([0, 1, 2, 3]);
  });

  test('returns results in input order regardless of completion order', async () => {
    const delays = [3, 0, 2, 1];
    const results = await runWorkerPool(delays, 4, async delay => {
      for (let i = 0; i < delay; i++) await tick();
      return delay;
    });

    expect(results.map(result => (result.status === 'fulfilled' ? result.value : -1))).toEqual([3, 0, 2, 1]);
  });

  test('collects a failing item without stopping the others', async () => {
    const seen: number[] = [];
    const results = await runWorkerPool([1, 2, 3], 1, async item => {
      seen.push(item);
      if (item === 2) throw new Error('boom');
      return item;
    });

    expect(seen).toEqual([1, 2, 3]);
    expect(results[0]).toEqual({ status: 'fulfilled', value: 1 });
    expect(results[1]).toMatchObject({ status: 'rejected', reason: new Error('boom') });
    expect(results[2]).toEqual({ status: 'fulfilled', value: 3 });
  });

  test('handles more workers than items and empty input', async () => {
    expect(await runWorkerPool([1], 5, async item => item)).toEqual([{ status: 'fulfilled', value: 1 }]);
    expect(await runWorkerPool([], 2, async () => 0)).toEqual([]);
  });

  test.each([0, -1, 1.5, Number.NaN])('rejects a worker count of %p', async count => {
    await expect(runWorkerPool([1], count, async item => item)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('summarize', () => {
  test('counts each status and lists failures in task order', () => {
    const summary = summarize(
      [
        { inputPath: 'a', outputPath: 'A', status: 'succeeded', recordCount: 2 },
        { inputPath: 'b', outputPath: 'B', status: 'failed', error: 'bad b' },
        { inputPath: 'c', outputPath: 'C', status: 'skipped' },
        { inputPath: 'd', outputPath: 'D', status: 'failed' }
      ],
      '/out'
    );

    expect(summary).toMatchObject({
      outputDir: '/out',
      total: 4,
      successCount: 1,
      errorCount: 2,
      skippedCount: 1,
      failures: [
        { inputPath: 'b', error: 'bad b' },
        { inputPath: 'd', error: 'unknown error' }
      ]
    });
  });
});

describe('dispatchFileTasks', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'worker-pool-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('runs every task and reports each completion', async () => {
    const inputs = ['one.json', 'two.json', 'three.json'].map(name => {
      const file = path.join(tempDir, name);
      fs.writeFileSync(file, name === 'two.json' ? '{"broken"\n' : '{"a.b":1}\n');
      return file;
    });
    const outputDir = path.join(tempDir, 'out');
    const tasks = inputs.map(input => createFileTask(input, path.join(outputDir, path.basename(input))));
    const reporter = collectingReporter();

    const summary = await dispatchFileTasks(tasks, {
      workerCount: 2,
      outputDir,
      transform: createRecordTransform(createPolicy()),
      reporter
    });

    expect(summary.total).toBe(3);
    expect(summary.successCount).toBe(2);
    expect(summary.errorCount).toBe(1);
    expect(summary.failures.map(failure => failure.inputPath)).toEqual([inputs[1]]);
    expect(summary.tasks.map(task => task.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(reporter.lines.sort()).toEqual(
      [
        `✅ ${inputs[0]} → ${tasks[0].outputPath} (1 records)`,
        `✅ ${inputs[2]} → ${tasks[2].outputPath} (1 records)`
      ].sort()
    );
    expect(reporter.errors).toHaveLength(1);
    expect(reporter.errors[0]).toMatch(/^❌ .*two\.json - Error: Malformed record/);
  });
});
