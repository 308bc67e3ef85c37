/**
 * Console reporting helpers
 */

import { FileTask, Reporter, RunSummary } from './types';

export const RULE = '─'.repeat(80);

export const consoleReporter: Reporter = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: message => console.error(message)
};

/**
 * One progress line for a finished task
 */
export function describeTask(task: FileTask): string {
  switch (task.status) {
    case 'succeeded':
      return `✅ ${task.inputPath} → ${task.outputPath} (${task.recordCount ?? 0} records)`;
    case 'skipped':
      return `⏭️  Skipping ${task.inputPath}: output already exists`;
    case 'failed':
      return `❌ ${task.inputPath} - Error: ${task.error ?? 'unknown error'}`;
    case 'pending':
      return `⏳ ${task.inputPath}`;
  }
}

/**
 * Report transformation summary
 * @param summary - Summary information
 */
export function reportSummary(summary: RunSummary, reporter: Reporter): void {
  reporter.info(RULE);
  reporter.info(`\n📈 Summary:`);
  reporter.info(`   📄 Processed: ${summary.total} file(s)`);
  reporter.info(`   ✅ Success: ${summary.successCount} file(s)`);
  reporter.info(`   ❌ Failed: ${summary.errorCount} file(s)`);
  if (summary.skippedCount > 0) {
    reporter.info(`   ⏭️  Skipped: ${summary.skippedCount} file(s)`);
  }
  for (const failure of summary.failures) {
    reporter.info(`      - ${failure.inputPath}: ${failure.error}`);
  }
  reporter.info(`   📁 Output directory: ${summary.outputDir}\n`);
}
