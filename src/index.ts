#!/usr/bin/env node

import { Command, OutputConfiguration } from 'commander';
import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig } from './config';
import { describeError } from './errors';
import { runPipeline } from './pipeline';
import { createPolicy, parseFieldList } from './sanitizer';
import { createRecordTransform } from './transforms';
import { Reporter } from './types';
import { normalizeUsageMetricsRecord } from './usageMetrics';
import { consoleReporter } from './utils';

/**
 * Options shared by every transform subcommand, as parsed by commander
 */
interface TransformCommandOptions {
  inputDir: string;
  outputDir: string;
  processes: string | number;
  pathContains?: string;
  fields?: string[];
  replacement?: string;
  skipExisting?: boolean;
  normalizeTimestamps?: boolean;
}

export interface ProgramContext {
  reporter?: Reporter;
  /** Receives the process exit status once a command finishes */
  setExitCode?: (code: number) => void;
  /** Where commander writes help and usage errors */
  output?: OutputConfiguration;
  /** Throw commander errors instead of exiting the process */
  exitOverride?: boolean;
}

/**
 * Validate options, build the record transform and run the pipeline
 * @returns Process exit status: 0 when every file succeeded, 1 otherwise
 */
export async function runTransformCommand(options: TransformCommandOptions, reporter: Reporter): Promise<number> {
  try {
    const config = loadPipelineConfig({
      inputDir: options.inputDir,
      outputDir: options.outputDir,
      processes: options.processes,
      pathContains: options.pathContains,
      skipExisting: options.skipExisting ?? false
    });

    const { selectFields, dropFields } = parseFieldList(options.fields ?? []);
    const policy = createPolicy({ selectFields, dropFields, replacement: options.replacement });

    if (selectFields.length > 0) {
      reporter.info(`Only extracting these fields: ${[...selectFields].sort().join(', ')}`);
    }
    if (dropFields.length > 0) {
      reporter.info(`Excluding these fields: ${[...dropFields].sort().join(', ')}`);
    }

    const transform = createRecordTransform(
      policy,
      options.normalizeTimestamps ? normalizeUsageMetricsRecord : undefined
    );

    const summary = await runPipeline(config, transform, reporter);
    return summary.errorCount > 0 ? 1 : 0;
  } catch (error) {
    reporter.error(`Fatal error: ${describeError(error)}`);
    return 1;
  }
}

function addPipelineOptions(command: Command): Command {
  return command
    .option('--input-dir <path>', 'Directory to read data files from', DEFAULT_PIPELINE_CONFIG.inputDir)
    .option('--output-dir <path>', 'Directory to write transformed files to', DEFAULT_PIPELINE_CONFIG.outputDir)
    .option('--processes <n>', 'Number of files to transform in parallel', String(DEFAULT_PIPELINE_CONFIG.processes))
    .option('--path-contains <text>', 'Only process files whose directory path contains this text')
    .option(
      '--fields <fields...>',
      'Fields to keep (dotted paths for nested fields, comma or space separated); prefix with "-" to drop a field'
    )
    .option('--replacement <text>', 'Replacement for characters not allowed in keys', '_')
    .option('--skip-existing', 'Leave output files that already exist untouched');
}

/**
 * Build the CLI without running it
 */
export function createProgram(context: ProgramContext = {}): Command {
  const reporter = context.reporter ?? consoleReporter;
  const setExitCode = context.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });

  const program = new Command();

  // Subcommands copy these settings when they are created
  if (context.output) {
    program.configureOutput(context.output);
  }
  if (context.exitOverride) {
    program.exitOverride();
  }

  program
    .name('transform')
    .description('Transform data files so their keys are valid warehouse column names')
    .version('0.1.0');

  addPipelineOptions(
    program
      .command('usage-metrics')
      .description('Transform usage metrics files (JSON lines, optionally gzipped)')
  )
    .option('--normalize-timestamps', 'Round timestamps to the minute and add Pacific date/time fields')
    .action(async (options: TransformCommandOptions) => {
      setExitCode(await runTransformCommand(options, reporter));
    });

  addPipelineOptions(
    program
      .command('records')
      .description('Sanitize the keys of any JSON lines data files')
  ).action(async (options: TransformCommandOptions) => {
    setExitCode(await runTransformCommand({ ...options, normalizeTimestamps: false }, reporter));
  });

  return program;
}

// Only run CLI if this is the main module
if (require.main === module) {
  const program = createProgram();

  if (process.argv.length === 2) {
    program.help();
  }

  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error('Fatal error:', describeError(error));
    process.exit(1);
  });
}

export { runPipeline } from './pipeline';
export { transformRecord, createRecordTransform } from './transforms';
export { sanitizeKey, isValidKey, createPolicy, parseFieldList } from './sanitizer';
export { runWorkerPool, dispatchFileTasks } from './workerPool';
export { normalizeUsageMetricsRecord } from './usageMetrics';
export * from './errors';
export * from './types';
