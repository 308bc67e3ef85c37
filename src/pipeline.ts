/**
 * Pipeline driver: scan the input directory, prepare the output directory and run the worker pool
 */

import * as fs from 'fs';
import * as path from 'path';
import { PipelineConfig } from './config';
import { InputDirectoryError, OutputDirectoryError, describeError, errnoCode } from './errors';
import { createFileTask } from './fileTask';
import { RecordTransform, Reporter, RunSummary } from './types';
import { RULE, consoleReporter, reportSummary } from './utils';
import { dispatchFileTasks, summarize } from './workerPool';

/**
 * Validate that the input directory exists, is a directory and can be listed
 * @returns Resolved absolute path
 */
export async function validateInputDirectory(dirPath: string): Promise<string> {
  const resolvedPath = path.resolve(dirPath);

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(resolvedPath);
  } catch (error) {
    throw new InputDirectoryError(dirPath, errnoCode(error) === 'ENOENT' ? 'does not exist' : `is not accessible: ${describeError(error)}`);
  }

  if (!stats.isDirectory()) {
    throw new InputDirectoryError(dirPath, 'is not a directory');
  }

  try {
    await fs.promises.access(resolvedPath, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    throw new InputDirectoryError(dirPath, `is not readable: ${describeError(error)}`);
  }

  return resolvedPath;
}

/**
 * Create the output directory if it doesn't exist
 * @returns Resolved absolute path
 */
export async function ensureOutputDirectory(dirPath: string): Promise<string> {
  const resolvedPath = path.resolve(dirPath);
  try {
    await fs.promises.mkdir(resolvedPath, { recursive: true });
  } catch (error) {
    throw new OutputDirectoryError(dirPath, describeError(error));
  }
  return resolvedPath;
}

export interface FindDataFilesOptions {
  /** Only keep files whose directory path contains this text */
  pathContains?: string;
  /** Directories never descended into */
  excludeDirs?: string[];
}

/**
 * Find all data files under a directory, recursively, in sorted order.
 * Hidden files and directories (including in-progress temporary outputs) are skipped.
 * Symbolic links to files are included; links to directories are not followed.
 * `pathContains` is matched against the directory path relative to `rootDir`.
 */
export async function findDataFiles(rootDir: string, options: FindDataFilesOptions = {}): Promise<string[]> {
  const root = path.resolve(rootDir);
  const excluded = new Set((options.excludeDirs ?? []).map(dir => path.resolve(dir)));
  const files: string[] = [];

  const isLinkedFile = async (linkPath: string): Promise<boolean> => {
    try {
      return (await fs.promises.stat(linkPath)).isFile();
    } catch (error) {
      // Dangling or looping link
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ELOOP') return false;
      throw error;
    }
  };

  const walk = async (dirPath: string): Promise<void> => {
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const matches = !options.pathContains || path.relative(root, dirPath).includes(options.pathContains);

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entryPath)) {
          await walk(entryPath);
        }
      } else if (matches && (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(entryPath))))) {
        files.push(entryPath);
      }
    }
  };

  await walk(root);
  return files;
}

/**
 * Transform every data file in `config.inputDir` into a mirrored path under `config.outputDir`
 * @throws InputDirectoryError if the input directory is missing or unreadable
 * @throws OutputDirectoryError if the output directory cannot be created
 */
export async function runPipeline(
  config: PipelineConfig,
  transform: RecordTransform,
  reporter: Reporter = consoleReporter
): Promise<RunSummary> {
  const inputDir = await validateInputDirectory(config.inputDir);
  const outputDir = await ensureOutputDirectory(config.outputDir);

  reporter.info(
    `Transforming data files from "${config.inputDir}" and writing them to "${config.outputDir}" ` +
      `using ${config.processes} parallel processes`
  );

  let dataFiles: string[];
  try {
    dataFiles = await findDataFiles(inputDir, {
      pathContains: config.pathContains,
      excludeDirs: [outputDir]
    });
  } catch (error) {
    throw new InputDirectoryError(config.inputDir, `could not be scanned: ${describeError(error)}`);
  }

  if (dataFiles.length === 0) {
    const matchCriteria = config.pathContains ? ` matching "${config.pathContains}"` : '';
    reporter.warn(`⚠️  No data files found in "${config.inputDir}"${matchCriteria}`);
    const summary = summarize([], outputDir);
    reportSummary(summary, reporter);
    return summary;
  }

  const tasks = dataFiles.map(file => createFileTask(file, path.join(outputDir, path.relative(inputDir, file))));

  reporter.info(RULE);
  const summary = await dispatchFileTasks(tasks, {
    workerCount: config.processes,
    outputDir,
    transform,
    reporter,
    skipExisting: config.skipExisting
  });

  reportSummary(summary, reporter);
  return summary;
}
