/**
 * One unit of work: transform one input file into one output file
 */

import * as fs from 'fs';
import * as path from 'path';
import { isGzipPath, readRecordFile, writeRecordFile } from './codec';
import { IOError, MalformedRecordError, describeError, errnoCode } from './errors';
import { DataRecord, FileTask, RecordTransform } from './types';

export interface FileTaskOptions {
  /** Leave an existing output file alone instead of overwriting it */
  skipExisting?: boolean;
}

export function createFileTask(inputPath: string, outputPath: string): FileTask {
  return { inputPath, outputPath, status: 'pending' };
}

/**
 * Hidden sibling the output is written to before being renamed into place
 */
export function temporaryPathFor(outputPath: string): string {
  return path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.tmp`);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    // The parent is missing or is not a directory, so there is nothing to remove
    if (errnoCode(error) !== 'ENOTDIR' && errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}

/**
 * Read, transform and write one file. Every record is transformed before anything is written,
 * and the output only appears once the temporary file is complete. On failure the temporary
 * file and any stale output are removed.
 * @returns Number of records written
 * @throws IOError on read or write failure
 * @throws MalformedRecordError if any record cannot be parsed or transformed
 */
export async function transformFile(
  inputPath: string,
  outputPath: string,
  transform: RecordTransform
): Promise<number> {
  const tempPath = temporaryPathFor(outputPath);

  try {
    try {
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    } catch (error) {
      throw new IOError(path.dirname(outputPath), 'write', error);
    }

    const lines = await readRecordFile(inputPath);
    const records: DataRecord[] = lines.map(({ line, value }) => {
      try {
        return transform(value);
      } catch (error) {
        if (error instanceof MalformedRecordError) {
          throw new MalformedRecordError(error.reason, inputPath, line);
        }
        throw error;
      }
    });

    await writeRecordFile(tempPath, records, isGzipPath(outputPath));

    try {
      await fs.promises.rename(tempPath, outputPath);
    } catch (error) {
      throw new IOError(outputPath, 'write', error);
    }

    return records.length;
  } catch (error) {
    await removeIfPresent(tempPath);
    await removeIfPresent(outputPath);
    throw error;
  }
}

/**
 * Run a task to completion. Never throws: failures are recorded on the returned task.
 */
export async function runFileTask(
  task: FileTask,
  transform: RecordTransform,
  options: FileTaskOptions = {}
): Promise<FileTask> {
  if (options.skipExisting && (await pathExists(task.outputPath))) {
    return { ...task, status: 'skipped' };
  }

  try {
    const recordCount = await transformFile(task.inputPath, task.outputPath, transform);
    return { ...task, status: 'succeeded', recordCount };
  } catch (error) {
    return { ...task, status: 'failed', error: describeError(error) };
  }
}
