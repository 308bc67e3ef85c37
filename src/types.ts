/**
 * Type definitions for the transform application
 */

import type { LosslessNumber } from 'lossless-json';

/** Numbers read from data files are LosslessNumbers holding the exact source text */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * One record of a data file: an ordered mapping from key to value
 */
export interface DataRecord {
  [key: string]: JsonValue;
}

/**
 * Rules for rewriting record keys. Immutable for the duration of a run.
 */
export interface SanitizationPolicy {
  /** Global pattern matching every character not allowed in a key */
  readonly invalidKeyChars: RegExp;
  readonly replacement: string;
  /** Dotted paths (original key names) to omit entirely */
  readonly dropFields: ReadonlySet<string>;
  /** Dotted paths to keep; empty means keep everything not dropped */
  readonly selectFields: ReadonlySet<string>;
}

export type KeyDecision =
  | { kind: 'rename'; key: string }
  | { kind: 'drop' };

/**
 * Turns one parsed input value into one output record
 */
export type RecordTransform = (record: unknown) => DataRecord;

export type FileTaskStatus = 'pending' | 'succeeded' | 'failed' | 'skipped';

export interface FileTask {
  inputPath: string;
  outputPath: string;
  status: FileTaskStatus;
  recordCount?: number;
  error?: string;
}

export interface FileFailure {
  inputPath: string;
  error: string;
}

/**
 * Summary of transformation run
 */
export interface RunSummary {
  outputDir: string;
  total: number;
  successCount: number;
  errorCount: number;
  skippedCount: number;
  failures: FileFailure[];
  tasks: FileTask[];
}

/**
 * Destination for progress and summary lines
 */
export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
