/**
 * Error kinds raised while transforming data files.
 */

export class TransformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransformError';
  }
}

export class ConfigurationError extends TransformError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export class InputDirectoryError extends TransformError {
  dirPath: string;

  constructor(dirPath: string, reason: string) {
    super(`Input directory '${dirPath}' ${reason}`);
    this.name = 'InputDirectoryError';
    this.dirPath = dirPath;
  }
}

export class OutputDirectoryError extends TransformError {
  dirPath: string;

  constructor(dirPath: string, reason: string) {
    super(`Could not create output directory '${dirPath}': ${reason}`);
    this.name = 'OutputDirectoryError';
    this.dirPath = dirPath;
  }
}

export class IOError extends TransformError {
  filePath: string;
  code?: string;

  constructor(filePath: string, operation: 'read' | 'write', cause: unknown) {
    super(`Could not ${operation} '${filePath}': ${describeError(cause)}`);
    this.name = 'IOError';
    this.filePath = filePath;
    this.code = errnoCode(cause);
  }
}

export class MalformedRecordError extends TransformError {
  reason: string;
  source?: string;
  line?: number;

  constructor(reason: string, source?: string, line?: number) {
    const location = source ? ` (${source}${line !== undefined ? `:${line}` : ''})` : '';
    super(`Malformed record${location}: ${reason}`);
    this.name = 'MalformedRecordError';
    this.reason = reason;
    this.source = source;
    this.line = line;
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code (ENOENT, EACCES, ...) of a file-system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
