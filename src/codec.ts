/**
 * Reading and writing JSON-lines record files, gzip-compressed when the name ends in .gz.
 * Number tokens are kept exactly as written, so large integers and "1.0" survive a round trip.
 */

import * as fs from 'fs';
import { Gunzip, gzipSync, strToU8 } from 'fflate';
import { parse, stringify } from 'lossless-json';
import { IOError, MalformedRecordError, describeError } from './errors';

export const GZIP_EXTENSION = '.gz';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function isGzipPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(GZIP_EXTENSION);
}

/**
 * One parsed line of a record file
 */
export interface ParsedLine {
  line: number;
  value: unknown;
}

/**
 * Parse newline-delimited JSON, skipping blank lines
 * @param source - File name used in error messages
 * @throws MalformedRecordError on the first line that is not valid JSON
 */
export function parseRecords(text: string, source?: string): ParsedLine[] {
  const parsed: ParsedLine[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((content, index) => {
    if (content.trim() === '') return;

    let value: unknown;
    try {
      value = parse(content);
    } catch (error) {
      throw new MalformedRecordError(describeError(error), source, index + 1);
    }
    parsed.push({ line: index + 1, value });
  });

  return parsed;
}

/**
 * Serialize records one per line, each terminated by a newline
 */
export function serializeRecords(records: readonly unknown[]): string {
  return records
    .map(record => {
      const text = stringify(record);
      if (text === undefined) {
        throw new MalformedRecordError(`cannot serialize a value of type ${typeof record}`);
      }
      return text + '\n';
    })
    .join('');
}

/**
 * Decompress every member of a gzip stream; concatenated members decode to concatenated content
 */
export function gunzipAll(data: Uint8Array): Uint8Array {
  const chunks: Uint8Array[] = [];
  const gunzip = new Gunzip();
  gunzip.ondata = chunk => {
    chunks.push(chunk);
  };

  // Members after the first are only decoded while the stream is still open
  gunzip.push(data);
  gunzip.push(new Uint8Array(0), true);

  return Buffer.concat(chunks);
}

/**
 * Decode UTF-8, rejecting byte sequences that are not valid UTF-8
 * @throws MalformedRecordError if the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array, source?: string): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new MalformedRecordError(`not valid UTF-8 (${describeError(error)})`, source);
  }
}

/**
 * Read and parse a record file
 * @throws IOError if the file cannot be read
 * @throws MalformedRecordError if the content is not valid gzip, UTF-8 or JSON lines
 */
export async function readRecordFile(filePath: string): Promise<ParsedLine[]> {
  let data: Buffer;
  try {
    data = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new IOError(filePath, 'read', error);
  }

  let bytes: Uint8Array = data;
  if (isGzipPath(filePath)) {
    try {
      bytes = gunzipAll(data);
    } catch (error) {
      throw new MalformedRecordError(`not a valid gzip stream (${describeError(error)})`, filePath);
    }
  }

  return parseRecords(decodeUtf8(bytes, filePath), filePath);
}

/**
 * Serialize records and write them to a file.
 * The gzip header carries a zero mtime so output bytes depend only on the records.
 * @param gzip - Compress the output; defaults to whether the path ends in .gz
 * @throws IOError if the file cannot be written
 */
export async function writeRecordFile(
  filePath: string,
  records: readonly unknown[],
  gzip: boolean = isGzipPath(filePath)
): Promise<void> {
  let bytes = strToU8(serializeRecords(records));
  if (gzip) {
    bytes = gzipSync(bytes, { mtime: 0 });
  }

  try {
    await fs.promises.writeFile(filePath, bytes);
  } catch (error) {
    throw new IOError(filePath, 'write', error);
  }
}
