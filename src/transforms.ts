/**
 * Record transformation: rewrite every key of a record according to a sanitization policy
 */

import { isLosslessNumber } from 'lossless-json';
import { MalformedRecordError } from './errors';
import { fieldPath, sanitizeKey } from './sanitizer';
import { DataRecord, JsonValue, RecordTransform, SanitizationPolicy } from './types';

/**
 * Check for a JSON object (not an array, a number or null)
 */
export function isDataRecord(value: unknown): value is DataRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isLosslessNumber(value)) return 'number';
  return typeof value;
}

function transformValue(value: JsonValue, policy: SanitizationPolicy, path: string): JsonValue {
  if (Array.isArray(value)) {
    return value.map(item => transformValue(item, policy, path));
  }
  if (isDataRecord(value)) {
    return transformMapping(value, policy, path);
  }
  return value;
}

function transformMapping(record: DataRecord, policy: SanitizationPolicy, parentPath?: string): DataRecord {
  // Map keeps the first position of a key and the last value written to it
  const clean = new Map<string, JsonValue>();

  for (const [key, value] of Object.entries(record)) {
    const decision = sanitizeKey(key, policy, parentPath);
    if (decision.kind === 'drop') continue;

    clean.set(decision.key, transformValue(value, policy, fieldPath(key, parentPath)));
  }

  // fromEntries defines own properties, so a "__proto__" key stays a plain key
  return Object.fromEntries(clean);
}

/**
 * Sanitize the keys of one record, recursing into nested objects and arrays of objects.
 * Leaf values are returned untouched and the input is never mutated.
 * When two keys sanitize to the same name, the last one wins.
 * @throws MalformedRecordError if the record is not a key-value mapping
 */
export function transformRecord(record: unknown, policy: SanitizationPolicy): DataRecord {
  if (!isDataRecord(record)) {
    throw new MalformedRecordError(`expected a JSON object but got ${describeType(record)}`);
  }
  return transformMapping(record, policy);
}

/**
 * Compose an optional preparation step with key sanitization
 * @param prepare - Runs on the parsed record before its keys are rewritten
 */
export function createRecordTransform(
  policy: SanitizationPolicy,
  prepare?: (record: DataRecord) => DataRecord
): RecordTransform {
  return (record: unknown) => {
    if (prepare && isDataRecord(record)) {
      return transformRecord(prepare(record), policy);
    }
    return transformRecord(record, policy);
  };
}
