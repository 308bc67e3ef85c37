/**
 * Normalization for usage metrics records exported from the metrics pipeline.
 *
 * Input:
 *   {"@timestamp": "...", "timestamp": 1234567, "metric": {"_deltaSeconds": "50", ...}, ...}
 * Output (before key sanitization):
 *   {"timestamp": 1234560, "metric": {"_deltaSeconds": 60, ...}, ...,
 *    "datetime_pt": "1970-01-14 22:56:00", "date_pt": "1970-01-14"}
 *
 * "@timestamp" is dropped because it is less accurate than "timestamp". Timestamps and deltas are
 * rounded to the minute, and a Pacific date/time is added for partitioning.
 */

import { isLosslessNumber, stringify } from 'lossless-json';
import { MalformedRecordError } from './errors';
import { isDataRecord } from './transforms';
import { DataRecord } from './types';

export const DELTA_UNIT_SECONDS = 60;

export const REPORTING_TIME_ZONE = 'America/Los_Angeles';

const pacificFormat = new Intl.DateTimeFormat('en-US', {
  timeZone: REPORTING_TIME_ZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23'
});

/**
 * Round seconds to the nearest whole unit, halves rounding away from zero for positive values
 */
export function roundToUnit(seconds: number, unit: number = DELTA_UNIT_SECONDS): number {
  return Math.trunc(seconds / unit + 0.5) * unit;
}

function toFiniteNumber(value: unknown): number | undefined {
  const number = isLosslessNumber(value) ? Number(value.value) : value;
  return typeof number === 'number' && Number.isFinite(number) ? number : undefined;
}

function describeValue(value: unknown): string {
  return stringify(value) ?? 'undefined';
}

function toInteger(value: unknown, field: string): number {
  const number = toFiniteNumber(value);
  if (number !== undefined) {
    return Math.trunc(number);
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  throw new MalformedRecordError(`'${field}' must be an integer, got ${describeValue(value)}`);
}

/**
 * Format epoch seconds as Pacific wall-clock date and datetime strings
 */
export function formatPacificTime(epochSeconds: number): { datetime: string; date: string } {
  const parts: Record<string, string> = {};
  for (const part of pacificFormat.formatToParts(new Date(epochSeconds * 1000))) {
    parts[part.type] = part.value;
  }

  const date = `${parts.year}-${parts.month}-${parts.day}`;
  return { datetime: `${date} ${parts.hour}:${parts.minute}:${parts.second}`, date };
}

/**
 * Round timestamps to the minute, remove "@timestamp" and add Pacific date/time fields.
 * Returns a new record; the input is not mutated.
 * @throws MalformedRecordError if "timestamp" or "metric._deltaSeconds" is missing or not numeric
 */
export function normalizeUsageMetricsRecord(record: DataRecord): DataRecord {
  const timestamp = toFiniteNumber(record.timestamp);
  if (timestamp === undefined) {
    throw new MalformedRecordError(`'timestamp' must be a number, got ${describeValue(record.timestamp)}`);
  }

  const { metric } = record;
  if (!isDataRecord(metric)) {
    throw new MalformedRecordError(`'metric' must be an object`);
  }

  const normalized: DataRecord = { ...record };
  delete normalized['@timestamp'];

  const roundedTimestamp = roundToUnit(timestamp);
  const deltaSeconds = toInteger(metric._deltaSeconds, 'metric._deltaSeconds');

  normalized.timestamp = roundedTimestamp;
  normalized.metric = {
    ...metric,
    _deltaSeconds: Math.max(roundToUnit(deltaSeconds), DELTA_UNIT_SECONDS)
  };

  const pacific = formatPacificTime(roundedTimestamp);
  normalized.datetime_pt = pacific.datetime;
  normalized.date_pt = pacific.date;

  return normalized;
}
