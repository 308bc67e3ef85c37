/**
 * Key sanitization for warehouse column names
 */

import { ConfigurationError, describeError } from './errors';
import { KeyDecision, SanitizationPolicy } from './types';

/**
 * Characters not allowed in a column name: anything but letters, digits and underscore.
 * Matches whole code points, so a character outside the BMP is one replacement.
 */
export const INVALID_KEY_CHARS = /[^a-zA-Z0-9_]/gu;

export const DEFAULT_REPLACEMENT = '_';

export interface PolicyOptions {
  invalidKeyChars?: RegExp;
  replacement?: string;
  dropFields?: Iterable<string>;
  selectFields?: Iterable<string>;
}

/**
 * Make a pattern global and code-point aware
 * @throws ConfigurationError if the pattern is not valid in unicode mode
 */
function codePointPattern(pattern: RegExp): RegExp {
  const unicode = pattern.unicode || pattern.flags.includes('v');
  if (pattern.global && unicode) return pattern;

  const flags = pattern.flags + (pattern.global ? '' : 'g') + (unicode ? '' : 'u');
  try {
    return new RegExp(pattern.source, flags);
  } catch (error) {
    throw new ConfigurationError(`key pattern /${pattern.source}/ is not valid with flags '${flags}': ${describeError(error)}`);
  }
}

/**
 * Build an immutable sanitization policy
 * @throws ConfigurationError if the replacement itself contains invalid characters
 */
export function createPolicy(options: PolicyOptions = {}): SanitizationPolicy {
  const invalidKeyChars = codePointPattern(options.invalidKeyChars ?? INVALID_KEY_CHARS);
  const replacement = options.replacement ?? DEFAULT_REPLACEMENT;

  // search() ignores the global flag and lastIndex
  if (replacement.search(invalidKeyChars) !== -1) {
    throw new ConfigurationError(`replacement '${replacement}' contains characters that are not allowed in keys`);
  }

  return Object.freeze({
    invalidKeyChars,
    replacement,
    dropFields: new Set(options.dropFields ?? []),
    selectFields: new Set(options.selectFields ?? [])
  });
}

/**
 * Split a field list into fields to keep and fields to drop.
 * Entries may be comma-separated; a leading "-" marks a field to drop.
 * Example: ['metric.job,-@timestamp', 'id'] selects metric.job and id, drops @timestamp
 */
export function parseFieldList(fields: readonly string[]): { selectFields: string[]; dropFields: string[] } {
  const selectFields: string[] = [];
  const dropFields: string[] = [];

  for (const entry of fields) {
    for (const raw of entry.split(',')) {
      const field = raw.trim();
      if (field === '' || field === '-') continue;

      if (field.startsWith('-')) {
        dropFields.push(field.slice(1));
      } else {
        selectFields.push(field);
      }
    }
  }

  return { selectFields, dropFields };
}

/**
 * Check whether a key satisfies the naming convention
 */
export function isValidKey(key: string, policy: SanitizationPolicy): boolean {
  return key.search(policy.invalidKeyChars) === -1;
}

/**
 * Join a parent path and a key into a dotted field path
 */
export function fieldPath(key: string, parentPath?: string): string {
  return parentPath ? `${parentPath}.${key}` : key;
}

function isSelected(path: string, selectFields: ReadonlySet<string>): boolean {
  if (selectFields.size === 0 || selectFields.has(path)) {
    return true;
  }

  for (const selected of selectFields) {
    // An ancestor of the path is selected, or the path leads to a selected field
    if (path.startsWith(`${selected}.`) || selected.startsWith(`${path}.`)) {
      return true;
    }
  }

  return false;
}

/**
 * Decide what happens to one key of a record.
 * Drop and select rules match the dotted path of the original key names.
 * @param parentPath - Dotted path of the enclosing mapping, if nested
 */
export function sanitizeKey(key: string, policy: SanitizationPolicy, parentPath?: string): KeyDecision {
  const path = fieldPath(key, parentPath);

  if (policy.dropFields.has(path) || !isSelected(path, policy.selectFields)) {
    return { kind: 'drop' };
  }

  return { kind: 'rename', key: key.replace(policy.invalidKeyChars, policy.replacement) };
}
