/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string and return the
 * parsed value, or `undefined` when the variable is unset so schema
 * defaults apply.
 *
 * Conventions:
 * - `undefined` or blank input returns `undefined`
 * - Malformed numbers come back as NaN; the zod schema rejects them with
 *   the offending path, which surfaces as a ConfigurationError
 * - Malformed booleans throw ConfigurationError directly
 */

import { ConfigurationError } from '@mev-sentinel/types';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Parse a numeric env value.
 *
 * @example
 * ```typescript
 * readEnvNumber(process.env.MEV_ALERT_THRESHOLD); // 0.7 | undefined | NaN
 * ```
 */
export function readEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value.trim());
}

/**
 * Parse a boolean env value ("true"/"false", "1"/"0", "yes"/"no", "on"/"off").
 *
 * @param value - Raw string to parse
 * @param label - Variable name, used in the error message
 */
export function readEnvBoolean(value: string | undefined, label: string): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean value for ${label}: "${value}"`, [
    `${label}: expected true/false`,
  ]);
}

/**
 * Parse a comma separated list, dropping blanks and surrounding whitespace.
 */
export function readEnvList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/**
 * Return the trimmed string, or `undefined` when blank.
 */
export function readEnvString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}
