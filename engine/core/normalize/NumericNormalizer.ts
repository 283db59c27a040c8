/**
 * Numeric Normalizer
 * Coerces heterogeneous text/number cells into comparable numbers
 */

import type { CellValue } from '../types/index.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/**
 * Normalize one cell to a number.
 *
 * Strings are trimmed and stripped of `%` and `,` before parsing, so
 * `"12.5%"` reads as 12.5 and `"1,234"` as 1234. Empty strings, `"nan"`,
 * booleans and anything unparseable read as null.
 */
export function normalizeNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === 'boolean') {
    return null;
  }

  const text = value.trim().replace(/[%,]/g, '');
  if (text === '' || text.toLowerCase() === 'nan') {
    return null;
  }

  if (DECIMAL_PATTERN.test(text)) {
    return parseFloat(text);
  }

  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }

  return null;
}

/**
 * Normalize a whole column
 */
export function normalizeSeries(values: ReadonlyArray<CellValue | undefined>): Array<number | null> {
  return values.map(normalizeNumber);
}

/**
 * Mean of the non-null entries, or null when there are none
 */
export function meanOf(values: ReadonlyArray<number | null>): number | null {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    if (value !== null) {
      sum += value;
      count++;
    }
  }
  return count > 0 ? sum / count : null;
}
