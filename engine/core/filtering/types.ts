/**
 * Filter System Types
 * Type definitions for the filtering subsystem
 */

import type { FilterOperator, RelationalOperator } from '../types/index.js';

/**
 * Value sentinel that compares each cell against the column mean
 * (matched case-insensitively)
 */
export const COLUMN_AVERAGE = 'Column Average';

/**
 * One boolean per dataset row; true keeps the row
 */
export type FilterMask = boolean[];

export const RELATIONAL_OPERATORS: readonly RelationalOperator[] = ['==', '!=', '>', '<', '>=', '<='];

export const FILTER_OPERATORS: readonly FilterOperator[] = [
  ...RELATIONAL_OPERATORS,
  'contains',
  'in',
  'column-equals',
  'column-not-equals',
];

export function isFilterOperator(value: string): value is FilterOperator {
  return FILTER_OPERATORS.some((operator) => operator === value);
}
