/**
 * Filter Engine
 *
 * Evaluates an ordered list of filter rows over a dataset.
 *
 * Semantics:
 * - Each valid row produces one boolean mask over the dataset rows.
 * - Masks fold left to right: the first valid row seeds the result, each
 *   later row is combined with AND or OR according to its own `join`.
 *   This is a flat fold, not AND-groups split by OR.
 * - Rows naming a column that the dataset lacks are skipped, so a sheet
 *   configuration keeps working after the columns change.
 * - A row whose evaluation throws excludes every dataset row.
 */

import type { CellValue, Dataset, FilterRow, RelationalOperator } from '../types/index.js';
import { cellToString, getCell } from '../types/index.js';
import { meanOf, normalizeNumber, normalizeSeries } from '../normalize/NumericNormalizer.js';
import { COLUMN_AVERAGE, type FilterMask } from './types.js';

// ===========================================================================
// Helpers
// ===========================================================================

export function isColumnAverage(value: string): boolean {
  return value.trim().toLowerCase() === COLUMN_AVERAGE.toLowerCase();
}

/**
 * Compare a normalized cell against a number.
 * A missing cell fails every operator except `!=`.
 */
export function compareNumbers(operator: RelationalOperator, cell: number | null, target: number): boolean {
  if (cell === null) {
    return operator === '!=';
  }
  switch (operator) {
    case '==':
      return cell === target;
    case '!=':
      return cell !== target;
    case '>':
      return cell > target;
    case '<':
      return cell < target;
    case '>=':
      return cell >= target;
    case '<=':
      return cell <= target;
  }
}

function allFalse(length: number): FilterMask {
  return new Array<boolean>(length).fill(false);
}

function evaluateRelational(cells: CellValue[], operator: RelationalOperator, literal: string): FilterMask {
  if (isColumnAverage(literal)) {
    const numbers = normalizeSeries(cells);
    const average = meanOf(numbers);
    if (average === null) {
      return allFalse(cells.length);
    }
    return numbers.map((n) => compareNumbers(operator, n, average));
  }

  const target = normalizeNumber(literal);
  if (target !== null) {
    return normalizeSeries(cells).map((n) => compareNumbers(operator, n, target));
  }

  // Non-numeric literal: only equality makes sense
  if (operator === '==') {
    return cells.map((cell) => cellToString(cell) === literal);
  }
  if (operator === '!=') {
    return cells.map((cell) => cellToString(cell) !== literal);
  }
  return allFalse(cells.length);
}

// ===========================================================================
// Evaluation
// ===========================================================================

/**
 * Build the mask for a single filter row.
 * @returns null when the row does not apply to this dataset
 */
export function evaluateFilterRow(dataset: Dataset, filter: FilterRow): FilterMask | null {
  if (!filter.column || !dataset.columns.includes(filter.column)) {
    return null;
  }

  const cells = dataset.rows.map((row) => getCell(row, filter.column));

  switch (filter.operator) {
    case 'column-equals':
    case 'column-not-equals': {
      const other = filter.compareColumn || filter.value;
      if (!other || !dataset.columns.includes(other)) {
        return null;
      }
      const expectEqual = filter.operator === 'column-equals';
      return dataset.rows.map(
        (row, i) => (cellToString(cells[i]) === cellToString(getCell(row, other))) === expectEqual
      );
    }

    case 'contains': {
      const needle = filter.value.toLowerCase();
      return cells.map((cell) => cell !== null && cellToString(cell).toLowerCase().includes(needle));
    }

    case 'in': {
      const members = new Set(
        filter.value
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part !== '')
      );
      return cells.map((cell) => members.has(cellToString(cell)));
    }

    default:
      return evaluateRelational(cells, filter.operator, filter.value);
  }
}

/**
 * Combine every applicable filter row into one mask.
 * @returns null when no row applies
 */
export function buildFilterMask(dataset: Dataset, filters: readonly FilterRow[]): FilterMask | null {
  let mask: FilterMask | null = null;

  for (const filter of filters) {
    let rowMask: FilterMask | null;
    try {
      rowMask = evaluateFilterRow(dataset, filter);
    } catch {
      rowMask = allFalse(dataset.rows.length);
    }

    if (rowMask === null) {
      continue;
    }

    if (mask === null) {
      mask = rowMask;
    } else if (filter.join === 'OR') {
      const current: FilterMask = mask;
      mask = rowMask.map((keep, i) => current[i] || keep);
    } else {
      const current: FilterMask = mask;
      mask = rowMask.map((keep, i) => current[i] && keep);
    }
  }

  return mask;
}

/**
 * Apply filter rows to a dataset.
 * Kept rows are the same row objects, in their original order.
 */
export function applyFilters(dataset: Dataset, filters: readonly FilterRow[]): Dataset {
  const mask = buildFilterMask(dataset, filters);
  if (mask === null) {
    return dataset;
  }
  return {
    columns: [...dataset.columns],
    rows: dataset.rows.filter((_, i) => mask[i]),
  };
}

// ===========================================================================
// Construction & Display
// ===========================================================================

export function createFilterRow(overrides: Partial<FilterRow> = {}): FilterRow {
  return {
    join: 'AND',
    column: '',
    operator: '==',
    value: '',
    compareColumn: '',
    ...overrides,
  };
}

/**
 * Human-readable label for a filter row
 */
export function describeFilterRow(filter: FilterRow): string {
  switch (filter.operator) {
    case 'column-equals':
      return `${filter.column} equals column ${filter.compareColumn || filter.value}`;
    case 'column-not-equals':
      return `${filter.column} differs from column ${filter.compareColumn || filter.value}`;
    case 'contains':
      return `${filter.column} contains "${filter.value}"`;
    case 'in':
      return `${filter.column} in [${filter.value}]`;
    default:
      return isColumnAverage(filter.value)
        ? `${filter.column} ${filter.operator} ${COLUMN_AVERAGE}`
        : `${filter.column} ${filter.operator} ${filter.value}`;
  }
}
