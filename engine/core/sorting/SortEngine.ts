/**
 * Sort Engine
 *
 * Turns an ordered list of sort rows into precedence groups and applies them
 * as stable multi-key sorts.
 *
 * An OR row starts a new group; AND (or the first valid row) appends to the
 * current one. Groups are applied last-to-first so that the first group has
 * the highest precedence and later groups only break its ties.
 */

import type { CellValue, Dataset, SortDirection, SortRow } from '../types/index.js';
import { getCell } from '../types/index.js';

/**
 * One key inside a sort group
 */
export interface SortKey {
  column: string;
  direction: SortDirection;
}

// ===========================================================================
// Comparison
// ===========================================================================

export function isBlank(value: CellValue | undefined): boolean {
  return value === null || value === undefined || value === '';
}

function typeOrder(value: CellValue): number {
  if (typeof value === 'number') return 0;
  if (typeof value === 'string') return 1;
  if (typeof value === 'boolean') return 2;
  return 3;
}

/**
 * Ascending comparison of two non-blank cells.
 * Numbers < text < booleans; text is case-insensitive with numeric collation.
 */
export function compareValues(a: CellValue, b: CellValue): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }

  // TRUE before FALSE
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? -1 : 1;
  }

  const typeA = typeOrder(a);
  const typeB = typeOrder(b);
  if (typeA !== typeB) return typeA - typeB;

  const strA = String(a).toLowerCase();
  const strB = String(b).toLowerCase();
  return strA.localeCompare(strB, undefined, { numeric: true });
}

/**
 * Compare two cells for one key. Blanks sort last in both directions.
 */
export function compareForKey(a: CellValue, b: CellValue, direction: SortDirection): number {
  const blankA = isBlank(a);
  const blankB = isBlank(b);
  if (blankA && blankB) return 0;
  if (blankA) return 1;
  if (blankB) return -1;

  const cmp = compareValues(a, b);
  return direction === 'asc' ? cmp : -cmp;
}

// ===========================================================================
// Grouping
// ===========================================================================

/**
 * Split sort rows into precedence groups, dropping rows on absent columns
 */
export function buildSortGroups(sorts: readonly SortRow[], columns: readonly string[]): SortKey[][] {
  const groups: SortKey[][] = [];
  let current: SortKey[] = [];

  for (const sort of sorts) {
    if (!sort.column || !columns.includes(sort.column)) {
      continue;
    }
    const key: SortKey = { column: sort.column, direction: sort.direction };

    if (current.length > 0 && sort.join === 'OR') {
      groups.push(current);
      current = [key];
    } else {
      current.push(key);
    }
  }

  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

// ===========================================================================
// Application
// ===========================================================================

function sortByGroup(dataset: Dataset, group: SortKey[]): Dataset {
  const indexed = dataset.rows.map((row, index) => ({ row, index }));

  indexed.sort((a, b) => {
    for (const key of group) {
      const cmp = compareForKey(getCell(a.row, key.column), getCell(b.row, key.column), key.direction);
      if (cmp !== 0) {
        return cmp;
      }
    }
    // Stable: preserve original order for equal elements
    return a.index - b.index;
  });

  return { columns: dataset.columns, rows: indexed.map((entry) => entry.row) };
}

/**
 * Reorder rows by the sort rows. Rows themselves are not copied.
 */
export function applySorts(dataset: Dataset, sorts: readonly SortRow[]): Dataset {
  const groups = buildSortGroups(sorts, dataset.columns);
  if (groups.length === 0) {
    return dataset;
  }

  let result: Dataset = { columns: [...dataset.columns], rows: dataset.rows };
  for (let i = groups.length - 1; i >= 0; i--) {
    result = sortByGroup(result, groups[i]);
  }
  return result;
}

export function createSortRow(overrides: Partial<SortRow> = {}): SortRow {
  return {
    join: 'AND',
    column: '',
    direction: 'asc',
    ...overrides,
  };
}
