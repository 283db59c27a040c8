/**
 * Join Engine
 *
 * VLOOKUP-style left outer join of a main dataset against a lookup dataset
 * on one or more key columns.
 *
 * - Column names are resolved trimmed and case-insensitively, preferring an
 *   exact match.
 * - Keys compare on their string form, so 7 matches "7". A null key never
 *   matches.
 * - The first lookup row wins when a key repeats.
 * - Added columns get the prefix, then `_lk1`, `_lk2`, ... until unique.
 */

import type { CellValue, Dataset, JoinSpec, Row } from '../types/index.js';
import { cellToString, findDuplicateColumns, getCell } from '../types/index.js';

// ===========================================================================
// Types
// ===========================================================================

export type JoinFailureReason =
  | 'EmptySource'
  | 'DuplicateColumns'
  | 'UnknownColumn'
  | 'KeyArityMismatch'
  | 'MergeFailed';

export interface JoinSuccess {
  success: true;
  dataset: Dataset;
  /** Names of the columns appended to the main dataset */
  addedColumns: string[];
  /** Main rows that found a lookup row */
  matchedRows: number;
}

export interface JoinFailure {
  success: false;
  reason: JoinFailureReason;
  error: string;
}

export type JoinResult = JoinSuccess | JoinFailure;

export function createJoinSpec(overrides: Partial<JoinSpec> = {}): JoinSpec {
  const spec: JoinSpec = {
    mainKeys: [],
    lookupKeys: [],
    valueColumns: [],
    prefix: '',
    defaultFill: null,
    ...overrides,
  };
  return spec.defaultFill === '' ? { ...spec, defaultFill: null } : spec;
}

// ===========================================================================
// Column Resolution
// ===========================================================================

/**
 * Find the dataset column a user-typed name refers to
 */
export function resolveColumn(columns: readonly string[], requested: string): string | null {
  const wanted = requested.trim();
  if (wanted === '') {
    return null;
  }
  if (columns.includes(wanted)) {
    return wanted;
  }
  const lower = wanted.toLowerCase();
  return columns.find((column) => column.trim().toLowerCase() === lower) ?? null;
}

function resolveAll(columns: readonly string[], requested: readonly string[]): { resolved: string[]; missing: string[] } {
  const resolved: string[] = [];
  const missing: string[] = [];
  for (const name of requested) {
    const column = resolveColumn(columns, name);
    if (column === null) {
      missing.push(name);
    } else {
      resolved.push(column);
    }
  }
  return { resolved, missing };
}

function failure(reason: JoinFailureReason, error: string): JoinFailure {
  return { success: false, reason, error };
}

// ===========================================================================
// Join
// ===========================================================================

function keyOf(row: Row, columns: readonly string[]): string | null {
  const parts: string[] = [];
  for (const column of columns) {
    const value = getCell(row, column);
    if (value === null) {
      return null;
    }
    parts.push(cellToString(value));
  }
  return JSON.stringify(parts);
}

function uniqueName(base: string, taken: Set<string>): string {
  let name = base;
  let i = 1;
  while (taken.has(name)) {
    name = `${base}_lk${i}`;
    i++;
  }
  return name;
}

function mergeRows(
  main: Dataset,
  lookup: Dataset,
  mainKeys: string[],
  lookupKeys: string[],
  valueColumns: string[],
  spec: JoinSpec
): JoinSuccess {
  // First occurrence wins
  const index = new Map<string, Row>();
  for (const row of lookup.rows) {
    const key = keyOf(row, lookupKeys);
    if (key !== null && !index.has(key)) {
      index.set(key, row);
    }
  }

  const taken = new Set(main.columns);
  const renames: Array<{ source: string; target: string }> = [];
  for (const source of valueColumns) {
    const target = uniqueName(`${spec.prefix}${source}`, taken);
    taken.add(target);
    renames.push({ source, target });
  }

  const fill = spec.defaultFill === '' ? null : spec.defaultFill;
  let matchedRows = 0;
  const rows = main.rows.map((row) => {
    const key = keyOf(row, mainKeys);
    const match = key === null ? undefined : index.get(key);
    if (match) {
      matchedRows++;
    }

    const merged: Row = { ...row };
    for (const { source, target } of renames) {
      const value: CellValue = match ? getCell(match, source) : null;
      merged[target] = value === null && fill !== null ? fill : value;
    }
    return merged;
  });

  const addedColumns = renames.map((rename) => rename.target);
  return {
    success: true,
    dataset: { columns: [...main.columns, ...addedColumns], rows },
    addedColumns,
    matchedRows,
  };
}

/**
 * Left-join `lookup` onto `main`.
 * Expected problems come back as failures; nothing is thrown.
 */
export function joinDatasets(main: Dataset, lookup: Dataset, spec: JoinSpec): JoinResult {
  if (main.rows.length === 0 || lookup.rows.length === 0) {
    return failure('EmptySource', main.rows.length === 0 ? 'Main dataset has no rows' : 'Lookup dataset has no rows');
  }

  const duplicates = [...findDuplicateColumns(main.columns), ...findDuplicateColumns(lookup.columns)];
  if (duplicates.length > 0) {
    return failure('DuplicateColumns', `Duplicate column names: ${duplicates.join(', ')}`);
  }

  if (spec.mainKeys.length === 0) {
    return failure('UnknownColumn', 'No key columns selected');
  }

  const mainKeys = resolveAll(main.columns, spec.mainKeys);
  const requestedLookupKeys = spec.lookupKeys.length > 0 ? spec.lookupKeys : spec.mainKeys;
  const lookupKeys = resolveAll(lookup.columns, requestedLookupKeys);
  const values = resolveAll(lookup.columns, spec.valueColumns);

  const missing = [
    ...mainKeys.missing.map((name) => `main key "${name}"`),
    ...lookupKeys.missing.map((name) => `lookup key "${name}"`),
    ...values.missing.map((name) => `value column "${name}"`),
  ];
  if (missing.length > 0) {
    return failure('UnknownColumn', `Unknown ${missing.join(', ')}`);
  }

  if (mainKeys.resolved.length !== lookupKeys.resolved.length) {
    return failure(
      'KeyArityMismatch',
      `Key count differs: ${mainKeys.resolved.length} main, ${lookupKeys.resolved.length} lookup`
    );
  }

  const valueColumns = values.resolved.filter(
    (column, i, all) => !lookupKeys.resolved.includes(column) && all.indexOf(column) === i
  );

  try {
    return mergeRows(main, lookup, mainKeys.resolved, lookupKeys.resolved, valueColumns, spec);
  } catch (error) {
    return failure('MergeFailed', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Split a comma-separated list of names, dropping blanks
 */
export function parseColumnList(text: string): string[] {
  return text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');
}
