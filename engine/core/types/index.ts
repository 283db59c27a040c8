/**
 * SheetOps Engine - Core Type Definitions
 * Tabular dataset and per-sheet configuration types
 */

// ============================================================================
// Dataset Types
// ============================================================================

/**
 * Scalar stored in a dataset cell. A key missing from a row reads as null.
 */
export type CellValue = string | number | boolean | null;

/**
 * One dataset row, keyed by column name
 */
export type Row = Record<string, CellValue>;

/**
 * In-memory ordered table of rows over named columns.
 * Column order and row order are both significant.
 */
export interface Dataset {
  columns: string[];
  rows: Row[];
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * How a filter/sort row links to the previous one (ignored on the first row)
 */
export type JoinMode = 'AND' | 'OR';

export type SortDirection = 'asc' | 'desc';

/**
 * Closed set of filter operators
 */
export type FilterOperator =
  // Relational (numeric when the literal parses, string otherwise)
  | '=='
  | '!='
  | '>'
  | '<'
  | '>='
  | '<='
  // Text
  | 'contains'
  | 'in'
  // Column-to-column
  | 'column-equals'
  | 'column-not-equals';

export type RelationalOperator = '==' | '!=' | '>' | '<' | '>=' | '<=';

export interface FilterRow {
  join: JoinMode;
  column: string;
  operator: FilterOperator;
  /** Literal, comma list for `in`, or the column-average sentinel */
  value: string;
  /** Comparison column for the column operators */
  compareColumn: string;
}

export interface SortRow {
  join: JoinMode;
  column: string;
  direction: SortDirection;
}

export interface DedupeConfig {
  enabled: boolean;
  column: string;
}

export interface ColumnConfig {
  /** Authoritative column universe, in display order */
  order: string[];
  /** Visibility per column; a missing entry means visible */
  visible: Record<string, boolean>;
  dedupe: DedupeConfig;
}

export type PivotAggregation = 'sum' | 'mean' | 'count' | 'min' | 'max';

export interface PivotSpec {
  rows: string[];
  columns: string[];
  values: string[];
  aggregation: PivotAggregation;
  /** When true the pivot replaces the sheet's derived view */
  generated: boolean;
}

export interface JoinSpec {
  mainKeys: string[];
  /** Defaults to mainKeys (by position) when empty */
  lookupKeys: string[];
  valueColumns: string[];
  prefix: string;
  /** Written into unmatched cells; null (or an empty string) leaves them empty */
  defaultFill: string | null;
}

/**
 * Full configuration of one sheet
 */
export interface SheetConfig {
  name: string;
  filters: FilterRow[];
  sorts: SortRow[];
  columns: ColumnConfig;
  pivot: PivotSpec;
  join: JoinSpec;
}

/**
 * Snapshot of every sheet's configuration
 */
export interface Preset {
  sheets: SheetConfig[];
}

// ============================================================================
// Dataset Helpers
// ============================================================================

/**
 * Create a dataset, taking the column list from the first row when omitted
 */
export function createDataset(rows: Row[], columns?: string[]): Dataset {
  return {
    columns: columns ? [...columns] : rows.length > 0 ? Object.keys(rows[0]) : [],
    rows,
  };
}

/**
 * Read a cell, treating a missing key as null
 */
export function getCell(row: Row, column: string): CellValue {
  return row[column] ?? null;
}

/**
 * String form of a cell used for text comparisons.
 * Null reads as the empty string; booleans use spreadsheet spelling.
 */
export function cellToString(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  return String(value);
}

/**
 * Names that appear more than once in a column list
 */
export function findDuplicateColumns(columns: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      duplicates.add(column);
    }
    seen.add(column);
  }
  return Array.from(duplicates);
}

/**
 * Name not yet in `taken`, suffixed ` (2)`, ` (3)`, ... when needed
 */
export function uniqueName(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) {
    return base;
  }
  let n = 2;
  while (taken.has(`${base} (${n})`)) {
    n++;
  }
  return `${base} (${n})`;
}

/**
 * Keep only the given columns (in the given order) on every row
 */
export function projectRows(rows: Row[], columns: string[]): Row[] {
  return rows.map((row) => {
    const projected: Row = {};
    for (const column of columns) {
      projected[column] = getCell(row, column);
    }
    return projected;
  });
}
