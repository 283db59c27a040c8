/**
 * Pivot Engine
 *
 * Groups a dataset by row keys (and optionally column keys) and aggregates
 * value columns into a flat table.
 *
 * Output layout:
 * - row key columns first, one row per distinct row-key tuple
 * - no values, no column keys: a single "Count" column
 * - no values, column keys: one count column per column-key tuple
 * - values, no column keys: one column per value, named after it
 * - values and column keys: one column per value and column-key tuple,
 *   headed `value | key1 | key2`
 *
 * Row groups and column tuples are ordered ascending. Rows with a null in any
 * key are left out. Missing combinations read as 0. Value columns that are
 * also row keys are ignored, and an output header that collides with an
 * earlier column is suffixed ` (2)`, ` (3)`, ...
 */

import type { CellValue, Dataset, PivotAggregation, PivotSpec, Row } from '../types/index.js';
import { cellToString, getCell, uniqueName } from '../types/index.js';
import { normalizeNumber } from '../normalize/NumericNormalizer.js';
import { compareValues } from '../sorting/SortEngine.js';

export const PIVOT_COUNT_COLUMN = 'Count';
export const PIVOT_HEADER_SEPARATOR = ' | ';

export const PIVOT_AGGREGATIONS: readonly PivotAggregation[] = ['sum', 'mean', 'count', 'min', 'max'];

export function isPivotAggregation(value: string): value is PivotAggregation {
  return PIVOT_AGGREGATIONS.some((aggregation) => aggregation === value);
}

export function createPivotSpec(overrides: Partial<PivotSpec> = {}): PivotSpec {
  return {
    rows: [],
    columns: [],
    values: [],
    aggregation: 'sum',
    generated: false,
    ...overrides,
  };
}

// ===========================================================================
// Accumulation
// ===========================================================================

/**
 * Running state for one output cell
 */
export interface Accumulator {
  numbers: number[];
  present: number;
}

function createAccumulator(): Accumulator {
  return { numbers: [], present: 0 };
}

function accumulate(acc: Accumulator, value: CellValue): void {
  if (value !== null) {
    acc.present++;
  }
  const n = normalizeNumber(value);
  if (n !== null) {
    acc.numbers.push(n);
  }
}

/**
 * Final value of an accumulator; undefined aggregates read as 0
 */
export function aggregate(acc: Accumulator | undefined, aggregation: PivotAggregation): number {
  if (!acc) {
    return 0;
  }
  const { numbers } = acc;

  switch (aggregation) {
    case 'count':
      return acc.present;
    case 'sum':
      return numbers.reduce((total, n) => total + n, 0);
    case 'mean':
      return numbers.length > 0 ? numbers.reduce((total, n) => total + n, 0) / numbers.length : 0;
    case 'min':
      return numbers.length > 0 ? Math.min(...numbers) : 0;
    case 'max':
      return numbers.length > 0 ? Math.max(...numbers) : 0;
  }
}

// ===========================================================================
// Keys
// ===========================================================================

type KeyTuple = CellValue[];

function readKey(row: Row, columns: readonly string[]): KeyTuple | null {
  const key: KeyTuple = [];
  for (const column of columns) {
    const value = getCell(row, column);
    if (value === null) {
      return null;
    }
    key.push(value);
  }
  return key;
}

function compareTuples(a: KeyTuple, b: KeyTuple): number {
  for (let i = 0; i < a.length; i++) {
    const cmp = compareValues(a[i], b[i]);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return 0;
}

function headerFor(parts: CellValue[]): string {
  return parts
    .map(cellToString)
    .filter((part) => part !== '')
    .join(PIVOT_HEADER_SEPARATOR);
}

/**
 * Distinct key tuples, keyed by their typed JSON form
 */
class KeyIndex {
  private readonly tuples = new Map<string, KeyTuple>();

  add(tuple: KeyTuple): string {
    const id = JSON.stringify(tuple);
    if (!this.tuples.has(id)) {
      this.tuples.set(id, tuple);
    }
    return id;
  }

  sorted(): Array<[string, KeyTuple]> {
    return Array.from(this.tuples.entries()).sort((a, b) => compareTuples(a[1], b[1]));
  }
}

// ===========================================================================
// Pivot
// ===========================================================================

/**
 * Build a pivot table.
 * @returns null when no selected row key exists in the dataset
 */
export function buildPivot(dataset: Dataset, spec: PivotSpec): Dataset | null {
  const present = (column: string) => dataset.columns.includes(column);
  const rowKeys = spec.rows.filter(present);
  const columnKeys = spec.columns.filter(present);
  // A row key is already a column of the output; aggregating it would clobber it
  const values = spec.values.filter((value) => present(value) && !rowKeys.includes(value));

  if (rowKeys.length === 0) {
    return null;
  }

  const rowIndex = new KeyIndex();
  const columnIndex = new KeyIndex();
  // rowId -> columnId -> value column -> accumulator
  const cells = new Map<string, Map<string, Map<string, Accumulator>>>();

  for (const row of dataset.rows) {
    const rowKey = readKey(row, rowKeys);
    const columnKey = readKey(row, columnKeys);
    if (rowKey === null || columnKey === null) {
      continue;
    }

    const rowId = rowIndex.add(rowKey);
    const columnId = columnIndex.add(columnKey);

    let byColumn = cells.get(rowId);
    if (!byColumn) {
      byColumn = new Map();
      cells.set(rowId, byColumn);
    }
    let byValue = byColumn.get(columnId);
    if (!byValue) {
      byValue = new Map();
      byColumn.set(columnId, byValue);
    }

    if (values.length === 0) {
      // Occurrence count; every row is present
      let acc = byValue.get(PIVOT_COUNT_COLUMN);
      if (!acc) {
        acc = createAccumulator();
        byValue.set(PIVOT_COUNT_COLUMN, acc);
      }
      acc.present++;
      continue;
    }

    for (const value of values) {
      let acc = byValue.get(value);
      if (!acc) {
        acc = createAccumulator();
        byValue.set(value, acc);
      }
      accumulate(acc, getCell(row, value));
    }
  }

  const rowGroups = rowIndex.sorted();
  const columnGroups = columnIndex.sorted();

  // Output columns paired with where their numbers come from
  const outputs: Array<{ header: string; columnId: string; value: string; aggregation: PivotAggregation }> = [];
  if (values.length === 0) {
    for (const [columnId, tuple] of columnGroups) {
      const header = columnKeys.length === 0 ? PIVOT_COUNT_COLUMN : headerFor(tuple);
      outputs.push({ header, columnId, value: PIVOT_COUNT_COLUMN, aggregation: 'count' });
    }
    if (columnKeys.length === 0 && columnGroups.length === 0) {
      outputs.push({ header: PIVOT_COUNT_COLUMN, columnId: '[]', value: PIVOT_COUNT_COLUMN, aggregation: 'count' });
    }
  } else {
    for (const value of values) {
      for (const [columnId, tuple] of columnGroups) {
        const header = columnKeys.length === 0 ? value : headerFor([value, ...tuple]);
        outputs.push({ header, columnId, value, aggregation: spec.aggregation });
      }
      if (columnKeys.length === 0 && columnGroups.length === 0) {
        outputs.push({ header: value, columnId: '[]', value, aggregation: spec.aggregation });
      }
    }
  }

  const taken = new Set(rowKeys);
  for (const output of outputs) {
    output.header = uniqueName(output.header, taken);
    taken.add(output.header);
  }

  const rows: Row[] = rowGroups.map(([rowId, tuple]) => {
    const out: Row = {};
    rowKeys.forEach((key, i) => {
      out[key] = tuple[i];
    });
    const byColumn = cells.get(rowId);
    for (const output of outputs) {
      out[output.header] = aggregate(byColumn?.get(output.columnId)?.get(output.value), output.aggregation);
    }
    return out;
  });

  return {
    columns: [...rowKeys, ...outputs.map((output) => output.header)],
    rows,
  };
}
