/**
 * Column Projection Engine
 *
 * Dedupes, reorders and hides columns according to a sheet's column config,
 * and keeps that config aligned with the dataset when its columns change.
 */

import type { CellValue, ColumnConfig, Dataset } from '../types/index.js';
import { cellToString, getCell, projectRows } from '../types/index.js';

// ===========================================================================
// Construction
// ===========================================================================

export function createColumnConfig(columns: readonly string[]): ColumnConfig {
  const visible: Record<string, boolean> = {};
  for (const column of columns) {
    visible[column] = true;
  }
  return {
    order: [...columns],
    visible,
    dedupe: { enabled: false, column: '' },
  };
}

export function isColumnVisible(config: ColumnConfig, column: string): boolean {
  return config.visible[column] ?? true;
}

/**
 * Columns that survive projection onto the given dataset columns, in order
 */
export function visibleColumns(config: ColumnConfig, columns: readonly string[]): string[] {
  return config.order.filter((column) => isColumnVisible(config, column) && columns.includes(column));
}

// ===========================================================================
// Application
// ===========================================================================

function dedupeKey(value: CellValue): string {
  // Prefix by type so 1 and "1" stay distinct; every null shares one key
  return value === null ? 'null:' : `${typeof value}:${cellToString(value)}`;
}

/**
 * Keep the first row for each distinct value of `column`
 */
export function dedupeRows(dataset: Dataset, column: string): Dataset {
  const seen = new Set<string>();
  const rows = dataset.rows.filter((row) => {
    const key = dedupeKey(getCell(row, column));
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
  return { columns: dataset.columns, rows };
}

/**
 * Apply dedupe, then ordering and visibility.
 * An empty visible list leaves the columns as they are.
 */
export function applyColumns(dataset: Dataset, config: ColumnConfig): Dataset {
  let result = dataset;

  const { enabled, column } = config.dedupe;
  if (enabled && column && dataset.columns.includes(column)) {
    result = dedupeRows(result, column);
  }

  const visible = visibleColumns(config, result.columns);
  if (visible.length === 0) {
    return result;
  }

  return {
    columns: visible,
    rows: projectRows(result.rows, visible),
  };
}

// ===========================================================================
// Reconciliation & Editing
// ===========================================================================

/**
 * Align a config with a new column set.
 * New columns are appended as visible, stale ones removed, and a dedupe
 * column that no longer exists is cleared.
 */
export function reconcileColumnConfig(config: ColumnConfig, columns: readonly string[]): ColumnConfig {
  const order = config.order.filter((column) => columns.includes(column));
  for (const column of columns) {
    if (!order.includes(column)) {
      order.push(column);
    }
  }

  const visible: Record<string, boolean> = {};
  for (const column of order) {
    visible[column] = isColumnVisible(config, column) || !config.order.includes(column);
  }

  const dedupeColumn = columns.includes(config.dedupe.column) ? config.dedupe.column : '';

  return {
    order,
    visible,
    dedupe: { enabled: config.dedupe.enabled, column: dedupeColumn },
  };
}

/**
 * Move a column up (negative offset) or down, clamped to the list bounds
 */
export function moveColumn(config: ColumnConfig, column: string, offset: number): ColumnConfig {
  const from = config.order.indexOf(column);
  if (from < 0) {
    return config;
  }
  const to = Math.min(Math.max(from + offset, 0), config.order.length - 1);
  if (to === from) {
    return config;
  }

  const order = [...config.order];
  order.splice(from, 1);
  order.splice(to, 0, column);
  return { ...config, order };
}

export function setColumnVisible(config: ColumnConfig, column: string, visible: boolean): ColumnConfig {
  return { ...config, visible: { ...config.visible, [column]: visible } };
}

export function showAllColumns(config: ColumnConfig): ColumnConfig {
  const visible: Record<string, boolean> = {};
  for (const column of config.order) {
    visible[column] = true;
  }
  return { ...config, visible };
}
