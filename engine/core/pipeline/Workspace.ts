/**
 * Workspace
 *
 * Owns the working dataset and the sheet configurations, and derives each
 * sheet's view through the pipeline:
 *
 *   raw -> filters -> sorts -> columns -> (generated pivot)
 *
 * Every mutation goes through a non-reentrant action; listeners are notified
 * once the action has completed. The subscribe/getSnapshot pair follows
 * React 18's useSyncExternalStore contract.
 */

import type { Dataset, JoinSpec, Preset, Row, SheetConfig } from '../types/index.js';
import { createDataset, uniqueName } from '../types/index.js';
import { applyFilters } from '../filtering/FilterEngine.js';
import { applySorts } from '../sorting/SortEngine.js';
import { applyColumns, dedupeRows, reconcileColumnConfig } from '../columns/ColumnProjection.js';
import { buildPivot } from '../pivot/PivotEngine.js';
import { createJoinSpec, joinDatasets, type JoinResult } from '../join/JoinEngine.js';
import { createSheetConfig } from '../preset/PresetModel.js';
import { RAW_DATA_SHEET_NAME, planSheetNames, type ExportSheet } from '../export/ExportPlan.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Explicit working context of a workspace
 */
export interface WorkspaceState {
  dataset: Dataset;
  sheets: SheetConfig[];
  /** Incremented after every completed change */
  version: number;
}

export type SheetFailureReason = 'UnknownSheet' | 'NameConflict' | 'InvalidName';

export type SheetResult =
  | { success: true; sheet: SheetConfig }
  | { success: false; reason: SheetFailureReason; error: string };

export type PivotResult =
  | { success: true; dataset: Dataset }
  | { success: false; reason: 'UnknownSheet' | 'EmptySelection' | 'PivotFailed'; error: string };

export type WorkspaceJoinResult = JoinResult | { success: false; reason: 'UnknownSheet'; error: string };

export type DeleteRowsResult =
  | { success: true; deleted: number }
  | { success: false; reason: 'UnknownSheet' | 'PivotGenerated'; error: string };

export type SheetPatch = Partial<Omit<SheetConfig, 'name'>>;

export interface ExportOptions {
  /** Sheet names to export, in this order; all sheets when omitted */
  sheets?: string[];
  /** Prepend the unprocessed dataset as its own worksheet */
  includeRaw?: boolean;
}

export type WorkspaceListener = () => void;

export type PipelineStage = 'filters' | 'sorts' | 'columns' | 'pivot';

const SHEET_NAME_BASE = 'Sheet';

// ============================================================================
// Workspace
// ============================================================================

export class Workspace {
  private state: WorkspaceState;
  private listeners: Set<WorkspaceListener> = new Set();
  private busy = false;

  constructor(dataset: Dataset = createDataset([])) {
    this.state = { dataset, sheets: [], version: 0 };
  }

  // ==========================================================================
  // Subscription
  // ==========================================================================

  /**
   * Subscribe to changes
   * @returns Unsubscribe function
   */
  subscribe = (listener: WorkspaceListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Current version number
   * Compatible with React 18's useSyncExternalStore
   */
  getSnapshot = (): number => {
    return this.state.version;
  };

  getState(): Readonly<WorkspaceState> {
    return this.state;
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        console.error('Workspace listener error:', error);
      }
    }
  }

  /**
   * Run a mutation. Nested actions are rejected; listeners run only when
   * the action reports a change.
   */
  private act<T>(action: () => { result: T; changed: boolean }): T {
    if (this.busy) {
      throw new Error('Workspace action started while another action is running');
    }

    this.busy = true;
    let outcome: { result: T; changed: boolean };
    try {
      outcome = action();
    } finally {
      this.busy = false;
    }

    if (outcome.changed) {
      this.state = { ...this.state, version: this.state.version + 1 };
      this.notifyListeners();
    }
    return outcome.result;
  }

  // ==========================================================================
  // Dataset
  // ==========================================================================

  /**
   * Replace the working dataset. Creates Sheet1 when no sheet exists.
   */
  loadDataset(dataset: Dataset): void {
    this.act<void>(() => {
      const sheets =
        this.state.sheets.length > 0 ? this.state.sheets : [createSheetConfig(`${SHEET_NAME_BASE}1`, dataset.columns)];
      this.replaceDataset(dataset, sheets);
      return { result: undefined, changed: true };
    });
  }

  private replaceDataset(dataset: Dataset, sheets: SheetConfig[] = this.state.sheets): void {
    this.state = {
      ...this.state,
      dataset,
      sheets: sheets.map((sheet) => ({
        ...sheet,
        columns: reconcileColumnConfig(sheet.columns, dataset.columns),
      })),
    };
  }

  /**
   * Remove raw rows by index. Out-of-range indices are ignored.
   * @returns Number of rows removed
   */
  deleteRows(indices: readonly number[]): number {
    return this.act<number>(() => {
      const doomed = new Set(indices);
      const { dataset } = this.state;
      const rows = dataset.rows.filter((_, i) => !doomed.has(i));
      const deleted = dataset.rows.length - rows.length;
      if (deleted > 0) {
        this.replaceDataset({ columns: dataset.columns, rows });
      }
      return { result: deleted, changed: deleted > 0 };
    });
  }

  /**
   * Remove the raw rows shown at the given positions of a sheet's base view
   */
  deleteViewRows(name: string, positions: readonly number[]): DeleteRowsResult {
    const sheet = this.getSheet(name);
    if (!sheet) {
      return unknownSheet(name);
    }
    if (sheet.pivot.generated) {
      return {
        success: false,
        reason: 'PivotGenerated',
        error: `Sheet "${name}" shows a pivot table; clear it to delete rows`,
      };
    }

    const rawIndex = new Map<Row, number>();
    this.state.dataset.rows.forEach((row, i) => rawIndex.set(row, i));

    const traced = this.traceRows(sheet);
    const indices: number[] = [];
    for (const position of positions) {
      const row = traced.rows[position];
      const index = row === undefined ? undefined : rawIndex.get(row);
      if (index !== undefined) {
        indices.push(index);
      }
    }

    return { success: true, deleted: this.deleteRows(indices) };
  }

  // ==========================================================================
  // Sheets
  // ==========================================================================

  listSheets(): string[] {
    return this.state.sheets.map((sheet) => sheet.name);
  }

  getSheet(name: string): SheetConfig | undefined {
    return this.state.sheets.find((sheet) => sheet.name === name);
  }

  private nextSheetName(): string {
    const existing = new Set(this.listSheets());
    let i = 1;
    while (existing.has(`${SHEET_NAME_BASE}${i}`)) {
      i++;
    }
    return `${SHEET_NAME_BASE}${i}`;
  }

  private checkName(name: string, except?: string): SheetResult | null {
    if (name.trim() === '') {
      return { success: false, reason: 'InvalidName', error: 'Sheet name cannot be empty' };
    }
    if (name !== except && this.getSheet(name)) {
      return { success: false, reason: 'NameConflict', error: `Sheet "${name}" already exists` };
    }
    return null;
  }

  private setSheets(sheets: SheetConfig[]): void {
    this.state = { ...this.state, sheets };
  }

  /**
   * Add a sheet with a fresh configuration over the current columns
   */
  addSheet(name?: string): SheetResult {
    return this.act<SheetResult>(() => {
      const sheetName = name ?? this.nextSheetName();
      const invalid = this.checkName(sheetName);
      if (invalid) {
        return { result: invalid, changed: false };
      }
      const sheet = createSheetConfig(sheetName, this.state.dataset.columns);
      this.setSheets([...this.state.sheets, sheet]);
      return { result: { success: true, sheet }, changed: true };
    });
  }

  renameSheet(name: string, newName: string): SheetResult {
    return this.act<SheetResult>(() => {
      const sheet = this.getSheet(name);
      if (!sheet) {
        return { result: unknownSheet(name), changed: false };
      }
      const invalid = this.checkName(newName, name);
      if (invalid) {
        return { result: invalid, changed: false };
      }
      const renamed = { ...sheet, name: newName };
      this.setSheets(this.state.sheets.map((s) => (s === sheet ? renamed : s)));
      return { result: { success: true, sheet: renamed }, changed: true };
    });
  }

  /**
   * Copy a sheet's configuration under the next free default name
   */
  duplicateSheet(name: string, newName?: string): SheetResult {
    return this.act<SheetResult>(() => {
      const sheet = this.getSheet(name);
      if (!sheet) {
        return { result: unknownSheet(name), changed: false };
      }
      const copyName = newName ?? this.nextSheetName();
      const invalid = this.checkName(copyName);
      if (invalid) {
        return { result: invalid, changed: false };
      }
      const copy = cloneSheet({ ...sheet, name: copyName });
      this.setSheets([...this.state.sheets, copy]);
      return { result: { success: true, sheet: copy }, changed: true };
    });
  }

  closeSheet(name: string): SheetResult {
    return this.act<SheetResult>(() => {
      const sheet = this.getSheet(name);
      if (!sheet) {
        return { result: unknownSheet(name), changed: false };
      }
      this.setSheets(this.state.sheets.filter((s) => s !== sheet));
      return { result: { success: true, sheet }, changed: true };
    });
  }

  /**
   * Restore a sheet to a fresh configuration, keeping its name
   */
  resetSheet(name: string): SheetResult {
    return this.updateSheetWith(name, (sheet) => createSheetConfig(sheet.name, this.state.dataset.columns));
  }

  /**
   * Replace parts of a sheet's configuration
   */
  updateSheet(name: string, patch: SheetPatch): SheetResult {
    return this.updateSheetWith(name, (sheet) => {
      const next = patch.join ? { ...sheet, ...patch, join: createJoinSpec(patch.join) } : { ...sheet, ...patch };
      return patch.columns
        ? { ...next, columns: reconcileColumnConfig(patch.columns, this.state.dataset.columns) }
        : next;
    });
  }

  private updateSheetWith(name: string, update: (sheet: SheetConfig) => SheetConfig): SheetResult {
    return this.act<SheetResult>(() => {
      const sheet = this.getSheet(name);
      if (!sheet) {
        return { result: unknownSheet(name), changed: false };
      }
      const updated = update(sheet);
      this.setSheets(this.state.sheets.map((s) => (s === sheet ? updated : s)));
      return { result: { success: true, sheet: updated }, changed: true };
    });
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  rawView(): Dataset {
    return this.state.dataset;
  }

  /**
   * Run one pipeline stage; a stage that throws passes its input through
   */
  private runStage(stage: PipelineStage, input: Dataset, apply: (dataset: Dataset) => Dataset): Dataset {
    try {
      return apply(input);
    } catch (error) {
      console.warn(`Pipeline stage "${stage}" skipped:`, error);
      return input;
    }
  }

  /**
   * Filters and sorts plus the column dedupe: every row is still a raw row
   */
  private traceRows(sheet: SheetConfig): Dataset {
    let dataset = this.runStage('filters', this.state.dataset, (d) => applyFilters(d, sheet.filters));
    dataset = this.runStage('sorts', dataset, (d) => applySorts(d, sheet.sorts));

    const { enabled, column } = sheet.columns.dedupe;
    if (enabled && column && dataset.columns.includes(column)) {
      dataset = this.runStage('columns', dataset, (d) => dedupeRows(d, column));
    }
    return dataset;
  }

  /**
   * Filter, sort and column stages of a sheet
   */
  baseView(name: string): Dataset | null {
    const sheet = this.getSheet(name);
    if (!sheet) {
      return null;
    }
    return this.runStage('columns', this.traceRows(sheet), (d) => applyColumns(d, sheet.columns));
  }

  /**
   * What the sheet shows: the base view, or its pivot once generated
   */
  derivedView(name: string): Dataset | null {
    const sheet = this.getSheet(name);
    const base = this.baseView(name);
    if (!sheet || !base || !sheet.pivot.generated) {
      return base;
    }
    return this.runStage('pivot', base, (d) => buildPivot(d, sheet.pivot) ?? d);
  }

  // ==========================================================================
  // Pivot
  // ==========================================================================

  /**
   * Compute a sheet's pivot without changing anything
   */
  previewPivot(name: string): PivotResult {
    const sheet = this.getSheet(name);
    const base = this.baseView(name);
    if (!sheet || !base) {
      return unknownSheet(name);
    }

    try {
      const pivot = buildPivot(base, sheet.pivot);
      if (pivot === null) {
        return { success: false, reason: 'EmptySelection', error: 'Select at least one existing row field' };
      }
      return { success: true, dataset: pivot };
    } catch (error) {
      return { success: false, reason: 'PivotFailed', error: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Make the pivot the sheet's derived view
   */
  generatePivot(name: string): PivotResult {
    const preview = this.previewPivot(name);
    if (!preview.success) {
      return preview;
    }
    this.updatePivotFlag(name, true);
    return preview;
  }

  clearPivot(name: string): SheetResult {
    return this.updatePivotFlag(name, false);
  }

  private updatePivotFlag(name: string, generated: boolean): SheetResult {
    return this.updateSheetWith(name, (sheet) => ({ ...sheet, pivot: { ...sheet.pivot, generated } }));
  }

  // ==========================================================================
  // Join
  // ==========================================================================

  /**
   * Join a lookup dataset onto a sheet's base view. On success the result
   * becomes the working dataset; on failure nothing changes.
   */
  runJoin(name: string, lookup: Dataset, spec?: JoinSpec): WorkspaceJoinResult {
    return this.act<WorkspaceJoinResult>(() => {
      const sheet = this.getSheet(name);
      const main = this.baseView(name);
      if (!sheet || !main) {
        return { result: unknownSheet(name), changed: false };
      }

      const joinSpec = createJoinSpec(spec ?? sheet.join);
      const result = joinDatasets(main, lookup, joinSpec);
      if (!result.success) {
        return { result, changed: false };
      }

      const sheets = this.state.sheets.map((s) => (s === sheet ? { ...s, join: joinSpec } : s));
      this.replaceDataset(result.dataset, sheets);
      return { result, changed: true };
    });
  }

  // ==========================================================================
  // Export & Presets
  // ==========================================================================

  /**
   * Derived views ready to write, with workbook-safe unique names
   */
  exportSheets(options: ExportOptions = {}): ExportSheet[] {
    const names = options.sheets ?? this.listSheets();
    const sources: Array<{ source: string; dataset: Dataset }> = [];

    if (options.includeRaw) {
      sources.push({ source: RAW_DATA_SHEET_NAME, dataset: this.rawView() });
    }
    for (const name of names) {
      const dataset = this.derivedView(name);
      if (dataset) {
        sources.push({ source: name, dataset });
      }
    }

    const planned = planSheetNames(sources.map((s) => s.source));
    return sources.map((s, i) => ({ name: planned[i], source: s.source, dataset: s.dataset }));
  }

  toPreset(): Preset {
    return { sheets: this.state.sheets.map(cloneSheet) };
  }

  /**
   * Replace every sheet with the preset's, reconciled against the dataset
   */
  applyPreset(preset: Preset): void {
    this.act<void>(() => {
      const taken = new Set<string>();
      const sheets = preset.sheets.map((sheet) => {
        const name = uniqueName(sheet.name, taken);
        taken.add(name);
        return cloneSheet({ ...sheet, name });
      });
      this.replaceDataset(this.state.dataset, sheets);
      return { result: undefined, changed: true };
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function unknownSheet(name: string): { success: false; reason: 'UnknownSheet'; error: string } {
  return { success: false, reason: 'UnknownSheet', error: `Unknown sheet "${name}"` };
}

/**
 * Deep copy of a sheet configuration
 */
export function cloneSheet(sheet: SheetConfig): SheetConfig {
  return {
    name: sheet.name,
    filters: sheet.filters.map((filter) => ({ ...filter })),
    sorts: sheet.sorts.map((sort) => ({ ...sort })),
    columns: {
      order: [...sheet.columns.order],
      visible: { ...sheet.columns.visible },
      dedupe: { ...sheet.columns.dedupe },
    },
    pivot: {
      ...sheet.pivot,
      rows: [...sheet.pivot.rows],
      columns: [...sheet.pivot.columns],
      values: [...sheet.pivot.values],
    },
    join: {
      ...sheet.join,
      mainKeys: [...sheet.join.mainKeys],
      lookupKeys: [...sheet.join.lookupKeys],
      valueColumns: [...sheet.join.valueColumns],
    },
  };
}
