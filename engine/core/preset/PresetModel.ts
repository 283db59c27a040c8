/**
 * Preset Model
 *
 * Converts sheet configurations to and from the JSON preset document.
 *
 * Document layout (one entry per sheet):
 * ```json
 * {
 *   "sheets": [{
 *     "name": "Sheet1",
 *     "filters": { "filters": [{ "join": "AND", "col": "A", "op": ">", "val": "2", "cmp": "" }] },
 *     "sorts": { "sorts": [["AND", "A", "Ascending"]] },
 *     "columns": { "order": ["A"], "visible": { "A": true }, "dedupe": { "enabled": false, "column": "" } },
 *     "pivot": { "rows": [], "columns": [], "values": [], "agg": "sum", "generated": false },
 *     "vlookup": { "main_keys": "", "lookup_keys": "", "values": "", "prefix": "", "default_fill": "" }
 *   }]
 * }
 * ```
 *
 * Loading never throws for a malformed entry: the entry is dropped or
 * defaulted and a {@link PresetIssue} is reported.
 */

import type {
  ColumnConfig,
  FilterOperator,
  FilterRow,
  JoinMode,
  JoinSpec,
  PivotSpec,
  Preset,
  SheetConfig,
  SortDirection,
  SortRow,
} from '../types/index.js';
import { uniqueName } from '../types/index.js';
import { createColumnConfig } from '../columns/ColumnProjection.js';
import { createPivotSpec, isPivotAggregation } from '../pivot/PivotEngine.js';
import { createJoinSpec, parseColumnList } from '../join/JoinEngine.js';
import { FILTER_OPERATORS, isFilterOperator } from '../filtering/types.js';

// ============================================================================
// Document Types
// ============================================================================

export interface FilterRowDocument {
  join: string;
  col: string;
  op: string;
  val: string;
  cmp: string;
}

/** `[join, column, "Ascending" | "Descending"]` */
export type SortRowDocument = [string, string, string];

export interface SheetDocument {
  name: string;
  filters: { filters: FilterRowDocument[] };
  sorts: { sorts: SortRowDocument[] };
  columns: {
    order: string[];
    visible: Record<string, boolean>;
    dedupe: { enabled: boolean; column: string };
  };
  pivot: {
    rows: string[];
    columns: string[];
    values: string[];
    agg: string;
    generated: boolean;
  };
  vlookup: {
    /** Comma-joined, or a list when a name would not survive the split */
    main_keys: string | string[];
    lookup_keys: string | string[];
    values: string | string[];
    prefix: string;
    default_fill: string;
  };
}

export interface PresetDocument {
  sheets: SheetDocument[];
}

/**
 * A problem found while loading a preset document
 */
export interface PresetIssue {
  /** Location inside the document, e.g. `sheets[0].filters[2].op` */
  path: string;
  message: string;
}

export interface DeserializeResult<T> {
  value: T;
  issues: PresetIssue[];
}

export const DEFAULT_SHEET_NAME = 'Sheet';

// ============================================================================
// Token Tables
// ============================================================================

const OPERATOR_TOKENS: Record<FilterOperator, string> = {
  '==': '==',
  '!=': '!=',
  '>': '>',
  '<': '<',
  '>=': '>=',
  '<=': '<=',
  contains: 'contains',
  in: 'in',
  'column-equals': '== Column',
  'column-not-equals': '!= Column',
};

const SORT_TOKENS: Record<SortDirection, string> = {
  asc: 'Ascending',
  desc: 'Descending',
};

function parseOperator(token: string): FilterOperator | null {
  const trimmed = token.trim();
  if (isFilterOperator(trimmed)) {
    return trimmed;
  }
  return FILTER_OPERATORS.find((operator) => OPERATOR_TOKENS[operator] === trimmed) ?? null;
}

function parseDirection(token: string): SortDirection | null {
  const lower = token.trim().toLowerCase();
  if (lower === 'ascending' || lower === 'asc') return 'asc';
  if (lower === 'descending' || lower === 'desc') return 'desc';
  return null;
}

// ============================================================================
// Narrowing Helpers
// ============================================================================

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scalar as text; numbers and booleans are accepted in hand-edited files
 */
function readText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

function readStringList(value: unknown): string[] | null {
  if (typeof value === 'string') {
    return parseColumnList(value);
  }
  if (Array.isArray(value)) {
    const list: string[] = [];
    for (const item of value) {
      const text = readText(item);
      if (text !== null) {
        list.push(text);
      }
    }
    return list;
  }
  return null;
}

/**
 * Reads fields off a document node, recording an issue for each bad value
 */
class FieldReader {
  constructor(
    private readonly node: UnknownRecord,
    private readonly path: string,
    private readonly issues: PresetIssue[]
  ) {}

  private report(key: string, message: string): void {
    this.issues.push({ path: `${this.path}.${key}`, message });
  }

  text(key: string, fallback: string): string {
    const raw = this.node[key];
    if (raw === undefined || raw === null) {
      return fallback;
    }
    const text = readText(raw);
    if (text === null) {
      this.report(key, 'expected a string');
      return fallback;
    }
    return text;
  }

  boolean(key: string, fallback: boolean): boolean {
    const raw = this.node[key];
    if (raw === undefined || raw === null) {
      return fallback;
    }
    if (typeof raw !== 'boolean') {
      this.report(key, 'expected a boolean');
      return fallback;
    }
    return raw;
  }

  list(key: string): string[] | undefined {
    const raw = this.node[key];
    if (raw === undefined || raw === null) {
      return undefined;
    }
    const list = readStringList(raw);
    if (list === null) {
      this.report(key, 'expected a list of column names');
      return [];
    }
    return list;
  }

  record(key: string): UnknownRecord {
    const raw = this.node[key];
    if (raw === undefined || raw === null) {
      return {};
    }
    if (!isRecord(raw)) {
      this.report(key, 'expected an object');
      return {};
    }
    return raw;
  }

  array(key: string): unknown[] {
    const raw = this.node[key];
    if (raw === undefined || raw === null) {
      return [];
    }
    if (!Array.isArray(raw)) {
      this.report(key, 'expected an array');
      return [];
    }
    return raw;
  }
}

function readJoin(token: string, path: string, issues: PresetIssue[]): JoinMode {
  const upper = token.trim().toUpperCase();
  if (upper === 'OR') return 'OR';
  if (upper !== 'AND' && upper !== '') {
    issues.push({ path, message: `unknown join "${token}", using AND` });
  }
  return 'AND';
}

// ============================================================================
// Filters
// ============================================================================

export function serializeFilters(filters: readonly FilterRow[]): { filters: FilterRowDocument[] } {
  return {
    filters: filters.map((filter) => ({
      join: filter.join,
      col: filter.column,
      op: OPERATOR_TOKENS[filter.operator],
      val: filter.value,
      cmp: filter.compareColumn,
    })),
  };
}

export function deserializeFilters(node: unknown, path = 'filters'): DeserializeResult<FilterRow[]> {
  const issues: PresetIssue[] = [];
  if (node === undefined || node === null) {
    return { value: [], issues };
  }
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: [], issues };
  }

  const rows: FilterRow[] = [];
  new FieldReader(node, path, issues).array('filters').forEach((entry, i) => {
    const entryPath = `${path}.filters[${i}]`;
    if (!isRecord(entry)) {
      issues.push({ path: entryPath, message: 'expected an object' });
      return;
    }
    const reader = new FieldReader(entry, entryPath, issues);
    const opToken = reader.text('op', '==');
    const operator = parseOperator(opToken);
    if (operator === null) {
      issues.push({ path: `${entryPath}.op`, message: `unknown operator "${opToken}"` });
      return;
    }
    rows.push({
      join: readJoin(reader.text('join', ''), `${entryPath}.join`, issues),
      column: reader.text('col', ''),
      operator,
      value: reader.text('val', ''),
      compareColumn: reader.text('cmp', ''),
    });
  });

  return { value: rows, issues };
}

// ============================================================================
// Sorts
// ============================================================================

export function serializeSorts(sorts: readonly SortRow[]): { sorts: SortRowDocument[] } {
  return {
    sorts: sorts.map((sort): SortRowDocument => [sort.join, sort.column, SORT_TOKENS[sort.direction]]),
  };
}

export function deserializeSorts(node: unknown, path = 'sorts'): DeserializeResult<SortRow[]> {
  const issues: PresetIssue[] = [];
  if (node === undefined || node === null) {
    return { value: [], issues };
  }
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: [], issues };
  }

  const rows: SortRow[] = [];
  new FieldReader(node, path, issues).array('sorts').forEach((entry, i) => {
    const entryPath = `${path}.sorts[${i}]`;
    if (!Array.isArray(entry) || (entry.length !== 2 && entry.length !== 3)) {
      issues.push({ path: entryPath, message: 'expected [join, column, order] or [column, order]' });
      return;
    }

    // Two-element entries predate the join field
    const parts = entry.map(readText);
    const [join, column, order] = parts.length === 2 ? ['AND', parts[0], parts[1]] : parts;
    if (join === null || column === null || order === null) {
      issues.push({ path: entryPath, message: 'expected string entries' });
      return;
    }

    const direction = parseDirection(order);
    if (direction === null) {
      issues.push({ path: entryPath, message: `unknown sort order "${order}"` });
      return;
    }
    rows.push({ join: readJoin(join, entryPath, issues), column, direction });
  });

  return { value: rows, issues };
}

// ============================================================================
// Columns
// ============================================================================

export function serializeColumns(config: ColumnConfig): SheetDocument['columns'] {
  return {
    order: [...config.order],
    visible: { ...config.visible },
    dedupe: { enabled: config.dedupe.enabled, column: config.dedupe.column },
  };
}

export function deserializeColumns(node: unknown, path = 'columns'): DeserializeResult<ColumnConfig> {
  const issues: PresetIssue[] = [];
  const config = createColumnConfig([]);
  if (node === undefined || node === null) {
    return { value: config, issues };
  }
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: config, issues };
  }

  const reader = new FieldReader(node, path, issues);
  const order = reader.list('order') ?? [];

  const visible: Record<string, boolean> = {};
  for (const [column, flag] of Object.entries(reader.record('visible'))) {
    if (typeof flag === 'boolean') {
      visible[column] = flag;
    } else {
      issues.push({ path: `${path}.visible.${column}`, message: 'expected a boolean' });
    }
  }

  const dedupe = new FieldReader(reader.record('dedupe'), `${path}.dedupe`, issues);
  return {
    value: {
      order,
      visible,
      dedupe: { enabled: dedupe.boolean('enabled', false), column: dedupe.text('column', '') },
    },
    issues,
  };
}

// ============================================================================
// Pivot
// ============================================================================

export function serializePivot(spec: PivotSpec): SheetDocument['pivot'] {
  return {
    rows: [...spec.rows],
    columns: [...spec.columns],
    values: [...spec.values],
    agg: spec.aggregation,
    generated: spec.generated,
  };
}

export function deserializePivot(node: unknown, path = 'pivot'): DeserializeResult<PivotSpec> {
  const issues: PresetIssue[] = [];
  if (node === undefined || node === null) {
    return { value: createPivotSpec(), issues };
  }
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: createPivotSpec(), issues };
  }

  const reader = new FieldReader(node, path, issues);

  // A single `value` predates multi-value pivots
  let values = reader.list('values');
  if (values === undefined) {
    const single = reader.text('value', '');
    values = single ? [single] : [];
  }

  const agg = reader.text('agg', 'sum');
  let aggregation: PivotSpec['aggregation'] = 'sum';
  if (isPivotAggregation(agg)) {
    aggregation = agg;
  } else {
    issues.push({ path: `${path}.agg`, message: `unknown aggregation "${agg}", using sum` });
  }

  return {
    value: {
      rows: reader.list('rows') ?? [],
      columns: reader.list('columns') ?? [],
      values,
      aggregation,
      generated: reader.boolean('generated', false),
    },
    issues,
  };
}

// ============================================================================
// VLOOKUP
// ============================================================================

function serializeColumnList(columns: string[]): string | string[] {
  const joinable = columns.every((column) => column !== '' && !column.includes(',') && column.trim() === column);
  return joinable ? columns.join(',') : [...columns];
}

export function serializeJoin(spec: JoinSpec): SheetDocument['vlookup'] {
  return {
    main_keys: serializeColumnList(spec.mainKeys),
    lookup_keys: serializeColumnList(spec.lookupKeys),
    values: serializeColumnList(spec.valueColumns),
    prefix: spec.prefix,
    default_fill: spec.defaultFill ?? '',
  };
}

export function deserializeJoin(node: unknown, path = 'vlookup'): DeserializeResult<JoinSpec> {
  const issues: PresetIssue[] = [];
  if (node === undefined || node === null) {
    return { value: createJoinSpec(), issues };
  }
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: createJoinSpec(), issues };
  }

  const reader = new FieldReader(node, path, issues);
  const fill = reader.text('default_fill', '');
  return {
    value: {
      mainKeys: reader.list('main_keys') ?? [],
      lookupKeys: reader.list('lookup_keys') ?? [],
      valueColumns: reader.list('values') ?? [],
      prefix: reader.text('prefix', ''),
      defaultFill: fill === '' ? null : fill,
    },
    issues,
  };
}

// ============================================================================
// Sheets & Presets
// ============================================================================

/**
 * Fresh configuration for a sheet over the given columns
 */
export function createSheetConfig(name: string, columns: readonly string[] = []): SheetConfig {
  return {
    name,
    filters: [],
    sorts: [],
    columns: createColumnConfig(columns),
    pivot: createPivotSpec(),
    join: createJoinSpec(),
  };
}

export function serializeSheet(sheet: SheetConfig): SheetDocument {
  return {
    name: sheet.name,
    filters: serializeFilters(sheet.filters),
    sorts: serializeSorts(sheet.sorts),
    columns: serializeColumns(sheet.columns),
    pivot: serializePivot(sheet.pivot),
    vlookup: serializeJoin(sheet.join),
  };
}

export function deserializeSheet(node: unknown, path = 'sheet'): DeserializeResult<SheetConfig> {
  const issues: PresetIssue[] = [];
  if (!isRecord(node)) {
    issues.push({ path, message: 'expected an object' });
    return { value: createSheetConfig(DEFAULT_SHEET_NAME), issues };
  }

  const stored = new FieldReader(node, path, issues).text('name', DEFAULT_SHEET_NAME);
  const name = stored.trim() === '' ? DEFAULT_SHEET_NAME : stored;
  const filters = deserializeFilters(node.filters, `${path}.filters`);
  const sorts = deserializeSorts(node.sorts, `${path}.sorts`);
  const columns = deserializeColumns(node.columns, `${path}.columns`);
  const pivot = deserializePivot(node.pivot, `${path}.pivot`);
  const join = deserializeJoin(node.vlookup, `${path}.vlookup`);

  issues.push(...filters.issues, ...sorts.issues, ...columns.issues, ...pivot.issues, ...join.issues);
  return {
    value: {
      name,
      filters: filters.value,
      sorts: sorts.value,
      columns: columns.value,
      pivot: pivot.value,
      join: join.value,
    },
    issues,
  };
}

export function serializePreset(preset: Preset): PresetDocument {
  return { sheets: preset.sheets.map(serializeSheet) };
}

/**
 * Load a preset document.
 * @throws Error only when the document is not an object
 */
export function deserializePreset(document: unknown): { preset: Preset; issues: PresetIssue[] } {
  if (!isRecord(document)) {
    throw new Error('Preset document must be a JSON object');
  }

  const issues: PresetIssue[] = [];
  const sheets: SheetConfig[] = [];
  const taken = new Set<string>();

  new FieldReader(document, 'preset', issues).array('sheets').forEach((node, i) => {
    const path = `sheets[${i}]`;
    const result = deserializeSheet(node, path);
    issues.push(...result.issues);

    const sheet = result.value;
    const name = uniqueName(sheet.name, taken);
    if (name !== sheet.name) {
      issues.push({ path: `${path}.name`, message: `duplicate sheet name "${sheet.name}", renamed to "${name}"` });
    }
    taken.add(name);
    sheets.push({ ...sheet, name });
  });

  return { preset: { sheets }, issues };
}
