/**
 * Automation
 *
 * Produces one worksheet per identifier: the dataset narrowed to rows whose
 * identifier column equals that identifier, then run through one preset
 * sheet's filters, sorts and columns. Identifiers left with no rows are
 * omitted.
 */

import type { Dataset, Preset, SheetConfig } from '../types/index.js';
import { cellToString, getCell } from '../types/index.js';
import { applyFilters } from '../filtering/FilterEngine.js';
import { applySorts } from '../sorting/SortEngine.js';
import { applyColumns } from '../columns/ColumnProjection.js';
import { resolveColumn } from '../join/JoinEngine.js';
import { planSheetNames, type ExportSheet } from '../export/ExportPlan.js';

export const DEFAULT_IDENTIFIER_COLUMN = 'User';

export interface AutomationOptions {
  /** Column holding the identifiers, matched case-insensitively */
  identifierColumn?: string;
  /** Preset sheet to apply; the first one when omitted */
  sheet?: string;
}

/**
 * Outcome of an automation run. A missing identifier column fails the whole
 * run with `UnknownColumn`; the rows are never passed through unnarrowed.
 */
export type AutomationResult =
  | {
      success: true;
      /** One entry per identifier with rows; `source` is the identifier */
      sheets: ExportSheet[];
      /** Identifiers that matched no rows */
      skipped: string[];
    }
  | {
      success: false;
      reason: 'UnknownColumn' | 'UnknownSheet';
      error: string;
    };

/**
 * Split a comma-separated identifier list, dropping blanks and repeats
 */
export function parseIdentifiers(text: string): string[] {
  const seen = new Set<string>();
  const identifiers: string[] = [];
  for (const part of text.split(',')) {
    const identifier = part.trim();
    if (identifier !== '' && !seen.has(identifier)) {
      seen.add(identifier);
      identifiers.push(identifier);
    }
  }
  return identifiers;
}

function pickSheet(preset: Preset, name: string | undefined): SheetConfig | undefined {
  if (name === undefined) {
    return preset.sheets[0];
  }
  return preset.sheets.find((sheet) => sheet.name === name);
}

/**
 * Run a preset sheet once per identifier
 */
export function runAutomation(
  dataset: Dataset,
  preset: Preset,
  identifiers: readonly string[],
  options: AutomationOptions = {}
): AutomationResult {
  const requested = options.identifierColumn ?? DEFAULT_IDENTIFIER_COLUMN;
  const column = resolveColumn(dataset.columns, requested);
  if (column === null) {
    return { success: false, reason: 'UnknownColumn', error: `Identifier column "${requested}" not found` };
  }

  const sheet = pickSheet(preset, options.sheet);
  if (!sheet) {
    return {
      success: false,
      reason: 'UnknownSheet',
      error: options.sheet === undefined ? 'Preset has no sheets' : `Preset has no sheet "${options.sheet}"`,
    };
  }

  const produced: Array<{ identifier: string; dataset: Dataset }> = [];
  const skipped: string[] = [];

  for (const identifier of identifiers) {
    const own: Dataset = {
      columns: [...dataset.columns],
      rows: dataset.rows.filter((row) => cellToString(getCell(row, column)) === identifier),
    };

    // Column order is taken as saved; no reconciliation against this file
    let result = applyFilters(own, sheet.filters);
    result = applySorts(result, sheet.sorts);
    result = applyColumns(result, sheet.columns);

    if (result.rows.length === 0) {
      skipped.push(identifier);
    } else {
      produced.push({ identifier, dataset: result });
    }
  }

  const names = planSheetNames(produced.map((entry) => entry.identifier));
  return {
    success: true,
    sheets: produced.map((entry, i) => ({ name: names[i], source: entry.identifier, dataset: entry.dataset })),
    skipped,
  };
}
