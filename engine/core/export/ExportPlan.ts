/**
 * Export Plan
 * Workbook sheet naming rules shared by the workspace and the writers
 */

import type { Dataset } from '../types/index.js';

/** Longest sheet name a workbook accepts */
export const MAX_SHEET_NAME_LENGTH = 31;

export const FALLBACK_SHEET_NAME = 'Sheet';

export const RAW_DATA_SHEET_NAME = 'Raw Data';

const FORBIDDEN_CHARACTERS = /[[\]:*?\/\\]/g;

/**
 * One worksheet to write
 */
export interface ExportSheet {
  /** Sanitised, unique worksheet name */
  name: string;
  /** Sheet configuration the data came from, or the raw-data label */
  source: string;
  dataset: Dataset;
}

/**
 * Strip characters a worksheet name cannot hold and truncate it
 */
export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(FORBIDDEN_CHARACTERS, '').trim().slice(0, MAX_SHEET_NAME_LENGTH);
  return cleaned === '' ? FALLBACK_SHEET_NAME : cleaned;
}

/**
 * Sanitise a list of names and make them unique (case-insensitively, as
 * workbooks compare them). Repeats get ` (2)`, ` (3)`, ... and stay within
 * the length limit.
 */
export function planSheetNames(names: readonly string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    const base = sanitizeSheetName(name);
    let candidate = base;
    let n = 2;
    while (taken.has(candidate.toLowerCase())) {
      const suffix = ` (${n})`;
      candidate = base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
      n++;
    }
    taken.add(candidate.toLowerCase());
    return candidate;
  });
}
