/**
 * SheetOps Harness - Batch Runner
 *
 * One automation run over one input file: read the file, load the preset,
 * split by identifier and write the output workbook.
 */

import { basename, dirname, extname, join } from 'path';
import { readTabularFile, TabularParseError, writeWorkbookFile, type TabularData } from '@sheetops/importer';
import { runAutomation } from '../core/automation/Automation.js';
import { PresetStore, PresetStoreError, readPresetFile, type LoadedPreset } from './PresetStore.js';
import type { BatchOptions, BatchResult } from './types.js';

const OUTPUT_SUFFIX = '_OUTPUT.xlsx';

const WATCHED_EXTENSIONS = new Set(['.xlsx', '.xls', '.csv']);

/**
 * Default output path: the input path with its extension replaced by
 * `_OUTPUT.xlsx`
 */
export function outputPathFor(inputPath: string): string {
  const extension = extname(inputPath);
  return join(dirname(inputPath), `${basename(inputPath, extension)}${OUTPUT_SUFFIX}`);
}

export function isOutputFile(path: string): boolean {
  return basename(path).toLowerCase().endsWith(OUTPUT_SUFFIX.toLowerCase());
}

/**
 * Whether a file is a tabular input the watcher should process
 */
export function isWatchedFile(path: string): boolean {
  return WATCHED_EXTENSIONS.has(extname(path).toLowerCase()) && !isOutputFile(path);
}

/**
 * Load a preset by store name, or from a file when the reference ends in .json
 */
export function loadPreset(reference: string, presetsDir: string): Promise<LoadedPreset> {
  if (reference.toLowerCase().endsWith('.json')) {
    return readPresetFile(reference);
  }
  return new PresetStore(presetsDir).load(reference);
}

/**
 * Run a preset per identifier over one input file and write the workbook
 */
export async function runBatch(inputPath: string, options: BatchOptions): Promise<BatchResult> {
  let loaded: LoadedPreset;
  try {
    loaded = await loadPreset(options.preset, options.presetsDir);
  } catch (error) {
    if (error instanceof PresetStoreError) {
      return { success: false, reason: 'PresetError', error: error.message };
    }
    throw error;
  }

  let table: TabularData;
  try {
    table = await readTabularFile(inputPath);
  } catch (error) {
    if (error instanceof TabularParseError) {
      return { success: false, reason: 'InputError', error: `${error.fileName}: ${error.message}` };
    }
    throw error;
  }

  const result = runAutomation(table, loaded.preset, options.identifiers, {
    identifierColumn: options.identifierColumn,
    sheet: options.sheet,
  });
  if (!result.success) {
    return result;
  }
  if (result.sheets.length === 0) {
    return { success: false, reason: 'NoRows', error: 'No rows matched any identifier; nothing written' };
  }

  const outputPath = options.output ?? outputPathFor(inputPath);
  await writeWorkbookFile(outputPath, result.sheets);

  return {
    success: true,
    outputPath,
    sheets: result.sheets.map((sheet) => sheet.name),
    skipped: result.skipped,
    presetIssues: loaded.issues.map((issue) => `${issue.path}: ${issue.message}`),
  };
}
