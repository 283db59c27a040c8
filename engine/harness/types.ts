/**
 * SheetOps Harness - Types
 *
 * Options and results for batch runs driven from the command line.
 */

// =============================================================================
// Batch Options
// =============================================================================

export interface BatchOptions {
  /** Preset name in the preset store, or a path to a .json preset file */
  preset: string;
  /** Identifiers to produce a sheet for */
  identifiers: string[];
  /** Column holding the identifiers */
  identifierColumn: string;
  /** Preset sheet to apply (first sheet by default) */
  sheet?: string;
  /** Output workbook path (`<input>_OUTPUT.xlsx` by default) */
  output?: string;
  /** Directory of the preset store */
  presetsDir: string;
  /** Print progress */
  verbose: boolean;
}

export const DEFAULT_BATCH_OPTIONS: Omit<BatchOptions, 'preset' | 'identifiers'> = {
  identifierColumn: 'User',
  presetsDir: 'presets',
  verbose: false,
};

// =============================================================================
// Batch Results
// =============================================================================

export type BatchFailureReason =
  | 'PresetError'
  | 'InputError'
  | 'UnknownColumn'
  | 'UnknownSheet'
  | 'NoRows';

export type BatchResult =
  | {
      success: true;
      outputPath: string;
      /** Worksheet names written, in order */
      sheets: string[];
      /** Identifiers that matched no rows */
      skipped: string[];
      /** Repairs made while reading the preset */
      presetIssues: string[];
    }
  | {
      success: false;
      reason: BatchFailureReason;
      error: string;
    };

// =============================================================================
// Watch Events
// =============================================================================

export type WatchEvent =
  | { type: 'started'; dir: string }
  | { type: 'detected'; path: string }
  | { type: 'completed'; path: string; result: BatchResult }
  | { type: 'failed'; path: string; error: Error };
