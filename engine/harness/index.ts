/**
 * SheetOps Harness - Module Exports
 *
 * Batch automation over tabular files: preset storage, per-identifier runs
 * and a folder watcher. The command-line entry point is cli.ts.
 */

export { PresetStore, PresetStoreError, parsePresetText, readPresetFile } from './PresetStore.js';
export type { LoadedPreset } from './PresetStore.js';

export { PathLock } from './PathLock.js';

export { runBatch, loadPreset, outputPathFor, isOutputFile, isWatchedFile } from './BatchRunner.js';

export { FolderWatcher } from './Watcher.js';
export type { BatchFunction, WatchListener } from './Watcher.js';

export {
  parseArgs,
  resolveBatchOptions,
  resolvePresetAction,
  ParseError,
  HELP_TEXT,
} from './CommandParser.js';
export type { CommandName, PresetAction, PresetCommand, ParsedCommand } from './CommandParser.js';

export { DEFAULT_BATCH_OPTIONS } from './types.js';
export type { BatchOptions, BatchResult, BatchFailureReason, WatchEvent } from './types.js';
