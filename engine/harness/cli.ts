#!/usr/bin/env node
/**
 * SheetOps Batch Runner - CLI Entry Point
 *
 * Usage:
 *   npx tsx engine/harness/cli.ts run data.xlsx --preset monthly --users 2009-T44,2010-A11
 *   npx tsx engine/harness/cli.ts watch ./inbox --preset monthly --users 2009-T44
 *   npx tsx engine/harness/cli.ts presets list
 *
 * Run with --help for every option.
 */

import { readFile } from 'fs/promises';
import {
  HELP_TEXT,
  ParseError,
  parseArgs,
  resolveBatchOptions,
  resolvePresetAction,
  type ParsedCommand,
} from './CommandParser.js';
import { runBatch } from './BatchRunner.js';
import { FolderWatcher } from './Watcher.js';
import { PresetStore, PresetStoreError, readPresetFile } from './PresetStore.js';
import { DEFAULT_BATCH_OPTIONS, type BatchResult, type WatchEvent } from './types.js';

// =============================================================================
// Output Formatting
// =============================================================================

function formatResult(result: BatchResult): string {
  if (!result.success) {
    return `FAIL (${result.reason}): ${result.error}`;
  }
  const lines = [`OK: wrote ${result.outputPath} (${result.sheets.length} sheet${result.sheets.length === 1 ? '' : 's'})`];
  if (result.skipped.length > 0) {
    lines.push(`  No rows for: ${result.skipped.join(', ')}`);
  }
  for (const issue of result.presetIssues) {
    lines.push(`  Preset: ${issue}`);
  }
  return lines.join('\n');
}

function formatWatchEvent(event: WatchEvent): string {
  switch (event.type) {
    case 'started':
      return `[WATCHER] Folder: ${event.dir}\n[WATCHER] Drop .xlsx, .xls or .csv files into this folder; Ctrl+C to stop`;
    case 'detected':
      return `[WATCHER] Detected: ${event.path}`;
    case 'completed':
      return `[WATCHER] ${event.path}\n${formatResult(event.result)}`;
    case 'failed':
      return `[WATCHER] ${event.path}\nERROR: ${event.error.message}`;
  }
}

// =============================================================================
// Commands
// =============================================================================

async function runCommand(parsed: ParsedCommand): Promise<number> {
  const [input] = parsed.args;
  if (input === undefined) {
    throw new ParseError('run requires an input file', 'run');
  }
  const options = resolveBatchOptions(parsed);

  if (options.verbose) {
    console.log(`Processing ${input} with preset "${options.preset}" for ${options.identifiers.length} identifier(s)`);
  }

  const result = await runBatch(input, options);
  if (result.success) {
    console.log(formatResult(result));
    return 0;
  }
  console.error(formatResult(result));
  return 1;
}

async function watchCommand(parsed: ParsedCommand): Promise<number> {
  const [dir] = parsed.args;
  if (dir === undefined) {
    throw new ParseError('watch requires a folder', 'watch');
  }
  const options = resolveBatchOptions(parsed);

  const watcher = new FolderWatcher(dir, options, (event) => {
    if (event.type === 'detected' && !options.verbose) {
      return;
    }
    if (event.type === 'failed' || (event.type === 'completed' && !event.result.success)) {
      console.error(formatWatchEvent(event));
    } else {
      console.log(formatWatchEvent(event));
    }
  });

  await watcher.start();

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
  });

  await watcher.close();
  console.log('\n[WATCHER] Stopped');
  return 0;
}

async function presetsCommand(parsed: ParsedCommand): Promise<number> {
  const command = resolvePresetAction(parsed);
  const store = new PresetStore(parsed.options.presetsDir ?? DEFAULT_BATCH_OPTIONS.presetsDir);

  switch (command.action) {
    case 'list': {
      const names = await store.list();
      if (names.length === 0) {
        console.log(`No presets in ${store.dir}`);
      }
      for (const name of names) {
        console.log(name);
      }
      return 0;
    }
    case 'show': {
      // Validate first, then print as stored so legacy fields stay visible
      await store.load(command.target);
      console.log(await readFile(store.pathOf(command.target), 'utf-8'));
      return 0;
    }
    case 'delete':
      await store.remove(command.target);
      console.log(`Deleted preset "${command.target}"`);
      return 0;
    case 'import': {
      const { preset, issues } = await readPresetFile(command.target);
      await store.save(command.name, preset);
      for (const issue of issues) {
        console.log(`  ${issue.path}: ${issue.message}`);
      }
      console.log(`Imported preset "${command.name}" (${preset.sheets.length} sheet${preset.sheets.length === 1 ? '' : 's'})`);
      return 0;
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.help || parsed.command === null) {
    console.log(HELP_TEXT);
    return parsed.help ? 0 : 1;
  }

  switch (parsed.command) {
    case 'run':
      return runCommand(parsed);
    case 'watch':
      return watchCommand(parsed);
    case 'presets':
      return presetsCommand(parsed);
  }
}

// Run
main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ParseError) {
      console.error(`Error: ${error.message}`);
      console.error('Run with --help for usage.');
    } else if (error instanceof PresetStoreError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Fatal error:', error);
    }
    process.exit(1);
  });
