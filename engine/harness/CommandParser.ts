/**
 * SheetOps Harness - Command Parser
 *
 * Parses command-line arguments into a structured command.
 *
 *   run <input> --preset <name|file.json> --users a,b [options]
 *   watch <dir> --preset <name|file.json> --users a,b [options]
 *   presets list
 *   presets show <name>
 *   presets delete <name>
 *   presets import <file.json> [--name <name>]
 */

import { basename, extname } from 'path';
import { parseIdentifiers } from '../core/automation/Automation.js';
import { DEFAULT_BATCH_OPTIONS, type BatchOptions } from './types.js';

export type CommandName = 'run' | 'watch' | 'presets';

export type PresetAction = 'list' | 'show' | 'delete' | 'import';

const COMMANDS: readonly CommandName[] = ['run', 'watch', 'presets'];

const PRESET_ACTIONS: readonly PresetAction[] = ['list', 'show', 'delete', 'import'];

export interface ParsedCommand {
  command: CommandName | null;
  /** Positional arguments after the command */
  args: string[];
  /** Flags given; unset flags are absent */
  options: Partial<BatchOptions>;
  /** Store name for `presets import` */
  name?: string;
  help: boolean;
}

export class ParseError extends Error {
  readonly argument: string;

  constructor(message: string, argument: string) {
    super(message);
    this.name = 'ParseError';
    this.argument = argument;
  }
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function isPresetAction(value: string): value is PresetAction {
  return PRESET_ACTIONS.some((action) => action === value);
}

/**
 * Parse an argument vector (without the node and script entries)
 *
 * @throws ParseError for unknown flags or a flag missing its value
 */
export function parseArgs(argv: readonly string[]): ParsedCommand {
  const result: ParsedCommand = { command: null, args: [], options: {}, help: false };

  let i = 0;
  if (argv.length > 0 && isCommandName(argv[0])) {
    result.command = argv[0];
    i = 1;
  }

  const valueOf = (flag: string): string => {
    i++;
    if (i >= argv.length) {
      throw new ParseError(`${flag} requires a value`, flag);
    }
    return argv[i];
  };

  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--preset':
      case '-p':
        result.options.preset = valueOf(arg);
        break;
      case '--users':
      case '-u':
        result.options.identifiers = parseIdentifiers(valueOf(arg));
        break;
      case '--user-column':
        result.options.identifierColumn = valueOf(arg);
        break;
      case '--sheet':
        result.options.sheet = valueOf(arg);
        break;
      case '--out':
      case '-o':
        result.options.output = valueOf(arg);
        break;
      case '--presets-dir':
        result.options.presetsDir = valueOf(arg);
        break;
      case '--name':
        result.name = valueOf(arg);
        break;
      case '--verbose':
      case '-v':
        result.options.verbose = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ParseError(`Unknown option: ${arg}`, arg);
        }
        result.args.push(arg);
    }
    i++;
  }

  return result;
}

/**
 * Complete batch options from parsed flags
 *
 * @throws ParseError when the preset or the identifiers are missing
 */
export function resolveBatchOptions(parsed: ParsedCommand): BatchOptions {
  const { preset, identifiers } = parsed.options;
  if (preset === undefined || preset.trim() === '') {
    throw new ParseError('--preset is required', '--preset');
  }
  if (identifiers === undefined || identifiers.length === 0) {
    throw new ParseError('--users needs at least one identifier', '--users');
  }

  return {
    ...DEFAULT_BATCH_OPTIONS,
    ...parsed.options,
    preset,
    identifiers,
  };
}

export type PresetCommand =
  | { action: 'list' }
  | { action: 'show' | 'delete'; target: string }
  | { action: 'import'; target: string; name: string };

/**
 * Split `presets <action> [arg]`
 *
 * @throws ParseError for an unknown or incomplete action
 */
export function resolvePresetAction(parsed: ParsedCommand): PresetCommand {
  const [action = 'list', target] = parsed.args;
  if (!isPresetAction(action)) {
    throw new ParseError(`Unknown presets action: ${action}`, action);
  }
  if (action === 'list') {
    return { action };
  }
  if (target === undefined) {
    throw new ParseError(`presets ${action} requires a ${action === 'import' ? 'file' : 'preset name'}`, action);
  }
  if (action === 'import') {
    return { action, target, name: parsed.name ?? basename(target, extname(target)) };
  }
  return { action, target };
}

export const HELP_TEXT = `
SheetOps Batch Runner

USAGE:
  sheetops run <input> --preset <name|file.json> --users <id,id,...> [options]
  sheetops watch <dir> --preset <name|file.json> --users <id,id,...> [options]
  sheetops presets list
  sheetops presets show <name>
  sheetops presets delete <name>
  sheetops presets import <file.json> [--name <name>]

OPTIONS:
  --preset, -p <ref>     Preset name in the store, or a path to a .json preset
  --users, -u <ids>      Comma-separated identifiers, one output sheet each
  --user-column <name>   Column holding the identifiers (default: User)
  --sheet <name>         Preset sheet to apply (default: the first)
  --out, -o <file>       Output workbook (default: <input>_OUTPUT.xlsx)
  --presets-dir <dir>    Preset store directory (default: ./presets)
  --verbose, -v          Print progress
  --help, -h             Show this help message

WATCH:
  Processes .xlsx, .xls and .csv files as they appear or change.
  Files ending in _OUTPUT.xlsx are ignored. Press Ctrl+C to stop.
`;
