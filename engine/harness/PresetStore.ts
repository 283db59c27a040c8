/**
 * SheetOps Harness - Preset Store
 *
 * Presets live on disk as `<dir>/<name>.json`, one document per file.
 */

import { mkdir, readFile, readdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Preset } from '../core/types/index.js';
import {
  deserializePreset,
  serializePreset,
  type PresetIssue,
} from '../core/preset/PresetModel.js';

const PRESET_EXTENSION = '.json';

/**
 * Error raised when a preset cannot be stored or read
 */
export class PresetStoreError extends Error {
  public readonly presetName: string;
  public readonly cause?: Error;

  constructor(message: string, presetName: string, cause?: Error) {
    super(message);
    this.name = 'PresetStoreError';
    this.presetName = presetName;
    this.cause = cause;
  }
}

export interface LoadedPreset {
  preset: Preset;
  /** Parts of the document that were repaired or dropped */
  issues: PresetIssue[];
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse preset JSON text
 *
 * @throws PresetStoreError when the text is not a preset document
 */
export function parsePresetText(text: string, presetName: string): LoadedPreset {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new PresetStoreError(`Preset "${presetName}" is not valid JSON: ${messageOf(error)}`, presetName, toError(error));
  }

  try {
    return deserializePreset(document);
  } catch (error) {
    throw new PresetStoreError(`Preset "${presetName}" is invalid: ${messageOf(error)}`, presetName, toError(error));
  }
}

/**
 * Read a preset document from an arbitrary path
 */
export async function readPresetFile(path: string): Promise<LoadedPreset> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PresetStoreError(`Cannot read preset file "${path}": ${messageOf(error)}`, path, toError(error));
  }
  return parsePresetText(text, path);
}

/**
 * Directory of named preset documents
 */
export class PresetStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * Path of a preset's file
   *
   * @throws PresetStoreError for names that are blank or hold path separators
   */
  pathOf(name: string): string {
    if (name.trim() === '' || /[\\/]/.test(name) || name === '.' || name === '..') {
      throw new PresetStoreError(`Invalid preset name "${name}"`, name);
    }
    return join(this.dir, `${name}${PRESET_EXTENSION}`);
  }

  /**
   * Names of stored presets, sorted
   */
  async list(): Promise<string[]> {
    await mkdir(this.dir, { recursive: true });
    const entries = await readdir(this.dir);
    return entries
      .filter((entry) => entry.endsWith(PRESET_EXTENSION))
      .map((entry) => entry.slice(0, -PRESET_EXTENSION.length))
      .sort();
  }

  async has(name: string): Promise<boolean> {
    return (await this.list()).includes(name);
  }

  /**
   * @throws PresetStoreError when the preset is missing or malformed
   */
  async load(name: string): Promise<LoadedPreset> {
    const path = this.pathOf(name);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new PresetStoreError(`Preset not found: ${name}`, name, toError(error));
      }
      throw new PresetStoreError(`Cannot read preset "${name}": ${messageOf(error)}`, name, toError(error));
    }
    return parsePresetText(text, name);
  }

  /**
   * Write a preset, replacing any preset of the same name
   */
  async save(name: string, preset: Preset): Promise<void> {
    const path = this.pathOf(name);
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, `${JSON.stringify(serializePreset(preset), null, 2)}\n`, 'utf-8');
  }

  /**
   * @throws PresetStoreError when the preset does not exist
   */
  async remove(name: string): Promise<void> {
    const path = this.pathOf(name);
    try {
      await unlink(path);
    } catch (error) {
      if (isNotFound(error)) {
        throw new PresetStoreError(`Preset not found: ${name}`, name, toError(error));
      }
      throw error;
    }
  }
}
