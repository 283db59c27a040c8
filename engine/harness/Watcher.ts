/**
 * SheetOps Harness - Folder Watcher
 *
 * Runs a batch for every tabular file that appears or changes in a folder.
 * Each event is an isolated run; events on one path are serialised through
 * a PathLock and a burst of events while a run is queued collapses into it.
 */

import { watch, type FSWatcher } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { PathLock } from './PathLock.js';
import { isWatchedFile, runBatch } from './BatchRunner.js';
import type { BatchOptions, BatchResult, WatchEvent } from './types.js';

export type BatchFunction = (inputPath: string, options: BatchOptions) => Promise<BatchResult>;

export type WatchListener = (event: WatchEvent) => void;

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class FolderWatcher {
  readonly dir: string;
  private options: BatchOptions;
  private listener: WatchListener;
  private runner: BatchFunction;
  private lock = new PathLock();
  private queued = new Set<string>();
  private jobs = new Set<Promise<void>>();
  private watcher: FSWatcher | null = null;

  constructor(dir: string, options: BatchOptions, listener: WatchListener, runner: BatchFunction = runBatch) {
    this.dir = resolve(dir);
    this.options = options;
    this.listener = listener;
    this.runner = runner;
  }

  /**
   * Create the folder if needed and start watching it
   */
  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }
    await mkdir(this.dir, { recursive: true });
    this.watcher = watch(this.dir, (_eventType, fileName) => {
      if (fileName) {
        this.handle(fileName);
      }
    });
    this.emit({ type: 'started', dir: this.dir });
  }

  /**
   * Stop watching and wait for queued runs to finish
   */
  async close(): Promise<void> {
    this.watcher?.close();
    this.watcher = null;
    await this.idle();
  }

  /**
   * Resolves once every queued run has finished
   */
  async idle(): Promise<void> {
    while (this.jobs.size > 0) {
      await Promise.all([...this.jobs]);
    }
  }

  /**
   * Queue a run for a file in the folder
   *
   * @returns Whether a run was queued
   */
  handle(fileName: string): boolean {
    const path = join(this.dir, fileName);
    if (!isWatchedFile(path) || this.queued.has(path)) {
      return false;
    }

    this.queued.add(path);
    this.emit({ type: 'detected', path });

    const job: Promise<void> = this.lock
      .run(path, async () => {
        this.queued.delete(path);
        // Removal and rename events report paths that are gone
        if (!(await fileExists(path))) {
          return null;
        }
        return this.runner(path, this.options);
      })
      .then(
        (result) => {
          if (result) {
            this.emit({ type: 'completed', path, result });
          }
        },
        (error: unknown) => {
          this.emit({ type: 'failed', path, error: error instanceof Error ? error : new Error(String(error)) });
        }
      )
      .finally(() => {
        this.jobs.delete(job);
      });

    this.jobs.add(job);
    return true;
  }

  private emit(event: WatchEvent): void {
    try {
      this.listener(event);
    } catch (error) {
      console.error('Watch listener error:', error);
    }
  }
}
