/**
 * Importer Entry Point Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TabularParseError, detectFormat, parseTabularData, readTabularFile } from './main.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('Importer - detectFormat', () => {
  it('should map extensions case-insensitively', () => {
    expect(detectFormat('Report.XLSX')).toBe('xlsx');
    expect(detectFormat('old.xls')).toBe('xls');
    expect(detectFormat('data.csv')).toBe('csv');
    expect(detectFormat('notes.txt')).toBeNull();
  });
});

describe('Importer - parseTabularData', () => {
  it('should parse CSV bytes', async () => {
    expect(await parseTabularData('a.csv', encode('x,y\n1,2'))).toEqual({
      columns: ['x', 'y'],
      rows: [{ x: 1, y: 2 }],
    });
  });

  it('should reject unsupported formats', async () => {
    const attempt = parseTabularData('notes.txt', encode('hello'));
    await expect(attempt).rejects.toBeInstanceOf(TabularParseError);
    await expect(attempt).rejects.toThrow(
      'Unsupported file format: .txt. Only .xlsx, .xls and .csv files are supported.'
    );
  });

  it('should wrap reader failures with the file name', async () => {
    const error = await parseTabularData('broken.xlsx', encode('not a zip')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TabularParseError);
    if (!(error instanceof TabularParseError)) return;
    expect(error.fileName).toBe('broken.xlsx');
    expect(error.message).toMatch(/^Failed to parse XLSX file: Failed to unzip file "broken\.xlsx"/);
    expect(error.cause).toBeInstanceOf(Error);
  });
});

describe('Importer - readTabularFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sheetops-importer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a file from disk', async () => {
    const path = join(dir, 'users.csv');
    await writeFile(path, 'User;Score\nu1;4\n');
    expect(await readTabularFile(path)).toEqual({ columns: ['User', 'Score'], rows: [{ User: 'u1', Score: 4 }] });
  });

  it('should report a missing file', async () => {
    const error = await readTabularFile(join(dir, 'missing.csv')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TabularParseError);
    if (!(error instanceof TabularParseError)) return;
    expect(error.fileName).toBe('missing.csv');
    expect(error.message).toMatch(/^Failed to read file: /);
  });
});
