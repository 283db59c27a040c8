/**
 * CSV Reader Tests
 */

import { describe, it, expect } from 'vitest';
import { decodeText, detectDelimiter, readCsv } from './ReadCsv.js';

const encode = (text: string) => new TextEncoder().encode(text);

describe('ReadCsv - detectDelimiter', () => {
  it('should pick the delimiter seen most in the header', () => {
    expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
    expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
  });

  it('should prefer the earlier candidate on a header tie', () => {
    expect(detectDelimiter('a,b;c\n1,2;3')).toBe(',');
  });

  it('should fall back to the median column count of the sample', () => {
    expect(detectDelimiter('title\nx|y|z\n1|2|3')).toBe('|');
  });

  it('should return null when nothing splits the lines', () => {
    expect(detectDelimiter('one column\nvalue')).toBeNull();
    expect(detectDelimiter('')).toBeNull();
  });
});

describe('ReadCsv - decodeText', () => {
  it('should drop a UTF-8 byte-order mark', () => {
    expect(decodeText(encode('\ufeffid'))).toBe('id');
  });

  it('should fall back to Latin-1 for invalid UTF-8', () => {
    const bytes = Uint8Array.from([0x63, 0x61, 0x66, 0xe9]);
    expect(decodeText(bytes)).toBe('café');
  });
});

describe('ReadCsv - readCsv', () => {
  it('should type numeric and boolean columns', () => {
    const table = readCsv(encode('Name,Units,Active,Code\nAda,12,true,007\nBob,,FALSE,x\n'));
    expect(table).toEqual({
      columns: ['Name', 'Units', 'Active', 'Code'],
      rows: [
        { Name: 'Ada', Units: 12, Active: true, Code: '007' },
        { Name: 'Bob', Units: null, Active: false, Code: 'x' },
      ],
    });
  });

  it('should read missing-value markers as null', () => {
    const table = readCsv(encode('k;v\na;NA\nb;2.5'));
    expect(table.rows).toEqual([
      { k: 'a', v: null },
      { k: 'b', v: 2.5 },
    ]);
  });

  it('should keep grouped numbers as text', () => {
    const table = readCsv(encode('AUM\n"1,500"\n200'));
    expect(table.rows).toEqual([{ AUM: '1,500' }, { AUM: '200' }]);
  });

  it('should skip blank lines and strip a byte-order mark', () => {
    const table = readCsv(encode('\ufeffid,name\n\n1,x\n   \n'));
    expect(table).toEqual({ columns: ['id', 'name'], rows: [{ id: 1, name: 'x' }] });
  });

  it('should read Latin-1 files', () => {
    const bytes = Uint8Array.from([...'name\ncaf'].map((ch) => ch.charCodeAt(0)).concat(0xe9));
    expect(readCsv(bytes)).toEqual({ columns: ['name'], rows: [{ name: 'café' }] });
  });

  it('should retry other delimiters when a parse yields one column', () => {
    const table = readCsv(encode('"p,q";r\n1;2'));
    expect(table).toEqual({ columns: ['p,q', 'r'], rows: [{ 'p,q': 1, r: 2 }] });
  });

  it('should cut data rows to the header width', () => {
    const table = readCsv(encode('a,b\n1,2,3'));
    expect(table).toEqual({ columns: ['a', 'b'], rows: [{ a: 1, b: 2 }] });
  });
});
