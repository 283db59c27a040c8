/**
 * XLS Reader Tests
 */

import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { readXls } from './ReadXls.js';

describe('ReadXls - readXls', () => {
  it('should read the first sheet of a binary workbook', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Name', 'Units'],
        ['Ada', 3],
        [null, null],
        ['Bob', true],
      ]),
      'First'
    );
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['Other']]), 'Second');

    const data = new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'biff8' }));

    expect(readXls(data)).toEqual({
      columns: ['Name', 'Units'],
      rows: [
        { Name: 'Ada', Units: 3 },
        { Name: 'Bob', Units: true },
      ],
    });
  });

  it('should keep date cells as serial numbers', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Booked'], [45293]]);
    sheet.A2 = { t: 'n', v: 45293, z: 'yyyy-mm-dd' };
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Dates');

    const data = new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'biff8' }));

    expect(readXls(data)).toEqual({ columns: ['Booked'], rows: [{ Booked: 45293 }] });
  });
});
