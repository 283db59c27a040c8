/**
 * XLSX Reader Tests
 */

import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { readXlsx } from './ReadXlsx.js';

const NS_MAIN = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const NS_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

async function buildArchive(parts: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [path, content] of Object.entries(parts)) {
    zip.file(path, content);
  }
  return zip.generateAsync({ type: 'uint8array' });
}

const WORKBOOK = `<workbook xmlns="${NS_MAIN}" xmlns:r="${NS_REL}"><sheets>`
  + '<sheet name="Data" sheetId="1" r:id="rId7"/></sheets></workbook>';

const WORKBOOK_RELS = '<Relationships>'
  + '<Relationship Id="rId3" Target="styles.xml"/>'
  + '<Relationship Id="rId7" Target="worksheets/data.xml"/>'
  + '</Relationships>';

const SHARED_STRINGS = '<sst><si><t>Name</t></si>'
  + '<si><r><t>To</t></r><r><rPr><b/></rPr><t>tal</t></r></si></sst>';

const WORKSHEET = `<worksheet xmlns="${NS_MAIN}"><sheetData>`
  + '<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>0</v></c><c r="D1" t="s"><v>1</v></c></row>'
  + '<row r="2"><c r="A2" t="inlineStr"><is><t>ok</t></is></c><c r="B2" t="b"><v>1</v></c>'
  + '<c r="C2"><v>3.5</v></c><c r="D2" t="e"><v>#DIV/0!</v></c></row>'
  + '<row r="5"><c r="B5" t="str"><v>later</v></c></row>'
  + '<row r="6"/>'
  + '</sheetData></worksheet>';

describe('ReadXlsx - readXlsx', () => {
  it('should read the first worksheet through the workbook relationships', async () => {
    const data = await buildArchive({
      '[Content_Types].xml': '<Types/>',
      'xl/workbook.xml': WORKBOOK,
      'xl/_rels/workbook.xml.rels': WORKBOOK_RELS,
      'xl/sharedStrings.xml': SHARED_STRINGS,
      'xl/worksheets/data.xml': WORKSHEET,
    });

    const table = await readXlsx(data, 'book.xlsx');

    expect(table).toEqual({
      columns: ['Name', 'Name.1', 'Unnamed: 2', 'Total'],
      rows: [
        { Name: 'ok', 'Name.1': true, 'Unnamed: 2': 3.5, Total: null },
        { Name: null, 'Name.1': 'later', 'Unnamed: 2': null, Total: null },
      ],
    });
  });

  it('should fall back to the first worksheet part without relationships', async () => {
    const data = await buildArchive({
      '[Content_Types].xml': '<Types/>',
      'xl/workbook.xml': `<workbook xmlns="${NS_MAIN}"><sheets><sheet name="S"/></sheets></workbook>`,
      'xl/worksheets/sheet1.xml': `<worksheet><sheetData><row><c><v>7</v></c></row><row><c><v>8</v></c></row></sheetData></worksheet>`,
    });

    expect(await readXlsx(data, 'plain.xlsx')).toEqual({ columns: ['7'], rows: [{ '7': 8 }] });
  });

  it('should reject an archive that is not a workbook', async () => {
    const data = await buildArchive({ 'readme.xml': '<x/>' });
    await expect(readXlsx(data, 'other.xlsx')).rejects.toThrow(
      'File "other.xlsx" does not appear to be a valid XLSX file'
    );
  });

  it('should reject a workbook whose worksheet part is missing', async () => {
    const data = await buildArchive({
      '[Content_Types].xml': '<Types/>',
      'xl/workbook.xml': WORKBOOK,
      'xl/_rels/workbook.xml.rels': WORKBOOK_RELS,
    });
    await expect(readXlsx(data, 'gap.xlsx')).rejects.toThrow('Worksheet "xl/worksheets/data.xml" is missing');
  });
});
