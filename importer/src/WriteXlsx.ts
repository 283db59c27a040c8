import JSZip from "jszip";
import { XMLBuilder } from "fast-xml-parser";
import { writeFile } from "fs/promises";
import { columnLetters } from "./TableShape.js";
import type { TabularCell, WorkbookSheet } from "./ICommon.js";

const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    suppressEmptyNode: true,
});

const XML_DECLARATION = { "@_version": "1.0", "@_encoding": "UTF-8", "@_standalone": "yes" };

const NS_MAIN = "http://schemas.openxmlformats.org/spreadsheetml/2006/main";
const NS_RELATIONSHIPS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const NS_PACKAGE_RELATIONSHIPS = "http://schemas.openxmlformats.org/package/2006/relationships";
const REL_WORKSHEET = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet";
const REL_OFFICE_DOCUMENT = "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument";

type XmlCell = Record<string, unknown>;

function buildXml(root: Record<string, unknown>): string {
    return builder.build({ "?xml": XML_DECLARATION, ...root });
}

/**
 * Serialise one cell; empty cells and non-finite numbers are left out
 */
function cellXml(reference: string, value: TabularCell): XmlCell | null {
    if (value === null || value === "") {
        return null;
    }
    if (typeof value === "number") {
        return Number.isFinite(value) ? { "@_r": reference, v: String(value) } : null;
    }
    if (typeof value === "boolean") {
        return { "@_r": reference, "@_t": "b", v: value ? "1" : "0" };
    }
    const text = value.trim() === value
        ? value
        : { "#text": value, "@_xml:space": "preserve" };
    return { "@_r": reference, "@_t": "inlineStr", is: { t: text } };
}

function rowXml(rowNumber: number, values: readonly TabularCell[]): Record<string, unknown> {
    const cells: XmlCell[] = [];
    values.forEach((value, i) => {
        const cell = cellXml(`${columnLetters(i)}${rowNumber}`, value);
        if (cell) {
            cells.push(cell);
        }
    });
    return { "@_r": String(rowNumber), c: cells };
}

function worksheetXml(sheet: WorkbookSheet): string {
    const { columns, rows } = sheet.dataset;
    const rowElements = [rowXml(1, columns)];
    rows.forEach((row, i) => {
        rowElements.push(rowXml(i + 2, columns.map((column) => row[column] ?? null)));
    });

    return buildXml({
        worksheet: {
            "@_xmlns": NS_MAIN,
            sheetData: { row: rowElements },
        },
    });
}

function workbookXml(sheets: readonly WorkbookSheet[]): string {
    return buildXml({
        workbook: {
            "@_xmlns": NS_MAIN,
            "@_xmlns:r": NS_RELATIONSHIPS,
            sheets: {
                sheet: sheets.map((sheet, i) => ({
                    "@_name": sheet.name,
                    "@_sheetId": String(i + 1),
                    "@_r:id": `rId${i + 1}`,
                })),
            },
        },
    });
}

function workbookRelsXml(sheets: readonly WorkbookSheet[]): string {
    return buildXml({
        Relationships: {
            "@_xmlns": NS_PACKAGE_RELATIONSHIPS,
            Relationship: sheets.map((_sheet, i) => ({
                "@_Id": `rId${i + 1}`,
                "@_Type": REL_WORKSHEET,
                "@_Target": `worksheets/sheet${i + 1}.xml`,
            })),
        },
    });
}

function rootRelsXml(): string {
    return buildXml({
        Relationships: {
            "@_xmlns": NS_PACKAGE_RELATIONSHIPS,
            Relationship: {
                "@_Id": "rId1",
                "@_Type": REL_OFFICE_DOCUMENT,
                "@_Target": "xl/workbook.xml",
            },
        },
    });
}

function contentTypesXml(sheets: readonly WorkbookSheet[]): string {
    return buildXml({
        Types: {
            "@_xmlns": "http://schemas.openxmlformats.org/package/2006/content-types",
            Default: [
                { "@_Extension": "rels", "@_ContentType": "application/vnd.openxmlformats-package.relationships+xml" },
                { "@_Extension": "xml", "@_ContentType": "application/xml" },
            ],
            Override: [
                {
                    "@_PartName": "/xl/workbook.xml",
                    "@_ContentType": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml",
                },
                ...sheets.map((_sheet, i) => ({
                    "@_PartName": `/xl/worksheets/sheet${i + 1}.xml`,
                    "@_ContentType": "application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml",
                })),
            ],
        },
    });
}

/**
 * Write sheets to an XLSX workbook. Sheet names are used as given and must
 * already be valid and unique.
 *
 * @throws Error when there are no sheets
 */
export async function writeWorkbook(sheets: readonly WorkbookSheet[]): Promise<Uint8Array> {
    if (sheets.length === 0) {
        throw new Error("A workbook needs at least one sheet");
    }

    const zip = new JSZip();
    zip.file("[Content_Types].xml", contentTypesXml(sheets));
    zip.file("_rels/.rels", rootRelsXml());
    zip.file("xl/workbook.xml", workbookXml(sheets));
    zip.file("xl/_rels/workbook.xml.rels", workbookRelsXml(sheets));
    sheets.forEach((sheet, i) => {
        zip.file(`xl/worksheets/sheet${i + 1}.xml`, worksheetXml(sheet));
    });

    return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}

/**
 * Write sheets to an XLSX file on disk
 */
export async function writeWorkbookFile(path: string, sheets: readonly WorkbookSheet[]): Promise<void> {
    await writeFile(path, await writeWorkbook(sheets));
}
