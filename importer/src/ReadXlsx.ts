import { HandleZip } from "./HandleZip.js";
import { ReadXml, attribute, children, descend, firstChild, textOf } from "./ReadXml.js";
import { buildTable, columnIndexOf } from "./TableShape.js";
import type { TabularCell, TabularData } from "./ICommon.js";

const WORKBOOK_PATH = "xl/workbook.xml";
const WORKBOOK_RELS_PATH = "xl/_rels/workbook.xml.rels";
const SHARED_STRINGS_PATH = "xl/sharedStrings.xml";
const DEFAULT_SHEET_PATH = "xl/worksheets/sheet1.xml";

/**
 * Resolve the archive path of the first worksheet through the workbook
 * relationships
 */
function firstSheetPath(xml: ReadXml): string {
    const sheet = descend(xml.parseXmlFile(WORKBOOK_PATH), "workbook/sheets/sheet");
    const relationId = attribute(sheet, "r:id");
    if (relationId === undefined) {
        return DEFAULT_SHEET_PATH;
    }

    const relationships = children(descend(xml.parseXmlFile(WORKBOOK_RELS_PATH), "Relationships"), "Relationship");
    const target = attribute(
        relationships.find((rel) => attribute(rel, "Id") === relationId),
        "Target"
    );
    if (target === undefined) {
        return DEFAULT_SHEET_PATH;
    }

    return target.startsWith("/") ? target.slice(1) : `xl/${target}`;
}

/**
 * Text of a shared or inline string item, joining rich-text runs
 */
function stringItemText(item: unknown): string {
    const plain = children(item, "t").map(textOf).join("");
    const runs = children(item, "r")
        .map((run) => children(run, "t").map(textOf).join(""))
        .join("");
    return plain + runs;
}

function readSharedStrings(xml: ReadXml): string[] {
    const table = descend(xml.parseXmlFile(SHARED_STRINGS_PATH), "sst");
    return children(table, "si").map(stringItemText);
}

/**
 * Decode one `<c>` element by its type attribute
 */
function cellValue(cell: unknown, sharedStrings: readonly string[]): TabularCell {
    const type = attribute(cell, "t");
    const raw = textOf(firstChild(cell, "v"));

    switch (type) {
        case "s": {
            const text = sharedStrings[Number(raw)];
            return text === undefined ? null : text;
        }
        case "inlineStr":
            return stringItemText(firstChild(cell, "is"));
        case "str":
            return raw;
        case "b":
            return raw === "1";
        case "e":
            return null;
        default: {
            if (raw.trim() === "") {
                return null;
            }
            const num = Number(raw);
            return Number.isFinite(num) ? num : raw;
        }
    }
}

/**
 * Read the first worksheet of an XLSX archive into a table
 */
export async function readXlsx(data: Uint8Array, fileName: string): Promise<TabularData> {
    const files = await new HandleZip(data, fileName).unzipFile();
    const xml = new ReadXml(files);

    const sheetPath = firstSheetPath(xml);
    const sheet = xml.parseXmlFile(sheetPath);
    if (sheet === undefined) {
        throw new Error(`Worksheet "${sheetPath}" is missing`);
    }

    const sharedStrings = readSharedStrings(xml);
    const rowElements = children(descend(sheet, "worksheet/sheetData"), "row");

    const grid: TabularCell[][] = [];
    for (const rowElement of rowElements) {
        const cells: TabularCell[] = [];
        children(rowElement, "c").forEach((cell, cellPosition) => {
            const reference = attribute(cell, "r");
            const index = reference === undefined ? cellPosition : columnIndexOf(reference);
            if (index < 0) {
                return;
            }
            while (cells.length < index) {
                cells.push(null);
            }
            cells[index] = cellValue(cell, sharedStrings);
        });
        grid.push(cells);
    }

    return buildTable(grid);
}
