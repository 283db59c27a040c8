import * as XLSX from "xlsx";
import { buildTable } from "./TableShape.js";
import { isTabularCell } from "./ICommon.js";
import type { TabularCell, TabularData } from "./ICommon.js";

function toCell(value: unknown): TabularCell {
    return isTabularCell(value) ? value : null;
}

/**
 * Read the first sheet of a legacy binary workbook (.xls) into a table.
 * Date cells keep their serial number, as in the .xlsx reader.
 */
export function readXls(data: Uint8Array): TabularData {
    const workbook = XLSX.read(data, { type: "array" });
    const firstName = workbook.SheetNames[0];
    const firstSheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
    if (firstSheet === undefined) {
        return { columns: [], rows: [] };
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(firstSheet, {
        header: 1,
        defval: null,
        blankrows: false,
        raw: true,
    });

    return buildTable(grid.map((cells) => cells.map(toCell)));
}
