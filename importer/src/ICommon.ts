/**
 * Cell value produced by every reader: text, number, boolean, or null for
 * an empty cell
 */
export type TabularCell = string | number | boolean | null;

/**
 * One record keyed by header name
 */
export type TabularRow = Record<string, TabularCell>;

/**
 * A parsed table: unique header names in file order and one record per
 * non-blank data row
 */
export interface TabularData {
    columns: string[];
    rows: TabularRow[];
}

/**
 * One worksheet handed to the workbook writer
 */
export interface WorkbookSheet {
    name: string;
    dataset: TabularData;
}

/**
 * Map of file paths to their text content within an XLSX archive
 */
export interface IuploadfileList {
    [filePath: string]: string;
}

/**
 * Check if an unknown value is a usable cell value
 */
export function isTabularCell(value: unknown): value is TabularCell {
    return value === null
        || typeof value === 'string'
        || typeof value === 'boolean'
        || (typeof value === 'number' && Number.isFinite(value));
}
