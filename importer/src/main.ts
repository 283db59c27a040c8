import { readFile } from "fs/promises";
import { basename } from "path";
import { readXlsx } from "./ReadXlsx.js";
import { readXls } from "./ReadXls.js";
import { readCsv } from "./ReadCsv.js";
import type { TabularData } from "./ICommon.js";

/**
 * Error class for tabular file parsing errors
 */
export class TabularParseError extends Error {
    public readonly fileName: string;
    public readonly cause?: Error;

    constructor(message: string, fileName: string, cause?: Error) {
        super(message);
        this.name = 'TabularParseError';
        this.fileName = fileName;
        this.cause = cause;
    }
}

export type TabularFormat = 'xlsx' | 'xls' | 'csv';

/**
 * File format implied by a file name's extension
 */
export function detectFormat(fileName: string): TabularFormat | null {
    const extension = fileName.split('.').pop()?.toLowerCase();
    switch (extension) {
        case 'xlsx':
        case 'xls':
        case 'csv':
            return extension;
        default:
            return null;
    }
}

/**
 * Parse tabular file contents (.xlsx, .xls or .csv) into a table
 *
 * @param fileName - Used to pick the format and in error messages
 * @param data - Raw file bytes
 * @throws TabularParseError if the file cannot be parsed
 *
 * @example
 * ```typescript
 * try {
 *   const table = await parseTabularData('report.csv', bytes);
 *   console.log('Columns:', table.columns);
 * } catch (error) {
 *   if (error instanceof TabularParseError) {
 *     console.error(`Failed to parse ${error.fileName}: ${error.message}`);
 *   }
 * }
 * ```
 */
export const parseTabularData = async (
    fileName: string,
    data: Uint8Array,
): Promise<TabularData> => {
    const format = detectFormat(fileName);
    if (format === null) {
        const extension = fileName.includes('.') ? fileName.split('.').pop() : '';
        throw new TabularParseError(
            `Unsupported file format: .${extension}. Only .xlsx, .xls and .csv files are supported.`,
            fileName
        );
    }

    try {
        switch (format) {
            case 'xlsx':
                return await readXlsx(data, fileName);
            case 'xls':
                return readXls(data);
            case 'csv':
                return readCsv(data);
        }
    } catch (error) {
        // Wrap errors with context
        const message = error instanceof Error ? error.message : String(error);
        const cause = error instanceof Error ? error : undefined;

        throw new TabularParseError(
            `Failed to parse ${format.toUpperCase()} file: ${message}`,
            fileName,
            cause
        );
    }
};

/**
 * Read and parse a tabular file from disk
 *
 * @throws TabularParseError if the file cannot be read or parsed
 */
export const readTabularFile = async (path: string): Promise<TabularData> => {
    const fileName = basename(path);
    let data: Uint8Array;
    try {
        data = await readFile(path);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const cause = error instanceof Error ? error : undefined;
        throw new TabularParseError(`Failed to read file: ${message}`, fileName, cause);
    }
    return parseTabularData(fileName, data);
};

export { writeWorkbook, writeWorkbookFile } from "./WriteXlsx.js";
export { detectDelimiter, decodeText, CSV_DELIMITERS } from "./ReadCsv.js";
export type { CsvDelimiter } from "./ReadCsv.js";

// Re-export types for consumers
export type { TabularCell, TabularRow, TabularData, WorkbookSheet } from "./ICommon.js";
