import Papa from "papaparse";
import { buildTable } from "./TableShape.js";
import type { TabularCell, TabularData, TabularRow } from "./ICommon.js";

/** Delimiters tried, in order of preference */
export const CSV_DELIMITERS = [",", ";", "\t", "|"] as const;

export type CsvDelimiter = typeof CSV_DELIMITERS[number];

/** Non-empty lines inspected when guessing the delimiter */
const SAMPLE_LINES = 30;

/** Cell text read as a missing value */
const MISSING_MARKERS = new Set([
    "", "#N/A", "#N/A N/A", "#NA", "-1.#IND", "-1.#QNAN", "-NaN", "-nan", "1.#IND",
    "1.#QNAN", "<NA>", "N/A", "NA", "NULL", "NaN", "None", "n/a", "nan", "null",
]);

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_MARKERS = new Set(["True", "TRUE", "true"]);
const FALSE_MARKERS = new Set(["False", "FALSE", "false"]);

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode bytes as UTF-8 (dropping a byte-order mark), falling back to
 * Latin-1 when they are not valid UTF-8
 */
export function decodeText(data: Uint8Array): string {
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(data);
    } catch (error) {
        if (!(error instanceof TypeError)) {
            throw error;
        }
        return new TextDecoder("latin1").decode(data);
    }
}

// =============================================================================
// Delimiter Detection
// =============================================================================

function countOccurrences(text: string, needle: string): number {
    return text.split(needle).length - 1;
}

function parseRows(text: string, delimiter: CsvDelimiter): string[][] {
    // Malformed quoting is kept as parsed rather than rejected
    return Papa.parse<string[]>(text, { delimiter, skipEmptyLines: "greedy" }).data;
}

/**
 * Guess the delimiter of a CSV text.
 *
 * The delimiter seen most often in the header line wins. When the header
 * holds none of them, each candidate parses a sample and the one giving the
 * largest median column count (then the lowest variance) is taken.
 *
 * @returns The delimiter, or null when nothing splits the lines
 */
export function detectDelimiter(text: string): CsvDelimiter | null {
    const sample = text
        .split(/\r\n|\n|\r/)
        .filter((line) => line.trim() !== "")
        .slice(0, SAMPLE_LINES);
    if (sample.length === 0) {
        return null;
    }

    let bestHeader: CsvDelimiter = CSV_DELIMITERS[0];
    let bestHeaderCount = 0;
    for (const delimiter of CSV_DELIMITERS) {
        const count = countOccurrences(sample[0], delimiter);
        if (count > bestHeaderCount) {
            bestHeader = delimiter;
            bestHeaderCount = count;
        }
    }
    if (bestHeaderCount > 0) {
        return bestHeader;
    }

    let best: { delimiter: CsvDelimiter | null; median: number; variance: number } = {
        delimiter: null,
        median: 1,
        variance: Infinity,
    };
    const sampleText = sample.join("\n");
    for (const delimiter of CSV_DELIMITERS) {
        const counts = parseRows(sampleText, delimiter).map((row) => row.length);
        if (counts.length === 0) {
            continue;
        }
        counts.sort((a, b) => a - b);
        const median = counts[Math.floor(counts.length / 2)];
        const variance = counts.reduce((sum, c) => sum + (c - median) ** 2, 0) / counts.length;
        if (median > best.median || (median === best.median && variance < best.variance)) {
            best = { delimiter, median, variance };
        }
    }

    return best.delimiter === null || best.median <= 1 ? null : best.delimiter;
}

// =============================================================================
// Column Typing
// =============================================================================

/**
 * Give each column a type from its non-empty cells: numbers when every one
 * is numeric, booleans when every one is a boolean word, text otherwise
 */
function typeColumns(table: TabularData): TabularData {
    const rows: TabularRow[] = table.rows.map((row) => ({ ...row }));

    for (const column of table.columns) {
        const texts: string[] = [];
        for (const row of table.rows) {
            const cell = row[column];
            if (typeof cell === "string" && !MISSING_MARKERS.has(cell.trim())) {
                texts.push(cell.trim());
            }
        }

        const numeric = texts.length > 0 && texts.every((text) => NUMBER_PATTERN.test(text));
        const boolean = !numeric && texts.length > 0
            && texts.every((text) => TRUE_MARKERS.has(text) || FALSE_MARKERS.has(text));

        for (const row of rows) {
            const cell = row[column];
            if (typeof cell !== "string") {
                continue;
            }
            const text = cell.trim();
            let typed: TabularCell = cell;
            if (MISSING_MARKERS.has(text)) {
                typed = null;
            } else if (numeric) {
                typed = Number(text);
            } else if (boolean) {
                typed = TRUE_MARKERS.has(text);
            }
            row[column] = typed;
        }
    }

    return { columns: table.columns, rows };
}

// =============================================================================
// Reading
// =============================================================================

function parseTable(text: string, delimiter: CsvDelimiter): TabularData {
    const grid = parseRows(text, delimiter);
    const width = grid.length > 0 ? grid[0].length : 0;
    return buildTable(grid, width);
}

/**
 * Read CSV bytes into a typed table. A parse that yields a single column is
 * retried with every delimiter, keeping the widest result.
 */
export function readCsv(data: Uint8Array): TabularData {
    const text = decodeText(data);
    const detected = detectDelimiter(text) ?? CSV_DELIMITERS[0];

    let table = parseTable(text, detected);
    if (table.columns.length === 1) {
        for (const delimiter of CSV_DELIMITERS) {
            if (delimiter === detected) {
                continue;
            }
            const candidate = parseTable(text, delimiter);
            if (candidate.columns.length > table.columns.length) {
                table = candidate;
            }
        }
    }

    return typeColumns(table);
}
