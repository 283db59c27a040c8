import type { TabularCell, TabularData, TabularRow } from "./ICommon.js";

// =============================================================================
// Cell References
// =============================================================================

/**
 * Convert a zero-based column index to letters (0 -> A, 26 -> AA)
 */
export function columnLetters(index: number): string {
    let letters = "";
    let n = index + 1;
    while (n > 0) {
        const rem = (n - 1) % 26;
        letters = String.fromCharCode(65 + rem) + letters;
        n = Math.floor((n - 1) / 26);
    }
    return letters;
}

/**
 * Zero-based column index of an A1-style reference, or -1 when malformed
 */
export function columnIndexOf(reference: string): number {
    const match = /^([A-Za-z]+)\d*$/.exec(reference);
    if (!match) {
        return -1;
    }
    let index = 0;
    for (const ch of match[1].toUpperCase()) {
        index = index * 26 + (ch.charCodeAt(0) - 64);
    }
    return index - 1;
}

// =============================================================================
// Headers
// =============================================================================

/**
 * Turn a raw header row into unique column names. Blank cells become
 * `Unnamed: <i>`; repeats become `name.1`, `name.2`, ...
 */
export function normalizeHeaders(raw: readonly TabularCell[]): string[] {
    const names: string[] = [];
    const taken = new Set<string>();

    raw.forEach((cell, i) => {
        const text = cell === null ? "" : String(cell).trim();
        const base = text === "" ? `Unnamed: ${i}` : text;

        let name = base;
        let n = 1;
        while (taken.has(name)) {
            name = `${base}.${n}`;
            n++;
        }
        taken.add(name);
        names.push(name);
    });

    return names;
}

// =============================================================================
// Table Assembly
// =============================================================================

function isBlankRow(cells: readonly TabularCell[]): boolean {
    return cells.every((cell) => cell === null || cell === "");
}

/**
 * Build a table from a grid whose first row is the header. Rows that hold
 * nothing are dropped.
 *
 * @param width - Column count; defaults to the widest row, with extra
 *   cells beyond the header named like blank header cells
 */
export function buildTable(grid: readonly (readonly TabularCell[])[], width?: number): TabularData {
    if (grid.length === 0) {
        return { columns: [], rows: [] };
    }

    const columnCount = width ?? Math.max(...grid.map((cells) => cells.length));
    const header: TabularCell[] = [];
    for (let i = 0; i < columnCount; i++) {
        header.push(grid[0][i] ?? null);
    }
    const columns = normalizeHeaders(header);

    const rows: TabularRow[] = [];
    for (const cells of grid.slice(1)) {
        if (isBlankRow(cells)) {
            continue;
        }
        const row: TabularRow = {};
        columns.forEach((column, i) => {
            const cell = cells[i];
            row[column] = cell === undefined || cell === "" ? null : cell;
        });
        rows.push(row);
    }

    return { columns, rows };
}
