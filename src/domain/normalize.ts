import type { NormalizedTable, RawTable } from "../types";
import { SchemaError } from "./errors";

export const JOIN_TIME = 'Join Time';
export const LEAVE_TIME = 'Leave Time';

/**
 * Convert a header to title case
 *
 * The header is trimmed and lower-cased, then every letter that starts the
 * string or follows a non-letter is upper-cased.
 *
 * Example:
 * - "  join time " => "Join Time"
 * - "NAME (original name)" => "Name (Original Name)"
 * - "e-mail" => "E-Mail"
 */
export const toTitleCase = (header: string): string =>
    header
        .trim()
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());

/**
 * Rewrite headers into their canonical form and key every row by them
 *
 * Cells are never typed: a null or missing cell becomes the empty string.
 * When two headers normalize to the same name the first column wins.
 */
export const normalizeTable = (table: RawTable): NormalizedTable => {
    const positions = new Map<string, number>();
    table.columns.forEach((header, position) => {
        const canonical = toTitleCase(header);
        if (!positions.has(canonical)) positions.set(canonical, position);
    });

    const rows = table.rows.map(cells => {
        const row: Record<string, string> = {};
        for (const [column, position] of positions) {
            row[column] = cells[position] ?? '';
        }
        return row;
    });

    return { columns: Array.from(positions.keys()), rows };
}

/**
 * Fail with SchemaError naming every required column that is absent
 */
export const requireColumns = (table: NormalizedTable, required: string[] = [JOIN_TIME, LEAVE_TIME]): void => {
    const missing = required.filter(column => !table.columns.includes(column));
    if (missing.length > 0) {
        throw new SchemaError(missing);
    }
}
