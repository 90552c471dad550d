import type { DedupStrategy, IdentifiedRow, NormalizedTable } from "../types";

/** Name-like columns, in order of preference */
export const NAME_COLUMNS = ['Name', 'Name (Original Name)', 'Full Name'] as const;

/**
 * Pick the identity column for a table
 *
 * Precedence: Email, then the first of NAME_COLUMNS present, then the row index.
 */
export const resolveDedupStrategy = (columns: string[]): DedupStrategy => {
    if (columns.includes('Email')) return { kind: 'email', column: 'Email' };

    const nameColumn = NAME_COLUMNS.find(column => columns.includes(column));
    if (nameColumn) return { kind: 'name', column: nameColumn };

    return { kind: 'index' };
}

export const identityKeyFor = (strategy: DedupStrategy, cells: Record<string, string>, index: number): string => {
    switch (strategy.kind) {
        case 'email':
        case 'name':
            return (cells[strategy.column] ?? '').toLowerCase().trim();
        case 'index':
            return String(index);
    }
}

/**
 * Progress line telling the caller which key collapses duplicate sessions
 */
export const describeDedupStrategy = (strategy: DedupStrategy): string => {
    switch (strategy.kind) {
        case 'email':
            return `Using 'Email' for dedupe.`;
        case 'name':
            return `Using '${strategy.column}' as dedupe key.`;
        case 'index':
            return 'No Email/Name column, using row index: every row counts as a distinct attendee.';
    }
}

export const identifyRows = (table: NormalizedTable, strategy: DedupStrategy): IdentifiedRow[] =>
    table.rows.map((cells, index) => ({
        index,
        identityKey: identityKeyFor(strategy, cells, index),
        cells
    }));
