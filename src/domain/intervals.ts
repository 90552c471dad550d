import { format, isValid, parse, parseISO } from "date-fns";
import type { AttendeeRecord, IdentifiedRow, IntervalTable } from "../types";
import { NoValidRowsError } from "./errors";
import { JOIN_TIME, LEAVE_TIME } from "./normalize";

const DAY_MONTH_PARTS = ['dd/MM/', 'dd-MM-', 'dd.MM.', 'dd MMM ', 'dd-MMM-', 'dd MMMM ', 'MMM dd ', 'MMMM dd '];
// `yy` goes first: date-fns' `yyyy` also accepts two digits and would read 24 as the year 24
const YEAR_TOKENS = ['yy', 'yyyy'];
const TIME_SUFFIXES = ['', ' HH:mm', ' HH:mm:ss', ' hh:mm a', ' hh:mm:ss a'];

/**
 * Day-first patterns: `03/04/2024` is the 3rd of April, never March 4th.
 * A month written out (`1 Apr 2024`, `Apr 1, 2024`) is unambiguous either way.
 */
const DAY_FIRST_FORMATS = DAY_MONTH_PARTS.flatMap(dayMonth =>
    YEAR_TOKENS.flatMap(year => TIME_SUFFIXES.map(time => `${dayMonth}${year}${time}`))
);

/**
 * Parse a join/leave cell into an instant
 *
 * Numeric dates are read day-before-month, with a four-digit year or a
 * two-digit one taken within 50 years of today (`24` is 2024). Month names,
 * full or abbreviated, are accepted before or after the day. A comma between
 * the parts is ignored, so `1/4/2024, 9:00:12 AM` reads like
 * `1/4/2024 9:00:12 AM`. Text starting with a four-digit year is read as
 * ISO-8601. Parsing is strict: trailing text or an impossible calendar date
 * (31/02/2024) makes the cell unparsable.
 *
 * @returns the instant, or null when the cell is empty or unparsable
 */
export const parseTimestamp = (text: string): Date | null => {
    const value = text.trim();
    if (!value) return null;

    if (/^\d{4}-\d{2}-\d{2}/.test(value)) {
        const parsed = parseISO(value);
        return isValid(parsed) ? parsed : null;
    }

    // Drop commas and zero-pad lone digits so `1/4/2024, 9:05` reads like `01/04/2024 09:05`
    const padded = value
        .replace(/,/g, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/\b(\d)\b/g, '0$1');
    const referenceDate = new Date();
    for (const pattern of DAY_FIRST_FORMATS) {
        const parsed = parse(padded, pattern, referenceDate);
        if (isValid(parsed)) return parsed;
    }
    return null;
}

/**
 * Parse timestamps, drop unusable rows and partition survivors by event date
 *
 * Algorithm:
 * 1. Parse Join Time and Leave Time of every row
 * 2. Drop rows where either fails (only the count is kept)
 * 3. Tag survivors with the calendar date of their join time
 * 4. Group by that date, dates ascending
 *
 * @throws {NoValidRowsError} when no row survives
 */
export const buildIntervalTable = (rows: IdentifiedRow[]): IntervalTable => {
    const records: AttendeeRecord[] = [];

    for (const row of rows) {
        const joinTime = parseTimestamp(row.cells[JOIN_TIME] ?? '');
        const leaveTime = parseTimestamp(row.cells[LEAVE_TIME] ?? '');
        if (!joinTime || !leaveTime) continue;

        records.push({
            ...row,
            joinTime,
            leaveTime,
            eventDate: format(joinTime, 'yyyy-MM-dd')
        });
    }

    if (records.length === 0) {
        throw new NoValidRowsError(`No valid rows: all ${rows.length} rows have an unparsable Join Time or Leave Time`);
    }

    const byDate = new Map<string, AttendeeRecord[]>();
    for (const record of records) {
        const bucket = byDate.get(record.eventDate);
        if (bucket) {
            bucket.push(record);
        } else {
            byDate.set(record.eventDate, [record]);
        }
    }

    const dates = Array.from(byDate.keys()).sort();
    if (dates.length === 0) {
        throw new NoValidRowsError('No valid event dates found');
    }

    return {
        records,
        dropped: rows.length - records.length,
        dates,
        byDate
    };
}
