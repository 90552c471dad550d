/**
 * Decoded input table as handed over by the file-decoding collaborator
 *
 * Headers are kept in their original spelling; every cell is text.
 */
export interface RawTable {
    columns: string[];
    /** Positional cells; a missing or null cell is treated as empty */
    rows: Array<Array<string | null>>;
}

/**
 * Table after header normalization
 *
 * Each row maps a canonical (trimmed, title-cased) header to its cell text.
 */
export interface NormalizedTable {
    columns: string[];
    rows: Array<Record<string, string>>;
}

/** Wall-clock time of day in 24-hour `HH:MM` form */
export type TimePoint = string;

/** Ordered, duplicate-free list of time points */
export type Timeline = TimePoint[];

/** Display label per time point */
export type Annotations = Record<TimePoint, string>;

export interface TimelineConfiguration {
    timeline: Timeline;
    annotations: Annotations;
}

/**
 * How attendees are told apart, decided once per table
 *
 * - email: the `Email` column
 * - name: the first name-like column present
 * - index: no identity column, every row is its own attendee
 */
export type DedupStrategy =
    | { kind: 'email'; column: 'Email' }
    | { kind: 'name'; column: string }
    | { kind: 'index' };

/** A row with its resolved identity, before timestamps are parsed */
export interface IdentifiedRow {
    /** Ordinal position in the input table */
    index: number;
    identityKey: string;
    cells: Record<string, string>;
}

/**
 * One attendance session with parsed timestamps
 *
 * The interval is closed: presence at joinTime and at leaveTime both count.
 */
export interface AttendeeRecord extends IdentifiedRow {
    joinTime: Date;
    leaveTime: Date;
    /** Calendar date of joinTime (yyyy-MM-dd, local time) */
    eventDate: string;
}

export interface IntervalTable {
    records: AttendeeRecord[];
    /** Number of rows dropped because a timestamp did not parse */
    dropped: number;
    /** Distinct event dates, ascending */
    dates: string[];
    byDate: Map<string, AttendeeRecord[]>;
}

export interface OccupancyPoint {
    time: TimePoint;
    /** Distinct attendees present */
    count: number;
    label?: string;
    /** `count` alone, or `count (label)` for annotated points */
    display: string;
}

export interface OccupancyResult {
    date: string;
    points: OccupancyPoint[];
}

/** Time point with its display value, as shown in reports */
export type OccupancyRow = [TimePoint, string];

export type JobStatus = 'submitted' | 'running' | 'done' | 'failed';

export interface JobResult {
    dates: string[];
    perDateCounts: Record<string, OccupancyRow[]>;
    /** First discovered event date; the only one written to the report artifact */
    primaryDate: string;
    primaryDateRows: OccupancyRow[];
    outputArtifactRef: string;
}

export interface JobSummary {
    id: string;
    status: JobStatus;
    fileName: string;
    createdAt: string;
    finishedAt: string | null;
    error: string | null;
}

export type LogEvent =
    | { kind: 'line'; text: string }
    | { kind: 'idle' };
