/**
 * Base class for failures raised by the occupancy engine and job pipeline
 *
 * `code` is the stable identifier returned to HTTP callers.
 */
export class OccupancyError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Required columns are missing after header normalization
 */
export class SchemaError extends OccupancyError {
    readonly missing: string[];

    constructor(missing: string[]) {
        super('schema_error', `Missing required column(s): ${missing.map(c => `'${c}'`).join(', ')}`);
        this.missing = missing;
    }
}

/**
 * Nothing left to count: every row had an unparsable timestamp
 */
export class NoValidRowsError extends OccupancyError {
    constructor(message: string) {
        super('no_valid_rows', message);
    }
}

/**
 * Unknown job or artifact, or a job that has not completed successfully
 */
export class NotFoundError extends OccupancyError {
    constructor(message: string) {
        super('not_found', message);
    }
}
