import { z } from 'zod';

/**
 * Validation schema for POST /jobs request body
 *
 * Carries a table already decoded from the uploaded file: ordered headers and
 * positional text cells.
 */
export const SubmitJobSchema = z.object({
    /** Original file name, shown in progress lines */
    fileName: z.string().min(1).max(255).optional(),
    columns: z.array(z.string()).min(1),
    /** Cells are text; null marks an empty cell */
    rows: z.array(z.array(z.string().nullable())),
});

/**
 * Validation schema for /jobs/:id route parameters
 */
export const JobParamsSchema = z.object({
    id: z.string().min(1),
});

/**
 * Validation schema for GET /reports/:name route parameters
 */
export const ReportParamsSchema = z.object({
    name: z.string().min(1),
});

/**
 * Validation schema for PUT /settings request body
 *
 * Only the outer shape is checked here. Entries are sanitized by the
 * configuration store, which drops invalid ones instead of failing.
 */
export const WriteSettingsSchema = z.object({
    /** Candidate time points (HH:MM); omitted keeps the current timeline */
    timeline: z.array(z.unknown()).optional(),
    /** Candidate labels keyed by time point; omitted keeps the current annotations */
    annotations: z.record(z.unknown()).optional(),
});
