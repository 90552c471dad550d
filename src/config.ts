import { z } from 'zod';

const BooleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

/**
 * Environment variables read at startup
 *
 * Numbers are coerced from their string form; anything invalid aborts startup.
 */
export const ConfigSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Pretty-print logs through pino-pretty */
    LOG_PRETTY: BooleanFlag.default('true'),
    /** Directory for generated report files */
    OUTPUT_DIR: z.string().min(1).default('outputs'),
    /** Jobs kept in memory at most */
    JOB_CAPACITY: z.coerce.number().int().positive().default(200),
    /** How long a finished job stays available */
    JOB_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
    /** Wait before a progress stream emits an idle event */
    STREAM_IDLE_MS: z.coerce.number().int().positive().default(500),
    /** Requests per minute per client */
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    BODY_LIMIT: z.coerce.number().int().positive().default(25 * 1024 * 1024)
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from an environment
 *
 * @throws {Error} listing every invalid variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    return parsed.data;
}
