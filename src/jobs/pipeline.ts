import { randomBytes } from "node:crypto";
import { setImmediate as nextTick } from "node:timers/promises";
import { format } from "date-fns";
import type { Logger } from "pino";
import type {
    JobResult,
    JobSummary,
    LogEvent,
    OccupancyResult,
    OccupancyRow,
    RawTable,
    TimelineConfiguration
} from "../types";
import { describeDedupStrategy, identifyRows, resolveDedupStrategy } from "../domain/dedup";
import { NoValidRowsError, NotFoundError } from "../domain/errors";
import { buildIntervalTable } from "../domain/intervals";
import { normalizeTable, requireColumns } from "../domain/normalize";
import { countOccupancy } from "../domain/occupancy";
import { renderReportCsv, reportFileName } from "../domain/report";
import type { ArtifactStore } from "../store/artifacts";
import type { TimelineConfigurationStore } from "../store/configuration";
import type { JobRecord, JobRegistry } from "../store/jobs";
import { DONE, FAILED, LogChannel } from "./channel";

export interface JobPipelineOptions {
    configuration: TimelineConfigurationStore;
    artifacts: ArtifactStore;
    registry: JobRegistry;
    logger: Logger;
    /** How long a subscriber waits for a line before receiving an idle event */
    idleMs: number;
}

export interface SubmitOptions {
    /** Name of the uploaded file, used in progress lines only */
    fileName?: string;
}

const toRows = (result: OccupancyResult): OccupancyRow[] =>
    result.points.map(point => [point.time, point.display]);

/**
 * Background runner for occupancy reports
 *
 * Each submitted table becomes a job that runs on the event loop, separately
 * from the caller. Lifecycle: submitted -> running -> done | failed, one-shot,
 * no retries and no cancellation.
 *
 * The timeline configuration is captured at submission; writes made while a
 * job runs only affect later submissions.
 */
export class JobPipeline {
    private readonly configuration: TimelineConfigurationStore;
    private readonly artifacts: ArtifactStore;
    private readonly registry: JobRegistry;
    private readonly logger: Logger;
    private readonly idleMs: number;

    constructor(options: JobPipelineOptions) {
        this.configuration = options.configuration;
        this.artifacts = options.artifacts;
        this.registry = options.registry;
        this.logger = options.logger;
        this.idleMs = options.idleMs;
    }

    /**
     * Start a job for a decoded table
     *
     * Returns before any processing happens.
     *
     * @returns the new job id
     */
    submit(table: RawTable, options: SubmitOptions = {}): string {
        const configuration = this.configuration.read();
        const job: JobRecord = {
            id: randomBytes(16).toString('hex'),
            fileName: options.fileName ?? 'table',
            status: 'submitted',
            channel: new LogChannel(),
            createdAt: new Date(),
            finishedAt: null,
            result: null,
            error: null,
            settled: Promise.resolve()
        };

        this.registry.insert(job);
        job.settled = nextTick().then(() => this.run(job, table, configuration));
        return job.id;
    }

    /**
     * Progress lines of a job, ending with DONE or FAILED
     *
     * Aborting `signal` stops the subscription and leaves unread lines for a
     * later subscriber.
     *
     * @throws {NotFoundError} unknown or expired job
     */
    subscribe(jobId: string, signal?: AbortSignal): AsyncIterable<LogEvent> {
        return this.require(jobId).channel.subscribe(this.idleMs, signal);
    }

    /**
     * Result of a job that completed successfully
     *
     * @throws {NotFoundError} unknown job, or a job that is still running or failed
     */
    getResult(jobId: string): JobResult {
        const job = this.registry.get(jobId);
        if (!job || job.status !== 'done' || !job.result) {
            throw new NotFoundError(`No result for job ${jobId}`);
        }
        return job.result;
    }

    getStatus(jobId: string): JobSummary {
        const job = this.require(jobId);
        return {
            id: job.id,
            status: job.status,
            fileName: job.fileName,
            createdAt: job.createdAt.toISOString(),
            finishedAt: job.finishedAt?.toISOString() ?? null,
            error: job.error
        };
    }

    /**
     * Wait for a job to reach a terminal state
     */
    settled(jobId: string): Promise<void> {
        return this.require(jobId).settled;
    }

    private require(jobId: string): JobRecord {
        const job = this.registry.get(jobId);
        if (!job) throw new NotFoundError(`Job ${jobId} not found`);
        return job;
    }

    /**
     * Normalize, identify, parse, count per date, save the report
     *
     * Never rejects: every failure ends the job as failed with a final
     * error line followed by FAILED.
     */
    private async run(job: JobRecord, table: RawTable, configuration: TimelineConfiguration): Promise<void> {
        const log = this.logger.child({ jobId: job.id });
        const emit = (message: string) => {
            job.channel.push(`[${format(new Date(), 'HH:mm:ss')}] ${message}`);
        };

        job.status = 'running';
        log.info({ fileName: job.fileName, rows: table.rows.length }, 'job started');

        try {
            emit(`Processing ${job.fileName}`);
            emit(`File loaded (${table.rows.length} rows).`);

            const normalized = normalizeTable(table);
            emit('Columns normalized.');
            requireColumns(normalized);

            const strategy = resolveDedupStrategy(normalized.columns);
            emit(describeDedupStrategy(strategy));
            if (strategy.kind === 'index') {
                log.warn('no identity column, every row counts as a distinct attendee');
            }

            emit('Parsing Join/Leave times (day first)...');
            const intervals = buildIntervalTable(identifyRows(normalized, strategy));
            emit(`Dropped ${intervals.dropped} invalid rows.`);
            emit(`Dates found: ${intervals.dates.join(', ')}`);

            const results: OccupancyResult[] = [];
            for (const date of intervals.dates) {
                await nextTick();
                emit(`Analyzing ${date} ...`);
                const points = countOccupancy(
                    date,
                    intervals.byDate.get(date) ?? [],
                    configuration.timeline,
                    configuration.annotations
                );
                points.forEach(point => emit(`[ ${point.time} ] -> ${point.display}`));
                results.push({ date, points });
            }

            const [primary] = results;
            if (!primary) throw new NoValidRowsError('No valid event dates found');

            const ref = await this.artifacts.save(reportFileName(randomBytes(4).toString('hex')), renderReportCsv(primary));
            emit(`Report saved: ${ref}`);
            if (results.length > 1) {
                emit(`Report covers ${primary.date} only; counts for ${results.length - 1} more date(s) are kept in the result.`);
            }

            job.result = {
                dates: intervals.dates,
                perDateCounts: Object.fromEntries(results.map(result => [result.date, toRows(result)])),
                primaryDate: primary.date,
                primaryDateRows: toRows(primary),
                outputArtifactRef: ref
            };
            job.status = 'done';
            job.finishedAt = new Date();
            log.info({ dates: intervals.dates, dropped: intervals.dropped, ref }, 'job done');
            job.channel.push(DONE);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            job.error = message;
            job.status = 'failed';
            job.finishedAt = new Date();
            log.error({ err }, 'job failed');
            emit(`Error: ${message}`);
            job.channel.push(FAILED);
        }
    }
}
