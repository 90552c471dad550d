import type { FastifyReply, FastifyRequest } from 'fastify';
import {
    JobParamsSchema,
    ReportParamsSchema,
    SubmitJobSchema,
    WriteSettingsSchema
} from './schemas';
import { NotFoundError } from './domain/errors';
import type { JobPipeline } from './jobs/pipeline';
import type { ArtifactStore } from './store/artifacts';
import type { TimelineConfigurationStore } from './store/configuration';
import type { LogEvent } from './types';

export interface RouteDependencies {
    pipeline: JobPipeline;
    configuration: TimelineConfigurationStore;
    artifacts: ArtifactStore;
}

const notFound = (reply: FastifyReply, err: NotFoundError) =>
    reply.status(404).send({ error: 'not_found', detail: err.message });

/**
 * Build the route handlers over the job pipeline and configuration store
 *
 * Handlers are thin: validate input, call one service operation, map
 * NotFoundError to 404. Anything else reaches Fastify's error handler.
 */
export const createHandlers = ({ pipeline, configuration, artifacts }: RouteDependencies) => {
    /**
     * Submit a decoded table for processing
     *
     * @returns 202 with the job id; processing continues in the background
     *
     * @throws {400} Invalid input (malformed table)
     */
    const submitJob = async (request: FastifyRequest, reply: FastifyReply) => {
        const body = SubmitJobSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const { fileName, columns, rows } = body.data;

        const jobId = pipeline.submit({ columns, rows }, { fileName });
        request.log.info({ jobId, rows: rows.length }, 'job submitted');

        return reply.status(202).send({
            jobId,
            stream: `/jobs/${jobId}/stream`,
            result: `/jobs/${jobId}/result`
        });
    }

    /**
     * Current state of a job
     *
     * @throws {404} Unknown or expired job
     */
    const jobStatus = async (request: FastifyRequest, reply: FastifyReply) => {
        const params = JobParamsSchema.safeParse(request.params);
        if (!params.success) {
            return reply.status(400).send({ error: 'invalid_input' });
        }
        try {
            return pipeline.getStatus(params.data.id);
        } catch (err) {
            if (err instanceof NotFoundError) return notFound(reply, err);
            throw err;
        }
    }

    /**
     * Stream progress lines as server-sent events
     *
     * Each line is sent as a `data:` event; an `: idle` comment goes out when
     * no line arrived within the idle interval. The response ends after the
     * DONE or FAILED line.
     *
     * @throws {404} Unknown or expired job
     */
    const streamJob = async (request: FastifyRequest, reply: FastifyReply) => {
        const params = JobParamsSchema.safeParse(request.params);
        if (!params.success) {
            return reply.status(400).send({ error: 'invalid_input' });
        }

        const disconnected = new AbortController();
        let events: AsyncIterable<LogEvent>;
        try {
            events = pipeline.subscribe(params.data.id, disconnected.signal);
        } catch (err) {
            if (err instanceof NotFoundError) return notFound(reply, err);
            throw err;
        }

        reply.hijack();
        reply.raw.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive'
        });

        // Client went away: abandon the pending read so unread lines stay buffered
        reply.raw.on('close', () => disconnected.abort());

        for await (const event of events) {
            reply.raw.write(event.kind === 'line' ? `data: ${event.text}\n\n` : ': idle\n\n');
        }
        if (!reply.raw.destroyed) reply.raw.end();
    }

    /**
     * Counts of a completed job
     *
     * @throws {404} Unknown job, or job not finished successfully
     */
    const jobResult = async (request: FastifyRequest, reply: FastifyReply) => {
        const params = JobParamsSchema.safeParse(request.params);
        if (!params.success) {
            return reply.status(400).send({ error: 'invalid_input' });
        }
        try {
            return pipeline.getResult(params.data.id);
        } catch (err) {
            if (err instanceof NotFoundError) return notFound(reply, err);
            throw err;
        }
    }

    /**
     * Download a generated report as CSV
     *
     * @throws {404} Unknown report
     */
    const downloadReport = async (request: FastifyRequest, reply: FastifyReply) => {
        const params = ReportParamsSchema.safeParse(request.params);
        if (!params.success) {
            return reply.status(400).send({ error: 'invalid_input' });
        }
        const { name } = params.data;
        const content = await artifacts.read(name);
        if (content === undefined) {
            return notFound(reply, new NotFoundError(`Report ${name} not found`));
        }
        return reply
            .header('Content-Type', 'text/csv; charset=utf-8')
            .header('Content-Disposition', `attachment; filename="${name}"`)
            .send(content);
    }

    const readSettings = async () => configuration.read();

    /**
     * Replace the timeline and annotations used by future jobs
     *
     * Invalid time points and labels are dropped silently; an omitted field
     * keeps its current value.
     *
     * @returns the configuration as stored
     *
     * @throws {400} Body is not an object with a timeline list and/or an annotations map
     */
    const writeSettings = async (request: FastifyRequest, reply: FastifyReply) => {
        const body = WriteSettingsSchema.safeParse(request.body);
        if (!body.success) {
            return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
        }
        const current = configuration.read();
        return configuration.write(
            body.data.timeline ?? current.timeline,
            body.data.annotations ?? current.annotations
        );
    }

    /**
     * Restore the built-in timeline and annotations for future jobs
     *
     * @returns the configuration as stored
     */
    const resetSettings = async () => configuration.reset();

    return {
        submitJob,
        jobStatus,
        streamJob,
        jobResult,
        downloadReport,
        readSettings,
        writeSettings,
        resetSettings
    };
}
