/**
 * Attendance Occupancy API
 *
 * Fastify application over the job pipeline and the timeline configuration.
 *
 * Features:
 * - Rate limiting (RATE_LIMIT_MAX requests per minute)
 * - Job submission, status, server-sent progress stream and results
 * - Report download and timeline settings
 */

import fastify from "fastify";
import rateLimit from '@fastify/rate-limit';
import type { Logger } from "pino";
import type { Config } from "./config";
import { createHandlers } from "./routes";
import { JobPipeline } from "./jobs/pipeline";
import type { ArtifactStore } from "./store/artifacts";
import { TimelineConfigurationStore } from "./store/configuration";
import { JobRegistry } from "./store/jobs";

export interface AppDependencies {
    config: Config;
    logger: Logger;
    artifacts: ArtifactStore;
    configuration?: TimelineConfigurationStore;
}

/**
 * Wire stores, pipeline and routes into a Fastify instance (not listening)
 */
export const buildApp = ({ config, logger, artifacts, configuration = new TimelineConfigurationStore() }: AppDependencies) => {
    const registry = new JobRegistry({ capacity: config.JOB_CAPACITY, ttlMs: config.JOB_TTL_MS });
    const pipeline = new JobPipeline({
        configuration,
        artifacts,
        registry,
        logger: logger.child({ component: 'jobs' }),
        idleMs: config.STREAM_IDLE_MS
    });

    const app = fastify({
        logger,
        bodyLimit: config.BODY_LIMIT
    });

    app.register(rateLimit, {
        max: config.RATE_LIMIT_MAX,
        timeWindow: '1 minute'
    });

    const handlers = createHandlers({ pipeline, configuration, artifacts });

    app.register(function (app, _, done) {
        app.post("/jobs", handlers.submitJob);
        app.get("/jobs/:id", handlers.jobStatus);
        app.get("/jobs/:id/stream", handlers.streamJob);
        app.get("/jobs/:id/result", handlers.jobResult);
        app.get("/reports/:name", handlers.downloadReport);
        app.get("/settings", handlers.readSettings);
        app.put("/settings", handlers.writeSettings);
        app.delete("/settings", handlers.resetSettings);
        app.get("/health", async () => ({ status: 'ok', jobs: registry.size }));

        done();
    });

    return { app, pipeline, configuration, registry };
}
