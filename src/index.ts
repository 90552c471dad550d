/**
 * Attendance Occupancy Server
 *
 * Entry point: reads the environment, builds the app and starts listening.
 * Reports are written under OUTPUT_DIR.
 */

import { buildApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { FileArtifactStore } from "./store/artifacts";

const config = loadConfig();
const logger = createLogger(config);

const { app } = buildApp({
    config,
    logger,
    artifacts: new FileArtifactStore(config.OUTPUT_DIR)
});

try {
    await app.listen({ port: config.PORT, host: config.HOST });
} catch (err) {
    logger.fatal({ err }, 'server failed to start');
    process.exit(1);
}
