import pino, { type Logger, type LoggerOptions } from "pino";
import type { Config } from "./config";

/**
 * Logger options: pino-pretty output for humans, plain JSON lines otherwise
 */
export const loggerOptions = (config: Pick<Config, 'LOG_LEVEL' | 'LOG_PRETTY'>): LoggerOptions => ({
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY ? {
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:dd-mm-yyyy HH:MM:ss"
            }
        }
    } : {})
});

export const createLogger = (config: Pick<Config, 'LOG_LEVEL' | 'LOG_PRETTY'>): Logger => pino(loggerOptions(config));
