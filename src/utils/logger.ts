// src/utils/logger.ts

import winston from 'winston';

/**
 * Every service gets its own winston logger tagged with the service name.
 * Logging is silenced under NODE_ENV=test so test output stays readable.
 */
export function createServiceLogger(service: string): winston.Logger {
    return winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        defaultMeta: { service },
        silent: process.env.NODE_ENV === 'test',
        transports: [new winston.transports.Console()],
    });
}
