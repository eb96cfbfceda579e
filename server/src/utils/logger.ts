/**
 * Centralized logger using Pino
 * Structured JSON in production, pino-pretty in development, silent in tests
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Create the logger instance
const logger: Logger = isDev
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino(options);

// Create child loggers for different modules
export const shopifyLogger: Logger = logger.child({ module: 'shopify' });
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const sourceLogger: Logger = logger.child({ module: 'source' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
