/**
 * Structured logging.
 *
 * - JSON lines in production, one readable line per entry in development
 * - every entry carries the trace id and student id from the trace context
 * - errors are logged whole: name, message, stack and the `cause` chain
 * - daily rotated log files (14 days) unless disabled by config
 *
 * kind:
 * - biz: session lifecycle (use case layer)
 * - sys: stores, locks and model calls (adapter layer)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getStudentId, getTraceContext } from './tracing.js';
import config from './config.js';

export type LogKind = 'biz' | 'sys';

export interface LogMeta {
    kind: LogKind;
    /** Emitting class or module */
    component: string;
    message: string;
    /** Pass the original error, never a wrapped string */
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (error === undefined || error === null) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause !== undefined ? { cause: serializeError(error.cause) } : {}),
            // custom fields such as `code`
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: String(error) };
}

const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const trace = getTraceContext();

    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: trace?.traceId || '-',
        studentId: getStudentId() || '-',
        sessionId: trace?.sessionId || '-',
        ...rest,
        message,
    };

    if (rest.error !== undefined) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceContext()?.traceId || '-';
    const studentId = getStudentId() || '-';

    let output = `${String(timestamp)} [${level.toUpperCase().padEnd(5)}] [${String(kind ?? 'sys')}] [${traceId}] [${studentId}] ${String(component ?? 'App')}: ${String(message)}`;

    const serialized = serializeError(error);
    if (serialized) {
        output += `\n  error: ${String(serialized.name ?? 'Error')} - ${String(serialized.message ?? serialized.raw)}`;
        if (serialized.stack) {
            output += `\n  stack: ${String(serialized.stack)}`;
        }
        if (serialized.cause) {
            output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
        }
    }

    if (meta && typeof meta === 'object' && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

const transports: Array<winston.transports.ConsoleTransportInstance | DailyRotateFile> = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize({ all: IS_DEV }),
            IS_DEV ? prettyFormat : jsonFormat
        ),
    }),
];

if (config.logging.toFile) {
    transports.push(
        new DailyRotateFile({
            dirname: config.logging.dir,
            filename: 'session-engine-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '50m',
            maxFiles: '14d',
            format: winston.format.combine(
                winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
                jsonFormat
            ),
        })
    );
}

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

/**
 * @example
 * logger.warn({
 *     kind: 'sys',
 *     component: 'UpstashSessionStore',
 *     message: 'Redis write failed',
 *     error,
 *     meta: { sessionId },
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),
};

export default logger;
