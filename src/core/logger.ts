/**
 * pino logger factory shared by the connection and the client.
 * @module core/logger
 */
import {pino, type Logger} from 'pino';

export type {Logger};

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Create a named pino logger writing JSON lines to stdout.
 */
export const createLogger = (level: LogLevel = 'info', name = 'vbox'): Logger => pino({name, level});
