import process from 'node:process';
import { APP_NAME } from '../config.js';
import type { LogLevel } from '../config-manager.js';

export type { LogLevel };

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warning: 30,
    error: 40,
};

/** Anything that can carry log lines to the client, e.g. the stdio transport. */
export interface LogSink {
    readonly isNotificationsEnabled: boolean;
    sendLog(level: LogLevel, message: string, data?: Record<string, unknown>): void;
}

let threshold: LogLevel = 'info';
let sink: LogSink | null = null;

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function setLogSink(next: LogSink | null): void {
    sink = next;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Write straight to stderr. Safe before the MCP handshake and on the
 * stdio transport, where stdout belongs to the protocol.
 */
export function logToStderr(level: LogLevel, message: string): void {
    if (!enabled(level)) return;
    process.stderr.write(`[${APP_NAME}] ${level.toUpperCase()} ${message}\n`);
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!enabled(level)) return;
    if (sink?.isNotificationsEnabled) {
        sink.sendLog(level, message, data);
        return;
    }
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    process.stderr.write(`[${APP_NAME}] ${level.toUpperCase()} ${message}${suffix}\n`);
}

export const logger = {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warning: (message: string, data?: Record<string, unknown>) => log('warning', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
};
