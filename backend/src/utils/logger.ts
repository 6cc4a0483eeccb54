/**
 * Structured Logging System
 * Context-aware logging with levels, request tracking and optional JSON-line file output
 */

import { createWriteStream, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { config } from '../config';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    CRITICAL = 4
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
    timestamp: string;
    level: string;
    requestId?: string;
    message: string;
    context?: LogContext;
    error?: {
        message: string;
        stack?: string;
        code?: string;
    };
}

export interface LoggerOptions {
    level?: LogLevel;
    logToFile?: boolean;
    logDir?: string;
}

export interface RequestLogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: unknown, context?: LogContext): void;
    critical(message: string, error?: unknown, context?: LogContext): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
    switch (value?.toLowerCase()) {
        case 'debug': return LogLevel.DEBUG;
        case 'warn': return LogLevel.WARN;
        case 'error': return LogLevel.ERROR;
        case 'critical': return LogLevel.CRITICAL;
        default: return LogLevel.INFO;
    }
}

function describeError(error: unknown): LogEntry['error'] {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return { message: error.message, stack: error.stack, code };
    }
    return { message: String(error) };
}

export class Logger {
    private logLevel: LogLevel;
    private logStream?: ReturnType<typeof createWriteStream>;
    private logDir: string;

    constructor(options: LoggerOptions = {}) {
        this.logLevel = options.level ?? LogLevel.INFO;
        this.logDir = options.logDir ?? join(process.cwd(), 'logs');
        if (options.logToFile) {
            this.initializeLogFile();
        }
    }

    private initializeLogFile() {
        try {
            if (!existsSync(this.logDir)) {
                mkdirSync(this.logDir, { recursive: true });
            }

            const logFile = join(this.logDir, `analysis-${this.getDateString()}.log`);
            this.logStream = createWriteStream(logFile, { flags: 'a' });

            this.logStream.on('error', (err) => {
                console.error('Log stream error:', err);
            });
        } catch (error) {
            console.error('Failed to initialize log file:', error);
        }
    }

    private getDateString(): string {
        const date = new Date();
        return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;
    }

    private formatLog(entry: LogEntry): string {
        return JSON.stringify(entry) + '\n';
    }

    private writeLog(entry: LogEntry) {
        const colors: Record<string, string> = {
            DEBUG: '\x1b[36m',    // Cyan
            INFO: '\x1b[32m',     // Green
            WARN: '\x1b[33m',     // Yellow
            ERROR: '\x1b[31m',    // Red
            CRITICAL: '\x1b[35m'  // Magenta
        };

        const reset = '\x1b[0m';
        const color = colors[entry.level] || '';

        console.log(`${color}[${entry.timestamp}] [${entry.level}]${entry.requestId ? ` [${entry.requestId}]` : ''} ${entry.message}${reset}`);

        if (entry.context) {
            console.log(`${color}  Context:${reset}`, entry.context);
        }

        if (entry.error) {
            console.error(`${color}  Error:${reset}`, entry.error);
        }

        if (this.logStream) {
            this.logStream.write(this.formatLog(entry));
        }
    }

    getLevel(): LogLevel {
        return this.logLevel;
    }

    setLevel(level: LogLevel) {
        this.logLevel = level;
    }

    debug(message: string, context?: LogContext, requestId?: string) {
        if (this.logLevel <= LogLevel.DEBUG) {
            this.writeLog({
                timestamp: new Date().toISOString(),
                level: 'DEBUG',
                requestId,
                message,
                context
            });
        }
    }

    info(message: string, context?: LogContext, requestId?: string) {
        if (this.logLevel <= LogLevel.INFO) {
            this.writeLog({
                timestamp: new Date().toISOString(),
                level: 'INFO',
                requestId,
                message,
                context
            });
        }
    }

    warn(message: string, context?: LogContext, requestId?: string) {
        if (this.logLevel <= LogLevel.WARN) {
            this.writeLog({
                timestamp: new Date().toISOString(),
                level: 'WARN',
                requestId,
                message,
                context
            });
        }
    }

    error(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        if (this.logLevel <= LogLevel.ERROR) {
            this.writeLog({
                timestamp: new Date().toISOString(),
                level: 'ERROR',
                requestId,
                message,
                context,
                error: describeError(error)
            });
        }
    }

    critical(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        this.writeLog({
            timestamp: new Date().toISOString(),
            level: 'CRITICAL',
            requestId,
            message,
            context,
            error: describeError(error)
        });
    }

    // Request-scoped logger
    child(requestId: string): RequestLogger {
        return {
            debug: (msg, ctx) => this.debug(msg, ctx, requestId),
            info: (msg, ctx) => this.info(msg, ctx, requestId),
            warn: (msg, ctx) => this.warn(msg, ctx, requestId),
            error: (msg, err, ctx) => this.error(msg, err, ctx, requestId),
            critical: (msg, err, ctx) => this.critical(msg, err, ctx, requestId)
        };
    }

    close() {
        if (this.logStream) {
            this.logStream.end();
        }
    }
}

// Singleton instance
const logger = new Logger({
    level: parseLogLevel(config.logLevel),
    logToFile: config.logToFile,
    logDir: config.logDir
});

export default logger;
