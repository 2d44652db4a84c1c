import * as fs from 'fs';

// Structured logging utility
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLevelName(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold()) return;

    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };

    // stdout carries the command reports, so log lines go to stderr
    process.stderr.write(JSON.stringify(entry) + '\n');

    const logFile = process.env.LOG_FILE;
    if (!logFile) return;
    try {
        const line = `${entry.timestamp} [${level.toUpperCase()}] ${message}${context ? ' ' + JSON.stringify(context) : ''}\n`;
        fs.appendFileSync(logFile, line);
    } catch (err) {
        process.stderr.write(`Failed to append to ${logFile}: ${errorMessage(err)}\n`);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
