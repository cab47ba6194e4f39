import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogEvent, LogLevel } from './types.js';

// ─── Event Emitter for SSE Broadcasting ───────────────────────────────────────

export const emitter = new EventEmitter();

// Increase max listeners to support many SSE clients
emitter.setMaxListeners(100);

export function broadcast(event: LogEvent): void {
    emitter.emit('log', event);
}

// ─── Colors ──────────────────────────────────────────────────────────────────

export const colors = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    info: colors.blue,
    success: colors.green,
    warn: colors.yellow,
    error: colors.red,
    phase: colors.magenta,
    debug: colors.dim,
};

const levelLabels: Record<LogLevel, string> = {
    info: 'INFO',
    success: ' OK ',
    warn: 'WARN',
    error: 'ERR ',
    phase: '>>>>',
    debug: 'DBG ',
};

// ─── Console Threshold ───────────────────────────────────────────────────────

export type LogThreshold = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const THRESHOLD_RANK: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    success: 1,
    phase: 1,
    warn: 2,
    error: 3,
};

function isThreshold(value: string): value is LogThreshold {
    return Object.hasOwn(THRESHOLD_RANK, value);
}

function thresholdFromEnv(): LogThreshold {
    const raw = process.env.SPECFLOW_LOG_LEVEL?.toLowerCase();
    return raw && isThreshold(raw) ? raw : 'info';
}

let threshold: LogThreshold = thresholdFromEnv();
let useStderr = false;

/**
 * Structured (--json) output owns stdout, so logs move to stderr.
 */
export function configureLogger(options: { level?: LogThreshold; stderr?: boolean }): void {
    if (options.level) threshold = options.level;
    if (options.stderr !== undefined) useStderr = options.stderr;
}

export function log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] >= THRESHOLD_RANK[threshold]) {
        const timestamp = new Date().toISOString().slice(11, 19);
        const color = levelColors[level];
        const label = levelLabels[level];
        const line = `${colors.dim}[${timestamp}]${colors.reset} ${color}${colors.bold}${label}${colors.reset} ${message}`;
        if (useStderr) {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    // SSE clients always get the event, whatever the console threshold
    broadcast({
        type: 'system',
        level,
        message,
        timestamp: new Date().toISOString(),
    });
}

// ─── Agent Transcript Logger ──────────────────────────────────────────────────

export interface AgentLogger {
    logFile: string;
    write(text: string): void;
    close(): void;
}

export function createAgentLogger(logsDir: string, agentName: string, invocationId: string): AgentLogger {
    fs.mkdirSync(logsDir, { recursive: true });

    // Create log file: .specflow/logs/2024-01-15T10-30-45-plan.log
    const logFile = path.join(logsDir, `${invocationId}-${agentName}.log`);
    const writeStream = fs.createWriteStream(logFile, { flags: 'a' });

    return {
        logFile,
        write(text: string): void {
            writeStream.write(text);

            broadcast({
                type: 'agent',
                agent: agentName,
                invocationId,
                message: text,
                timestamp: new Date().toISOString(),
            });
        },
        close(): void {
            writeStream.end();
        },
    };
}

export function generateInvocationId(): string {
    // Format: 2024-01-15T10-30-45
    return new Date().toISOString().slice(0, 19).replace(/:/g, '-');
}
