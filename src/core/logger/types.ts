/**
 * Logger Types
 *
 * The logger turns observer events into log lines, one per event.
 */

/**
 * Configured verbosity.
 *
 * - silent: nothing
 * - error: errors only
 * - warn: errors and warnings
 * - info: plus lifecycle events (default)
 * - verbose: every event, with its payload
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Higher numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Severity of a single entry.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry, written as one JSON line.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2026-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "job:complete",
 *     "message": "Job 12 (pool.scrub) SUCCESS in 1520ms"
 * }
 * ```
 */
export interface LogEntry {
    timestamp: string;
    level: EntryLevel;

    /** Observer event name, or `log` for direct calls */
    event: string;

    message: string;

    /** Event payload, included at verbose level */
    data?: Record<string, unknown>;

    /** Fields attached to every entry (node name, pid, ...) */
    context?: Record<string, unknown>;
}

/**
 * The `logging` section of keel.yml.
 */
export interface LoggerConfig {
    enabled: boolean;
    level: LogLevel;

    /** Log file path */
    file: string;

    /** Rotate once the file reaches this size (e.g. '10mb') */
    maxSize: string;

    /** Rotated files kept */
    maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    enabled: true,
    level: 'info',
    file: '/var/log/keel/keel.log',
    maxSize: '10mb',
    maxFiles: 5,
};

export interface RotationResult {
    rotated: boolean;
    oldFile?: string;
    newFile?: string;
    deletedFiles?: string[];
}

export type LoggerState = 'idle' | 'running' | 'flushing' | 'stopped';
