/**
 * Logger
 *
 * Captures every observer event through `observer.queue()`, so logging
 * never runs inside the emitter's call stack. JSON lines go to the log
 * file; compact lines go to the console stream when there is one.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: settings.logging,
 *     file: settings.logging.file,
 *     console: isHeadless() ? process.stdout : undefined,
 * })
 *
 * await logger.start()
 * // ... every observer event is now classified, redacted and written
 * await logger.stop()
 * ```
 */
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import type { EventQueue } from '@logosdx/observer';

import { toError } from '../errors/index.js';
import { isRecord } from '../filter/index.js';
import { observer, type KeelEvents } from '../observer.js';
import { classifyEvent, passes } from './classifier.js';
import { formatEntry, formatLine, serializeEntry } from './formatter.js';
import { filterData } from './redact.js';
import { checkAndRotate } from './rotation.js';
import type { EntryLevel, LogEntry, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

export interface LoggerOptions {
    config?: Partial<LoggerConfig>;

    /** Fields attached to every entry */
    context?: Record<string, unknown>;

    /**
     * Log file. A path is opened (and reopened after rotation) by the
     * logger; a stream is written as is and never rotated.
     */
    file?: string | Writable;

    /** Receives compact lines */
    console?: Writable;

    /** How often to check the file size, in ms. 0 checks only at start */
    rotationCheckMs?: number;
}

export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #path: string | null;
    #file: Writable | null;
    #console: Writable | null;
    #rotationCheckMs: number;
    #queue: EventQueue<KeelEvents, RegExp> | null = null;
    #state: LoggerState = 'idle';
    #rotationInterval: ReturnType<typeof setInterval> | null = null;
    #shutdownCleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#path = typeof options.file === 'string' ? options.file : null;
        this.#file = typeof options.file === 'string' ? null : options.file ?? null;
        this.#console = options.console ?? null;
        this.#rotationCheckMs = options.rotationCheckMs ?? 60_000;

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Path of the owned log file, if any.
     */
    get filepath(): string | null {

        return this.#path;

    }

    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    // ─────────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Open the log file and begin consuming events. A disabled logger
     * stays idle.
     */
    async start(): Promise<void> {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        if (this.#path) {

            await this.#rotate();
            await this.#open(this.#path);

            if (this.#rotationCheckMs > 0) {

                this.#rotationInterval = setInterval(() => {

                    this.#rotate().catch((error: unknown) => this.#reportFailure(error));

                }, this.#rotationCheckMs);
                this.#rotationInterval.unref();

            }

        }

        this.#queue = observer.queue(
            /./,
            (payload: unknown) => {

                if (!isRecord(payload)) {

                    return;

                }

                const event = payload['event'];
                const data = payload['data'];

                if (typeof event === 'string') {

                    this.#handleEvent(event, isRecord(data) ? data : {});

                }

            },
            {
                name: 'logger',
                autoStart: true,
                concurrency: 1,
                type: 'fifo',
            },
        );

        this.#shutdownCleanup = observer.on('app:shutdown', () => {

            this.stop().catch((error: unknown) => this.#reportFailure(error));

        });

        this.#state = 'running';

        observer.emit('logger:started', {
            file: this.#path ?? 'stream',
            level: this.#config.level,
        });

    }

    /**
     * Drain pending events and close the owned log file.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'flushing';

        if (this.#rotationInterval) {

            clearInterval(this.#rotationInterval);
            this.#rotationInterval = null;

        }

        if (this.#shutdownCleanup) {

            this.#shutdownCleanup();
            this.#shutdownCleanup = null;

        }

        if (this.#queue) {

            await this.#queue.stop();
            this.#queue = null;

        }

        if (this.#path) {

            await this.#close();

        }

        this.#state = 'stopped';

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    #handleEvent(event: string, data: Record<string, unknown>): void {

        // The logger's own events would loop
        if (event.startsWith('logger:')) {

            return;

        }

        const level = classifyEvent(event);

        if (!passes(level, this.#config.level)) {

            return;

        }

        // Errors always carry their payload (and stack)
        const includeData = level === 'error' || this.#config.level === 'verbose';

        this.#write(formatEntry(event, filterData(data, this.#config.level), this.#context, includeData, level));

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running' || !passes(level, this.#config.level)) {

            return;

        }

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            event: 'log',
            message,
        };

        if (data && Object.keys(data).length > 0 && (level === 'error' || this.#config.level === 'verbose')) {

            entry.data = filterData(data, this.#config.level);

        }

        if (Object.keys(this.#context).length > 0) {

            entry.context = this.#context;

        }

        this.#write(entry);

    }

    #write(entry: LogEntry): void {

        this.#console?.write(formatLine(entry));
        this.#file?.write(serializeEntry(entry));

    }

    async #open(path: string): Promise<void> {

        await mkdir(dirname(path), { recursive: true });

        this.#file = createWriteStream(path, { flags: 'a' });

    }

    async #close(): Promise<void> {

        const file = this.#file;

        this.#file = null;

        if (file) {

            await new Promise<void>((resolve) => file.end(() => resolve()));

        }

    }

    async #rotate(): Promise<void> {

        if (!this.#path) {

            return;

        }

        const result = await checkAndRotate(this.#path, this.#config.maxSize, this.#config.maxFiles);

        if (!result.rotated || !result.oldFile || !result.newFile) {

            return;

        }

        if (this.#file) {

            await this.#close();
            await this.#open(this.#path);

        }

        observer.emit('logger:rotated', { oldFile: result.oldFile, newFile: result.newFile });

    }

    #reportFailure(error: unknown): void {

        observer.emit('error', {
            source: 'logger',
            error: toError(error),
        });

    }

}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get the process-wide logger, creating it when options are given.
 */
export function getLogger(options?: LoggerOptions): Logger | null {

    if (!loggerInstance && options) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        await loggerInstance.stop();
        loggerInstance = null;

    }

}
