/**
 * Job types.
 *
 * A job is a trackable unit of possibly long-running work. It is created on
 * submission, mutated only by the scheduler and by its own body's progress
 * calls, and evicted from the job table when transient and finished.
 */
import type { Readable, Writable } from 'node:stream'

import type { Job } from './job.js'


/**
 * Job lifecycle.
 *
 * `WAITING → RUNNING → {SUCCESS, FAILED, ABORTED}`
 */
export type JobState = 'WAITING' | 'RUNNING' | 'SUCCESS' | 'FAILED' | 'ABORTED';

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set(['SUCCESS', 'FAILED', 'ABORTED']);

/**
 * Where the body executes.
 *
 * - loop: inline on the event loop, cooperatively abortable
 * - thread: bounded worker-thread pool
 * - process: isolated child process
 */
export type ExecutionMode = 'loop' | 'thread' | 'process';

export interface JobProgress {
    percent: number | null;
    description: string | null;
    extra: unknown;
}

/**
 * Structured view of the error a job failed with.
 */
export interface ExceptionInfo {
    type: string;
    message: string;
    stack: string | null;
    expected: boolean;
    errno: number | null;
}

/**
 * Plain, filterable view of a job.
 */
export type JobSnapshot = {
    id: number;
    method: string;
    arguments: unknown[];
    lock: string | null;
    state: JobState;
    progress: JobProgress;
    result: unknown;
    error: string | null;
    exception: ExceptionInfo | null;
    description: string | null;
    transient: boolean;
    abortable: boolean;
    mode: ExecutionMode;
    logsPath: string | null;
    logsExcerpt: string | null;
    createdAt: string;
    startedAt: string | null;
    finishedAt: string | null;
};

export type PipeName = 'input' | 'output';

export interface PipeStreams {
    input?: Readable;
    output?: Writable;
}

/**
 * Loop-mode body. Receives its own Job for progress, pipes and abort.
 */
export type LoopJobBody = (job: Job, ...args: unknown[]) => unknown;

/**
 * Thread/process body: an ES module exporting `(job, ...args) => result`.
 * The `job` it receives is a proxy with `setProgress` and `log`.
 */
export interface ModuleBody {
    /** Absolute path or file: URL */
    module: string;

    /** Named export to call; defaults to `default` */
    export?: string;
}

export type JobTarget =
    | { mode: 'loop'; run: LoopJobBody }
    | ({ mode: 'thread' | 'process' } & ModuleBody);

/**
 * Static per-method job declaration.
 */
export interface JobOptions {
    /** Lock name, or derived from the raw arguments; null means no lock */
    lock?: string | ((args: unknown[]) => string | null);

    /**
     * Maximum WAITING jobs on the lock. When full, submission creates no job
     * and returns the job at the tail of the queue instead.
     */
    lockQueueSize?: number;

    /** Open a per-job log file */
    logs?: boolean;

    pipes?: PipeName[];

    /** Verify declared pipes are connected before the body starts */
    checkPipes?: boolean;

    /** Drop from the job table and emit no added/changed once finished */
    transient?: boolean;

    description?: (args: unknown[]) => string | null;

    abortable?: boolean;
}

export interface JobRequest {
    method: string;
    args: unknown[];
    target: JobTarget;
    options?: JobOptions;
    pipes?: PipeStreams;
}
