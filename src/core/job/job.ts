/**
 * A single job and the API its body sees.
 *
 * The body receives its own Job: it reports progress, writes to its log,
 * reads and writes pipes, and hits abort-aware suspension points through
 * `sleep()`, `wrap()` and `untilAborted()`.
 *
 * @example
 * ```typescript
 * async function scrub(job: Job, pool: string) {
 *     for (let pct = 0; pct < 100; pct += 10) {
 *         job.setProgress(pct, `Scrubbing ${pool}`)
 *         await job.sleep(1000)
 *     }
 *     return { pool, errors: 0 }
 * }
 * ```
 */
import { setTimeout as delay } from 'node:timers/promises'
import { attempt } from '@logosdx/utils'

import {
    JobAbortedError,
    WorkerError,
    isExpectedError,
} from '../errors/index.js'
import { JobPipes } from './pipes.js'
import type { JobLogs } from './logs.js'
import {
    TERMINAL_STATES,
    type ExceptionInfo,
    type ExecutionMode,
    type JobProgress,
    type JobSnapshot,
    type JobState,
    type PipeName,
    type PipeStreams,
} from './types.js'


export interface JobInit {
    id: number
    method: string
    args: unknown[]
    lock: string | null
    mode: ExecutionMode
    transient: boolean
    abortable: boolean
    description: string | null
    pipes?: PipeName[]
    streams?: PipeStreams
}


export class Job {

    readonly id: number
    readonly method: string
    readonly args: unknown[]
    readonly lock: string | null
    readonly mode: ExecutionMode
    readonly transient: boolean
    readonly abortable: boolean
    readonly description: string | null
    readonly pipes: JobPipes
    readonly createdAt = new Date()

    state: JobState = 'WAITING'
    progress: JobProgress = { percent: null, description: null, extra: null }
    result: unknown = null
    error: Error | null = null
    startedAt: Date | null = null
    finishedAt: Date | null = null
    logs: JobLogs | null = null
    logsExcerpt: string | null = null

    readonly #controller = new AbortController()
    readonly #listeners = new Set<(job: Job) => void>()
    readonly #settled: Promise<void>
    #resolveSettled: () => void = () => undefined

    constructor(init: JobInit) {

        this.id = init.id
        this.method = init.method
        this.args = init.args
        this.lock = init.lock
        this.mode = init.mode
        this.transient = init.transient
        this.abortable = init.abortable
        this.description = init.description
        this.pipes = new JobPipes(init.id, init.pipes, init.streams)
        this.#settled = new Promise<void>((resolve) => {

            this.#resolveSettled = resolve
        })
    }

    get signal(): AbortSignal {

        return this.#controller.signal
    }

    get aborted(): boolean {

        return this.#controller.signal.aborted
    }

    get finished(): boolean {

        return TERMINAL_STATES.has(this.state)
    }

    /**
     * Subscribe to state and progress changes. Returns a cleanup function.
     */
    onChange(listener: (job: Job) => void): () => void {

        this.#listeners.add(listener)

        return () => this.#listeners.delete(listener)
    }


    // ─────────────────────────────────────────────────────────────
    // Body API
    // ─────────────────────────────────────────────────────────────

    /**
     * Update progress. Omitted or null arguments keep their current value.
     */
    setProgress(percent?: number | null, description?: string | null, extra?: unknown): void {

        if (percent != null) this.progress.percent = percent
        if (description) this.progress.description = description
        if (extra != null) this.progress.extra = extra

        this.#notify()
    }

    log(text: string): void {

        this.logs?.write(text)
    }

    checkAborted(): void {

        if (this.aborted) {

            throw new JobAbortedError(this.id)
        }
    }

    /**
     * Abort-aware sleep.
     *
     * @throws JobAbortedError when the job is aborted before or during the sleep
     */
    async sleep(ms: number): Promise<void> {

        this.checkAborted()

        const [, err] = await attempt(() => delay(ms, undefined, { signal: this.signal }))

        if (err) {

            throw this.aborted ? new JobAbortedError(this.id) : err
        }
    }

    /**
     * Settle with `promise`, or reject with JobAbortedError as soon as the
     * job is aborted. The promise itself keeps running.
     */
    untilAborted<T>(promise: Promise<T>): Promise<T> {

        return new Promise<T>((resolve, reject) => {

            if (this.aborted) {

                reject(new JobAbortedError(this.id))
                return
            }

            const onAbort = () => reject(new JobAbortedError(this.id))
            const cleanup = () => this.signal.removeEventListener('abort', onAbort)

            this.signal.addEventListener('abort', onAbort, { once: true })

            void promise.then(
                (value) => {

                    cleanup()
                    resolve(value)
                },
                (err: unknown) => {

                    cleanup()
                    reject(err)
                },
            )
        })
    }

    /**
     * Wait for another job, mirroring its progress, and return its result.
     */
    async wrap(other: Job): Promise<unknown> {

        const mirror = () => this.setProgress(
            other.progress.percent,
            other.progress.description,
            other.progress.extra,
        )

        const cleanup = other.onChange(mirror)

        try {

            return await this.untilAborted(other.wait())
        }
        finally {

            cleanup()
        }
    }

    /**
     * Resolve with the result once finished, or reject with its error.
     */
    async wait(): Promise<unknown> {

        await this.#settled

        if (this.state === 'ABORTED') {

            throw this.error ?? new JobAbortedError(this.id)
        }

        if (this.state === 'FAILED') {

            throw this.error ?? new Error(`Job ${this.id} failed`)
        }

        return this.result
    }


    // ─────────────────────────────────────────────────────────────
    // Scheduler API
    // ─────────────────────────────────────────────────────────────

    markRunning(): void {

        this.state = 'RUNNING'
        this.startedAt = new Date()
        this.#notify()
    }

    /**
     * Move to a terminal state. Later calls are ignored.
     */
    markFinished(state: 'SUCCESS', result: unknown): void
    markFinished(state: 'FAILED' | 'ABORTED', error: Error): void
    markFinished(state: 'SUCCESS' | 'FAILED' | 'ABORTED', outcome: unknown): void {

        if (this.finished) {

            return
        }

        this.state = state
        this.finishedAt = new Date()

        if (state === 'SUCCESS') {

            this.result = outcome
        }
        else if (outcome instanceof Error) {

            this.error = outcome
        }

        this.#notify()
        this.#resolveSettled()
    }

    requestAbort(): void {

        this.#controller.abort(new JobAbortedError(this.id))
    }

    snapshot(): JobSnapshot {

        return {
            id: this.id,
            method: this.method,
            arguments: [...this.args],
            lock: this.lock,
            state: this.state,
            progress: { ...this.progress },
            result: this.result,
            error: this.error ? this.error.message : null,
            exception: this.error ? exceptionInfo(this.error) : null,
            description: this.description,
            transient: this.transient,
            abortable: this.abortable,
            mode: this.mode,
            logsPath: this.logs?.path ?? null,
            logsExcerpt: this.logsExcerpt,
            createdAt: this.createdAt.toISOString(),
            startedAt: this.startedAt?.toISOString() ?? null,
            finishedAt: this.finishedAt?.toISOString() ?? null,
        }
    }

    #notify(): void {

        for (const listener of this.#listeners) {

            listener(this)
        }
    }
}


function exceptionInfo(err: Error): ExceptionInfo {

    const errno = 'errno' in err && typeof err.errno === 'number' ? err.errno : null

    return {
        type: err instanceof WorkerError ? err.remoteName : err.name,
        message: err.message,
        stack: (err instanceof WorkerError ? err.remoteStack : err.stack) ?? null,
        expected: isExpectedError(err),
        errno,
    }
}
