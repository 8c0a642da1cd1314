/**
 * Job scheduler.
 *
 * Admits jobs, serializes jobs that share a lock name in strict FIFO order,
 * executes bodies on the loop, the thread pool or a child process, and
 * owns the job table.
 *
 * Admission with a lock:
 * 1. Lock free: claimed at once, the job is RUNNING before `submit` returns.
 * 2. Lock held: the job is WAITING at the tail of the lock's queue.
 * 3. Lock held and `lockQueueSize` jobs already waiting: no job is created;
 *    `submit` returns the job at the tail of the queue (or the holder when
 *    the queue size is 0).
 *
 * @example
 * ```typescript
 * const scheduler = new JobScheduler({ threadPoolSize: 2 })
 *
 * const job = scheduler.submit({
 *     method: 'pool.scrub',
 *     args: ['tank'],
 *     target: { mode: 'loop', run: scrub },
 *     options: { lock: 'pool:tank', lockQueueSize: 1, abortable: true },
 * })
 *
 * const result = await job.wait()
 * ```
 */
import { availableParallelism } from 'node:os'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { AsyncLockRegistry } from '../lock/index.js'
import {
    CallError,
    ERRNO,
    JobAbortedError,
    NotAbortableError,
    NotFoundError,
    isExpectedError,
    toError,
} from '../errors/index.js'
import { applyQuery, type Filter, type QueryOptions, type QueryResult } from '../filter/index.js'
import {
    Job,
    JobLogs,
    type JobOptions,
    type JobRequest,
    type JobTarget,
} from '../job/index.js'
import { ThreadPool } from './thread-pool.js'
import { ProcessRunner } from './process-runner.js'
import type { TaskHooks } from './protocol.js'


export interface SchedulerOptions {
    /** Worker threads for thread-mode bodies */
    threadPoolSize?: number

    /** Concurrent child processes for process-mode bodies */
    processPoolSize?: number

    /** Directory for per-job log files */
    logsDir?: string

    /** Lines kept in `logsExcerpt` */
    logsExcerptLines?: number
}


export const DEFAULT_SCHEDULER_OPTIONS: Required<SchedulerOptions> = {
    threadPoolSize: Math.max(1, availableParallelism()),
    processPoolSize: 2,
    logsDir: '/var/log/jobs',
    logsExcerptLines: 10,
}


export class JobScheduler {

    readonly threadPool: ThreadPool
    readonly processRunner: ProcessRunner

    /** Job locks. Separate from the registry used by `lock`-declared methods. */
    readonly locks = new AsyncLockRegistry()

    readonly #options: Required<SchedulerOptions>
    readonly #jobs = new Map<number, Job>()
    readonly #queues = new Map<string, Job[]>()
    readonly #holders = new Map<string, Job>()
    #nextId = 1

    constructor(options: SchedulerOptions = {}) {

        this.#options = {
            threadPoolSize: options.threadPoolSize ?? DEFAULT_SCHEDULER_OPTIONS.threadPoolSize,
            processPoolSize: options.processPoolSize ?? DEFAULT_SCHEDULER_OPTIONS.processPoolSize,
            logsDir: options.logsDir ?? DEFAULT_SCHEDULER_OPTIONS.logsDir,
            logsExcerptLines: options.logsExcerptLines ?? DEFAULT_SCHEDULER_OPTIONS.logsExcerptLines,
        }
        this.threadPool = new ThreadPool(this.#options.threadPoolSize)
        this.processRunner = new ProcessRunner(this.#options.processPoolSize)
    }

    /**
     * Admit a job. Returns the new job, or an already-waiting one when the
     * lock's queue is full.
     *
     * @throws CallError when pipes are declared for a thread or process body
     */
    submit(request: JobRequest): Job {

        const options: JobOptions = request.options ?? {}
        const lock = resolveLock(options.lock, request.args)

        if (request.target.mode !== 'loop' && options.pipes?.length) {

            throw new CallError(`${request.method}: pipes require a loop-mode body`, ERRNO.EINVAL)
        }

        if (lock !== null && options.lockQueueSize !== undefined) {

            const existing = this.#coalesce(lock, options.lockQueueSize)

            if (existing) {

                observer.emit('job:coalesced', { lock, method: request.method, jobId: existing.id })
                return existing
            }
        }

        const job = new Job({
            id: this.#nextId++,
            method: request.method,
            args: request.args,
            lock,
            mode: request.target.mode,
            transient: options.transient ?? false,
            abortable: options.abortable ?? false,
            description: options.description?.(request.args) ?? null,
            pipes: options.pipes,
            streams: request.pipes,
        })

        this.#jobs.set(job.id, job)

        if (!job.transient) {

            job.onChange(() => observer.emit('job:changed', { job: job.snapshot() }))
            observer.emit('job:added', { job: job.snapshot() })
        }

        if (lock === null) {

            this.#start(job, request.target, options)
            return job
        }

        const mutex = this.locks.get(lock)

        if (mutex.tryAcquire(job.id)) {

            this.#holders.set(lock, job)
            this.#start(job, request.target, options)
            return job
        }

        const queue = this.#queueFor(lock)
        queue.push(job)

        void mutex.acquire({ owner: job.id, signal: job.signal }).then(
            () => {

                removeFrom(queue, job)
                this.#holders.set(lock, job)

                if (job.aborted) {

                    this.#finish(job, 'ABORTED', new JobAbortedError(job.id))
                    this.#releaseLock(job)
                    return
                }

                this.#start(job, request.target, options)
            },
            (err: unknown) => {

                removeFrom(queue, job)
                this.#finish(job, 'ABORTED', toError(err))
            },
        )

        return job
    }

    get(id: number): Job | undefined {

        return this.#jobs.get(id)
    }

    /**
     * @throws NotFoundError when no such job is listed
     */
    getOrThrow(id: number): Job {

        const job = this.#jobs.get(id)

        if (!job) {

            throw new NotFoundError('Job', id)
        }

        return job
    }

    /**
     * Query the job table. Finished transient jobs are never listed.
     */
    list(filters: Filter[] = [], options: QueryOptions = {}): QueryResult {

        const snapshots = [...this.#jobs.values()].map((job) => job.snapshot())

        return applyQuery(snapshots, filters, options, 'Job')
    }

    /**
     * Jobs waiting on `lock`, in queue order.
     */
    waiting(lock: string): readonly Job[] {

        return this.#queues.get(lock) ?? []
    }

    holder(lock: string): Job | undefined {

        return this.#holders.get(lock)
    }

    /**
     * Abort a job.
     *
     * Loop bodies see JobAbortedError at their next suspension point. Thread
     * and process bodies keep running; the job is marked ABORTED at once and
     * its lock is released when the body returns.
     *
     * @throws NotFoundError when the job is not listed
     * @throws NotAbortableError when the job was not declared abortable
     */
    abort(id: number): void {

        const job = this.getOrThrow(id)

        if (job.finished) {

            return
        }

        if (!job.abortable) {

            throw new NotAbortableError(job.id, job.method)
        }

        if (job.state === 'WAITING' && job.lock !== null) {

            removeFrom(this.#queueFor(job.lock), job)
        }

        job.requestAbort()

        if (job.state === 'RUNNING' && job.mode !== 'loop') {

            this.#finish(job, 'ABORTED', new JobAbortedError(job.id))
        }
    }

    /**
     * Drop finished jobs from the table. Returns how many were removed.
     */
    reap(): number {

        let removed = 0

        for (const [id, job] of this.#jobs) {

            if (job.finished) {

                this.#jobs.delete(id)
                removed++
            }
        }

        return removed
    }

    async close(): Promise<void> {

        await Promise.all([
            this.threadPool.close(),
            this.processRunner.close(),
        ])
    }


    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    #coalesce(lock: string, lockQueueSize: number): Job | null {

        if (!this.locks.has(lock) || !this.locks.get(lock).locked) {

            return null
        }

        const queue = this.#queues.get(lock) ?? []

        if (queue.length < lockQueueSize) {

            return null
        }

        return queue[queue.length - 1] ?? this.#holders.get(lock) ?? null
    }

    #queueFor(lock: string): Job[] {

        let queue = this.#queues.get(lock)

        if (!queue) {

            queue = []
            this.#queues.set(lock, queue)
        }

        return queue
    }

    #start(job: Job, target: JobTarget, options: JobOptions): void {

        if (options.checkPipes ?? true) {

            const [, pipeErr] = attemptSync(() => job.pipes.check())

            if (pipeErr) {

                this.#finish(job, 'FAILED', pipeErr)
                this.#releaseLock(job)
                return
            }
        }

        job.markRunning()

        void this.#execute(job, target, options)
    }

    async #execute(job: Job, target: JobTarget, options: JobOptions): Promise<void> {

        if (options.logs) {

            job.logs = new JobLogs(this.#options.logsDir, job.id)
        }

        const [result, err] = await attempt(async () => {

            await job.logs?.open()
            return this.#run(job, target)
        })

        if (job.logs) {

            await this.#closeLogs(job, job.logs)
        }

        if (err) {

            this.#finish(job, job.aborted ? 'ABORTED' : 'FAILED', err)
        }
        else if (job.aborted) {

            this.#finish(job, 'ABORTED', new JobAbortedError(job.id))
        }
        else {

            this.#finish(job, 'SUCCESS', result)
        }

        this.#releaseLock(job)
    }

    async #run(job: Job, target: JobTarget): Promise<unknown> {

        if (target.mode === 'loop') {

            return target.run(job, ...job.args)
        }

        const task = {
            jobId: job.id,
            module: target.module,
            export: target.export,
            args: job.args,
            lock: null,
        }

        const hooks: TaskHooks = {
            onProgress: (percent, description, extra) => {

                if (!job.finished) job.setProgress(percent, description, extra)
            },
            onLog: (text) => job.log(text),
        }

        return target.mode === 'thread'
            ? this.threadPool.run(task, hooks)
            : this.processRunner.run(task, hooks)
    }

    async #closeLogs(job: Job, logs: JobLogs): Promise<void> {

        const [, closeErr] = await attempt(() => logs.close())
        const [excerpt, readErr] = closeErr
            ? [null, closeErr]
            : await attempt(() => logs.excerpt(this.#options.logsExcerptLines))

        if (readErr) {

            observer.emit('error', {
                source: 'job',
                error: readErr,
                context: { jobId: job.id, logsPath: logs.path },
            })
            return
        }

        job.logsExcerpt = excerpt
    }

    #finish(job: Job, state: 'SUCCESS' | 'FAILED' | 'ABORTED', outcome: unknown): void {

        if (job.finished) {

            return
        }

        if (state === 'SUCCESS') {

            job.markFinished(state, outcome)
        }
        else {

            const error = toError(outcome)
            job.markFinished(state, error)

            if (state === 'FAILED' && !isExpectedError(error)) {

                observer.emit('error', {
                    source: 'job',
                    error,
                    context: { jobId: job.id, method: job.method },
                })
            }
        }

        const started = job.startedAt ?? job.createdAt
        const finished = job.finishedAt ?? new Date()

        observer.emit('job:complete', {
            id: job.id,
            method: job.method,
            state: job.state,
            durationMs: finished.getTime() - started.getTime(),
        })

        if (job.transient) {

            this.#jobs.delete(job.id)
        }
    }

    #releaseLock(job: Job): void {

        if (job.lock === null || this.#holders.get(job.lock) !== job) {

            return
        }

        this.#holders.delete(job.lock)
        this.locks.get(job.lock).release()
    }
}


function resolveLock(lock: JobOptions['lock'], args: unknown[]): string | null {

    if (typeof lock === 'function') {

        return lock(args)
    }

    return lock ?? null
}


function removeFrom(queue: Job[], job: Job): void {

    const idx = queue.indexOf(job)

    if (idx !== -1) {

        queue.splice(idx, 1)
    }
}

