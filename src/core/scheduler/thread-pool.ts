/**
 * Bounded pool of worker threads for blocking job and method bodies.
 *
 * Workers start lazily up to `size` and are reused. A task that is
 * disowned (its job aborted) keeps its worker busy until the body returns;
 * threads are never interrupted mid-task. A worker that crashes fails its
 * task and is replaced on the next dispatch.
 *
 * @example
 * ```typescript
 * const pool = new ThreadPool(4)
 * const digest = await pool.run({
 *     jobId: null,
 *     module: '/usr/lib/keel/bodies/checksum.mjs',
 *     args: ['/mnt/tank/file'],
 *     lock: null,
 * })
 * await pool.close()
 * ```
 */
import { Worker } from 'node:worker_threads'

import { CallError, WorkerError, toError } from '../errors/index.js'
import { THREAD_BOOTSTRAP } from './worker-code.js'
import {
    WorkerMessageSchema,
    type RunMessage,
    type TaskHooks,
    type WorkerMessage,
    type WorkerTask,
} from './protocol.js'


interface PendingTask {
    message: RunMessage
    hooks: TaskHooks
    resolve: (value: unknown) => void
    reject: (err: Error) => void
}


export class ThreadPool {

    readonly #idle: Worker[] = []
    readonly #busy = new Map<Worker, PendingTask>()
    readonly #queue: PendingTask[] = []
    #workers = 0
    #nextTaskId = 1
    #closed = false

    constructor(public readonly size: number) {

        if (size < 1) {

            throw new RangeError(`Thread pool size must be at least 1, got ${size}`)
        }
    }

    /** Tasks currently executing */
    get active(): number {

        return this.#busy.size
    }

    /** Tasks waiting for a free worker */
    get queued(): number {

        return this.#queue.length
    }

    run(task: WorkerTask, hooks: TaskHooks = {}): Promise<unknown> {

        if (this.#closed) {

            return Promise.reject(new CallError('Thread pool is closed'))
        }

        return new Promise<unknown>((resolve, reject) => {

            this.#queue.push({
                message: { type: 'run', taskId: this.#nextTaskId++, ...task },
                hooks,
                resolve,
                reject,
            })

            this.#dispatch()
        })
    }

    /**
     * Terminate every worker. Running and queued tasks are rejected.
     */
    async close(): Promise<void> {

        this.#closed = true

        for (const pending of this.#queue.splice(0)) {

            pending.reject(new CallError('Thread pool is closed'))
        }

        const workers = [...this.#idle.splice(0), ...this.#busy.keys()]

        for (const pending of this.#busy.values()) {

            pending.reject(new CallError('Thread pool is closed'))
        }

        this.#busy.clear()
        this.#workers = 0

        await Promise.all(workers.map((w) => w.terminate()))
    }


    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    #dispatch(): void {

        while (this.#queue.length) {

            const worker = this.#idle.pop() ?? this.#spawn()

            if (!worker) {

                return
            }

            const pending = this.#queue.shift()

            if (!pending) {

                this.#idle.push(worker)
                return
            }

            this.#busy.set(worker, pending)
            worker.postMessage(pending.message)
        }
    }

    #spawn(): Worker | null {

        if (this.#workers >= this.size) {

            return null
        }

        const worker = new Worker(THREAD_BOOTSTRAP, { eval: true })
        this.#workers++

        worker.on('message', (raw: unknown) => this.#onMessage(worker, raw))
        worker.on('error', (err) => this.#onCrash(worker, err))
        worker.on('exit', (code) => this.#onCrash(worker, new Error(`Worker exited with code ${code}`)))

        return worker
    }

    #onMessage(worker: Worker, raw: unknown): void {

        const pending = this.#busy.get(worker)
        const parsed = WorkerMessageSchema.safeParse(raw)

        if (!pending || !parsed.success || parsed.data.taskId !== pending.message.taskId) {

            return
        }

        if (settle(pending, parsed.data)) {

            this.#busy.delete(worker)
            this.#idle.push(worker)
            this.#dispatch()
        }
    }

    #onCrash(worker: Worker, err: unknown): void {

        const pending = this.#busy.get(worker)
        const idleIdx = this.#idle.indexOf(worker)

        if (!pending && idleIdx === -1) {

            // Already removed by close() or an earlier error event
            return
        }

        this.#busy.delete(worker)

        if (idleIdx !== -1) {

            this.#idle.splice(idleIdx, 1)
        }

        this.#workers--

        if (pending) {

            const error = toError(err)
            pending.reject(new WorkerError(error.message, error.name, error.stack))
        }

        if (!this.#closed) {

            this.#dispatch()
        }
    }
}


/**
 * Apply one worker message to its task. True once the task has settled.
 */
export function settle(pending: Pick<PendingTask, 'hooks' | 'resolve' | 'reject'>, msg: WorkerMessage): boolean {

    switch (msg.type) {

    case 'progress':
        pending.hooks.onProgress?.(msg.percent, msg.description, msg.extra)
        return false

    case 'log':
        pending.hooks.onLog?.(msg.text)
        return false

    case 'result':
        pending.resolve(msg.value)
        return true

    case 'error':
        pending.reject(new WorkerError(msg.message, msg.name, msg.stack ?? undefined))
        return true
    }
}
