/**
 * Runs job bodies in isolated child processes.
 *
 * One process per task, at most `size` at a time; further tasks wait in
 * FIFO order. A body that crashes its process fails only its own task.
 */
import { spawn, type ChildProcess } from 'node:child_process'

import { CallError, WorkerError } from '../errors/index.js'
import { PROCESS_BOOTSTRAP } from './worker-code.js'
import { settle } from './thread-pool.js'
import {
    WorkerMessageSchema,
    type RunMessage,
    type TaskHooks,
    type WorkerTask,
} from './protocol.js'


export class ProcessRunner {

    readonly #children = new Set<ChildProcess>()
    readonly #waiting: Array<() => void> = []
    #active = 0
    #nextTaskId = 1
    #closed = false

    constructor(public readonly size: number) {

        if (size < 1) {

            throw new RangeError(`Process pool size must be at least 1, got ${size}`)
        }
    }

    get active(): number {

        return this.#active
    }

    get queued(): number {

        return this.#waiting.length
    }

    async run(task: WorkerTask, hooks: TaskHooks = {}): Promise<unknown> {

        if (task.lock) {

            throw new CallError('Blocking locks cannot be shared with a child process')
        }

        await this.#slot()

        try {

            return await this.#spawn({ type: 'run', taskId: this.#nextTaskId++, ...task }, hooks)
        }
        finally {

            this.#active--
            this.#waiting.shift()?.()
        }
    }

    /**
     * Kill every child process and reject tasks still waiting for a slot.
     */
    async close(): Promise<void> {

        this.#closed = true

        const exits = [...this.#children].map((child) => new Promise<void>((resolve) => {

            if (child.exitCode !== null || child.signalCode !== null) {

                resolve()
                return
            }

            child.once('exit', () => resolve())
            child.kill('SIGKILL')
        }))

        // Waiters wake up, see #closed, and reject
        for (const wake of this.#waiting.splice(0)) {

            wake()
        }

        await Promise.all(exits)
    }


    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    async #slot(): Promise<void> {

        if (this.#closed) {

            throw new CallError('Process runner is closed')
        }

        if (this.#active >= this.size) {

            await new Promise<void>((resolve) => this.#waiting.push(resolve))

            if (this.#closed) {

                throw new CallError('Process runner is closed')
            }
        }

        this.#active++
    }

    #spawn(message: RunMessage, hooks: TaskHooks): Promise<unknown> {

        return new Promise<unknown>((resolve, reject) => {

            let settled = false

            const child = spawn(process.execPath, ['-e', PROCESS_BOOTSTRAP], {
                stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
                serialization: 'advanced',
            })

            this.#children.add(child)

            const pending = {
                hooks,
                resolve: (value: unknown) => {

                    settled = true
                    resolve(value)
                },
                reject: (err: Error) => {

                    settled = true
                    reject(err)
                },
            }

            child.on('message', (raw: unknown) => {

                const parsed = WorkerMessageSchema.safeParse(raw)

                if (parsed.success && parsed.data.taskId === message.taskId && !settled) {

                    settle(pending, parsed.data)
                }
            })

            child.once('error', (err) => {

                if (!settled) {

                    pending.reject(new WorkerError(err.message, err.name, err.stack))
                }
            })

            child.once('exit', (code, signal) => {

                this.#children.delete(child)

                if (!settled) {

                    const reason = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`
                    pending.reject(new WorkerError(`Job process exited with ${reason}`, 'ProcessExit'))
                }
            })

            child.send(message)
        })
    }
}
