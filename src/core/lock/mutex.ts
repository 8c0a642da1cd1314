/**
 * Cooperative mutex for code running on the event loop.
 *
 * Waiters are served strictly in arrival order: `release()` hands the lock
 * to the head of the queue without ever marking it free, so a caller that
 * arrives between release and wake-up cannot jump the queue.
 */
import type { AcquireOptions } from './types.js'


interface Waiter {
    owner: unknown
    resolve: () => void
    reject: (err: Error) => void
    detach: () => void
}


export class AsyncMutex {

    #locked = false
    #owner: unknown = undefined
    #waiters: Waiter[] = []

    get locked(): boolean {

        return this.#locked
    }

    get owner(): unknown {

        return this.#owner
    }

    get waiting(): number {

        return this.#waiters.length
    }

    /**
     * Claim the lock synchronously if nobody holds it.
     */
    tryAcquire(owner?: unknown): boolean {

        if (this.#locked) {

            return false
        }

        this.#locked = true
        this.#owner = owner

        return true
    }

    /**
     * Wait for the lock. Resolves once the caller holds it.
     *
     * @throws the signal's reason when aborted while still waiting
     */
    acquire(options: AcquireOptions = {}): Promise<void> {

        const { signal, owner } = options

        if (signal?.aborted) {

            return Promise.reject(abortReason(signal))
        }

        if (this.tryAcquire(owner)) {

            return Promise.resolve()
        }

        return new Promise<void>((resolve, reject) => {

            const waiter: Waiter = {
                owner,
                resolve,
                reject,
                detach: () => undefined,
            }

            if (signal) {

                const onAbort = () => {

                    const idx = this.#waiters.indexOf(waiter)

                    if (idx !== -1) {

                        this.#waiters.splice(idx, 1)
                        reject(abortReason(signal))
                    }
                }

                signal.addEventListener('abort', onAbort, { once: true })
                waiter.detach = () => signal.removeEventListener('abort', onAbort)
            }

            this.#waiters.push(waiter)
        })
    }

    /**
     * Release the lock, handing it to the next waiter if there is one.
     */
    release(): void {

        const next = this.#waiters.shift()

        if (!next) {

            this.#locked = false
            this.#owner = undefined
            return
        }

        next.detach()
        this.#owner = next.owner
        next.resolve()
    }

    /**
     * Run `fn` while holding the lock.
     */
    async runExclusive<T>(fn: () => Promise<T> | T, options: AcquireOptions = {}): Promise<T> {

        await this.acquire(options)

        try {

            return await fn()
        }
        finally {

            this.release()
        }
    }
}


function abortReason(signal: AbortSignal): Error {

    const reason: unknown = signal.reason

    return reason instanceof Error ? reason : new Error('Lock wait aborted')
}
