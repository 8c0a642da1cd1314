/**
 * Process-wide lock registries.
 *
 * Locks are created on first reference and never evicted, so a long-lived
 * daemon holds one lock per distinct key it has ever seen. `size` and the
 * `lock:created` event make that growth visible.
 *
 * @example
 * ```typescript
 * const locks = getLockRegistry()
 *
 * await locks.withLock('pool:tank', async () => {
 *     await exportPool('tank')
 * })
 *
 * // Worker threads get a buffer slot instead of an object
 * const ref = getThreadLockRegistry().ref('pool:tank')
 * worker.postMessage({ lock: ref })
 * ```
 */
import { observer } from '../observer.js'
import { AsyncMutex } from './mutex.js'
import { BlockingMutex } from './blocking.js'
import type {
    AcquireOptions,
    BlockingLockRef,
    LockHandle,
    LockStats,
} from './types.js'


/**
 * Lock table for callers on the event loop.
 *
 * Get-or-create runs synchronously, so two callers asking for the same key
 * in the same tick always receive the same mutex.
 */
export class AsyncLockRegistry {

    readonly #locks = new Map<string, AsyncMutex>()

    get size(): number {

        return this.#locks.size
    }

    has(key: string): boolean {

        return this.#locks.has(key)
    }

    get(key: string): AsyncMutex {

        let mutex = this.#locks.get(key)

        if (!mutex) {

            mutex = new AsyncMutex()
            this.#locks.set(key, mutex)
            observer.emit('lock:created', { registry: 'async', key, size: this.#locks.size })
        }

        return mutex
    }

    async acquire(key: string, options: AcquireOptions = {}): Promise<LockHandle> {

        const mutex = this.get(key)
        await mutex.acquire(options)

        return releaseOnce(key, () => mutex.release())
    }

    async withLock<T>(key: string, fn: () => Promise<T> | T, options: AcquireOptions = {}): Promise<T> {

        return this.get(key).runExclusive(fn, options)
    }

    stats(): LockStats[] {

        return [...this.#locks].map(([key, mutex]) => ({
            key,
            locked: mutex.locked,
            waiting: mutex.waiting,
            owner: mutex.owner,
        }))
    }
}


/**
 * Lock table for worker threads.
 *
 * Each key owns one Int32 slot. Slots are carved from fixed-size shared
 * segments; a new segment is allocated when the current one fills up.
 * Allocation only ever happens on the main thread, and the main thread
 * never blocks on a slot: it hands refs to workers and inspects them with
 * `get(key).locked` or `tryLock()`.
 */
export class ThreadLockRegistry {

    readonly #slots = new Map<string, BlockingLockRef>()
    readonly #segments: SharedArrayBuffer[] = []
    #used = 0

    constructor(private readonly slotsPerSegment = 256) {}

    get size(): number {

        return this.#slots.size
    }

    has(key: string): boolean {

        return this.#slots.has(key)
    }

    /**
     * Buffer slot backing `key`, for handing to a worker thread.
     */
    ref(key: string): BlockingLockRef {

        const existing = this.#slots.get(key)

        if (existing) {

            return existing
        }

        let buffer = this.#segments[this.#segments.length - 1]

        if (!buffer || this.#used === this.slotsPerSegment) {

            buffer = new SharedArrayBuffer(this.slotsPerSegment * Int32Array.BYTES_PER_ELEMENT)
            this.#segments.push(buffer)
            this.#used = 0
        }

        const ref: BlockingLockRef = { key, buffer, index: this.#used++ }

        this.#slots.set(key, ref)
        observer.emit('lock:created', { registry: 'thread', key, size: this.#slots.size })

        return ref
    }

    get(key: string): BlockingMutex {

        const ref = this.ref(key)

        return new BlockingMutex(ref.buffer, ref.index)
    }

    stats(): LockStats[] {

        return [...this.#slots.values()].map((ref) => ({
            key: ref.key,
            locked: new BlockingMutex(ref.buffer, ref.index).locked,
            waiting: 0,
        }))
    }
}


function releaseOnce(key: string, release: () => void): LockHandle {

    let released = false

    return {
        key,
        release() {

            if (released) {

                return
            }

            released = true
            release()
        },
    }
}


// ─────────────────────────────────────────────────────────────
// Module singletons
// ─────────────────────────────────────────────────────────────

let asyncInstance: AsyncLockRegistry | null = null
let threadInstance: ThreadLockRegistry | null = null


/**
 * Get the global registry used by `lock`-declared loop methods.
 */
export function getLockRegistry(): AsyncLockRegistry {

    if (!asyncInstance) {

        asyncInstance = new AsyncLockRegistry()
    }

    return asyncInstance
}


/**
 * Get the global registry used by `lock`-declared thread methods.
 */
export function getThreadLockRegistry(): ThreadLockRegistry {

    if (!threadInstance) {

        threadInstance = new ThreadLockRegistry()
    }

    return threadInstance
}


/**
 * Reset both registries (for testing).
 */
export function resetLockRegistries(): void {

    asyncInstance = null
    threadInstance = null
}
