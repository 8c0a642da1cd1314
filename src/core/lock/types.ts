/**
 * Lock registry types.
 *
 * Two registries share one string key space: the async registry suspends
 * loop callers, the thread registry blocks worker threads. A loop caller
 * and a thread caller holding the same key do not exclude each other.
 */

/**
 * Scoped ownership of a lock. Calling `release()` more than once is a no-op.
 *
 * @example
 * ```typescript
 * const handle = await getLockRegistry().acquire('disk:sda')
 * try {
 *     await wipe('sda')
 * }
 * finally {
 *     handle.release()
 * }
 * ```
 */
export interface LockHandle {
    /** Registry key this handle holds */
    readonly key: string;

    release(): void;
}

/**
 * Options for acquiring an async lock.
 */
export interface AcquireOptions {
    /** Rejects the wait (not an existing hold) when aborted */
    signal?: AbortSignal;

    /** Tag recorded as the current holder, usually a job id */
    owner?: unknown;
}

/**
 * Point-in-time view of one lock.
 */
export interface LockStats {
    key: string;
    locked: boolean;
    waiting: number;
    owner?: unknown;
}

/**
 * Where a worker thread finds a blocking lock: a slot in a shared buffer.
 */
export interface BlockingLockRef {
    key: string;
    buffer: SharedArrayBuffer;
    index: number;
}
