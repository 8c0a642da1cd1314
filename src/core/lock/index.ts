/**
 * Lock module exports.
 *
 * In-process mutual exclusion keyed by string, in two independent domains:
 * event-loop callers and worker threads.
 *
 * @example
 * ```typescript
 * import { getLockRegistry } from './lock/index.js'
 *
 * const handle = await getLockRegistry().acquire('disk:sda', { owner: job.id })
 * try {
 *     await wipe()
 * }
 * finally {
 *     handle.release()
 * }
 * ```
 */

// Types
export type {
    AcquireOptions,
    BlockingLockRef,
    LockHandle,
    LockStats,
} from './types.js';

// Primitives
export { AsyncMutex } from './mutex.js';
export { BlockingMutex } from './blocking.js';

// Registries
export {
    AsyncLockRegistry,
    ThreadLockRegistry,
    getLockRegistry,
    getThreadLockRegistry,
    resetLockRegistries,
} from './registry.js';
