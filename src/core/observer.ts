/**
 * Central event system for keel.
 *
 * Core modules emit events; the logger, the transport layer and tests
 * subscribe. Service change notifications (`<namespace>.query` ADDED /
 * CHANGED / REMOVED) and job lifecycle notifications both travel here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('job:complete', { id, method, state, durationMs })
 *
 * // In the transport layer - subscribe to events
 * const cleanup = observer.on('service:event', (data) => forward(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^job:/, ({ event, data }) => logJobEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'
import type { JobSnapshot, JobState } from './job/types.js'
import type { Settings } from './settings/types.js'
import type { ServiceType } from './service/types.js'


/**
 * Kind of a collection change notification.
 */
export type ChangeType = 'ADDED' | 'CHANGED' | 'REMOVED'


/**
 * All events emitted by keel core modules.
 *
 * Events are namespaced by module:
 * - `job:*` - Job lifecycle and progress
 * - `lock:*` - Lock registry growth
 * - `service:*` - Service registration and collection change notifications
 * - `hook:*` - Notification hook failures
 * - `replicated:*` - Clustered backend health and version reconciliation
 * - `settings:*` - Settings load
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all for unexpected errors
 */
export interface KeelEvents {

    // Jobs
    'job:added': { job: JobSnapshot }
    'job:changed': { job: JobSnapshot }
    'job:complete': { id: number; method: string; state: JobState; durationMs: number }
    'job:coalesced': { lock: string; method: string; jobId: number }

    // Locks
    'lock:created': { registry: 'async' | 'thread'; key: string; size: number }

    // Services
    'service:registered': { namespace: string; type: ServiceType; methods: string[] }
    'service:event': { name: string; type: ChangeType; id: unknown; fields?: Record<string, unknown>; cleared?: boolean }

    // Hooks
    'hook:failed': { name: string; error: Error }

    // Replicated stores
    'replicated:unhealthy': { namespace: string; probe: 'cluster' | 'local'; reason: string }
    'replicated:version-mismatch': { namespace: string; local: string; stored: string }
    'replicated:defaults-inserted': { namespace: string; count: number }

    // Settings
    'settings:loaded': { path: string; settings: Settings; fromFile: boolean }

    // Logger
    'logger:started': { file: string; level: string }
    'logger:rotated': { oldFile: string; newFile: string }

    // App lifecycle
    'app:shutdown': { reason: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type KeelEventNames = Events<KeelEvents>;
export type KeelEventCallback<E extends KeelEventNames> = ObserverEngine.EventCallback<KeelEvents[E]>

/**
 * Global observer instance for keel.
 *
 * Enable debug mode with `KEEL_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<KeelEvents>({
    name: 'keel',
    spy: isDebug()
        ? (action) => console.error(`[keel:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
