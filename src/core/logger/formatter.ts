/**
 * Log Formatter
 *
 * Turns observer events into log entries and entries into lines.
 */
import { isRecord } from '../filter/index.js'
import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


type Payload = Record<string, unknown>


/**
 * Read a (possibly nested) field as display text.
 */
function text(data: Payload, ...path: string[]): string {

    let value: unknown = data

    for (const key of path) {

        value = isRecord(value) ? value[key] : undefined
    }

    if (value instanceof Error) {

        return value.message
    }

    return String(value)
}


const MESSAGE_TEMPLATES: Record<string, (data: Payload) => string> = {

    // Jobs
    'job:added': (d) => `Job ${text(d, 'job', 'id')} (${text(d, 'job', 'method')}) added`,
    'job:changed': (d) => `Job ${text(d, 'job', 'id')} (${text(d, 'job', 'method')}) ${text(d, 'job', 'state')}`,
    'job:complete': (d) => `Job ${text(d, 'id')} (${text(d, 'method')}) ${text(d, 'state')} in ${text(d, 'durationMs')}ms`,
    'job:coalesced': (d) => `${text(d, 'method')} coalesced onto job ${text(d, 'jobId')} waiting on ${text(d, 'lock')}`,

    // Locks
    'lock:created': (d) => `Created ${text(d, 'registry')} lock ${text(d, 'key')} (${text(d, 'size')} total)`,

    // Services
    'service:registered': (d) => `Registered ${text(d, 'type')} service ${text(d, 'namespace')}`,
    'service:event': (d) => `${text(d, 'name')} ${text(d, 'type')} ${text(d, 'id')}`,
    'hook:failed': (d) => `Hook ${text(d, 'name')} failed: ${text(d, 'error')}`,

    // Replicated stores
    'replicated:unhealthy': (d) => `${text(d, 'namespace')}: ${text(d, 'probe')} probe unhealthy (${text(d, 'reason')})`,
    'replicated:version-mismatch': (d) => `${text(d, 'namespace')}: stored version ${text(d, 'stored')} does not match ${text(d, 'local')}, using defaults`,
    'replicated:defaults-inserted': (d) => `${text(d, 'namespace')}: inserted ${text(d, 'count')} default entries`,

    // Settings / lifecycle
    'settings:loaded': (d) => `Settings loaded from ${text(d, 'path')}${d['fromFile'] ? '' : ' (defaults)'}`,
    'logger:started': (d) => `Logger started: ${text(d, 'file')} at ${text(d, 'level')} level`,
    'logger:rotated': (d) => `Rotated log: ${text(d, 'oldFile')} -> ${text(d, 'newFile')}`,
    'app:shutdown': (d) => `Shutting down: ${text(d, 'reason')}`,

    'error': (d) => `Error in ${text(d, 'source')}: ${text(d, 'error')}`,
}


/**
 * Human-readable summary of an event. Unknown events list up to three
 * payload fields.
 *
 * @example
 * ```typescript
 * generateMessage('hook:failed', { name: 'smb.post_update', error: new Error('boom') })
 * // 'Hook smb.post_update failed: boom'
 *
 * generateMessage('disk:attached', { name: 'sda' })
 * // 'disk attached: name="sda"'
 * ```
 */
export function generateMessage(event: string, data: Payload): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    const label = event.replace(/:/g, ' ')
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    return parts.length ? `${label}: ${parts.join(', ')}` : label
}


function summarizeValue(value: unknown): string {

    if (typeof value === 'string') {

        return value.length > 50 ? `"${value.slice(0, 47)}..."` : `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (isRecord(value)) {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Make a payload JSON-safe: errors keep name, message and the top of
 * the stack; dates become ISO strings; anything unserializable becomes
 * its string form.
 */
export function sanitizeData(data: Payload): Payload {

    const result: Payload = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 4).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * @example
 * ```typescript
 * formatEntry('job:complete', { id: 3, method: 'pool.scrub', state: 'SUCCESS', durationMs: 40 })
 * // { timestamp, level: 'info', event: 'job:complete',
 * //   message: 'Job 3 (pool.scrub) SUCCESS in 40ms' }
 * ```
 */
export function formatEntry(
    event: string,
    data: Payload,
    context?: Payload,
    includeData = false,
    level: EntryLevel = classifyEvent(event),
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}


/**
 * Compact single-line form for console output.
 *
 * `[2026-01-15T10:30:00.000Z] [INFO ] [job:complete] Job 3 ...`
 */
export function formatLine(entry: LogEntry): string {

    let line = `[${entry.timestamp}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.event}] ${entry.message}`

    if (entry.data) {

        line += ` ${JSON.stringify(entry.data)}`
    }

    return line + '\n'
}
