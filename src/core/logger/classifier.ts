/**
 * Event Classifier
 *
 * Maps an observer event name to an entry level:
 * - `error`, `*:error`, `*:failed`, `*-mismatch` -> error
 * - `*:unhealthy`, `*:coalesced`, `*:blocked` -> warn
 * - lifecycle verbs (`*:complete`, `*:registered`, `*:loaded`, ...) -> info
 * - everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/, /[:-]mismatch$/];

const WARN_PATTERNS = [/:unhealthy$/, /:coalesced$/, /:blocked$/];

const INFO_PATTERNS = [
    /:complete$/,
    /:registered$/,
    /:loaded$/,
    /:started$/,
    /:rotated$/,
    /:shutdown$/,
    /-inserted$/,
];

/**
 * @example
 * ```typescript
 * classifyEvent('hook:failed')                 // 'error'
 * classifyEvent('replicated:version-mismatch') // 'error'
 * classifyEvent('job:coalesced')               // 'warn'
 * classifyEvent('job:complete')                // 'info'
 * classifyEvent('job:changed')                 // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((p) => p.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((p) => p.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((p) => p.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Whether an entry of `level` passes the configured verbosity.
 */
export function passes(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Whether an event should be logged at the configured verbosity.
 *
 * @example
 * ```typescript
 * shouldLog('job:complete', 'info')    // true
 * shouldLog('job:changed', 'info')     // false
 * shouldLog('job:changed', 'verbose')  // true
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return passes(classifyEvent(event), configLevel);

}
