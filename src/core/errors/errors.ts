/**
 * Error taxonomy shared by services, jobs and stores.
 *
 * Expected errors (validation, not-found, dependency, backend health,
 * version) are surfaced to callers verbatim and fail a job without being
 * reported as process faults. Everything else is unexpected and is logged
 * with its stack through the observer `error` event.
 */
import type { ZodIssue } from 'zod'

import type { VersionStamp } from '../replicated/types.js'


/**
 * errno values attached to operator-facing errors.
 */
export const ERRNO = {
    ENOENT: 2,
    EFAULT: 14,
    EBUSY: 16,
    EEXIST: 17,
    EINVAL: 22,
    ENOTSUP: 95,
    ETIMEDOUT: 110,
} as const

export type Errno = typeof ERRNO[keyof typeof ERRNO]


/**
 * A single validation failure at a dotted attribute path.
 */
export interface ValidationIssue {
    attribute: string
    message: string
    errno: Errno
}


/**
 * Batched validation failures.
 *
 * Collect every problem with a payload, then `check()` once before any
 * mutation so the call is all-or-nothing.
 *
 * @example
 * ```typescript
 * const verrors = new ValidationErrors()
 * if (!data.name) verrors.add('disk_create.name', 'Name is required')
 * await crud.ensureUnique(verrors, 'disk_create', 'name', data.name)
 * verrors.check()
 * ```
 */
export class ValidationErrors extends Error {

    override readonly name = 'ValidationErrors' as const

    readonly errors: ValidationIssue[] = []

    constructor(issues: ValidationIssue[] = []) {

        super('')
        this.errors.push(...issues)
        this.message = this.#render()
    }

    /**
     * Build from zod issues, prefixing every path with `schemaName`.
     */
    static fromZod(schemaName: string, issues: ZodIssue[]): ValidationErrors {

        const verrors = new ValidationErrors()

        for (const issue of issues) {

            const path = [schemaName, ...issue.path.map(String)].join('.')
            verrors.add(path, issue.message)
        }

        return verrors
    }

    get length(): number {

        return this.errors.length
    }

    add(attribute: string, message: string, errno: Errno = ERRNO.EINVAL): this {

        this.errors.push({ attribute, message, errno })
        this.message = this.#render()

        return this
    }

    extend(other: ValidationErrors): this {

        for (const issue of other.errors) {

            this.add(issue.attribute, issue.message, issue.errno)
        }

        return this
    }

    /**
     * Throw this collection when it holds at least one issue.
     */
    check(): void {

        if (this.errors.length) {

            throw this
        }
    }

    #render(): string {

        return this.errors
            .map((e) => `[${e.errno}] ${e.attribute}: ${e.message}`)
            .join('\n')
    }
}


/**
 * Keyed lookup found nothing.
 *
 * @example
 * ```typescript
 * const [disk, err] = await attempt(() => disks.getInstance(7))
 * if (err instanceof NotFoundError) return null
 * ```
 */
export class NotFoundError extends Error {

    override readonly name = 'NotFoundError' as const
    readonly errno = ERRNO.ENOENT

    constructor(
        public readonly entity: string,
        public readonly id?: unknown,
        message?: string,
    ) {

        super(message ?? (id === undefined
            ? `${entity} does not exist`
            : `${entity} ${String(id)} does not exist`))
    }
}


/**
 * A store that still references an entry being deleted.
 *
 * Config stores report the referencing `key`; CRUD stores report the
 * referencing `objects`.
 */
export interface Dependent {
    /** Owning service, or null for a table no service registered */
    service: string | null
    datastore: string
    key?: string
    objects?: Record<string, unknown>[]
}


/**
 * Delete refused because other stores reference the entry.
 */
export class DependencyConflictError extends Error {

    override readonly name = 'DependencyConflictError' as const
    readonly errno = ERRNO.EBUSY

    constructor(public readonly dependencies: Dependent[]) {

        const lines = dependencies.map((dep, i) => dep.service === null
            ? `${i + 1}) '${dep.datastore}' Datastore\n`
            : `${i + 1}) '${dep.service}' Service\n`)

        super(`This object is being used by following service(s):\n${lines.join('')}`)
    }
}


/**
 * Write attempted while the clustered backend reports unhealthy.
 */
export class UnhealthyBackendError extends Error {

    override readonly name = 'UnhealthyBackendError' as const
    readonly errno = ERRNO.EBUSY

    constructor(
        public readonly namespace: string,
        public readonly reason?: string,
    ) {

        super(`Clustered store for '${namespace}' is unhealthy${reason ? `: ${reason}` : ''}`)
    }
}


/**
 * Stored payload was written by an incompatible version.
 */
export class VersionMismatchError extends Error {

    override readonly name = 'VersionMismatchError' as const
    readonly errno = ERRNO.EINVAL

    constructor(
        public readonly namespace: string,
        public readonly local: VersionStamp,
        public readonly stored: VersionStamp | null,
    ) {

        const storedText = stored ? `${stored.major}.${stored.minor}` : 'unknown'

        super(
            `Version mismatch for '${namespace}': local ${local.major}.${local.minor}, stored ${storedText}`
        )
    }
}


/**
 * Generic operator-facing failure carrying an errno.
 *
 * @example
 * ```typescript
 * throw new CallError('Pool is exporting', ERRNO.EBUSY, { pool: 'tank' })
 * ```
 */
export class CallError extends Error {

    override readonly name = 'CallError' as const

    constructor(
        message: string,
        public readonly errno: Errno = ERRNO.EFAULT,
        public readonly extra?: Record<string, unknown>,
    ) {

        super(message)
    }
}


/**
 * A job declared pipes the caller never connected.
 */
export class PipeNotReadyError extends Error {

    override readonly name = 'PipeNotReadyError' as const

    constructor(
        public readonly jobId: number,
        public readonly pipe: 'input' | 'output',
    ) {

        super(`Pipe '${pipe}' is not connected for job ${jobId}`)
    }
}


/**
 * Raised inside a job body at the first suspension point after abort.
 */
export class JobAbortedError extends Error {

    override readonly name = 'JobAbortedError' as const

    constructor(public readonly jobId: number) {

        super(`Job ${jobId} was aborted`)
    }
}


export class NotAbortableError extends Error {

    override readonly name = 'NotAbortableError' as const
    readonly errno = ERRNO.ENOTSUP

    constructor(
        public readonly jobId: number,
        public readonly method: string,
    ) {

        super(`Job ${jobId} (${method}) is not abortable`)
    }
}


export class MethodNotFoundError extends Error {

    override readonly name = 'MethodNotFoundError' as const
    readonly errno = ERRNO.ENOENT

    constructor(public readonly method: string) {

        super(`Method '${method}' not found`)
    }
}


/**
 * Error raised by a thread or process job body, re-raised on the loop.
 */
export class WorkerError extends Error {

    override readonly name = 'WorkerError' as const

    constructor(
        message: string,
        public readonly remoteName: string,
        public readonly remoteStack?: string,
    ) {

        super(message)
    }
}


const EXPECTED_NAMES: ReadonlySet<string> = new Set([
    'ValidationErrors',
    'NotFoundError',
    'DependencyConflictError',
    'UnhealthyBackendError',
    'VersionMismatchError',
    'CallError',
    'PipeNotReadyError',
    'JobAbortedError',
    'NotAbortableError',
    'MethodNotFoundError',
])


/**
 * True for errors that describe a problem with the request rather than
 * with the daemon. Errors relayed from a worker are judged by their remote
 * name.
 */
export function isExpectedError(err: unknown): boolean {

    if (err instanceof WorkerError) {

        return EXPECTED_NAMES.has(err.remoteName)
    }

    return err instanceof ValidationErrors
        || err instanceof NotFoundError
        || err instanceof DependencyConflictError
        || err instanceof UnhealthyBackendError
        || err instanceof VersionMismatchError
        || err instanceof CallError
        || err instanceof PipeNotReadyError
        || err instanceof JobAbortedError
        || err instanceof NotAbortableError
        || err instanceof MethodNotFoundError
}


/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {

    return value instanceof Error ? value : new Error(String(value))
}
