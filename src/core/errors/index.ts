/**
 * Error module exports.
 */
export {
    ERRNO,
    ValidationErrors,
    NotFoundError,
    DependencyConflictError,
    UnhealthyBackendError,
    VersionMismatchError,
    CallError,
    PipeNotReadyError,
    JobAbortedError,
    NotAbortableError,
    MethodNotFoundError,
    WorkerError,
    isExpectedError,
    toError,
} from './errors.js'

export type { Errno, ValidationIssue, Dependent } from './errors.js'
