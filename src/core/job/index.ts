/**
 * Job module exports.
 */
export type {
    ExceptionInfo,
    ExecutionMode,
    JobOptions,
    JobProgress,
    JobRequest,
    JobSnapshot,
    JobState,
    JobTarget,
    LoopJobBody,
    ModuleBody,
    PipeName,
    PipeStreams,
} from './types.js';

export { TERMINAL_STATES } from './types.js';

export { Job, type JobInit } from './job.js';
export { JobPipes } from './pipes.js';
export { JobLogs } from './logs.js';
