/**
 * Scheduler module exports.
 */
export {
    JobScheduler,
    DEFAULT_SCHEDULER_OPTIONS,
    type SchedulerOptions,
} from './scheduler.js';

export { ThreadPool } from './thread-pool.js';
export { ProcessRunner } from './process-runner.js';

export type { TaskHooks, WorkerTask } from './protocol.js';
