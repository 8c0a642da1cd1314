/**
 * Service and method descriptors.
 *
 * Everything a service exposes is declared up front: a frozen descriptor
 * for the service itself and one method or job descriptor per callable.
 */
import type { Entry } from '../filter/index.js'
import type { Job, JobOptions, ExecutionMode } from '../job/index.js'
import type { Throttle } from './throttle.js'


export type ServiceType = 'service' | 'config' | 'crud' | 'compound';

/**
 * Context handed to every method. Transport layers put their session
 * object under `app`.
 */
export interface CallContext {
    app?: unknown;

    /** The running job, for calls made from inside a job body */
    job?: Job;
}

/**
 * Per-store transform applied to every raw record before callers see it.
 */
export type ExtendFn = (entry: Entry, context: unknown) => Entry | Promise<Entry>;

/**
 * Built once per query; its result is passed to every `ExtendFn` call.
 */
export type ExtendContextFn = (rows: Entry[], extra: Record<string, unknown>) => unknown;

export interface ServiceConfig {
    namespace: string;

    /** Backing table. Null for services without local storage. */
    datastore?: string | null;

    /** Column prefix of the backing table */
    datastorePrefix?: string;

    datastoreExtend?: ExtendFn | null;
    datastoreExtendContext?: ExtendContextFn | null;

    /** Default `id` */
    primaryKey?: string;

    /** Default `integer` */
    primaryKeyType?: 'integer' | 'string';

    /** Register `<namespace>.query` as an event */
    eventRegister?: boolean;

    /** Send ADDED/CHANGED/REMOVED after mutations */
    eventSend?: boolean;

    /** Hidden from `core.get_services` and `core.get_methods` */
    private?: boolean;

    /** Human name used in not-found messages */
    verboseName?: string;

    /** Refuse deletes while other stores reference the entry */
    checkDependencies?: boolean;
}

export interface ServiceDescriptor {
    readonly namespace: string;
    readonly datastore: string | null;
    readonly datastorePrefix: string;
    readonly datastoreExtend: ExtendFn | null;
    readonly datastoreExtendContext: ExtendContextFn | null;
    readonly primaryKey: string;
    readonly primaryKeyType: 'integer' | 'string';
    readonly eventRegister: boolean;
    readonly eventSend: boolean;
    readonly private: boolean;
    readonly verboseName: string;
    readonly checkDependencies: boolean;
}

export interface MethodOptions {
    private?: boolean;

    /** Serialize every call of this method under the lock name */
    lock?: string;

    throttle?: Throttle;

    description?: string;
}

/**
 * Arguments after validation, with the body bound to them. `run` is null
 * for module bodies, which receive `args` in the worker instead.
 */
export interface PreparedCall<F> {
    args: unknown[];
    run: F | null;
}

export interface ModuleRef {
    module: string;
    export?: string;
}

/**
 * A plain method.
 */
export interface MethodDefinition {
    readonly kind: 'method';
    readonly mode: ExecutionMode;
    readonly private: boolean;
    readonly lock: string | null;
    readonly throttle: Throttle | null;
    readonly description: string | null;
    readonly module: ModuleRef | null;

    /**
     * @throws ValidationErrors when the arguments do not match `accepts`
     */
    prepare(raw: unknown[], ctx: CallContext): PreparedCall<() => unknown>;
}

export interface JobMethodOptions extends JobOptions {
    private?: boolean;
}

/**
 * A job-backed method. Calls return a job id at once.
 */
export interface JobDefinition {
    readonly kind: 'job';
    readonly mode: ExecutionMode;
    readonly private: boolean;
    readonly options: JobOptions;
    readonly description: string | null;
    readonly module: ModuleRef | null;

    /**
     * @throws ValidationErrors when the arguments do not match `accepts`
     */
    prepare(raw: unknown[], ctx: CallContext): PreparedCall<(job: Job) => unknown>;
}

export type MethodDescriptor = MethodDefinition | JobDefinition;

export type MethodTable = Record<string, MethodDescriptor>;

/**
 * Hook callback. Sync hooks run in-line and their errors reach the caller;
 * others run detached.
 */
export type HookFn = (...args: unknown[]) => unknown;

export interface HookOptions {
    /** Await the hook and propagate its failure. Default true. */
    sync?: boolean;
}

export interface EventInfo {
    name: string;
    description: string;
    private: boolean;
}

/**
 * Summary returned by `core.get_services`.
 */
export interface ServiceInfo {
    type: ServiceType;
    config: {
        namespace: string;
        datastore: string | null;
        datastorePrefix: string;
        primaryKey: string;
        primaryKeyType: 'integer' | 'string';
        eventSend: boolean;
        private: boolean;
        verboseName: string;
    };
}

/**
 * Summary returned by `core.get_methods`.
 */
export interface MethodInfo {
    description: string | null;
    job: boolean;
    mode: ExecutionMode;
    lock: string | null;
    abortable: boolean;
}
