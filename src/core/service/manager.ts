/**
 * Service registry and method dispatch.
 *
 * Methods are addressed as `<namespace>.<method>`. A plain method returns
 * its result; a job method returns the new job's id at once (or the id of
 * an already-waiting job when its lock queue is full).
 *
 * Hooks run in registration order. Sync hooks are awaited and their
 * failures reach the caller; async hooks run detached and report failures
 * through `hook:failed`.
 *
 * @example
 * ```typescript
 * const manager = new ServiceManager({ datastore, scheduler: { logsDir: '/tmp/jobs' } })
 *
 * manager.register(new DiskService(manager))
 * manager.registerHook('disk.post_delete', (rv) => refreshTopology(rv))
 * await manager.start()
 *
 * const disks = await manager.call('disk.query', [[['size', '>', 1024]]])
 * const jobId = await manager.call('pool.scrub', ['tank'])
 * ```
 */
import { attempt } from '@logosdx/utils'

import {
    CallError,
    ERRNO,
    MethodNotFoundError,
    toError,
} from '../errors/index.js'
import type { Datastore } from '../datastore/index.js'
import type { Job, JobTarget, PipeStreams } from '../job/index.js'
import {
    getLockRegistry,
    getThreadLockRegistry,
    type AsyncLockRegistry,
    type ThreadLockRegistry,
} from '../lock/index.js'
import { observer, type ChangeType, type KeelEvents } from '../observer.js'
import { JobScheduler, type SchedulerOptions } from '../scheduler/index.js'
import { CompoundService } from './compound.js'
import { DependencyIndex } from './dependencies.js'
import type { Service } from './service.js'
import type {
    CallContext,
    EventInfo,
    HookFn,
    HookOptions,
    JobDefinition,
    MethodDescriptor,
    MethodInfo,
    MethodDefinition,
    ServiceInfo,
} from './types.js'


export interface ServiceManagerOptions {
    /** Local store behind Config and CRUD services */
    datastore?: Datastore | null

    /** A scheduler to share, or options for a new one */
    scheduler?: JobScheduler | SchedulerOptions
}

export interface ChangePayload {
    id: unknown
    fields?: Record<string, unknown>
    cleared?: boolean
}

export type ServiceEvent = KeelEvents['service:event']


interface HookEntry {
    fn: HookFn
    sync: boolean
}


export class ServiceManager {

    readonly datastore: Datastore | null
    readonly scheduler: JobScheduler
    readonly locks: AsyncLockRegistry = getLockRegistry()
    readonly threadLocks: ThreadLockRegistry = getThreadLockRegistry()
    readonly dependencies = new DependencyIndex()

    readonly #services = new Map<string, Service>()
    readonly #methods = new Map<string, MethodDescriptor>()
    readonly #hooks = new Map<string, HookEntry[]>()
    readonly #events = new Map<string, EventInfo>()
    #started = false

    constructor(options: ServiceManagerOptions = {}) {

        this.datastore = options.datastore ?? null
        this.scheduler = options.scheduler instanceof JobScheduler
            ? options.scheduler
            : new JobScheduler(options.scheduler)
    }

    get started(): boolean {

        return this.#started
    }

    /**
     * Register a service under its namespace.
     *
     * @throws CallError when the namespace is already taken
     */
    register<S extends Service>(service: S): S {

        const namespace = service.namespace

        if (this.#services.has(namespace)) {

            throw new CallError(`Service '${namespace}' is already registered`, ERRNO.EEXIST)
        }

        const methods = service.methods()

        this.#services.set(namespace, service)

        for (const [name, definition] of Object.entries(methods)) {

            this.#methods.set(`${namespace}.${name}`, definition)
        }

        if (service.type === 'crud' && service.descriptor.eventRegister) {

            this.registerEvent(`${namespace}.query`, `Sent on ${namespace} changes.`, {
                private: service.descriptor.private,
            })
        }

        observer.emit('service:registered', {
            namespace,
            type: service.type,
            methods: Object.keys(methods),
        })

        return service
    }

    /**
     * Merge `parts` into one namespace and register it.
     *
     * @throws CallError on conflicting config keys or duplicate method names
     */
    registerCompound(parts: Service[]): CompoundService {

        return this.register(new CompoundService(this, parts))
    }

    /**
     * Call a method. Job methods return the job id.
     *
     * @throws MethodNotFoundError for an unknown name
     * @throws ValidationErrors when the arguments do not validate
     */
    async call(name: string, args: unknown[] = [], ctx: CallContext = {}): Promise<unknown> {

        const definition = this.#resolve(name)

        if (definition.kind === 'job') {

            return this.#submit(name, definition, args, ctx).id
        }

        return this.#invoke(definition, args, ctx)
    }

    /**
     * Call a job method and return the Job itself.
     *
     * @throws CallError when `name` is not a job method
     */
    callJob(name: string, args: unknown[] = [], ctx: CallContext = {}, pipes?: PipeStreams): Job {

        const definition = this.#resolve(name)

        if (definition.kind !== 'job') {

            throw new CallError(`${name} is not a job`, ERRNO.EINVAL)
        }

        return this.#submit(name, definition, args, ctx, pipes)
    }

    hasMethod(name: string): boolean {

        return this.#methods.has(name)
    }

    isJob(name: string): boolean {

        return this.#methods.get(name)?.kind === 'job'
    }

    getService(namespace: string): Service | undefined {

        return this.#services.get(namespace)
    }

    // ─────────────────────────────────────────────────────────────
    // Hooks and events
    // ─────────────────────────────────────────────────────────────

    registerHook(name: string, fn: HookFn, options: HookOptions = {}): () => void {

        const entry: HookEntry = { fn, sync: options.sync ?? true }
        const hooks = this.#hooks.get(name) ?? []

        hooks.push(entry)
        this.#hooks.set(name, hooks)

        return () => {

            const current = this.#hooks.get(name) ?? []
            this.#hooks.set(name, current.filter((h) => h !== entry))
        }
    }

    /**
     * Run every hook registered under `name`.
     */
    async callHook(name: string, ...args: unknown[]): Promise<void> {

        for (const hook of this.#hooks.get(name) ?? []) {

            if (hook.sync) {

                await hook.fn(...args)
                continue
            }

            void attempt(async () => hook.fn(...args)).then(([, err]) => {

                if (err) {

                    observer.emit('hook:failed', { name, error: toError(err) })
                }
            })
        }
    }

    registerEvent(name: string, description: string, options: { private?: boolean } = {}): void {

        this.#events.set(name, { name, description, private: options.private ?? false })
    }

    sendEvent(name: string, type: ChangeType, payload: ChangePayload): void {

        observer.emit('service:event', { name, type, ...payload })
    }

    /**
     * Listen to one service event, e.g. `disk.query`.
     */
    subscribe(name: string, callback: (event: ServiceEvent) => void): () => void {

        return observer.on('service:event', (event) => {

            if (event.name === name) {

                callback(event)
            }
        })
    }

    // ─────────────────────────────────────────────────────────────
    // Introspection
    // ─────────────────────────────────────────────────────────────

    getServices(includePrivate = false): Record<string, ServiceInfo> {

        const services: Record<string, ServiceInfo> = {}

        for (const [namespace, service] of this.#services) {

            const d = service.descriptor

            if (d.private && !includePrivate) {

                continue
            }

            services[namespace] = {
                type: service.type,
                config: {
                    namespace: d.namespace,
                    datastore: d.datastore,
                    datastorePrefix: d.datastorePrefix,
                    primaryKey: d.primaryKey,
                    primaryKeyType: d.primaryKeyType,
                    eventSend: d.eventSend,
                    private: d.private,
                    verboseName: d.verboseName,
                },
            }
        }

        return services
    }

    /**
     * Public methods, optionally limited to one namespace. Methods of
     * private services and private methods are left out.
     */
    getMethods(namespace?: string): Record<string, MethodInfo> {

        const methods: Record<string, MethodInfo> = {}

        for (const [name, definition] of this.#methods) {

            const owner = name.slice(0, name.lastIndexOf('.'))

            if (namespace !== undefined && owner !== namespace) {

                continue
            }

            if (definition.private || this.#services.get(owner)?.descriptor.private) {

                continue
            }

            methods[name] = {
                description: definition.description,
                job: definition.kind === 'job',
                mode: definition.mode,
                lock: definition.kind === 'job'
                    ? typeof definition.options.lock === 'string' ? definition.options.lock : null
                    : definition.lock,
                abortable: definition.kind === 'job' && (definition.options.abortable ?? false),
            }
        }

        return methods
    }

    getEvents(): Record<string, EventInfo> {

        const events: Record<string, EventInfo> = {}

        for (const [name, info] of this.#events) {

            if (!info.private) {

                events[name] = info
            }
        }

        return events
    }

    // ─────────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Run every service's `setup()` and index foreign keys between stores.
     */
    async start(): Promise<void> {

        if (this.#started) {

            return
        }

        for (const service of this.#services.values()) {

            await service.setup()
        }

        if (this.datastore) {

            await this.dependencies.build(this.datastore, this.#services.values())
        }

        this.#started = true
    }

    async close(): Promise<void> {

        await this.scheduler.close()
        this.#started = false
    }

    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    #resolve(name: string): MethodDescriptor {

        const definition = this.#methods.get(name)

        if (!definition) {

            throw new MethodNotFoundError(name)
        }

        return definition
    }

    #submit(name: string, definition: JobDefinition, raw: unknown[], ctx: CallContext, pipes?: PipeStreams): Job {

        const prepared = definition.prepare(raw, ctx)
        const target: JobTarget = prepared.run
            ? { mode: 'loop', run: prepared.run }
            : moduleTarget(name, definition)

        return this.scheduler.submit({
            method: name,
            args: prepared.args,
            target,
            options: definition.options,
            pipes,
        })
    }

    async #invoke(definition: MethodDefinition, raw: unknown[], ctx: CallContext): Promise<unknown> {

        const prepared = definition.prepare(raw, ctx)
        const lock = definition.lock

        const execute = async (): Promise<unknown> => {

            if (prepared.run) {

                return prepared.run()
            }

            if (!definition.module) {

                throw new CallError('Method has neither a body nor a module', ERRNO.EFAULT)
            }

            const task = {
                jobId: null,
                module: definition.module.module,
                export: definition.module.export,
                args: prepared.args,
                lock: null,
            }

            // Thread bodies take the lock inside the worker
            if (definition.mode === 'thread') {

                return this.scheduler.threadPool.run({
                    ...task,
                    lock: lock === null ? null : this.threadLocks.ref(lock),
                })
            }

            return this.scheduler.processRunner.run(task)
        }

        const serialized = lock === null || definition.mode === 'thread'
            ? execute
            : () => this.locks.withLock(lock, execute)

        return definition.throttle
            ? definition.throttle.run(prepared.args, serialized)
            : serialized()
    }
}


function moduleTarget(name: string, definition: JobDefinition): JobTarget {

    if (!definition.module || definition.mode === 'loop') {

        throw new CallError(`${name}: job has neither a body nor a module`, ERRNO.EFAULT)
    }

    return { mode: definition.mode, ...definition.module }
}
