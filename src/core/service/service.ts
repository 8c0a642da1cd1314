/**
 * Base service.
 *
 * A service owns one namespace and exposes the methods returned by
 * `methods()`. The descriptor is built once in the constructor and frozen.
 *
 * @example
 * ```typescript
 * class PoolService extends Service {
 *
 *     constructor(manager: ServiceManager) {
 *         super(manager, { namespace: 'pool' })
 *     }
 *
 *     override methods(): MethodTable {
 *         return {
 *             scrub: defineJob(z.tuple([z.string()]), (job, pool) => this.scrub(job, pool), {
 *                 lock: ([pool]) => `pool:${String(pool)}`,
 *                 abortable: true,
 *             }),
 *         }
 *     }
 * }
 * ```
 */
import { CallError, ERRNO } from '../errors/index.js'
import type { Datastore, DatastoreOptions } from '../datastore/index.js'
import type { ServiceManager } from './manager.js'
import type {
    MethodTable,
    ServiceConfig,
    ServiceDescriptor,
    ServiceType,
} from './types.js'


/**
 * Fill descriptor defaults and freeze.
 */
export function describeService(config: ServiceConfig): ServiceDescriptor {

    return Object.freeze({
        namespace: config.namespace,
        datastore: config.datastore ?? null,
        datastorePrefix: config.datastorePrefix ?? '',
        datastoreExtend: config.datastoreExtend ?? null,
        datastoreExtendContext: config.datastoreExtendContext ?? null,
        primaryKey: config.primaryKey ?? 'id',
        primaryKeyType: config.primaryKeyType ?? 'integer',
        eventRegister: config.eventRegister ?? true,
        eventSend: config.eventSend ?? true,
        private: config.private ?? false,
        verboseName: config.verboseName ?? defaultVerboseName(config.namespace),
        checkDependencies: config.checkDependencies ?? true,
    })
}


/**
 * `storage.disk_group` → `Disk group`
 */
function defaultVerboseName(namespace: string): string {

    const last = namespace.split('.').pop() ?? namespace
    const words = last.replace(/_/g, ' ')

    return words.charAt(0).toUpperCase() + words.slice(1)
}


export class Service {

    readonly type: ServiceType = 'service'
    readonly descriptor: ServiceDescriptor

    /**
     * Config keys given explicitly, used to detect conflicts when parts
     * are merged into a compound service.
     */
    readonly specified: Readonly<ServiceConfig>

    constructor(
        protected readonly manager: ServiceManager,
        config: ServiceConfig,
    ) {

        this.specified = Object.freeze({ ...config })
        this.descriptor = describeService(config)
    }

    get namespace(): string {

        return this.descriptor.namespace
    }

    /**
     * Callable methods, keyed by their name within the namespace.
     */
    methods(): MethodTable {

        return {}
    }

    /**
     * Runs once from `ServiceManager.start()`.
     */
    async setup(): Promise<void> {

        // Nothing by default
    }

    /**
     * The local datastore.
     *
     * @throws CallError when the manager was built without one
     */
    protected get datastore(): Datastore {

        const datastore = this.manager.datastore

        if (!datastore) {

            throw new CallError(`${this.namespace}: no datastore configured`, ERRNO.ENOTSUP)
        }

        return datastore
    }

    /**
     * The backing table.
     *
     * @throws CallError when the descriptor names none
     */
    protected get table(): string {

        const table = this.descriptor.datastore

        if (!table) {

            throw new CallError(
                `${this.namespace}: operation requires a \`datastore\` in the service config`,
                ERRNO.ENOTSUP,
            )
        }

        return table
    }

    protected get datastoreOptions(): DatastoreOptions {

        return {
            prefix: this.descriptor.datastorePrefix,
            primaryKey: this.descriptor.primaryKey,
        }
    }
}
