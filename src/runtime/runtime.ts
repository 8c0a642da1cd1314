/**
 * Runtime
 *
 * Owns the pieces a running daemon is made of and shuts them down in
 * reverse order of creation.
 */
import { observer } from '../core/observer.js';
import type { DatastoreConnection } from '../core/datastore/index.js';
import type { Logger } from '../core/logger/index.js';
import type { ReplicationOptions } from '../core/replicated/index.js';
import type { ServiceManager } from '../core/service/manager.js';
import type { CallContext } from '../core/service/types.js';
import type { JobScheduler } from '../core/scheduler/index.js';
import type { Settings } from '../core/settings/index.js';

export interface RuntimeParts {
    connection: DatastoreConnection | null;

    /** Destroy the connection on close */
    ownsConnection: boolean;

    logger: Logger | null;
}

export class Runtime {

    readonly connection: DatastoreConnection | null;
    readonly logger: Logger | null;

    #ownsConnection: boolean;
    #closed = false;

    constructor(
        readonly settings: Settings,
        readonly manager: ServiceManager,
        parts: RuntimeParts,
    ) {

        this.connection = parts.connection;
        this.logger = parts.logger;
        this.#ownsConnection = parts.ownsConnection;

    }

    get scheduler(): JobScheduler {

        return this.manager.scheduler;

    }

    get closed(): boolean {

        return this.#closed;

    }

    /**
     * Dispatch a method call. Job methods return the job id.
     */
    call(name: string, args: unknown[] = [], ctx: CallContext = {}): Promise<unknown> {

        return this.manager.call(name, args, ctx);

    }

    /**
     * Fill in the health re-check interval from settings.
     *
     * @example
     * ```typescript
     * new ReplicatedConfigService(runtime.manager, { namespace: 'smb' }, runtime.replication({
     *     backend,
     *     defaults: { workgroup: 'WORKGROUP' },
     *     isClustered: () => true,
     *     clusterHealthy: () => cluster.healthy(),
     * }))
     * ```
     */
    replication<D>(options: ReplicationOptions<D>): ReplicationOptions<D> {

        return {
            healthCheckInterval: this.settings.replication.healthCheckInterval,
            ...options,
        };

    }

    /**
     * Stop the scheduler, then the logger, then the datastore (unless it
     * was handed in by the caller).
     */
    async close(reason = 'close'): Promise<void> {

        if (this.#closed) {

            return;

        }

        this.#closed = true;

        observer.emit('app:shutdown', { reason });

        await this.manager.close();
        await this.logger?.stop();
        if (this.#ownsConnection) {

            await this.connection?.destroy();

        }

    }

}
