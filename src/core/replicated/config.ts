/**
 * Config service that runs against a clustered store when the node is
 * clustered and against the local datastore otherwise.
 *
 * Reads never fail for availability: when both health probes say
 * unhealthy, when nothing was stored yet, or when the stored version is
 * not ours, `config()` returns a copy of the defaults. Writes refuse an
 * unhealthy cluster or a foreign version.
 *
 * @example
 * ```typescript
 * const smb = new ReplicatedConfigService(manager, { namespace: 'smb', datastore: 'services.cifs' }, {
 *     backend,
 *     defaults: { workgroup: 'WORKGROUP', guest: 'nobody' },
 *     isClustered: () => cluster.enabled,
 *     clusterHealthy: () => cluster.healthy(),
 * })
 * ```
 */
import { isRecord, type Entry } from '../filter/index.js'
import { ConfigService, type ConfigServiceOptions } from '../service/config.js'
import { extendRows } from '../service/extend.js'
import type { ServiceManager } from '../service/manager.js'
import type { ServiceConfig } from '../service/types.js'
import { Replication } from './replication.js'
import type { ReplicationOptions } from './types.js'


export class ReplicatedConfigService extends ConfigService {

    readonly replication: Replication<Entry>

    constructor(
        manager: ServiceManager,
        config: ServiceConfig,
        replication: ReplicationOptions<Entry>,
        options: ConfigServiceOptions = {},
    ) {

        super(manager, config, options)
        this.replication = new Replication(config.namespace, replication)
    }

    override async config(): Promise<Entry> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.config()
        }

        if (!await r.readable()) {

            return r.defaults()
        }

        const stored = await r.readStored()

        if (!stored) {

            return r.defaults()
        }

        let data = isRecord(stored.data) ? stored.data : r.defaults()

        if (r.mismatched(stored)) {

            r.reportMismatch(stored)
            data = r.defaults()
        }

        return this.#extend(data)
    }

    protected override async doUpdate(data: Entry): Promise<Entry> {

        return this.directUpdate(data)
    }

    /**
     * Write without running hooks.
     *
     * @throws UnhealthyBackendError when the cluster is unhealthy
     * @throws VersionMismatchError when the stored version is not ours
     */
    async directUpdate(data: Entry): Promise<Entry> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.doUpdate(data)
        }

        await r.assertWritable()

        const old = await r.readForWrite()

        const payload = { ...data }

        delete payload[this.descriptor.primaryKey]

        const next = { ...(isRecord(old.data) ? old.data : r.defaults()), ...this.validate(payload) }

        await r.write(() => r.backend.write(r.name, { version: r.version, data: next }), old.version)

        const fresh = await r.backend.read(r.name)

        return this.#extend(isRecord(fresh.data) ? fresh.data : next)
    }

    async #extend(data: Entry): Promise<Entry> {

        const [extended] = await extendRows(this.descriptor, [data])

        return extended ?? data
    }
}
