/**
 * CRUD service backed by a clustered store when the node is clustered.
 *
 * Degraded reads return the defaults list as is, including when the
 * backend fails the read. When an extend transform is registered and the
 * healthy store is empty, the defaults are written to it once and returned
 * in its place.
 */
import { attempt } from '@logosdx/utils'

import { NotFoundError } from '../errors/index.js'
import {
    applyQuery,
    isRecord,
    matchAll,
    type Entry,
    type Filter,
    type QueryOptions,
    type QueryResult,
} from '../filter/index.js'
import { observer } from '../observer.js'
import { CRUDService, type CRUDServiceOptions } from '../service/crud.js'
import { extendRows } from '../service/extend.js'
import type { ServiceManager } from '../service/manager.js'
import type { ServiceConfig } from '../service/types.js'
import { Replication } from './replication.js'
import type { BatchOp, ReplicationOptions } from './types.js'


export class ReplicatedCrudService extends CRUDService {

    readonly replication: Replication<Entry[]>

    constructor(
        manager: ServiceManager,
        config: ServiceConfig,
        replication: ReplicationOptions<Entry[]>,
        options: CRUDServiceOptions = {},
    ) {

        super(manager, config, options)
        this.replication = new Replication(config.namespace, replication)
    }

    override async query(filters: Filter[] = [], options: QueryOptions = {}): Promise<QueryResult> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.query(filters, options)
        }

        if (!await r.readable()) {

            return r.defaults()
        }

        const stored = await r.readStored()

        if (!stored || !Array.isArray(stored.data)) {

            return r.defaults()
        }

        if (r.mismatched(stored)) {

            r.reportMismatch(stored)
            return r.defaults()
        }

        const rows = stored.data.filter(isRecord)
        const entity = this.descriptor.verboseName

        if (!this.descriptor.datastoreExtend) {

            return applyQuery(rows, filters, options, entity)
        }

        let extended = await extendRows(this.descriptor, rows, options.extra)
        const defaults = r.defaults()

        if (!extended.length && defaults.length) {

            const [, err] = await attempt(() => this.insertDefaults())

            if (err) {

                r.reportFailure('defaults insertion', err)
            }

            extended = defaults
        }

        return applyQuery(extended, filters, options, entity)
    }

    /**
     * Degraded reads ignore filters, so the key is matched again here: a
     * missing id fails even while the defaults stand in for the store.
     *
     * @throws NotFoundError when no record matches
     */
    override async getInstance(id: unknown, options: QueryOptions = {}): Promise<Entry> {

        if (!await this.replication.isClustered()) {

            return super.getInstance(id, options)
        }

        const byKey: Filter[] = [[this.descriptor.primaryKey, '=', id]]
        const result = await this.query(byKey, {
            ...options,
            forceSqlFilters: options.forceSqlFilters ?? true,
            get: false,
            count: false,
        })

        const [first] = Array.isArray(result) ? result.filter((row) => matchAll(row, byKey)) : []

        if (!first) {

            throw new NotFoundError(this.descriptor.verboseName, id)
        }

        return first
    }

    protected override async doCreate(data: Entry): Promise<unknown> {

        return this.directCreate(data)
    }

    protected override async doUpdate(id: unknown, data: Entry): Promise<unknown> {

        return this.directUpdate(id, data)
    }

    protected override async doDelete(id: unknown): Promise<unknown> {

        return this.directDelete(id)
    }

    /**
     * Create without running hooks. Returns the stored entry.
     *
     * @throws UnhealthyBackendError when the cluster is unhealthy
     * @throws VersionMismatchError when the backend refuses our version
     */
    async directCreate(data: Entry): Promise<unknown> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.doCreate(data)
        }

        await r.assertWritable()

        const stored = await r.readForWrite()
        const payload = this.validate(data, 'create')
        const id = await r.write(
            () => r.backend.create(r.name, { version: r.version, data: payload }),
            stored.version,
        )

        return this.getInstance(id)
    }

    async directUpdate(id: unknown, data: Entry): Promise<unknown> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.doUpdate(id, data)
        }

        await r.assertWritable()

        const stored = await r.readForWrite()
        const payload = { ...data }

        delete payload[this.descriptor.primaryKey]

        const changes = this.validate(payload, 'update')

        await r.write(
            () => r.backend.update(r.name, id, { version: r.version, data: changes }),
            stored.version,
        )

        return this.getInstance(id)
    }

    async directDelete(id: unknown): Promise<unknown> {

        const r = this.replication

        if (!await r.isClustered()) {

            return super.doDelete(id)
        }

        await r.assertWritable()

        const stored = await r.readForWrite()

        await r.write(() => r.backend.delete(r.name, id, r.version), stored.version)

        return true
    }

    /**
     * Write the defaults into the clustered store, keyed `<namespace>_<id>`.
     */
    async insertDefaults(): Promise<void> {

        const r = this.replication
        const pk = this.descriptor.primaryKey

        const ops = r.defaults().map((entry): BatchOp => {

            const value = { ...entry }

            delete value[pk]

            return { action: 'SET', key: `${this.namespace}_${String(entry[pk])}`, value }
        })

        await r.backend.batch(r.name, ops)

        observer.emit('replicated:defaults-inserted', { namespace: this.namespace, count: ops.length })
    }
}
