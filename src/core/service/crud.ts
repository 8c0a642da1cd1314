/**
 * CRUD service: a namespace backed by a keyed collection.
 *
 * Every record goes through the extend transform before a caller sees it.
 * When a transform is registered, filters run after it (they may name
 * computed fields) unless the caller forces `forceSqlFilters`.
 *
 * Mutations run `do*`, then the `<namespace>.post_*` hooks, then send the
 * `<namespace>.query` event. A hook failure reaches the caller and
 * suppresses the event; the mutation is not rolled back.
 *
 * @example
 * ```typescript
 * class DiskService extends CRUDService {
 *     constructor(manager: ServiceManager) {
 *         super(manager, {
 *             namespace: 'disk',
 *             datastore: 'storage.disk',
 *             datastorePrefix: 'disk_',
 *             datastoreExtend: (row) => ({ ...row, is_locked: row.locked_by !== null }),
 *         }, {
 *             schema: z.object({ name: z.string(), size: z.number().int() }),
 *         })
 *     }
 * }
 *
 * const locked = await disks.query([['is_locked', '=', true]])
 * ```
 */
import { z } from 'zod'

import {
    DependencyConflictError,
    NotFoundError,
    ValidationErrors,
    type Dependent,
} from '../errors/index.js'
import {
    applyQuery,
    isRecord,
    QueryOptionsSchema,
    shapeResult,
    type Entry,
    type Filter,
    type QueryOptions,
    type QueryResult,
} from '../filter/index.js'
import { defineMethod, filterable } from './define.js'
import { extendRows } from './extend.js'
import { Service } from './service.js'
import type { ServiceManager } from './manager.js'
import type { MethodTable, ServiceConfig, ServiceType } from './types.js'


export interface CRUDServiceOptions {
    /** Shape of a new record; updates are checked against its partial form */
    schema?: z.AnyZodObject
}


export class CRUDService extends Service {

    override readonly type: ServiceType = 'crud'
    protected readonly schema: z.AnyZodObject | null

    constructor(manager: ServiceManager, config: ServiceConfig, options: CRUDServiceOptions = {}) {

        super(manager, config)
        this.schema = options.schema ?? null
    }

    override methods(): MethodTable {

        const record = z.record(z.unknown())

        return {
            query: defineMethod(filterable, (_ctx, filters, options) => this.query(filters, options)),
            get_instance: defineMethod(
                z.tuple([z.unknown(), QueryOptionsSchema.default({})]),
                (_ctx, id, options) => this.getInstance(id, options),
            ),
            create: defineMethod(z.tuple([record]), (_ctx, data) => this.create(data)),
            update: defineMethod(z.tuple([z.unknown(), record]), (_ctx, id, data) => this.update(id, data)),
            delete: defineMethod(z.tuple([z.unknown()]), (_ctx, id) => this.delete(id)),
        }
    }

    async query(filters: Filter[] = [], options: QueryOptions = {}): Promise<QueryResult> {

        const entity = this.descriptor.verboseName

        if (this.descriptor.datastoreExtend && !options.forceSqlFilters) {

            const rows = await this.#rows([], {})

            return applyQuery(await extendRows(this.descriptor, rows, options.extra), filters, options, entity)
        }

        if (options.count) {

            return this.datastore.query(this.table, filters, { ...this.datastoreOptions, count: true })
        }

        const rows = await this.#rows(filters, {
            orderBy: options.orderBy,
            limit: options.limit,
            offset: options.offset,
        })

        const extended = await extendRows(this.descriptor, rows, options.extra)

        return shapeResult(extended, { select: options.select, get: options.get }, entity)
    }

    /**
     * The record with primary key `id`. Filters run in storage unless
     * `forceSqlFilters` is set to false.
     *
     * @throws NotFoundError when no record matches
     */
    async getInstance(id: unknown, options: QueryOptions = {}): Promise<Entry> {

        const result = await this.query([[this.descriptor.primaryKey, '=', id]], {
            ...options,
            forceSqlFilters: options.forceSqlFilters ?? true,
            get: false,
            count: false,
        })

        const [first] = Array.isArray(result) ? result : []

        if (!first) {

            throw new NotFoundError(this.descriptor.verboseName, id)
        }

        return first
    }

    async create(data: Entry): Promise<unknown> {

        const rv = await this.doCreate(data)

        await this.manager.callHook(`${this.namespace}.post_create`, rv)
        this.#sendChange('ADDED', rv)

        return rv
    }

    async update(id: unknown, data: Entry): Promise<unknown> {

        const rv = await this.doUpdate(id, data)

        await this.manager.callHook(`${this.namespace}.post_update`, rv)
        this.#sendChange('CHANGED', rv)

        return rv
    }

    async delete(id: unknown): Promise<unknown> {

        const rv = await this.doDelete(id)

        await this.manager.callHook(`${this.namespace}.post_delete`, rv)

        if (this.descriptor.eventSend) {

            const name = `${this.namespace}.query`

            this.manager.sendEvent(name, 'CHANGED', { id, cleared: true })
            this.manager.sendEvent(name, 'REMOVED', { id })
        }

        return rv
    }

    /**
     * Validate against the schema, insert, and return the stored record.
     */
    protected async doCreate(data: Entry): Promise<unknown> {

        const payload = this.validate(data, 'create')
        const id = await this.datastore.insert(this.table, payload, this.datastoreOptions)

        return this.getInstance(id)
    }

    protected async doUpdate(id: unknown, data: Entry): Promise<unknown> {

        await this.getInstance(id)

        const payload = { ...data }

        delete payload[this.descriptor.primaryKey]

        await this.datastore.update(this.table, id, this.validate(payload, 'update'), this.datastoreOptions)

        return this.getInstance(id)
    }

    /**
     * Refuse while other stores reference the record (unless the
     * descriptor turns the check off), then remove it.
     */
    protected async doDelete(id: unknown): Promise<unknown> {

        await this.getInstance(id)

        if (this.descriptor.checkDependencies) {

            await this.checkDependencies(id)
        }

        await this.datastore.delete(this.table, id, this.datastoreOptions)

        return true
    }

    /**
     * Add a validation error when another record already has `value` in
     * `field`. Pass `id` to skip the record being updated.
     */
    async ensureUnique(
        verrors: ValidationErrors,
        schemaName: string,
        field: string,
        value: unknown,
        id?: unknown,
    ): Promise<void> {

        const filters: Filter[] = [[field, '=', value]]

        if (id !== undefined) {

            filters.push([this.descriptor.primaryKey, '!=', id])
        }

        const count = await this.query(filters, { count: true })

        if (typeof count === 'number' && count > 0) {

            verrors.add([schemaName, field].filter(Boolean).join('.'), `Object with this ${field} already exists`)
        }
    }

    /**
     * @throws DependencyConflictError when any store still references `id`
     */
    async checkDependencies(id: unknown, ignored: ReadonlySet<string> = new Set()): Promise<void> {

        const dependencies = await this.getDependencies(id, ignored)

        if (dependencies.length) {

            throw new DependencyConflictError(dependencies)
        }
    }

    /**
     * Stores holding a foreign key to `id`. `ignored` may name referencing
     * tables or service namespaces.
     */
    async getDependencies(id: unknown, ignored: ReadonlySet<string> = new Set()): Promise<Dependent[]> {

        const datastore = this.datastore
        const index = this.manager.dependencies
        const dependencies: Dependent[] = []

        for (const ref of await index.backrefs(datastore, this.table)) {

            const owner = index.owner(ref.table)

            if (ignored.has(ref.table) || (owner && ignored.has(owner.namespace))) {

                continue
            }

            const result = await datastore.query(ref.table, [[ref.column, '=', id]])
            const rows = Array.isArray(result) ? result : []

            if (!rows.length) {

                continue
            }

            const dependent: Dependent = { service: owner?.namespace ?? null, datastore: ref.table }

            if (owner?.type === 'config') {

                const prefix = owner.descriptor.datastorePrefix
                dependent.key = prefix && ref.column.startsWith(prefix)
                    ? ref.column.slice(prefix.length)
                    : ref.column
            }
            else if (owner instanceof CRUDService) {

                const pk = owner.descriptor.primaryKey
                const ids = rows.map((row) => row[pk] ?? row['id'])
                const objects = await owner.query([[pk, 'in', ids]])

                dependent.objects = Array.isArray(objects) ? objects : []
            }
            else {

                dependent.objects = rows
            }

            dependencies.push(dependent)
        }

        return dependencies
    }

    protected validate(data: Entry, action: 'create' | 'update'): Entry {

        if (!this.schema) {

            return data
        }

        const schema = action === 'create' ? this.schema.strict() : this.schema.partial().strict()
        const result = schema.safeParse(data)

        if (!result.success) {

            throw ValidationErrors.fromZod(`${this.namespace.replace(/\./g, '_')}_${action}`, result.error.issues)
        }

        return result.data
    }

    async #rows(filters: Filter[], options: QueryOptions): Promise<Entry[]> {

        const result = await this.datastore.query(this.table, filters, { ...options, ...this.datastoreOptions })

        return Array.isArray(result) ? result : []
    }

    #sendChange(type: 'ADDED' | 'CHANGED', rv: unknown): void {

        const pk = this.descriptor.primaryKey

        if (this.descriptor.eventSend && isRecord(rv) && pk in rv) {

            this.manager.sendEvent(`${this.namespace}.query`, type, { id: rv[pk], fields: rv })
        }
    }
}
