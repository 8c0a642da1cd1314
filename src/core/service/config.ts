/**
 * Config service: a namespace backed by a single-row table.
 *
 * The row is created on first access. Concurrent first reads race through
 * a double-checked get-or-insert under one process-wide mutex, so exactly
 * one row is ever inserted.
 *
 * @example
 * ```typescript
 * class SshService extends ConfigService {
 *     constructor(manager: ServiceManager) {
 *         super(manager, { namespace: 'ssh', datastore: 'services.ssh', datastorePrefix: 'ssh_' }, {
 *             schema: z.object({ port: z.number().int(), passwordauth: z.boolean() }),
 *         })
 *     }
 * }
 *
 * await manager.call('ssh.update', [{ port: 2222 }])
 * ```
 */
import { z } from 'zod'

import { NotFoundError, ValidationErrors } from '../errors/index.js'
import type { Entry } from '../filter/index.js'
import { AsyncMutex } from '../lock/index.js'
import { defineMethod } from './define.js'
import { extendRows } from './extend.js'
import { Service } from './service.js'
import type { ServiceManager } from './manager.js'
import type { MethodTable, ServiceConfig, ServiceType } from './types.js'


const getOrInsertLock = new AsyncMutex()


export interface ConfigServiceOptions {
    /** Shape of the record; updates are checked against its partial form */
    schema?: z.AnyZodObject
}


export class ConfigService extends Service {

    override readonly type: ServiceType = 'config'
    protected readonly schema: z.AnyZodObject | null

    constructor(manager: ServiceManager, config: ServiceConfig, options: ConfigServiceOptions = {}) {

        super(manager, config)
        this.schema = options.schema ?? null
    }

    override methods(): MethodTable {

        return {
            config: defineMethod(z.tuple([]), () => this.config()),
            update: defineMethod(
                z.tuple([z.record(z.unknown())]),
                (_ctx, data) => this.update(data),
            ),
        }
    }

    /**
     * The record, extended.
     */
    async config(): Promise<Entry> {

        const row = await this.getOrInsert()
        const [extended] = await extendRows(this.descriptor, [row])

        return extended ?? row
    }

    /**
     * Apply `doUpdate`, then run `<namespace>.post_update` hooks. A failing
     * hook reaches the caller; the update stays committed.
     */
    async update(data: Entry): Promise<Entry> {

        const rv = await this.doUpdate(data)

        await this.manager.callHook(`${this.namespace}.post_update`, rv)

        return rv
    }

    /**
     * Validate `data` against the schema and write it over the row.
     */
    protected async doUpdate(data: Entry): Promise<Entry> {

        const pk = this.descriptor.primaryKey
        const current = await this.getOrInsert()
        const payload = { ...data }

        delete payload[pk]

        const changes = this.validate(payload)

        await this.datastore.update(this.table, current[pk], changes, this.datastoreOptions)

        return this.config()
    }

    /**
     * The raw row, inserting an empty one when the table is empty.
     */
    protected async getOrInsert(): Promise<Entry> {

        const existing = await this.#read()

        if (existing) {

            return existing
        }

        return getOrInsertLock.runExclusive(async () => {

            const inserted = await this.#read()

            if (inserted) {

                return inserted
            }

            await this.datastore.insert(this.table, {}, this.datastoreOptions)

            return this.datastore.config(this.table, this.datastoreOptions)
        })
    }

    protected validate(data: Entry): Entry {

        if (!this.schema) {

            return data
        }

        const result = this.schema.partial().strict().safeParse(data)

        if (!result.success) {

            throw ValidationErrors.fromZod(`${this.namespace.replace(/\./g, '_')}_update`, result.error.issues)
        }

        return result.data
    }

    async #read(): Promise<Entry | null> {

        try {

            return await this.datastore.config(this.table, this.datastoreOptions)
        }
        catch (err) {

            if (err instanceof NotFoundError) {

                return null
            }

            throw err
        }
    }
}
