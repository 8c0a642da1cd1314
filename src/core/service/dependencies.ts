/**
 * Foreign-key index between stores.
 *
 * Built once by `ServiceManager.start()`: for every registered store, the
 * tables that reference it and the service owning each table. Deletes
 * consult the index instead of rescanning the catalog.
 */
import type { Backref, Datastore } from '../datastore/index.js'
import { tableName } from '../datastore/index.js'
import type { Service } from './service.js'


export class DependencyIndex {

    readonly #backrefs = new Map<string, Backref[]>()
    readonly #owners = new Map<string, Service>()
    #built = false

    get built(): boolean {

        return this.#built
    }

    /**
     * Index every service that declares a datastore.
     */
    async build(datastore: Datastore, services: Iterable<Service>): Promise<void> {

        this.#backrefs.clear()
        this.#owners.clear()

        for (const service of services) {

            const table = service.descriptor.datastore

            if (table) {

                this.#owners.set(tableName(table), service)
            }
        }

        for (const table of this.#owners.keys()) {

            this.#backrefs.set(table, await datastore.getBackrefs(table))
        }

        this.#built = true
    }

    /**
     * Tables referencing `table`. Tables no service declares are looked up
     * on demand and cached.
     */
    async backrefs(datastore: Datastore, table: string): Promise<Backref[]> {

        const name = tableName(table)
        const cached = this.#backrefs.get(name)

        if (cached) {

            return cached
        }

        const refs = await datastore.getBackrefs(name)

        this.#backrefs.set(name, refs)

        return refs
    }

    /**
     * The service whose datastore is `table`.
     */
    owner(table: string): Service | undefined {

        return this.#owners.get(tableName(table))
    }
}
