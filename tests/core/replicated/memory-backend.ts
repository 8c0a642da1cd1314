/**
 * In-process replicated backend for tests.
 *
 * Config payloads are stored as one record, CRUD payloads as a list of
 * records with numeric ids. Writes carrying a version other than the
 * stored one are refused with VersionConflictError. Setting `readError`
 * makes every read reject with it.
 */
import { isRecord, type Entry } from '../../../src/core/filter/index.js'
import {
    VersionConflictError,
    type BatchOp,
    type ReplicatedBackend,
    type StoredPayload,
    type VersionStamp,
    type VersionedPayload,
} from '../../../src/core/replicated/index.js'


export class MemoryBackend implements ReplicatedBackend {

    readonly stores = new Map<string, StoredPayload>()
    readonly batches: Array<{ name: string; ops: BatchOp[] }> = []
    healthy = true
    readError: Error | null = null
    #nextId = 1

    async health(): Promise<boolean> {

        return this.healthy
    }

    async read(name: string): Promise<StoredPayload> {

        if (this.readError) {

            throw this.readError
        }

        const stored = this.stores.get(name)

        return stored ? structuredClone(stored) : { version: null, data: null }
    }

    async write(name: string, payload: VersionedPayload): Promise<void> {

        this.#checkVersion(name, payload.version)
        this.stores.set(name, { version: payload.version, data: { ...payload.data } })
    }

    async create(name: string, payload: VersionedPayload): Promise<unknown> {

        this.#checkVersion(name, payload.version)

        const id = this.#nextId++

        this.stores.set(name, {
            version: payload.version,
            data: [...this.#list(name), { id, ...payload.data }],
        })

        return id
    }

    async update(name: string, id: unknown, payload: VersionedPayload): Promise<void> {

        this.#checkVersion(name, payload.version)
        this.stores.set(name, {
            version: payload.version,
            data: this.#list(name).map((e) => e['id'] === id ? { ...e, ...payload.data } : e),
        })
    }

    async delete(name: string, id: unknown, version: VersionStamp): Promise<void> {

        this.#checkVersion(name, version)
        this.stores.set(name, {
            version,
            data: this.#list(name).filter((e) => e['id'] !== id),
        })
    }

    async batch(name: string, ops: BatchOp[]): Promise<void> {

        this.batches.push({ name, ops })

        let entries = this.#list(name)

        for (const op of ops) {

            const id = Number(op.key.slice(op.key.lastIndexOf('_') + 1))

            entries = entries.filter((e) => e['id'] !== id)

            if (op.action === 'SET') {

                entries.push({ id, ...op.value })
            }
        }

        const version = this.stores.get(name)?.version ?? null

        this.stores.set(name, { version, data: entries })
    }

    #list(name: string): Entry[] {

        const data = this.stores.get(name)?.data

        return Array.isArray(data) ? data.filter(isRecord) : []
    }

    #checkVersion(name: string, version: VersionStamp): void {

        const stored = this.stores.get(name)?.version ?? null

        if (stored && (stored.major !== version.major || stored.minor !== version.minor)) {

            throw new VersionConflictError(stored)
        }
    }
}
