/**
 * ReplicatedCrudService tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { z } from 'zod'

import { ReplicatedCrudService } from '../../../src/core/replicated/index.js'
import { ServiceManager, type ServiceEvent } from '../../../src/core/service/index.js'
import { UnhealthyBackendError, ValidationErrors } from '../../../src/core/errors/index.js'
import type { DatastoreConnection } from '../../../src/core/datastore/index.js'
import type { Entry } from '../../../src/core/filter/index.js'
import { observer, type KeelEvents } from '../../../src/core/observer.js'
import { openStorage } from '../service/services.js'
import { MemoryBackend } from './memory-backend.js'


const DEFAULTS: Entry[] = [{ id: 1, name: 'homes', path: '/mnt/tank/homes' }]

const ShareSchema = z.object({ name: z.string(), path: z.string() })


describe('replicated: ReplicatedCrudService', () => {

    let manager: ServiceManager
    let backend: MemoryBackend
    let clustered: boolean
    let clusterHealthy: boolean
    let time: number
    let shares: ReplicatedCrudService

    beforeEach(() => {

        manager = new ServiceManager()
        backend = new MemoryBackend()
        clustered = true
        clusterHealthy = true
        time = 0

        shares = manager.register(new ReplicatedCrudService(manager, { namespace: 'share' }, {
            backend,
            defaults: DEFAULTS,
            isClustered: () => clustered,
            clusterHealthy: () => clusterHealthy,
            now: () => time,
        }, { schema: ShareSchema }))
    })

    afterEach(async () => {

        await manager.close()
    })

    it('should create entries in the clustered store and send ADDED', async () => {

        const events: ServiceEvent[] = []
        const cleanup = manager.subscribe('share.query', (e) => events.push(e))

        const created = await manager.call('share.create', [{ name: 'media', path: '/mnt/tank/media' }])

        cleanup()

        expect(created).toEqual({ id: 1, name: 'media', path: '/mnt/tank/media' })
        expect(events).toEqual([{ name: 'share.query', type: 'ADDED', id: 1, fields: created }])
        expect(backend.stores.get('share')).toEqual({
            version: { major: 0, minor: 1 },
            data: [{ id: 1, name: 'media', path: '/mnt/tank/media' }],
        })
    })

    it('should filter stored entries in-process', async () => {

        await shares.create({ name: 'media', path: '/mnt/tank/media' })
        await shares.create({ name: 'backup', path: '/mnt/dozer/backup' })

        const tank = await shares.query([['path', '^', '/mnt/tank']], { select: ['name'] })

        expect(tank).toEqual([{ name: 'media' }])
    })

    it('should update and return the stored entry', async () => {

        await shares.create({ name: 'media', path: '/mnt/tank/media' })

        expect(await shares.update(1, { path: '/mnt/tank/video' })).toEqual({
            id: 1,
            name: 'media',
            path: '/mnt/tank/video',
        })
    })

    it('should delete from the clustered store', async () => {

        await shares.create({ name: 'media', path: '/mnt/tank/media' })

        expect(await shares.delete(1)).toBe(true)
        expect(await shares.query()).toEqual([])
    })

    it('should return the defaults verbatim when degraded', async () => {

        await shares.create({ name: 'media', path: '/mnt/tank/media' })
        clusterHealthy = false
        backend.healthy = false
        time = 30_000

        expect(await shares.query([['name', '=', 'media']])).toEqual(DEFAULTS)
    })

    it('should refuse writes while the cluster is unhealthy', async () => {

        clusterHealthy = false

        await expect(shares.create({ name: 'media', path: '/mnt/tank/media' })).rejects.toBeInstanceOf(UnhealthyBackendError)
    })

    it('should return the defaults when nothing was ever stored', async () => {

        expect(await shares.query([['name', '=', 'media']])).toEqual(DEFAULTS)
        expect(backend.batches).toEqual([])
    })

    it('should return the defaults when the stored list is from another version', async () => {

        backend.stores.set('share', { version: { major: 2, minor: 0 }, data: [{ id: 5, name: 'old', path: '/old' }] })

        expect(await shares.query()).toEqual(DEFAULTS)
    })

    it('should return the defaults when the store cannot be read', async () => {

        const events: Array<KeelEvents['replicated:unhealthy']> = []
        const cleanup = observer.on('replicated:unhealthy', (e) => events.push(e))

        backend.readError = new Error('unreachable')

        const rows = await shares.query([['name', '=', 'media']])

        cleanup()

        expect(rows).toEqual(DEFAULTS)
        expect(events).toEqual([{ namespace: 'share', probe: 'cluster', reason: 'read failed: unreachable' }])
    })

    it('should look up degraded entries by primary key', async () => {

        clusterHealthy = false
        backend.healthy = false

        expect(await manager.call('share.get_instance', [1])).toEqual({ id: 1, name: 'homes', path: '/mnt/tank/homes' })
        await expect(shares.getInstance(999)).rejects.toThrow('Share 999 does not exist')
    })

    it('should reject a pattern that does not compile', async () => {

        const error = await manager.call('share.query', [[['name', '~', '(']]]).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(ValidationErrors)
        expect(error).toHaveProperty('message', '[22] arguments.0.0.2: Invalid regular expression')
    })
})


describe('replicated: default insertion', () => {

    let manager: ServiceManager
    let backend: MemoryBackend

    beforeEach(() => {

        manager = new ServiceManager()
        backend = new MemoryBackend()
    })

    function mountedShares(): ReplicatedCrudService {

        return manager.register(new ReplicatedCrudService(manager, {
            namespace: 'share',
            datastoreExtend: (row) => ({ ...row, mounted: true }),
        }, {
            backend,
            defaults: DEFAULTS,
            isClustered: () => true,
            clusterHealthy: () => true,
        }, { schema: ShareSchema }))
    }

    afterEach(async () => {

        await manager.close()
    })

    it('should seed an empty store with the defaults when an extend transform is set', async () => {

        const counts: number[] = []
        const cleanup = observer.on('replicated:defaults-inserted', ({ count }) => counts.push(count))

        const shares = manager.register(new ReplicatedCrudService(manager, {
            namespace: 'share',
            datastoreExtend: (row) => ({ ...row, mounted: true }),
        }, {
            backend,
            defaults: DEFAULTS,
            isClustered: () => true,
            clusterHealthy: () => true,
        }))

        backend.stores.set('share', { version: null, data: [] })

        expect(await shares.query()).toEqual(DEFAULTS)
        expect(backend.batches).toEqual([{
            name: 'share',
            ops: [{ action: 'SET', key: 'share_1', value: { name: 'homes', path: '/mnt/tank/homes' } }],
        }])
        expect(await shares.query()).toEqual([{ id: 1, name: 'homes', path: '/mnt/tank/homes', mounted: true }])

        cleanup()

        expect(counts).toEqual([1])
    })

    it('should still return the defaults when seeding fails', async () => {

        const events: Array<KeelEvents['replicated:unhealthy']> = []
        const cleanup = observer.on('replicated:unhealthy', (e) => events.push(e))
        const shares = mountedShares()

        backend.stores.set('share', { version: null, data: [] })
        backend.batch = async () => {

            throw new Error('read-only')
        }

        const rows = await shares.query()

        cleanup()

        expect(rows).toEqual(DEFAULTS)
        expect(events).toEqual([{ namespace: 'share', probe: 'cluster', reason: 'defaults insertion failed: read-only' }])
    })

    it('should return and announce created entries through the extend transform', async () => {

        const shares = mountedShares()
        const events: ServiceEvent[] = []
        const cleanup = manager.subscribe('share.query', (e) => events.push(e))

        const created = await shares.create({ name: 'media', path: '/mnt/tank/media' })

        cleanup()

        const record = { id: 1, name: 'media', path: '/mnt/tank/media', mounted: true }

        expect(created).toEqual(record)
        expect(events).toEqual([{ name: 'share.query', type: 'ADDED', id: 1, fields: record }])
    })
})


describe('replicated: local fallback', () => {

    let conn: DatastoreConnection
    let manager: ServiceManager

    beforeEach(async () => {

        conn = await openStorage()
        manager = new ServiceManager({ datastore: conn.datastore })
    })

    afterEach(async () => {

        await manager.close()
        await conn.destroy()
    })

    it('should use the local datastore when not clustered', async () => {

        const backend = new MemoryBackend()
        const pools = manager.register(new ReplicatedCrudService(manager, {
            namespace: 'pool',
            datastore: 'storage.pool',
            datastorePrefix: 'pool_',
        }, {
            backend,
            defaults: [],
            isClustered: () => false,
            clusterHealthy: () => true,
        }))

        const created = await pools.create({ name: 'tank' })

        expect(created).toEqual({ id: 1, name: 'tank', locked_by: null })
        expect(await pools.query([], { count: true })).toBe(1)
        expect(backend.stores.size).toBe(0)
    })
})
