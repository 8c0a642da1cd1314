/**
 * ReplicatedConfigService tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { z } from 'zod'

import { ReplicatedConfigService, VersionConflictError } from '../../../src/core/replicated/index.js'
import { ServiceManager } from '../../../src/core/service/index.js'
import { UnhealthyBackendError, VersionMismatchError } from '../../../src/core/errors/index.js'
import type { DatastoreConnection } from '../../../src/core/datastore/index.js'
import { observer, type KeelEvents } from '../../../src/core/observer.js'
import { openStorage } from '../service/services.js'
import { MemoryBackend } from './memory-backend.js'


const DEFAULTS = { port: 22, passwordauth: false, pool_id: null }


describe('replicated: ReplicatedConfigService', () => {

    let conn: DatastoreConnection
    let manager: ServiceManager
    let backend: MemoryBackend
    let clustered: boolean
    let clusterHealthy: boolean
    let probes: number
    let time: number
    let ssh: ReplicatedConfigService

    beforeEach(async () => {

        conn = await openStorage()
        manager = new ServiceManager({ datastore: conn.datastore })
        backend = new MemoryBackend()
        clustered = true
        clusterHealthy = true
        probes = 0
        time = 0

        ssh = manager.register(new ReplicatedConfigService(manager, {
            namespace: 'ssh',
            datastore: 'services.ssh',
            datastorePrefix: 'ssh_',
        }, {
            backend,
            defaults: DEFAULTS,
            isClustered: () => clustered,
            clusterHealthy: () => {

                probes++
                return clusterHealthy
            },
            now: () => time,
        }, {
            schema: z.object({
                port: z.number().int().min(1),
                passwordauth: z.boolean(),
                pool_id: z.number().int().nullable(),
            }),
        }))
    })

    afterEach(async () => {

        await manager.close()
        await conn.destroy()
    })

    it('should use the local datastore when not clustered', async () => {

        clustered = false

        const updated = await manager.call('ssh.update', [{ port: 2222 }])

        expect(updated).toEqual({ id: 1, port: 2222, passwordauth: false, pool_id: null })
        expect(backend.stores.size).toBe(0)
        expect(probes).toBe(0)
    })

    it('should return a copy of the defaults when nothing is stored', async () => {

        const first = await ssh.config()

        first['port'] = 1

        expect(await ssh.config()).toEqual(DEFAULTS)
    })

    it('should write the defaults merged with the changes', async () => {

        const updated = await manager.call('ssh.update', [{ port: 2222 }])

        expect(updated).toEqual({ port: 2222, passwordauth: false, pool_id: null })
        expect(backend.stores.get('ssh')).toEqual({
            version: { major: 0, minor: 1 },
            data: { port: 2222, passwordauth: false, pool_id: null },
        })
        expect(await ssh.config()).toEqual(updated)
    })

    it('should return the defaults when both probes are unhealthy', async () => {

        const events: Array<KeelEvents['replicated:unhealthy']> = []
        const cleanup = observer.on('replicated:unhealthy', (e) => events.push(e))

        backend.stores.set('ssh', { version: { major: 0, minor: 1 }, data: { port: 2222, passwordauth: true, pool_id: null } })
        clusterHealthy = false
        backend.healthy = false

        const config = await ssh.config()

        cleanup()

        expect(config).toEqual(DEFAULTS)
        expect(events).toEqual([{ namespace: 'ssh', probe: 'local', reason: 'replica reports unhealthy' }])
    })

    it('should return the defaults when the store cannot be read', async () => {

        const events: Array<KeelEvents['replicated:unhealthy']> = []
        const cleanup = observer.on('replicated:unhealthy', (e) => events.push(e))

        backend.readError = new Error('unreachable')

        const config = await ssh.config()

        cleanup()

        expect(config).toEqual(DEFAULTS)
        expect(events).toEqual([{ namespace: 'ssh', probe: 'cluster', reason: 'read failed: unreachable' }])
    })

    it('should read through a healthy local replica when the cluster is unhealthy', async () => {

        backend.stores.set('ssh', { version: { major: 0, minor: 1 }, data: { port: 2222, passwordauth: true, pool_id: null } })
        clusterHealthy = false

        expect(await ssh.config()).toEqual({ port: 2222, passwordauth: true, pool_id: null })
    })

    it('should ignore data written by another version', async () => {

        const events: Array<KeelEvents['replicated:version-mismatch']> = []
        const cleanup = observer.on('replicated:version-mismatch', (e) => events.push(e))

        backend.stores.set('ssh', { version: { major: 0, minor: 2 }, data: { port: 2222, passwordauth: true, pool_id: null } })

        const config = await ssh.config()

        cleanup()

        expect(config).toEqual(DEFAULTS)
        expect(events).toEqual([{ namespace: 'ssh', local: '0.1', stored: '0.2' }])
    })

    it('should refuse to write over data from another version', async () => {

        const stored = { version: { major: 0, minor: 2 }, data: { port: 2222, passwordauth: true, pool_id: null } }

        backend.stores.set('ssh', stored)

        const error = await ssh.update({ port: 2200 }).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(VersionMismatchError)
        expect(error).toHaveProperty('message', "Version mismatch for 'ssh': local 0.1, stored 0.2")
        expect(backend.stores.get('ssh')).toEqual(stored)
    })

    it('should translate a version conflict raised by the backend', async () => {

        backend.write = async () => {

            throw new VersionConflictError({ major: 1, minor: 0 })
        }

        await expect(ssh.update({ port: 2200 })).rejects.toThrow("Version mismatch for 'ssh': local 0.1, stored 1.0")
    })

    it('should refuse writes while the cluster is unhealthy', async () => {

        clusterHealthy = false

        const error = await ssh.update({ port: 2200 }).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(UnhealthyBackendError)
        expect(error).toHaveProperty(
            'message',
            "Clustered store for 'ssh' is unhealthy: clustered configuration may not be altered while cluster is unhealthy",
        )
        expect(backend.stores.size).toBe(0)
    })

    it('should reuse the cluster probe result within the interval', async () => {

        await ssh.config()
        time = 29_999
        await ssh.config()

        expect(probes).toBe(1)

        time = 30_000
        await ssh.config()

        expect(probes).toBe(2)
    })

    it('should treat a throwing probe as unhealthy', async () => {

        const events: Array<KeelEvents['replicated:unhealthy']> = []
        const cleanup = observer.on('replicated:unhealthy', (e) => events.push(e))

        const replication = new ReplicatedConfigService(manager, { namespace: 'nfs' }, {
            backend,
            defaults: {},
            isClustered: () => true,
            clusterHealthy: () => { throw new Error('cluster down') },
        }).replication

        expect(await replication.clusterHealthy()).toBe(false)
        expect(await replication.readable()).toBe(true)

        cleanup()

        expect(events).toEqual([{ namespace: 'nfs', probe: 'cluster', reason: 'health check failed: cluster down' }])
    })
})
