/**
 * ConfigService tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import { ValidationErrors } from '../../../src/core/errors/index.js'
import { startStorage, stopStorage, type Storage } from './services.js'


describe('service: ConfigService', () => {

    let storage: Storage

    beforeEach(async () => {

        storage = await startStorage()
    })

    afterEach(async () => {

        await stopStorage(storage)
    })

    it('should create the row with column defaults on first read', async () => {

        expect(await storage.ssh.config()).toEqual({
            id: 1,
            port: 22,
            passwordauth: false,
            pool_id: null,
        })
    })

    it('should insert exactly one row under concurrent first reads', async () => {

        const results = await Promise.all(Array.from({ length: 8 }, () => storage.ssh.config()))
        const rows = await storage.conn.datastore.query('services.ssh', [], { count: true })

        expect(rows).toBe(1)
        expect(new Set(results.map((r) => r['id']))).toEqual(new Set([1]))
    })

    it('should update the row and return it', async () => {

        const updated = await storage.manager.call('ssh.update', [{ port: 2222, passwordauth: true }])

        expect(updated).toEqual({ id: 1, port: 2222, passwordauth: true, pool_id: null })
        expect(await storage.manager.call('ssh.config')).toEqual(updated)
    })

    it('should ignore the primary key in updates', async () => {

        const updated = await storage.ssh.update({ id: 7, port: 2200 })

        expect(updated['id']).toBe(1)
        expect(updated['port']).toBe(2200)
    })

    it('should reject values outside the schema', async () => {

        const error = await storage.ssh.update({ port: 0 }).catch((err: unknown) => err)

        expect(error).toBeInstanceOf(ValidationErrors)
        expect(error).toHaveProperty('message', '[22] ssh_update.port: Number must be greater than or equal to 1')
        expect((await storage.ssh.config())['port']).toBe(22)
    })

    it('should reject unknown keys', async () => {

        await expect(storage.ssh.update({ bogus: 1 })).rejects.toThrow(
            "[22] ssh_update: Unrecognized key(s) in object: 'bogus'",
        )
    })

    it('should run post_update hooks with the new record', async () => {

        const seen: unknown[] = []

        storage.manager.registerHook('ssh.post_update', (rv) => {

            seen.push(rv)
        })

        await storage.ssh.update({ port: 2022 })

        expect(seen).toEqual([{ id: 1, port: 2022, passwordauth: false, pool_id: null }])
    })

    it('should keep the update when a hook fails', async () => {

        storage.manager.registerHook('ssh.post_update', () => {

            throw new Error('reload failed')
        })

        await expect(storage.ssh.update({ port: 2022 })).rejects.toThrow('reload failed')
        expect((await storage.ssh.config())['port']).toBe(2022)
    })
})
