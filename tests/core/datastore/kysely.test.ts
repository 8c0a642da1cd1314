/**
 * KyselyDatastore tests over in-memory SQLite.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { sql } from 'kysely'

import {
    createDatastore,
    tableName,
    type DatastoreConnection,
} from '../../../src/core/datastore/index.js'
import { NotFoundError } from '../../../src/core/errors/index.js'


const DISK = { prefix: 'disk_' }


async function seed(conn: DatastoreConnection): Promise<void> {

    await sql`
        CREATE TABLE storage_pool (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            pool_name TEXT NOT NULL
        )
    `.execute(conn.db)

    await sql`
        CREATE TABLE storage_disk (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            disk_name TEXT NOT NULL,
            disk_size INTEGER,
            disk_ssd BOOLEAN,
            disk_meta JSON,
            disk_pool_id INTEGER REFERENCES storage_pool (id)
        )
    `.execute(conn.db)

    await sql`CREATE TABLE system_general (id INTEGER PRIMARY KEY, gen_hostname TEXT)`.execute(conn.db)

    const store = conn.datastore
    const pool = await store.insert('storage.pool', { name: 'tank' }, { prefix: 'pool_' })

    await store.insert('storage.disk', { name: 'sda', size: 512, ssd: true, meta: { rack: 'a1' }, pool_id: pool }, DISK)
    await store.insert('storage.disk', { name: 'sdb', size: 1024, ssd: false, meta: { rack: 'b2' }, pool_id: null }, DISK)
    await store.insert('storage.disk', { name: 'nvme0', size: 256, ssd: true, meta: { rack: 'a2' }, pool_id: pool }, DISK)
}


describe('datastore: tableName', () => {

    it('should replace dots with underscores', () => {

        expect(tableName('storage.disk')).toBe('storage_disk')
        expect(tableName('system.general')).toBe('system_general')
    })
})


describe('datastore: KyselyDatastore', () => {

    let conn: DatastoreConnection

    beforeEach(async () => {

        conn = await createDatastore({ dialect: 'sqlite', filename: ':memory:' })
        await seed(conn)
    })

    afterEach(async () => {

        await conn.destroy()
    })

    it('should return the generated primary key from insert', async () => {

        const id = await conn.datastore.insert('storage.disk', { name: 'sdc' }, DISK)

        expect(id).toBe(4)
    })

    it('should strip the prefix and restore booleans and JSON', async () => {

        const disk = await conn.datastore.query('storage.disk', [['name', '=', 'sdb']], { ...DISK, get: true })

        expect(disk).toEqual({
            id: 2,
            name: 'sdb',
            size: 1024,
            ssd: false,
            meta: { rack: 'b2' },
            pool_id: null,
        })
    })

    it('should filter, order and project in SQL', async () => {

        const names = await conn.datastore.query('storage.disk', [['size', '>', 300]], {
            ...DISK,
            orderBy: ['-size'],
            select: ['name'],
        })

        expect(names).toEqual([{ name: 'sdb' }, { name: 'sda' }])
    })

    it('should count matches', async () => {

        expect(await conn.datastore.query('storage.disk', [['ssd', '=', true]], { ...DISK, count: true })).toBe(2)
        expect(await conn.datastore.query('storage.disk', [['name', 'in', ['sda', 'nvme0']]], { ...DISK, count: true })).toBe(2)
        expect(await conn.datastore.query('storage.disk', [['pool_id', '=', null]], { ...DISK, count: true })).toBe(1)
        expect(await conn.datastore.query('storage.disk', [['pool_id', '!=', 1]], { ...DISK, count: true })).toBe(1)
    })

    it('should match prefixes and suffixes', async () => {

        const prefix = await conn.datastore.query('storage.disk', [['name', '^', 'sd']], { ...DISK, count: true })
        const suffix = await conn.datastore.query('storage.disk', [['name', '$', '0']], { ...DISK, select: ['name'] })
        const notPrefix = await conn.datastore.query('storage.disk', [['name', '!^', 'sd']], { ...DISK, select: ['name'] })

        expect(prefix).toBe(2)
        expect(suffix).toEqual([{ name: 'nvme0' }])
        expect(notPrefix).toEqual([{ name: 'nvme0' }])
    })

    it('should combine OR groups', async () => {

        const names = await conn.datastore.query('storage.disk', [
            ['OR', [['size', '<', 300], [['ssd', '=', false], ['size', '>', 1000]]]],
        ], { ...DISK, orderBy: ['name'], select: ['name'] })

        expect(names).toEqual([{ name: 'nvme0' }, { name: 'sdb' }])
    })

    it('should place nulls last unless asked otherwise', async () => {

        const last = await conn.datastore.query('storage.disk', [], { ...DISK, orderBy: ['pool_id', 'name'], select: ['name'] })
        const first = await conn.datastore.query('storage.disk', [], { ...DISK, orderBy: ['nulls_first:pool_id', 'name'], select: ['name'] })

        expect(last).toEqual([{ name: 'nvme0' }, { name: 'sda' }, { name: 'sdb' }])
        expect(first).toEqual([{ name: 'sdb' }, { name: 'nvme0' }, { name: 'sda' }])
    })

    it('should page with limit and offset', async () => {

        const page = await conn.datastore.query('storage.disk', [], { ...DISK, orderBy: ['name'], limit: 1, offset: 1, select: ['name'] })
        const rest = await conn.datastore.query('storage.disk', [], { ...DISK, orderBy: ['name'], offset: 2, select: ['name'] })

        expect(page).toEqual([{ name: 'sda' }])
        expect(rest).toEqual([{ name: 'sdb' }])
    })

    it('should evaluate regex and nested fields in-process', async () => {

        const regex = await conn.datastore.query('storage.disk', [['name', '~', 'sd[ab]']], { ...DISK, count: true })
        const nested = await conn.datastore.query('storage.disk', [['meta.rack', '^', 'a']], {
            ...DISK,
            orderBy: ['name'],
            select: ['name'],
        })

        expect(regex).toBe(2)
        expect(nested).toEqual([{ name: 'nvme0' }, { name: 'sda' }])
    })

    it('should raise NotFoundError for get without a match', async () => {

        const lookup = conn.datastore.query('storage.disk', [['name', '=', 'sdz']], { ...DISK, get: true })

        await expect(lookup).rejects.toThrow('storage.disk does not exist')
    })

    it('should update and delete by primary key', async () => {

        await conn.datastore.update('storage.disk', 1, { size: 2048, ssd: false }, DISK)
        await conn.datastore.delete('storage.disk', 3, DISK)

        const rows = await conn.datastore.query('storage.disk', [], { ...DISK, orderBy: ['id'], select: ['name', 'size', 'ssd'] })

        expect(rows).toEqual([
            { name: 'sda', size: 2048, ssd: false },
            { name: 'sdb', size: 1024, ssd: false },
        ])
    })

    it('should read the single row of a config table', async () => {

        await expect(conn.datastore.config('system.general', { prefix: 'gen_' })).rejects.toBeInstanceOf(NotFoundError)

        await conn.datastore.insert('system.general', { id: 1, hostname: 'keel' }, { prefix: 'gen_' })

        expect(await conn.datastore.config('system.general', { prefix: 'gen_' })).toEqual({ id: 1, hostname: 'keel' })
    })

    it('should list foreign keys pointing at a table', async () => {

        expect(await conn.datastore.getBackrefs('storage.pool')).toEqual([
            { table: 'storage_disk', column: 'disk_pool_id', references: 'id' },
        ])
        expect(await conn.datastore.getBackrefs('storage.disk')).toEqual([])
    })
})
