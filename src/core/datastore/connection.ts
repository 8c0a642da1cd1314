/**
 * Open a datastore from settings.
 *
 * SQLite uses better-sqlite3 (synchronous, in-process; `:memory:` for
 * tests). PostgreSQL loads `pg` on demand.
 *
 * @example
 * ```typescript
 * // In-memory database
 * const conn = await createDatastore({ dialect: 'sqlite', filename: ':memory:' })
 *
 * // PostgreSQL
 * const conn = await createDatastore({
 *     dialect: 'postgres',
 *     connectionString: 'postgres://keel@localhost/keel',
 * })
 *
 * await conn.destroy()
 * ```
 */
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'

import { KyselyDatastore } from './kysely.js'
import type { DatastoreDialect } from './types.js'


export interface DatastoreConfig {
    dialect: DatastoreDialect

    /** SQLite database file */
    filename?: string

    /** PostgreSQL connection URL */
    connectionString?: string

    pool?: {
        min?: number
        max?: number
    }
}


export interface DatastoreConnection {
    datastore: KyselyDatastore
    db: Kysely<unknown>
    destroy: () => Promise<void>
}


export async function createDatastore(config: DatastoreConfig): Promise<DatastoreConnection> {

    const db = config.dialect === 'postgres'
        ? await createPostgresDb(config)
        : createSqliteDb(config)

    return {
        datastore: new KyselyDatastore(db, config.dialect),
        db,
        destroy: () => db.destroy(),
    }
}


function createSqliteDb(config: DatastoreConfig): Kysely<unknown> {

    const database = new Database(config.filename ?? ':memory:')

    // Backrefs and the dependency guard rely on declared foreign keys
    database.pragma('foreign_keys = ON')

    return new Kysely<unknown>({
        dialect: new SqliteDialect({ database }),
    })
}


async function createPostgresDb(config: DatastoreConfig): Promise<Kysely<unknown>> {

    // Loaded on demand
    const { default: pg } = await import('pg')

    const pool = new pg.Pool({
        connectionString: config.connectionString,
        min: config.pool?.min ?? 0,
        max: config.pool?.max ?? 10,
    })

    return new Kysely<unknown>({
        dialect: new PostgresDialect({ pool }),
    })
}
