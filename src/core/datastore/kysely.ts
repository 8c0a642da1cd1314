/**
 * Datastore over Kysely (SQLite via better-sqlite3, PostgreSQL via pg).
 *
 * Statements are written with Kysely's `sql` template so one code path
 * serves both dialects. Filters run as SQL when every operator can be
 * expressed there; otherwise all rows are fetched and filtered in-process
 * with identical semantics.
 *
 * @example
 * ```typescript
 * const { datastore } = await createDatastore({ dialect: 'sqlite', filename: ':memory:' })
 *
 * const id = await datastore.insert('storage.disk', { name: 'sda', size: 512 }, { prefix: 'disk_' })
 * const big = await datastore.query('storage.disk', [['size', '>', 256]], { prefix: 'disk_' })
 * ```
 */
import { sql, type Kysely, type RawBuilder } from 'kysely'

import { NotFoundError } from '../errors/index.js'
import {
    applyQuery,
    isRecord,
    shapeResult,
    type Entry,
    type Filter,
    type QueryResult,
} from '../filter/index.js'
import {
    compileOrderBy,
    compileWhere,
    isOrderPushable,
    isPushable,
} from './sql.js'
import type {
    Backref,
    Datastore,
    DatastoreDialect,
    DatastoreOptions,
    DatastoreQueryOptions,
} from './types.js'


type Row = Record<string, unknown>


/**
 * Storage table for a dotted store name (`storage.disk` → `storage_disk`).
 */
export function tableName(name: string): string {

    return name.replace(/\./g, '_')
}


export class KyselyDatastore implements Datastore {

    readonly #columnTypes = new Map<string, Map<string, string>>()

    constructor(
        public readonly db: Kysely<unknown>,
        public readonly dialect: DatastoreDialect,
    ) {}

    async query(table: string, filters: Filter[] = [], options: DatastoreQueryOptions = {}): Promise<QueryResult> {

        const name = tableName(table)
        const column = columnMapper(options)

        if (!isPushable(filters) || !isOrderPushable(options.orderBy)) {

            const rows = await this.#select(name, sql``, options)

            return applyQuery(rows, filters, options, table)
        }

        const where = compileWhere(filters, column, (v) => this.#encode(v))

        if (options.count) {

            const result = await sql<{ count: number | string | bigint }>`
                SELECT COUNT(*) AS count FROM ${sql.table(name)} WHERE ${where}
            `.execute(this.db)

            return Number(result.rows[0]?.count ?? 0)
        }

        let tail = sql`WHERE ${where}${compileOrderBy(options.orderBy, column)}`

        if (options.limit) {

            tail = sql`${tail} LIMIT ${options.limit}`
        }

        if (options.offset) {

            // SQLite needs a LIMIT before OFFSET; -1 means unbounded there
            tail = options.limit || this.dialect === 'postgres'
                ? sql`${tail} OFFSET ${options.offset}`
                : sql`${tail} LIMIT -1 OFFSET ${options.offset}`
        }

        const rows = await this.#select(name, tail, options)

        return shapeResult(rows, { select: options.select, get: options.get }, table)
    }

    async config(table: string, options: DatastoreOptions = {}): Promise<Entry> {

        const rows = await this.#select(tableName(table), sql`LIMIT 1`, options)
        const [row] = rows

        if (!row) {

            throw new NotFoundError(table)
        }

        return row
    }

    async insert(table: string, data: Entry, options: DatastoreOptions = {}): Promise<unknown> {

        const pk = options.primaryKey ?? 'id'
        const entries = this.#toColumns(data, options)
        const target = sql.table(tableName(table))

        const statement = entries.length
            ? sql<Row>`
                INSERT INTO ${target} (${sql.join(entries.map(([c]) => sql.ref(c)))})
                VALUES (${sql.join(entries.map(([, v]) => v))})
                RETURNING ${sql.ref(pk)}
            `
            : sql<Row>`INSERT INTO ${target} DEFAULT VALUES RETURNING ${sql.ref(pk)}`

        const result = await statement.execute(this.db)

        return result.rows[0]?.[pk] ?? data[pk]
    }

    async update(table: string, id: unknown, data: Entry, options: DatastoreOptions = {}): Promise<void> {

        const pk = options.primaryKey ?? 'id'
        const entries = this.#toColumns(data, options).filter(([c]) => c !== pk)

        if (!entries.length) {

            return
        }

        const assignments = entries.map(([c, v]) => sql`${sql.ref(c)} = ${v}`)

        await sql`
            UPDATE ${sql.table(tableName(table))}
            SET ${sql.join(assignments)}
            WHERE ${sql.ref(pk)} = ${this.#encode(id)}
        `.execute(this.db)
    }

    async delete(table: string, id: unknown, options: DatastoreOptions = {}): Promise<void> {

        const pk = options.primaryKey ?? 'id'

        await sql`
            DELETE FROM ${sql.table(tableName(table))}
            WHERE ${sql.ref(pk)} = ${this.#encode(id)}
        `.execute(this.db)
    }

    async getBackrefs(table: string): Promise<Backref[]> {

        const name = tableName(table)

        if (this.dialect === 'postgres') {

            const result = await sql<{ referencing_table: string; referencing_column: string; referenced_column: string }>`
                SELECT
                    kcu.table_name AS referencing_table,
                    kcu.column_name AS referencing_column,
                    ccu.column_name AS referenced_column
                FROM information_schema.table_constraints tc
                JOIN information_schema.key_column_usage kcu
                    ON tc.constraint_name = kcu.constraint_name
                    AND tc.table_schema = kcu.table_schema
                JOIN information_schema.constraint_column_usage ccu
                    ON ccu.constraint_name = tc.constraint_name
                    AND ccu.table_schema = tc.table_schema
                WHERE tc.constraint_type = 'FOREIGN KEY'
                AND ccu.table_name = ${name}
                ORDER BY kcu.table_name, kcu.column_name
            `.execute(this.db)

            return result.rows.map((r) => ({
                table: r.referencing_table,
                column: r.referencing_column,
                references: r.referenced_column,
            }))
        }

        const tables = await sql<{ name: string }>`
            SELECT name FROM sqlite_master
            WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
            ORDER BY name
        `.execute(this.db)

        const backrefs: Backref[] = []

        for (const t of tables.rows) {

            const fks = await sql<{ table: string; from: string; to: string | null }>`
                PRAGMA foreign_key_list(${sql.table(t.name)})
            `.execute(this.db)

            for (const fk of fks.rows) {

                if (fk.table === name) {

                    backrefs.push({ table: t.name, column: fk.from, references: fk.to ?? 'id' })
                }
            }
        }

        return backrefs
    }

    /**
     * Forget cached column types, e.g. after a migration.
     */
    refreshSchema(): void {

        this.#columnTypes.clear()
    }


    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    async #select(name: string, tail: RawBuilder<unknown>, options: DatastoreOptions): Promise<Entry[]> {

        const result = await sql<Row>`SELECT * FROM ${sql.table(name)} ${tail}`.execute(this.db)
        const types = await this.#types(name)

        return result.rows.map((row) => this.#decode(row, types, options))
    }

    /**
     * Declared column types, used to restore booleans and JSON on SQLite.
     */
    async #types(name: string): Promise<Map<string, string>> {

        const cached = this.#columnTypes.get(name)

        if (cached) {

            return cached
        }

        const types = new Map<string, string>()

        if (this.dialect === 'sqlite') {

            const info = await sql<{ name: string; type: string }>`
                PRAGMA table_info(${sql.table(name)})
            `.execute(this.db)

            for (const col of info.rows) {

                types.set(col.name, col.type.toUpperCase())
            }
        }

        this.#columnTypes.set(name, types)

        return types
    }

    #decode(row: Row, types: Map<string, string>, options: DatastoreOptions): Entry {

        const prefix = options.prefix ?? ''
        const entry: Entry = {}

        for (const [col, raw] of Object.entries(row)) {

            const field = prefix && col.startsWith(prefix) ? col.slice(prefix.length) : col
            const type = types.get(col) ?? ''
            let value = raw

            if (type.startsWith('BOOL') && typeof raw === 'number') {

                value = raw !== 0
            }
            else if (type.includes('JSON') && typeof raw === 'string') {

                value = JSON.parse(raw)
            }

            entry[field] = value
        }

        return entry
    }

    #encode(value: unknown): unknown {

        if (typeof value === 'boolean' && this.dialect === 'sqlite') {

            return value ? 1 : 0
        }

        if (value instanceof Date) {

            return value.toISOString()
        }

        if (Array.isArray(value) || isRecord(value)) {

            return JSON.stringify(value)
        }

        return value
    }

    #toColumns(data: Entry, options: DatastoreOptions): Array<[string, unknown]> {

        const column = columnMapper(options)

        return Object.entries(data)
            .filter(([, v]) => v !== undefined)
            .map(([field, v]): [string, unknown] => [column(field), this.#encode(v)])
    }
}


function columnMapper(options: DatastoreOptions): (field: string) => string {

    const prefix = options.prefix ?? ''
    const pk = options.primaryKey ?? 'id'

    return (field) => field === pk ? pk : `${prefix}${field}`
}
