/**
 * Datastore boundary.
 *
 * The local backing store behind Config and CRUD services. Tables hold
 * prefixed columns (`<prefix><field>`); the primary key is never prefixed
 * and every returned record has the prefix stripped.
 */
import type { Entry, Filter, QueryOptions, QueryResult } from '../filter/index.js'


export type DatastoreDialect = 'sqlite' | 'postgres';

export interface DatastoreOptions {
    /** Column prefix stripped from returned fields */
    prefix?: string;

    /** Primary-key column, never prefixed. Default `id` */
    primaryKey?: string;
}

export interface DatastoreQueryOptions extends QueryOptions, DatastoreOptions {}

/**
 * A foreign key pointing at a table.
 */
export interface Backref {
    /** Referencing table */
    table: string;

    /** Referencing column */
    column: string;

    /** Referenced column on the target table */
    references: string;
}

export interface Datastore {
    /**
     * List, count or fetch one record, depending on options.
     */
    query(table: string, filters?: Filter[], options?: DatastoreQueryOptions): Promise<QueryResult>;

    /**
     * The single row of a config table.
     *
     * @throws NotFoundError when the table is empty
     */
    config(table: string, options?: DatastoreOptions): Promise<Entry>;

    /**
     * Insert a record and return its primary key.
     */
    insert(table: string, data: Entry, options?: DatastoreOptions): Promise<unknown>;

    update(table: string, id: unknown, data: Entry, options?: DatastoreOptions): Promise<void>;

    delete(table: string, id: unknown, options?: DatastoreOptions): Promise<void>;

    /**
     * Foreign keys in other tables that reference `table`.
     */
    getBackrefs(table: string): Promise<Backref[]>;
}
