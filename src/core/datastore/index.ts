/**
 * Datastore module exports.
 */
export type {
    Backref,
    Datastore,
    DatastoreDialect,
    DatastoreOptions,
    DatastoreQueryOptions,
} from './types.js';

export { KyselyDatastore, tableName } from './kysely.js';
export { compileOrderBy, compileWhere, isOrderPushable, isPushable } from './sql.js';
export {
    createDatastore,
    type DatastoreConfig,
    type DatastoreConnection,
} from './connection.js';
