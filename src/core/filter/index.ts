/**
 * Filter module exports.
 */
export type {
    Comparison,
    Entry,
    Filter,
    FilterOp,
    OrFilter,
    QueryOptions,
    QueryResult,
} from './types.js';

export { FILTER_OPS } from './types.js';

export {
    applyQuery,
    filterFields,
    getField,
    isFilterGroup,
    isRecord,
    matchAll,
    matchFilter,
    parseOrderBy,
    setField,
    shapeResult,
} from './filter.js';

export { FilterSchema, FilterOpSchema, QueryOptionsSchema } from './schema.js';
