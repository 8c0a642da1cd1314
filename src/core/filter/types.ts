/**
 * Query filter language shared by datastores, CRUD stores and the job table.
 *
 * @example
 * ```typescript
 * const filters: Filter[] = [
 *     ['pool', '=', 'tank'],
 *     ['OR', [['size', '>', 1024], [['name', '^', 'sd'], ['type', '!=', 'SSD']]]],
 * ]
 * ```
 */

/**
 * A record as seen by callers: field name to value.
 */
export type Entry = Record<string, unknown>;

export type FilterOp =
    | '='
    | '!='
    | '>'
    | '>='
    | '<'
    | '<='
    | 'in'
    | 'nin'
    | 'rin'
    | 'rnin'
    | '^'
    | '!^'
    | '$'
    | '!$'
    | '~';

/**
 * `[field, op, value]`. Dotted field names address nested values.
 */
export type Comparison = [field: string, op: FilterOp, value: unknown];

/**
 * Disjunction. An inner list is an AND group.
 */
export type OrFilter = ['OR', Array<Filter | Filter[]>];

export type Filter = Comparison | OrFilter;

export interface QueryOptions {
    /** Return the first match instead of a list; NotFoundError when empty */
    get?: boolean;

    /** Return the number of matches */
    count?: boolean;

    limit?: number;
    offset?: number;

    /** Field names; `-field` descending, `nulls_first:` / `nulls_last:` prefixes */
    orderBy?: string[];

    /** Projection; dotted names build nested objects */
    select?: string[];

    /** Push filters to storage even when the store has an extend transform */
    forceSqlFilters?: boolean;

    /** Passed to the extend-context builder */
    extra?: Record<string, unknown>;
}

export type QueryResult = Entry[] | Entry | number;

export const FILTER_OPS: readonly FilterOp[] = [
    '=', '!=', '>', '>=', '<', '<=',
    'in', 'nin', 'rin', 'rnin',
    '^', '!^', '$', '!$', '~',
];
