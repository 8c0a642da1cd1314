/**
 * In-process evaluation of filters and query options.
 *
 * Used when filters reference fields computed by an extend transform, for
 * the job table, and by datastores whenever a filter cannot be expressed
 * in SQL.
 */
import { NotFoundError } from '../errors/index.js'
import type {
    Comparison,
    Entry,
    Filter,
    QueryOptions,
    QueryResult,
} from './types.js'


/**
 * Read a possibly dotted field from an entry.
 */
export function getField(entry: Entry, field: string): unknown {

    let current: unknown = entry

    for (const part of field.split('.')) {

        if (!isRecord(current)) {

            return undefined
        }

        current = current[part]
    }

    return current
}


/**
 * Write a possibly dotted field, creating intermediate objects.
 */
export function setField(entry: Entry, field: string, value: unknown): void {

    const parts = field.split('.')
    const last = parts.pop() ?? field
    let current: Entry = entry

    for (const part of parts) {

        const next = current[part]

        if (isRecord(next)) {

            current = next
        }
        else {

            const created: Entry = {}
            current[part] = created
            current = created
        }
    }

    current[last] = value
}


export function isRecord(value: unknown): value is Entry {

    return typeof value === 'object' && value !== null && !Array.isArray(value)
}


function compare(a: unknown, b: unknown): number | null {

    if (typeof a === 'number' && typeof b === 'number') {

        return a - b
    }

    if (typeof a === 'string' && typeof b === 'string') {

        return a < b ? -1 : a > b ? 1 : 0
    }

    if (typeof a === 'bigint' && typeof b === 'bigint') {

        return a < b ? -1 : a > b ? 1 : 0
    }

    return null
}


function contains(container: unknown, value: unknown): boolean {

    if (Array.isArray(container)) {

        return container.includes(value)
    }

    if (typeof container === 'string' && typeof value === 'string') {

        return container.includes(value)
    }

    return false
}


function matchComparison(entry: Entry, [field, op, value]: Comparison): boolean {

    const actual = getField(entry, field)

    switch (op) {

    case '=':
        return actual === value || (actual === undefined && value === null)

    case '!=':
        return !(actual === value || (actual === undefined && value === null))

    case '>': {

        const c = compare(actual, value)
        return c !== null && c > 0
    }

    case '>=': {

        const c = compare(actual, value)
        return c !== null && c >= 0
    }

    case '<': {

        const c = compare(actual, value)
        return c !== null && c < 0
    }

    case '<=': {

        const c = compare(actual, value)
        return c !== null && c <= 0
    }

    case 'in':
        return contains(value, actual)

    case 'nin':
        return !contains(value, actual)

    case 'rin':
        return actual != null && contains(actual, value)

    case 'rnin':
        return actual != null && !contains(actual, value)

    case '^':
        return typeof actual === 'string' && typeof value === 'string' && actual.startsWith(value)

    case '!^':
        return typeof actual === 'string' && typeof value === 'string' && !actual.startsWith(value)

    case '$':
        return typeof actual === 'string' && typeof value === 'string' && actual.endsWith(value)

    case '!$':
        return typeof actual === 'string' && typeof value === 'string' && !actual.endsWith(value)

    case '~':
        // Anchored at the start of the value, not the whole string
        return typeof actual === 'string'
            && typeof value === 'string'
            && new RegExp(`^(?:${value})`).test(actual)
    }
}


/**
 * True when the entry satisfies one filter.
 */
export function matchFilter(entry: Entry, filter: Filter): boolean {

    if (filter.length === 2) {

        return filter[1].some((branch) => isFilterGroup(branch)
            ? branch.every((f) => matchFilter(entry, f))
            : matchFilter(entry, branch))
    }

    return matchComparison(entry, filter)
}


/**
 * True when the entry satisfies every filter.
 */
export function matchAll(entry: Entry, filters: Filter[]): boolean {

    return filters.every((f) => matchFilter(entry, f))
}


export function isFilterGroup(branch: Filter | Filter[]): branch is Filter[] {

    // A group's first element is itself a filter tuple; a filter's is its field name
    return branch.length === 0 || Array.isArray(branch[0])
}


/**
 * Every field a filter list reads, OR branches included.
 */
export function filterFields(filters: Array<Filter | Filter[]>): string[] {

    const fields: string[] = []

    for (const item of filters) {

        if (isFilterGroup(item)) {

            fields.push(...filterFields(item))
        }
        else if (item.length === 2) {

            fields.push(...filterFields(item[1]))
        }
        else {

            fields.push(item[0])
        }
    }

    return fields
}


interface OrderKey {
    field: string
    descending: boolean
    nullsFirst: boolean
}


export function parseOrderBy(orderBy: string): OrderKey {

    let field = orderBy
    let nullsFirst: boolean | null = null

    if (field.startsWith('nulls_first:')) {

        nullsFirst = true
        field = field.slice('nulls_first:'.length)
    }
    else if (field.startsWith('nulls_last:')) {

        nullsFirst = false
        field = field.slice('nulls_last:'.length)
    }

    const descending = field.startsWith('-')

    if (descending) {

        field = field.slice(1)
    }

    return { field, descending, nullsFirst: nullsFirst ?? false }
}


function sortEntries(entries: Entry[], orderBy: string[]): Entry[] {

    const keys = orderBy.map(parseOrderBy)

    return [...entries].sort((a, b) => {

        for (const key of keys) {

            const av = getField(a, key.field)
            const bv = getField(b, key.field)
            const aNull = av == null
            const bNull = bv == null

            if (aNull || bNull) {

                if (aNull && bNull) continue

                return (aNull ? -1 : 1) * (key.nullsFirst ? 1 : -1)
            }

            const c = compare(av, bv) ?? compare(String(av), String(bv)) ?? 0

            if (c !== 0) {

                return key.descending ? -c : c
            }
        }

        return 0
    })
}


function project(entry: Entry, select: string[]): Entry {

    const out: Entry = {}

    for (const field of select) {

        const value = getField(entry, field)

        if (value !== undefined) {

            setField(out, field, value)
        }
    }

    return out
}


/**
 * Apply ordering, paging, projection and result shaping to rows that
 * already passed their filters.
 *
 * @param entity - name used in the NotFoundError raised by `get`
 */
export function shapeResult(entries: Entry[], options: QueryOptions = {}, entity = 'Object'): QueryResult {

    let rows = entries

    if (options.count) {

        return rows.length
    }

    if (options.orderBy?.length) {

        rows = sortEntries(rows, options.orderBy)
    }

    const offset = options.offset ?? 0

    if (offset || options.limit) {

        rows = rows.slice(offset, options.limit ? offset + options.limit : undefined)
    }

    if (options.select?.length) {

        const select = options.select
        rows = rows.map((row) => project(row, select))
    }

    if (options.get) {

        const [first] = rows

        if (!first) {

            throw new NotFoundError(entity)
        }

        return first
    }

    return rows
}


/**
 * Filter and shape a list of entries in-process.
 *
 * @example
 * ```typescript
 * applyQuery(jobs, [['state', '=', 'RUNNING']], { orderBy: ['-id'], limit: 5 })
 * ```
 */
export function applyQuery(
    entries: Entry[],
    filters: Filter[] = [],
    options: QueryOptions = {},
    entity = 'Object',
): QueryResult {

    const matched = filters.length
        ? entries.filter((e) => matchAll(e, filters))
        : entries

    return shapeResult(matched, options, entity)
}
