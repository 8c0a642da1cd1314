/**
 * Compile filters and ordering into SQL fragments.
 *
 * Only operators with identical semantics in SQLite and PostgreSQL are
 * pushed down; `rin`, `rnin`, `~` and dotted fields are evaluated in-process
 * by the caller instead.
 */
import { sql, type RawBuilder } from 'kysely'

import {
    isFilterGroup,
    parseOrderBy,
    type Comparison,
    type Filter,
    type FilterOp,
} from '../filter/index.js'


const PUSHABLE_OPS: ReadonlySet<FilterOp> = new Set([
    '=', '!=', '>', '>=', '<', '<=', 'in', 'nin', '^', '!^', '$', '!$',
])


export type ColumnOf = (field: string) => string
export type Encode = (value: unknown) => unknown


/**
 * True when every filter (OR branches included) can run as SQL.
 */
export function isPushable(filters: Array<Filter | Filter[]>): boolean {

    return filters.every((item) => {

        if (isFilterGroup(item)) {

            return isPushable(item)
        }

        if (item.length === 2) {

            return isPushable(item[1])
        }

        const [field, op] = item

        return PUSHABLE_OPS.has(op) && !field.includes('.')
    })
}


/**
 * True when every order-by field is a plain column.
 */
export function isOrderPushable(orderBy: string[] = []): boolean {

    return orderBy.every((o) => !parseOrderBy(o).field.includes('.'))
}


const TRUE = sql<boolean>`1 = 1`
const FALSE = sql<boolean>`1 = 0`


function text(value: RawBuilder<unknown>): RawBuilder<unknown> {

    return sql`CAST(${value} AS TEXT)`
}


function compileComparison([field, op, raw]: Comparison, column: ColumnOf, encode: Encode): RawBuilder<unknown> {

    const col = sql.ref(column(field))

    if (op === 'in' || op === 'nin') {

        const list = Array.isArray(raw) ? raw : []
        const hasNull = list.some((v) => v == null)
        const values = list.filter((v) => v != null).map(encode)
        const inList = values.length ? sql`${col} IN (${sql.join(values)})` : FALSE

        if (op === 'in') {

            return hasNull ? sql`(${inList} OR ${col} IS NULL)` : inList
        }

        const notIn = values.length ? sql`${col} NOT IN (${sql.join(values)})` : TRUE

        return hasNull
            ? sql`(${notIn} AND ${col} IS NOT NULL)`
            : sql`(${notIn} OR ${col} IS NULL)`
    }

    if (raw == null) {

        if (op === '=') return sql`${col} IS NULL`
        if (op === '!=') return sql`${col} IS NOT NULL`

        // Ordering and string operators never match null
        return FALSE
    }

    const value = encode(raw)
    const valueText = text(sql`${value}`)
    const colText = text(sql`${col}`)

    switch (op) {

    case '=':
        return sql`${col} = ${value}`

    case '!=':
        return sql`(${col} <> ${value} OR ${col} IS NULL)`

    case '>':
        return sql`${col} > ${value}`

    case '>=':
        return sql`${col} >= ${value}`

    case '<':
        return sql`${col} < ${value}`

    case '<=':
        return sql`${col} <= ${value}`

    case '^':
        return sql`substr(${colText}, 1, length(${valueText})) = ${valueText}`

    case '!^':
        return sql`(${col} IS NOT NULL AND substr(${colText}, 1, length(${valueText})) <> ${valueText})`

    case '$':
        return sql`substr(${colText}, length(${colText}) - length(${valueText}) + 1) = ${valueText}`

    case '!$':
        return sql`(${col} IS NOT NULL AND substr(${colText}, length(${colText}) - length(${valueText}) + 1) <> ${valueText})`

    default:
        throw new Error(`Operator '${op}' cannot be compiled to SQL`)
    }
}


function compileFilter(filter: Filter, column: ColumnOf, encode: Encode): RawBuilder<unknown> {

    if (filter.length === 2) {

        const branches = filter[1].map((branch) => isFilterGroup(branch)
            ? compileWhere(branch, column, encode)
            : compileFilter(branch, column, encode))

        return branches.length ? sql`(${sql.join(branches, sql` OR `)})` : FALSE
    }

    return compileComparison(filter, column, encode)
}


/**
 * AND of every filter, as one parenthesized expression.
 */
export function compileWhere(filters: Filter[], column: ColumnOf, encode: Encode): RawBuilder<unknown> {

    if (!filters.length) {

        return TRUE
    }

    const parts = filters.map((f) => compileFilter(f, column, encode))

    return sql`(${sql.join(parts, sql` AND `)})`
}


/**
 * `ORDER BY` clause, or an empty fragment.
 */
export function compileOrderBy(orderBy: string[] = [], column: ColumnOf): RawBuilder<unknown> {

    if (!orderBy.length) {

        return sql``
    }

    const parts = orderBy.map((o) => {

        const key = parseOrderBy(o)
        const col = sql.ref(column(key.field))
        const direction = key.descending ? sql`DESC` : sql`ASC`

        // Explicit null placement so both dialects order alike
        return key.nullsFirst
            ? sql`${col} IS NOT NULL, ${col} ${direction}`
            : sql`${col} IS NULL, ${col} ${direction}`
    })

    return sql` ORDER BY ${sql.join(parts)}`
}
