/**
 * Zod schemas for filters and query options received from callers.
 */
import { attemptSync } from '@logosdx/utils'
import { z } from 'zod'

import type { Filter, QueryOptions } from './types.js'


export const FilterOpSchema = z.enum([
    '=', '!=', '>', '>=', '<', '<=',
    'in', 'nin', 'rin', 'rnin',
    '^', '!^', '$', '!$', '~',
])


/**
 * `~` patterns are matched anchored at the start of the value.
 */
function compiles(pattern: unknown): boolean {

    if (typeof pattern !== 'string') {

        return false
    }

    const [, err] = attemptSync(() => new RegExp(`^(?:${pattern})`))

    return !err
}


const ComparisonSchema = z.tuple([z.string().min(1), FilterOpSchema, z.unknown()])
    .superRefine(([, op, value], ctx) => {

        if (op === '~' && !compiles(value)) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [2], message: 'Invalid regular expression' })
        }
    })


export const FilterSchema: z.ZodType<Filter> = z.lazy(() => z.union([
    z.tuple([z.literal('OR'), z.array(z.union([FilterSchema, z.array(FilterSchema)]))]),
    ComparisonSchema,
]))


export const QueryOptionsSchema: z.ZodType<QueryOptions> = z.object({
    get: z.boolean().optional(),
    count: z.boolean().optional(),
    limit: z.number().int().nonnegative().optional(),
    offset: z.number().int().nonnegative().optional(),
    orderBy: z.array(z.string()).optional(),
    select: z.array(z.string()).optional(),
    forceSqlFilters: z.boolean().optional(),
    extra: z.record(z.unknown()).optional(),
}).strict()
