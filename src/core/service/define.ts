/**
 * Method and job descriptors.
 *
 * `accepts` is a zod tuple validating the raw positional arguments. Missing
 * trailing arguments are passed as `undefined`, so `.default()` and
 * `.optional()` items behave like optional parameters.
 *
 * @example
 * ```typescript
 * methods(): MethodTable {
 *     return {
 *         ping: defineMethod(z.tuple([]), () => 'pong'),
 *
 *         scrub: defineJob(
 *             z.tuple([z.string()]),
 *             async (job, pool) => scrub(job, pool),
 *             { lock: ([pool]) => `pool:${String(pool)}`, lockQueueSize: 1, abortable: true },
 *         ),
 *
 *         checksum: defineJob(
 *             z.tuple([z.string()]),
 *             { mode: 'thread', module: new URL('./checksum.mjs', import.meta.url).href },
 *         ),
 *     }
 * }
 * ```
 */
import { z } from 'zod'

import { ValidationErrors } from '../errors/index.js'
import { FilterSchema, QueryOptionsSchema } from '../filter/index.js'
import type { Job } from '../job/index.js'
import type {
    CallContext,
    JobMethodOptions,
    JobDefinition,
    MethodOptions,
    MethodDefinition,
    ModuleRef,
} from './types.js'


export type Accepts<A extends unknown[]> = z.ZodType<A, z.ZodTypeDef, unknown>

export type ModuleTarget = { mode: 'thread' | 'process' } & ModuleRef

export type MethodBody<A extends unknown[]> = (ctx: CallContext, ...args: A) => unknown

export type JobBody<A extends unknown[]> = (job: Job, ...args: A) => unknown


/**
 * `(filters, options)` as taken by every query method.
 */
export const filterable = z.tuple([
    z.array(FilterSchema).default([]),
    QueryOptionsSchema.default({}),
])


export function defineMethod<A extends unknown[]>(
    accepts: Accepts<A>,
    body: MethodBody<A> | ModuleTarget,
    options: MethodOptions = {},
): MethodDefinition {

    const run = typeof body === 'function' ? body : null

    return Object.freeze({
        kind: 'method' as const,
        mode: typeof body === 'function' ? 'loop' as const : body.mode,
        private: options.private ?? false,
        lock: options.lock ?? null,
        throttle: options.throttle ?? null,
        description: options.description ?? null,
        module: typeof body === 'function' ? null : moduleRef(body),

        prepare(raw: unknown[], ctx: CallContext) {

            const args = parseArgs(accepts, raw)

            return {
                args,
                run: run ? () => run(ctx, ...args) : null,
            }
        },
    })
}


export function defineJob<A extends unknown[]>(
    accepts: Accepts<A>,
    body: JobBody<A> | ModuleTarget,
    options: JobMethodOptions = {},
): JobDefinition {

    const { private: isPrivate, ...jobOptions } = options
    const run = typeof body === 'function' ? body : null

    return Object.freeze({
        kind: 'job' as const,
        mode: typeof body === 'function' ? 'loop' as const : body.mode,
        private: isPrivate ?? false,
        options: jobOptions,
        description: null,
        module: typeof body === 'function' ? null : moduleRef(body),

        prepare(raw: unknown[]) {

            const args = parseArgs(accepts, raw)

            return {
                args,
                run: run ? (job: Job) => run(job, ...args) : null,
            }
        },
    })
}


/**
 * Validate positional arguments.
 *
 * @throws ValidationErrors with paths like `arguments.0.name`
 */
export function parseArgs<A extends unknown[]>(accepts: Accepts<A>, raw: unknown[], schemaName = 'arguments'): A {

    const result = accepts.safeParse(pad(accepts, raw))

    if (!result.success) {

        throw ValidationErrors.fromZod(schemaName, result.error.issues)
    }

    return result.data
}


function pad<A extends unknown[]>(accepts: Accepts<A>, raw: unknown[]): unknown[] {

    if (accepts instanceof z.ZodTuple && raw.length < accepts.items.length) {

        return [...raw, ...new Array<undefined>(accepts.items.length - raw.length).fill(undefined)]
    }

    return raw
}


function moduleRef(target: ModuleTarget): ModuleRef {

    return target.export === undefined
        ? { module: target.module }
        : { module: target.module, export: target.export }
}
