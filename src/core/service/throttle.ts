/**
 * Per-key call throttling.
 *
 * A call closer than `seconds` to the previous admitted call with the same
 * key waits, re-checking every `retryMs`, until the period has passed.
 * `condition` may let a call through immediately or pick the key from the
 * arguments.
 *
 * @example
 * ```typescript
 * const perPool = throttle({
 *     seconds: 5,
 *     condition: ([pool]) => [false, String(pool)],
 * })
 *
 * defineMethod(z.tuple([z.string()]), (ctx, pool) => scan(pool), { throttle: perPool })
 * ```
 */
import { setTimeout as delay } from 'node:timers/promises'

import { CallError, ERRNO } from '../errors/index.js'


/**
 * Returns `[shortcut, key]`. A true shortcut skips throttling.
 */
export type ThrottleCondition = (args: unknown[]) => [boolean, string | null]

export interface ThrottleOptions {
    seconds: number
    condition?: ThrottleCondition

    /** Waiters allowed at once before new calls are refused. Default 10. */
    maxWaiters?: number

    /** Default 500 */
    retryMs?: number

    /** Monotonic clock in milliseconds */
    now?: () => number
}


export class Throttle {

    readonly #lastCalls = new Map<string | null, number>()
    readonly #periodMs: number
    readonly #condition: ThrottleCondition | null
    readonly #maxWaiters: number
    readonly #retryMs: number
    readonly #now: () => number
    #waiters = 0

    constructor(options: ThrottleOptions) {

        this.#periodMs = options.seconds * 1000
        this.#condition = options.condition ?? null
        this.#maxWaiters = options.maxWaiters ?? 10
        this.#retryMs = options.retryMs ?? 500
        this.#now = options.now ?? (() => performance.now())
    }

    get waiters(): number {

        return this.#waiters
    }

    /**
     * Resolve once the call may proceed.
     *
     * @throws CallError (EBUSY) when `maxWaiters` calls are already waiting
     */
    async admit(args: unknown[]): Promise<void> {

        let key: string | null = null

        if (this.#condition) {

            const [shortcut, conditionKey] = this.#condition(args)

            if (shortcut) {

                return
            }

            key = conditionKey
        }

        if (this.#register(key)) {

            return
        }

        if (this.#waiters >= this.#maxWaiters) {

            throw new CallError('Too many throttled calls waiting', ERRNO.EBUSY, { key })
        }

        this.#waiters++

        try {

            while (!this.#register(key)) {

                await delay(this.#retryMs)
            }
        }
        finally {

            this.#waiters--
        }
    }

    async run<T>(args: unknown[], fn: () => T | Promise<T>): Promise<T> {

        await this.admit(args)

        return fn()
    }

    #register(key: string | null): boolean {

        const now = this.#now()
        const last = this.#lastCalls.get(key)

        if (last === undefined || now - last > this.#periodMs) {

            this.#lastCalls.set(key, now)
            return true
        }

        return false
    }
}


export function throttle(options: ThrottleOptions): Throttle {

    return new Throttle(options)
}
