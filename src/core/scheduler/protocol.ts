/**
 * Messages exchanged with thread and process job bodies.
 *
 * Outbound messages are structured-cloned; inbound ones are validated
 * before the scheduler trusts them.
 */
import { z } from 'zod'

import type { BlockingLockRef } from '../lock/index.js'


/**
 * A unit of work for a worker thread or child process.
 */
export interface WorkerTask {
    jobId: number | null
    module: string
    export?: string
    args: unknown[]
    lock: BlockingLockRef | null
}

export interface RunMessage extends WorkerTask {
    type: 'run'
    taskId: number
}

/**
 * Callbacks fired while a task runs.
 */
export interface TaskHooks {
    onProgress?: (percent: number | null, description: string | null, extra: unknown) => void
    onLog?: (text: string) => void
}


export const WorkerMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('progress'),
        taskId: z.number(),
        percent: z.number().nullable(),
        description: z.string().nullable(),
        extra: z.unknown(),
    }),
    z.object({
        type: z.literal('log'),
        taskId: z.number(),
        text: z.string(),
    }),
    z.object({
        type: z.literal('result'),
        taskId: z.number(),
        value: z.unknown(),
    }),
    z.object({
        type: z.literal('error'),
        taskId: z.number(),
        name: z.string(),
        message: z.string(),
        stack: z.string().nullable(),
    }),
])

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>
