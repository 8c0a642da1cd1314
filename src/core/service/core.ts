/**
 * The `core` namespace: job table access, bulk calls and introspection.
 *
 * @example
 * ```typescript
 * manager.register(new CoreService(manager))
 *
 * const running = await manager.call('core.get_jobs', [[['state', '=', 'RUNNING']]])
 * const bulkId = await manager.call('core.bulk', ['disk.delete', [[1], [2]], 'Deleting disk {0}'])
 * ```
 */
import { z } from 'zod'

import { isRecord, type Filter, type QueryOptions, type QueryResult } from '../filter/index.js'
import type { Job } from '../job/index.js'
import { defineJob, defineMethod, filterable } from './define.js'
import { Service } from './service.js'
import type { ServiceManager } from './manager.js'
import type { MethodTable } from './types.js'


export interface BulkStatus {
    result: unknown
    error: string | null
    job_id?: number
}


const JobUpdateSchema = z.object({
    progress: z.object({
        percent: z.number().nullable(),
        description: z.string().nullable().optional(),
        extra: z.unknown().optional(),
    }).optional(),
})


export class CoreService extends Service {

    constructor(manager: ServiceManager) {

        super(manager, { namespace: 'core', datastore: null })
    }

    override methods(): MethodTable {

        const id = z.tuple([z.number().int()])

        return {
            get_jobs: defineMethod(filterable, (_ctx, filters, options) => this.getJobs(filters, options)),
            job_wait: defineJob(id, (job, target) => job.wrap(this.manager.scheduler.getOrThrow(target))),
            job_abort: defineMethod(id, (_ctx, target) => this.manager.scheduler.abort(target)),
            job_update: defineMethod(
                z.tuple([z.number().int(), JobUpdateSchema]),
                (_ctx, target, data) => this.jobUpdate(target, data),
            ),
            bulk: defineJob(
                z.tuple([z.string(), z.array(z.array(z.unknown())), z.string().nullable().default(null)]),
                (job, method, params, description) => this.bulk(job, method, params, description),
                { lock: (args) => `bulk:${String(args[0])}` },
            ),
            get_services: defineMethod(z.tuple([]), () => this.manager.getServices()),
            get_methods: defineMethod(
                z.tuple([z.string().optional()]),
                (_ctx, namespace) => this.manager.getMethods(namespace),
            ),
            get_events: defineMethod(z.tuple([]), () => this.manager.getEvents()),
            ping: defineMethod(z.tuple([]), () => 'pong'),
            reap_jobs: defineMethod(z.tuple([]), () => this.manager.scheduler.reap()),
        }
    }

    getJobs(filters: Filter[] = [], options: QueryOptions = {}): QueryResult {

        return this.manager.scheduler.list(filters, options)
    }

    jobUpdate(id: number, data: z.infer<typeof JobUpdateSchema>): void {

        const job = this.manager.scheduler.getOrThrow(id)
        const progress = data.progress

        if (progress) {

            job.setProgress(progress.percent, progress.description, progress.extra)
        }
    }

    /**
     * Call `method` once per entry of `params`, in order. Failures are
     * reported per call; the bulk job itself always succeeds.
     */
    async bulk(job: Job, method: string, params: unknown[][], description: string | null): Promise<BulkStatus[]> {

        const statuses: BulkStatus[] = []

        for (const [i, args] of params.entries()) {

            let progress = `${i} / ${params.length}`

            if (description !== null) {

                progress += `: ${formatDescription(description, args)}`
            }

            job.setProgress(100 * i / params.length, progress)

            statuses.push(await this.#bulkCall(job, method, args))
        }

        return statuses
    }

    async #bulkCall(job: Job, method: string, args: unknown[]): Promise<BulkStatus> {

        try {

            if (this.manager.isJob(method)) {

                const child = this.manager.callJob(method, args, { job })

                try {

                    return { result: await child.wait(), error: null, job_id: child.id }
                }
                catch (err) {

                    return { result: null, error: errorText(err), job_id: child.id }
                }
            }

            return { result: await this.manager.call(method, args, { job }), error: null }
        }
        catch (err) {

            return { result: null, error: errorText(err) }
        }
    }
}


/**
 * Fill `{0}` and `{0[key]}` placeholders from positional arguments.
 */
export function formatDescription(template: string, args: unknown[]): string {

    return template.replace(/\{(\d+)(?:\[([^\]]+)\])?\}/g, (_match, index: string, key: string | undefined) => {

        const value = args[Number(index)]

        if (key === undefined) {

            return String(value ?? '')
        }

        return isRecord(value) ? String(value[key] ?? '') : ''
    })
}


function errorText(err: unknown): string {

    return err instanceof Error ? err.message : String(err)
}
