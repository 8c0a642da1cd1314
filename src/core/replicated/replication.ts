/**
 * Health gating and version reconciliation shared by replicated Config and
 * CRUD services.
 *
 * The primary health probe runs at most once per `healthCheckInterval`;
 * its result (a thrown probe counts as unhealthy) is reused until then. Two
 * calls racing at the expiry boundary may both probe.
 * The local replica is asked only when the primary probe says unhealthy.
 */
import { attempt } from '@logosdx/utils'

import { UnhealthyBackendError, VersionMismatchError, toError } from '../errors/index.js'
import { observer } from '../observer.js'
import {
    VersionConflictError,
    type ReplicatedBackend,
    type ReplicationOptions,
    type StoredPayload,
    type VersionStamp,
} from './types.js'


export const DEFAULT_VERSION: VersionStamp = Object.freeze({ major: 0, minor: 1 })

export const DEFAULT_HEALTH_CHECK_INTERVAL = 30


export function formatVersion(version: VersionStamp | null): string {

    return version ? `${version.major}.${version.minor}` : 'unknown'
}


export class Replication<D> {

    readonly backend: ReplicatedBackend
    readonly version: VersionStamp
    readonly name: string

    readonly #defaults: D
    readonly #isClustered: () => boolean | Promise<boolean>
    readonly #clusterHealthy: () => boolean | Promise<boolean>
    readonly #intervalMs: number
    readonly #now: () => number

    #status: boolean | null = null
    #lastCheck = 0

    constructor(
        public readonly namespace: string,
        options: ReplicationOptions<D>,
    ) {

        this.backend = options.backend
        this.version = options.version ?? DEFAULT_VERSION
        this.name = options.name ?? namespace
        this.#defaults = options.defaults
        this.#isClustered = options.isClustered
        this.#clusterHealthy = options.clusterHealthy
        this.#intervalMs = (options.healthCheckInterval ?? DEFAULT_HEALTH_CHECK_INTERVAL) * 1000
        this.#now = options.now ?? (() => performance.now())
    }

    /**
     * A fresh copy of the default payload.
     */
    defaults(): D {

        return structuredClone(this.#defaults)
    }

    async isClustered(): Promise<boolean> {

        return this.#isClustered()
    }

    /**
     * Primary health, cached for the check interval.
     */
    async clusterHealthy(): Promise<boolean> {

        const now = this.#now()

        if (this.#status !== null && now - this.#lastCheck < this.#intervalMs) {

            return this.#status
        }

        const [status, err] = await attempt(async () => this.#clusterHealthy())

        if (err) {

            observer.emit('replicated:unhealthy', {
                namespace: this.namespace,
                probe: 'cluster',
                reason: `health check failed: ${toError(err).message}`,
            })
        }

        this.#status = status === true
        this.#lastCheck = now

        return this.#status
    }

    /**
     * Health of this node's replica. Never throws.
     */
    async localHealthy(): Promise<boolean> {

        const [healthy, err] = await attempt(() => this.backend.health(this.name))

        if (healthy) {

            return true
        }

        observer.emit('replicated:unhealthy', {
            namespace: this.namespace,
            probe: 'local',
            reason: err ? `health check failed: ${toError(err).message}` : 'replica reports unhealthy',
        })

        return false
    }

    /**
     * Stored payload for the read path, or null when the backend fails
     * the read. A failed read is reported as unhealthy.
     */
    async readStored(): Promise<StoredPayload | null> {

        const [stored, err] = await attempt(() => this.backend.read(this.name))

        if (err) {

            this.reportFailure('read', err)
            return null
        }

        return stored
    }

    reportFailure(action: string, err: unknown): void {

        observer.emit('replicated:unhealthy', {
            namespace: this.namespace,
            probe: 'cluster',
            reason: `${action} failed: ${toError(err).message}`,
        })
    }

    /**
     * False only when both probes say unhealthy.
     */
    async readable(): Promise<boolean> {

        return await this.clusterHealthy() || await this.localHealthy()
    }

    /**
     * @throws UnhealthyBackendError when the primary probe says unhealthy
     */
    async assertWritable(): Promise<void> {

        if (!await this.clusterHealthy()) {

            throw new UnhealthyBackendError(
                this.namespace,
                'clustered configuration may not be altered while cluster is unhealthy',
            )
        }
    }

    /**
     * True when `stored` was written by an incompatible version. A missing
     * stamp is accepted.
     */
    mismatched(stored: StoredPayload): boolean {

        const version = stored.version

        return version !== null
            && (version.major !== this.version.major || version.minor !== this.version.minor)
    }

    /**
     * Report a mismatch found on the read path.
     */
    reportMismatch(stored: StoredPayload): void {

        observer.emit('replicated:version-mismatch', {
            namespace: this.namespace,
            local: formatVersion(this.version),
            stored: formatVersion(stored.version),
        })
    }

    /**
     * @throws VersionMismatchError when `stored` is incompatible
     */
    assertCompatible(stored: StoredPayload): void {

        if (this.mismatched(stored)) {

            throw new VersionMismatchError(this.namespace, this.version, stored.version)
        }
    }

    /**
     * Read the stored payload ahead of a write.
     *
     * @throws VersionMismatchError when it was written by another version
     */
    async readForWrite(): Promise<StoredPayload> {

        const stored = await this.backend.read(this.name)

        this.assertCompatible(stored)

        return stored
    }

    /**
     * Run a backend write, translating version conflicts.
     *
     * @throws VersionMismatchError when the backend refuses the version
     */
    async write<T>(fn: () => Promise<T>, stored: VersionStamp | null = null): Promise<T> {

        try {

            return await fn()
        }
        catch (err) {

            if (err instanceof VersionConflictError) {

                throw new VersionMismatchError(this.namespace, this.version, err.stored ?? stored)
            }

            throw err
        }
    }
}
