/**
 * Replicated backend boundary.
 *
 * A clustered key/value store whose consistency is the backend's concern.
 * Payloads carry a version stamp so nodes running different releases can
 * tell when stored data has a shape they do not understand.
 */
import type { Entry } from '../filter/index.js'


export interface VersionStamp {
    major: number;
    minor: number;
}

/**
 * What a read returns. `data` is a record for config stores and a list
 * for CRUD stores, or null when nothing was ever written.
 */
export interface StoredPayload {
    version: VersionStamp | null;
    data: unknown;
}

export interface VersionedPayload {
    version: VersionStamp;
    data: Entry;
}

export interface BatchOp {
    action: 'SET' | 'DEL';
    key: string;
    value?: Entry;
}

export interface ReplicatedBackend {
    /** Health of this node's replica of `name` */
    health(name: string): Promise<boolean>;

    read(name: string): Promise<StoredPayload>;

    /**
     * Replace a config payload.
     *
     * @throws VersionConflictError when the stored version differs
     */
    write(name: string, payload: VersionedPayload): Promise<void>;

    /**
     * Add a CRUD entry and return its id.
     *
     * @throws VersionConflictError when the stored version differs
     */
    create(name: string, payload: VersionedPayload): Promise<unknown>;

    /**
     * @throws VersionConflictError when the stored version differs
     */
    update(name: string, id: unknown, payload: VersionedPayload): Promise<void>;

    /**
     * @throws VersionConflictError when the stored version differs
     */
    delete(name: string, id: unknown, version: VersionStamp): Promise<void>;

    batch(name: string, ops: BatchOp[]): Promise<void>;
}

/**
 * Raised by a backend refusing a write whose version differs from the
 * stored one.
 */
export class VersionConflictError extends Error {

    override readonly name = 'VersionConflictError' as const;

    constructor(public readonly stored: VersionStamp | null) {

        super('Stored version differs from payload version');
    }
}

export interface ReplicationOptions<D> {
    backend: ReplicatedBackend;

    /** Returned whenever the clustered store cannot be trusted */
    defaults: D;

    /** Whether this node runs clustered; checked on every call */
    isClustered: () => boolean | Promise<boolean>;

    /** Primary health predicate; its result is cached */
    clusterHealthy: () => boolean | Promise<boolean>;

    /** Version this build writes and understands. Default 0.1 */
    version?: VersionStamp;

    /** Seconds a health result is reused. Default 30 */
    healthCheckInterval?: number;

    /** Backend store name. Defaults to the namespace */
    name?: string;

    /** Monotonic clock in milliseconds */
    now?: () => number;
}
