/**
 * Replicated store module exports.
 */
export type {
    BatchOp,
    ReplicatedBackend,
    ReplicationOptions,
    StoredPayload,
    VersionedPayload,
    VersionStamp,
} from './types.js';
export { VersionConflictError } from './types.js';

export {
    DEFAULT_HEALTH_CHECK_INTERVAL,
    DEFAULT_VERSION,
    Replication,
    formatVersion,
} from './replication.js';
export { ReplicatedConfigService } from './config.js';
export { ReplicatedCrudService } from './crud.js';
