/**
 * Service module exports.
 *
 * @example
 * ```typescript
 * import { ServiceManager, CRUDService, CoreService } from './service/index.js'
 *
 * const manager = new ServiceManager({ datastore })
 * manager.register(new CoreService(manager))
 * manager.register(new DiskService(manager))
 * await manager.start()
 * ```
 */

// Types
export type {
    CallContext,
    EventInfo,
    ExtendContextFn,
    ExtendFn,
    HookFn,
    HookOptions,
    JobMethodOptions,
    JobDefinition,
    MethodDescriptor,
    MethodInfo,
    MethodOptions,
    MethodDefinition,
    MethodTable,
    ModuleRef,
    PreparedCall,
    ServiceConfig,
    ServiceDescriptor,
    ServiceInfo,
    ServiceType,
} from './types.js';

// Descriptors
export {
    defineJob,
    defineMethod,
    filterable,
    parseArgs,
    type Accepts,
    type JobBody,
    type MethodBody,
    type ModuleTarget,
} from './define.js';
export { Throttle, throttle, type ThrottleCondition, type ThrottleOptions } from './throttle.js';

// Services
export { Service, describeService } from './service.js';
export { ConfigService, type ConfigServiceOptions } from './config.js';
export { CRUDService, type CRUDServiceOptions } from './crud.js';
export { CompoundService } from './compound.js';
export { CoreService, formatDescription, type BulkStatus } from './core.js';
export { extendRows } from './extend.js';

// Registry
export { DependencyIndex } from './dependencies.js';
export {
    ServiceManager,
    type ChangePayload,
    type ServiceEvent,
    type ServiceManagerOptions,
} from './manager.js';
