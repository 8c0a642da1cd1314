/**
 * Core module exports.
 *
 * Everything the daemon runtime and the transport layer build on.
 */

// Observer
export { observer, type ChangeType, type KeelEvents, type KeelEventNames, type KeelEventCallback } from './observer.js'

// Environment
export { isHeadless, isDebug } from './environment.js'

// Errors
export * from './errors/index.js'

// Query filters
export * from './filter/index.js'

// Locks
export * from './lock/index.js'

// Jobs and scheduling
export * from './job/index.js'
export * from './scheduler/index.js'

// Datastore
export * from './datastore/index.js'

// Services
export * from './service/index.js'
export * from './replicated/index.js'

// Settings
export * from './settings/index.js'

// Logger
export * from './logger/index.js'
