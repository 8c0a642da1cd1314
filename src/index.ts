/**
 * keel
 *
 * Runtime core of a storage-appliance control-plane daemon.
 */
export * from './core/index.js'
export * from './runtime/index.js'
