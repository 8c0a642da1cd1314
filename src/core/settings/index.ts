/**
 * Settings module exports.
 */
export type {
    Settings,
    LoggingSettings,
    JobsSettings,
    ReplicationSettings,
    DatastoreSettings,
} from './types.js';

export { SettingsSchema, SettingsValidationError, parseSettings } from './schema.js';
export type { SettingsSchemaType } from './schema.js';

export { SETTINGS_FILE_NAME, SETTINGS_SEARCH_PATHS, createDefaultSettings } from './defaults.js';

export { SettingsManager, getSettingsManager, resetSettingsManager } from './manager.js';
export type { SettingsManagerOptions } from './manager.js';
