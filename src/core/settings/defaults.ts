/**
 * Default Settings
 *
 * Used when no keel.yml exists or when sections are missing.
 */
import { SettingsSchema } from './schema.js';
import type { Settings } from './types.js';

export const SETTINGS_FILE_NAME = 'keel.yml';

/**
 * Directories searched for `keel.yml`, in order, when no path is given.
 */
export const SETTINGS_SEARCH_PATHS = ['.', '/etc/keel'];

/**
 * Create a fresh copy of the default settings.
 */
export function createDefaultSettings(): Settings {

    return SettingsSchema.parse({});

}
