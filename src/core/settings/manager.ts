/**
 * Settings Manager
 *
 * Loads keel.yml, applies environment overrides and validates the result.
 * A missing file is not an error: every field has a default.
 */
import { readFile, access } from 'node:fs/promises'
import { isAbsolute, join, resolve } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { isRecord } from '../filter/index.js'
import { observer } from '../observer.js'
import { parseSettings } from './schema.js'
import { SETTINGS_FILE_NAME, SETTINGS_SEARCH_PATHS, createDefaultSettings } from './defaults.js'
import type {
    Settings,
    LoggingSettings,
    JobsSettings,
    ReplicationSettings,
    DatastoreSettings,
} from './types.js'


export interface SettingsManagerOptions {

    /** Explicit settings file. Skips the search path */
    path?: string

    /** Base for relative paths (default: process.cwd()) */
    cwd?: string

    /** Environment to read overrides from (default: process.env) */
    env?: NodeJS.ProcessEnv
}


/**
 * Environment variables mapped onto settings fields.
 */
const ENV_OVERRIDES: ReadonlyArray<[variable: string, section: string, field: string]> = [
    ['KEEL_LOG_LEVEL', 'logging', 'level'],
    ['KEEL_LOG_FILE', 'logging', 'file'],
    ['KEEL_JOBS_LOGS_DIR', 'jobs', 'logsDir'],
]


/**
 * Manages daemon settings from keel.yml.
 *
 * @example
 * ```typescript
 * const manager = new SettingsManager({ path: '/etc/keel/keel.yml' })
 * const settings = await manager.load()
 *
 * new JobScheduler(manager.jobs)
 * ```
 */
export class SettingsManager {

    #cwd: string
    #path: string | null
    #env: NodeJS.ProcessEnv
    #settings: Settings | null = null
    #source: string | null = null

    constructor(options: SettingsManagerOptions = {}) {

        this.#cwd = options.cwd ?? process.cwd()
        this.#path = options.path ? resolve(this.#cwd, options.path) : null
        this.#env = options.env ?? process.env
    }

    // ─────────────────────────────────────────────────────────────
    // Loading
    // ─────────────────────────────────────────────────────────────

    /**
     * Find the settings file. An explicit path is returned whether or not
     * it exists; otherwise the first search directory holding keel.yml.
     */
    async locate(): Promise<string | null> {

        if (this.#path) {

            return this.#path
        }

        for (const dir of SETTINGS_SEARCH_PATHS) {

            const candidate = join(isAbsolute(dir) ? dir : resolve(this.#cwd, dir), SETTINGS_FILE_NAME)
            const [, err] = await attempt(() => access(candidate))

            if (!err) {

                return candidate
            }
        }

        return null
    }

    /**
     * Load and validate settings.
     *
     * @throws SettingsValidationError if settings are invalid
     * @throws Error when the file cannot be read or is not valid YAML
     */
    async load(): Promise<Settings> {

        const path = await this.locate()
        let raw: unknown = {}
        let fromFile = false

        if (path) {

            const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

            if (readErr && !this.#isMissing(readErr)) {

                throw new Error(`Failed to read settings file: ${readErr.message}`)
            }

            if (content !== null) {

                const [parsed, yamlErr] = attemptSync(() => parseYaml(content))

                if (yamlErr) {

                    throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`)
                }

                raw = parsed ?? {}
                fromFile = true
            }
        }

        this.#settings = parseSettings(this.#applyEnv(raw))
        this.#source = path ?? join(this.#cwd, SETTINGS_FILE_NAME)

        observer.emit('settings:loaded', {
            path: this.#source,
            settings: this.#settings,
            fromFile,
        })

        return this.#settings
    }

    #applyEnv(raw: unknown): unknown {

        if (!isRecord(raw)) {

            return raw
        }

        const out: Record<string, unknown> = { ...raw }

        for (const [variable, section, field] of ENV_OVERRIDES) {

            const value = this.#env[variable]

            if (!value) {

                continue
            }

            const current = out[section]

            out[section] = { ...(isRecord(current) ? current : {}), [field]: value }
        }

        return out
    }

    #isMissing(err: Error): boolean {

        return 'code' in err && err.code === 'ENOENT'
    }

    // ─────────────────────────────────────────────────────────────
    // Accessors
    // ─────────────────────────────────────────────────────────────

    get isLoaded(): boolean {

        return this.#settings !== null
    }

    /**
     * Where settings were read from, or would have been.
     */
    get source(): string | null {

        return this.#source
    }

    /**
     * Loaded settings, or the defaults before `load()`.
     */
    get settings(): Settings {

        return this.#settings ?? createDefaultSettings()
    }

    get logging(): LoggingSettings {

        return this.settings.logging
    }

    get jobs(): JobsSettings {

        return this.settings.jobs
    }

    get replication(): ReplicationSettings {

        return this.settings.replication
    }

    get datastore(): DatastoreSettings {

        return this.settings.datastore
    }
}


// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let settingsManagerInstance: SettingsManager | null = null


/**
 * Get the process-wide settings manager. Options only apply on first call.
 */
export function getSettingsManager(options?: SettingsManagerOptions): SettingsManager {

    if (!settingsManagerInstance) {

        settingsManagerInstance = new SettingsManager(options)
    }

    return settingsManagerInstance
}


export function resetSettingsManager(): void {

    settingsManagerInstance = null
}
