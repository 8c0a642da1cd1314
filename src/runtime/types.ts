/**
 * Runtime types.
 */
import type { Writable } from 'node:stream';

import type { DatastoreConnection } from '../core/datastore/index.js';
import type { Service } from '../core/service/index.js';
import type { ServiceManager } from '../core/service/manager.js';
import type { Settings } from '../core/settings/index.js';

/**
 * Options for `createRuntime()`.
 */
export interface CreateRuntimeOptions {
    /** Settings file. Default: search `./keel.yml` then `/etc/keel/keel.yml` */
    settingsPath?: string;

    /** Base for relative paths (default: process.cwd()) */
    cwd?: string;

    /** Environment for overrides (default: process.env) */
    env?: NodeJS.ProcessEnv;

    /** Use these settings instead of loading keel.yml */
    settings?: Settings;

    /**
     * An already open datastore, or `false` to run without one. Default:
     * open the one named in settings.
     */
    datastore?: DatastoreConnection | false;

    /** Start the logger (default: true) */
    logger?: boolean;

    /** Console stream for headless logging */
    console?: Writable;

    /** Build the services to register, after `core` */
    services?: (manager: ServiceManager) => Service[];
}
