/**
 * Runtime factory.
 *
 * Wires settings, the datastore, the scheduler, the service manager and
 * the logger into one object.
 *
 * @example
 * ```typescript
 * import { createRuntime } from 'keel-daemon'
 *
 * const runtime = await createRuntime({
 *     services: (manager) => [new DiskService(manager), new PoolService(manager)],
 * })
 *
 * const jobId = await runtime.call('pool.scrub', ['tank'])
 *
 * await runtime.close()
 * ```
 */
import { createDatastore, type DatastoreConnection } from '../core/datastore/index.js';
import { startLogger, type Logger } from '../core/logger/index.js';
import { CoreService } from '../core/service/core.js';
import { ServiceManager } from '../core/service/manager.js';
import { SettingsManager, type Settings } from '../core/settings/index.js';

import { Runtime } from './runtime.js';
import type { CreateRuntimeOptions } from './types.js';

async function loadSettings(options: CreateRuntimeOptions): Promise<Settings> {

    if (options.settings) {

        return options.settings;

    }

    const manager = new SettingsManager({
        path: options.settingsPath,
        cwd: options.cwd,
        env: options.env,
    });

    return manager.load();

}

async function openDatastore(settings: Settings, options: CreateRuntimeOptions): Promise<DatastoreConnection | null> {

    if (options.datastore === false) {

        return null;

    }

    return options.datastore ?? createDatastore(settings.datastore);

}

/**
 * Build and start a runtime. On failure, whatever was already opened is
 * closed before the error propagates.
 */
export async function createRuntime(options: CreateRuntimeOptions = {}): Promise<Runtime> {

    const settings = await loadSettings(options);

    const logger: Logger | null = options.logger === false
        ? null
        : await startLogger(settings, { console: options.console });

    const ownsConnection = !options.datastore;
    let connection: DatastoreConnection | null = null;
    let manager: ServiceManager | null = null;

    try {

        connection = await openDatastore(settings, options);
        manager = new ServiceManager({
            datastore: connection?.datastore ?? null,
            scheduler: settings.jobs,
        });

        manager.register(new CoreService(manager));

        for (const service of options.services?.(manager) ?? []) {

            manager.register(service);

        }

        await manager.start();

        return new Runtime(settings, manager, { connection, ownsConnection, logger });

    }
    catch (err) {

        await manager?.close();
        await logger?.stop();

        if (connection && ownsConnection) {

            await connection.destroy();

        }

        throw err;

    }

}

export { Runtime, type RuntimeParts } from './runtime.js';
export type { CreateRuntimeOptions } from './types.js';
