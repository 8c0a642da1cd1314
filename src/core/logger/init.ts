/**
 * Logger Initialization
 *
 * Starts the logger once settings are loaded, since the settings decide
 * the file, the level and the extra redacted fields.
 *
 * @example
 * ```typescript
 * enableAutoLoggerInit()
 * await getSettingsManager().load() // emits settings:loaded, logger starts
 * ```
 */
import type { Writable } from 'node:stream';

import { isHeadless } from '../environment.js';
import { toError } from '../errors/index.js';
import { observer } from '../observer.js';
import type { Settings } from '../settings/types.js';
import { Logger } from './logger.js';
import { addMaskedFields } from './redact.js';

export interface AutoLoggerOptions {
    /** Console stream used in headless runs (default: process.stdout) */
    console?: Writable;

    /** Fields attached to every entry */
    context?: Record<string, unknown>;
}

let settingsCleanup: (() => void) | null = null;
let logger: Logger | null = null;

/**
 * Create and start a logger for `settings`. Headless runs log compact
 * lines to the console; attached runs log JSON lines to the file.
 */
export async function startLogger(settings: Settings, options: AutoLoggerOptions = {}): Promise<Logger | null> {

    const config = settings.logging;

    if (!config.enabled) {

        return null;

    }

    addMaskedFields(config.redact);

    const headless = isHeadless();
    const instance = new Logger({
        config,
        context: options.context,
        file: headless ? undefined : config.file,
        console: headless ? options.console ?? process.stdout : undefined,
    });

    await instance.start();

    return instance;

}

/**
 * Start the logger on the next `settings:loaded`. Calling it twice is a
 * no-op.
 */
export function enableAutoLoggerInit(options: AutoLoggerOptions = {}): void {

    if (settingsCleanup) {

        return;

    }

    settingsCleanup = observer.once('settings:loaded', ({ settings }) => {

        startLogger(settings, options)
            .then((started) => {

                logger = started;

            })
            .catch((error: unknown) => {

                observer.emit('error', { source: 'logger', error: toError(error) });

            });

    });

}

export async function disableAutoLoggerInit(): Promise<void> {

    if (settingsCleanup) {

        settingsCleanup();
        settingsCleanup = null;

    }

    if (logger) {

        await logger.stop();
        logger = null;

    }

}

export function getInitializedLogger(): Logger | null {

    return logger;

}
