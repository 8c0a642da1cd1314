/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs through
 * observer.queue(), with redaction of sensitive fields and size-based
 * rotation.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    RotationResult,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, passes, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, formatLine, sanitizeData, serializeEntry } from './formatter.js';

// Rotation
export { parseSize, rotatedName, listRotatedFiles, checkAndRotate } from './rotation.js';

// Redaction
export { addMaskedFields, isMaskedField, maskValue, filterData } from './redact.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';

// Initialization
export {
    startLogger,
    enableAutoLoggerInit,
    disableAutoLoggerInit,
    getInitializedLogger,
    type AutoLoggerOptions,
} from './init.js';
