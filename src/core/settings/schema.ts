/**
 * Settings Zod schemas and validation.
 *
 * Every section and field is optional in `keel.yml`; parsing fills in
 * the defaults so callers always see a complete `Settings` object.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

const DialectSchema = z.enum(['sqlite', 'postgres']);

/**
 * File size pattern (e.g., '10mb', '100kb').
 */
const FileSizeSchema = z
    .string()
    .regex(/^\d+\s*(b|kb|mb|gb)$/i, 'Invalid file size format (e.g., "10mb")');

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

const LoggingSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),
    file: z.string().min(1).default('/var/log/keel/keel.log'),
    maxSize: FileSizeSchema.default('10mb'),
    maxFiles: z.number().int().min(1).default(5),

    /** Extra field names masked in log output */
    redact: z.array(z.string().min(1)).default([]),
});

const JobsSchema = z.object({
    threadPoolSize: z.number().int().min(1).optional(),
    processPoolSize: z.number().int().min(1).default(2),
    logsDir: z.string().min(1).default('/var/log/jobs'),
    logsExcerptLines: z.number().int().min(0).default(10),
});

const ReplicationSchema = z.object({
    healthCheckInterval: z.number().positive().default(30),
});

const DatastoreSchema = z
    .object({
        dialect: DialectSchema.default('sqlite'),
        filename: z.string().optional(),
        connectionString: z.string().optional(),
    })
    .refine((ds) => ds.dialect !== 'postgres' || !!ds.connectionString, {
        message: 'PostgreSQL datastore requires a connectionString',
        path: ['connectionString'],
    });

// ─────────────────────────────────────────────────────────────
// Main Settings Schema
// ─────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
    logging: LoggingSchema.default({}),
    jobs: JobsSchema.default({}),
    replication: ReplicationSchema.default({}),
    datastore: DatastoreSchema.default({}),
});

export type SettingsSchemaType = z.infer<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 */
export class SettingsValidationError extends Error {

    override readonly name = 'SettingsValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

// ─────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────

/**
 * Parse and validate settings, returning defaults for missing fields.
 *
 * @throws SettingsValidationError naming the first offending field
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ jobs: { processPoolSize: 4 } })
 * // settings.logging.level === 'info'
 * ```
 */
export function parseSettings(settings: unknown): SettingsSchemaType {

    const result = SettingsSchema.safeParse(settings ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new SettingsValidationError(
            firstIssue?.message ?? 'Settings validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
