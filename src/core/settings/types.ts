/**
 * Settings Types
 *
 * Daemon settings live in `keel.yml`. The shapes are inferred from the
 * zod schema so the two never drift.
 */
import type { SettingsSchemaType } from './schema.js';

export type Settings = SettingsSchemaType;

export type LoggingSettings = Settings['logging'];

export type JobsSettings = Settings['jobs'];

export type ReplicationSettings = Settings['replication'];

export type DatastoreSettings = Settings['datastore'];
