/**
 * Redaction
 *
 * Masks sensitive fields in log payloads. Field names are matched through
 * a set holding every case variant of each registered name, so `apiKey`,
 * `api_key`, `API-KEY` and `ApiKey` all hit.
 *
 * @example
 * ```typescript
 * maskValue('test-secret-value', 'password', 'info')
 * // => '<Password ************... (17) />'
 *
 * maskValue('test-secret-value', 'password', 'verbose')
 * // => '<Password test********... (17) />'
 * ```
 */
import { isRecord } from '../filter/index.js';
import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;

const MASKED_FIELDS = new Set<string>();

// ─────────────────────────────────────────────────────────────
// Name Variants
// ─────────────────────────────────────────────────────────────

/**
 * Split a field name into lowercase words on separators and case humps.
 */
function words(name: string): string[] {

    return name
        .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
        .split(/[-_\s]+/)
        .filter(Boolean)
        .map((w) => w.toLowerCase());

}

function capitalize(word: string): string {

    return word.charAt(0).toUpperCase() + word.slice(1);

}

function variants(name: string): string[] {

    const parts = words(name);
    const [head = '', ...rest] = parts;
    const joined = parts.join('');

    return [
        name,
        joined,
        joined.toUpperCase(),
        head + rest.map(capitalize).join(''),
        parts.map(capitalize).join(''),
        parts.join('_'),
        parts.join('_').toUpperCase(),
        parts.join('-'),
        parts.join('-').toUpperCase(),
    ];

}

// ─────────────────────────────────────────────────────────────
// Registration
// ─────────────────────────────────────────────────────────────

export function addMaskedFields(fields: string[]): void {

    for (const field of fields) {

        for (const variant of variants(field)) {

            MASKED_FIELDS.add(variant);

        }

    }

}

addMaskedFields([
    'password',
    'passwd',
    'secret',
    'token',
    'api_key',
    'access_key',
    'secret_key',
    'private_key',
    'client_secret',
    'auth_token',
    'bearer_token',
    'credential',
    'credentials',
    'passphrase',
]);

export function isMaskedField(key: string): boolean {

    return MASKED_FIELDS.has(key);

}

// ─────────────────────────────────────────────────────────────
// Masking
// ─────────────────────────────────────────────────────────────

/**
 * Mask a value as `<Label mask (length) />`. At verbose level the first
 * four characters stay visible.
 */
export function maskValue(value: string, field: string, level: LogLevel): string {

    const maskLen = Math.min(value.length, MASK_MAX_LENGTH);

    let masked = '*'.repeat(maskLen);

    if (level === 'verbose' && value.length >= 4) {

        masked = value.slice(0, 4) + '*'.repeat(Math.max(0, maskLen - 4));

    }

    if (value.length > MASK_MAX_LENGTH) {

        masked += '...';

    }

    const label = words(field).map(capitalize).join('');

    return `<${label} ${masked} (${value.length}) />`;

}

/**
 * Errors, dates and class instances pass through untouched.
 */
function isPlain(value: object): boolean {

    const proto: unknown = Object.getPrototypeOf(value);

    return proto === Object.prototype || proto === null;

}

function redactValue(value: unknown, level: LogLevel): unknown {

    if (Array.isArray(value)) {

        return value.map((item) => redactValue(item, level));

    }

    if (isRecord(value) && isPlain(value)) {

        return filterData(value, level);

    }

    return value;

}

/**
 * Copy `entry` with every masked string field replaced, recursing into
 * nested records and arrays. The input is not modified.
 */
export function filterData(
    entry: Record<string, unknown>,
    level: LogLevel,
): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        filtered[key] = MASKED_FIELDS.has(key) && typeof value === 'string'
            ? maskValue(value, key, level)
            : redactValue(value, level);

    }

    return filtered;

}
