/**
 * Environment Detection
 *
 * Decides whether the daemon runs attached to a terminal or under a
 * supervisor, which in turn decides where the logger writes.
 */

/**
 * Variables set by service supervisors and CI runners.
 */
const HEADLESS_ENV_VARS = [
    'CI',
    'INVOCATION_ID',
    'JOURNAL_STREAM',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
];

/**
 * Detect a headless run (no interactive terminal).
 *
 * `KEEL_HEADLESS=true` forces it, `KEEL_HEADLESS=false` rules it out.
 *
 * @example
 * ```typescript
 * const stream = isHeadless() ? process.stdout : undefined
 * ```
 */
export function isHeadless(env: NodeJS.ProcessEnv = process.env): boolean {

    const flag = env['KEEL_HEADLESS'];

    if (flag === 'true') {

        return true;

    }

    if (flag === 'false') {

        return false;

    }

    if (HEADLESS_ENV_VARS.some((name) => !!env[name])) {

        return true;

    }

    return !process.stdout.isTTY;

}

/**
 * True when `KEEL_DEBUG` is set to anything but an empty string or `0`.
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    const value = env['KEEL_DEBUG'];

    return !!value && value !== '0';

}
