/**
 * Vitest global setup.
 *
 * Creates ./tmp before tests run and removes leftover test directories
 * from it once they finish.
 */
import { mkdirSync, existsSync } from 'node:fs';
import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { attempt } from '@logosdx/utils';

/**
 * Directories created by tests (keel-<area>-test-XXXXXX).
 */
const TEST_DIR_PATTERN = /^keel-[a-z]+-test-/;

export default function globalSetup(): () => Promise<void> {

    const tmpDir = join(process.cwd(), 'tmp');

    if (!existsSync(tmpDir)) {

        mkdirSync(tmpDir, { recursive: true });

    }

    return async () => {

        const [entries, err] = await attempt(() => readdir(tmpDir));

        if (err) {

            return;

        }

        const leftovers = entries.filter((name) => TEST_DIR_PATTERN.test(name));

        await Promise.all(
            leftovers.map((name) => rm(join(tmpDir, name), { recursive: true, force: true })),
        );

    };

}
