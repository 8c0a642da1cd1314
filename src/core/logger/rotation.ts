/**
 * Log Rotation
 *
 * Once the log file reaches `maxSize` it is renamed with a timestamp
 * suffix (`keel.2026-01-15T10-30-00.log`) and the oldest rotated files
 * beyond `maxFiles` are removed.
 */
import { stat, rename, readdir, unlink } from 'node:fs/promises'
import { dirname, basename, join, extname } from 'node:path'
import { attempt } from '@logosdx/utils'

import type { RotationResult } from './types.js'


const UNITS: Record<string, number> = {
    b: 1,
    kb: 1024,
    mb: 1024 ** 2,
    gb: 1024 ** 3,
}


/**
 * @example
 * ```typescript
 * parseSize('10mb')  // 10485760
 * parseSize('512kb') // 524288
 * parseSize('100')   // 100
 * ```
 */
export function parseSize(size: string): number {

    const match = /^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/.exec(size.trim().toLowerCase())
    const amount = match?.[1]
    const multiplier = UNITS[match?.[2] ?? 'b']

    if (amount === undefined || multiplier === undefined) {

        throw new Error(`Invalid size format: ${size}`)
    }

    return Math.floor(parseFloat(amount) * multiplier)
}


function parts(filepath: string): { dir: string; base: string; ext: string } {

    const ext = extname(filepath)

    return { dir: dirname(filepath), base: basename(filepath, ext), ext }
}


export function rotatedName(filepath: string, at: Date = new Date()): string {

    const { dir, base, ext } = parts(filepath)
    const stamp = at.toISOString().replace(/\.\d+Z$/, '').replace(/:/g, '-')

    return join(dir, `${base}.${stamp}${ext}`)
}


/**
 * Rotated siblings of `filepath`, newest first.
 */
export async function listRotatedFiles(filepath: string): Promise<string[]> {

    const { dir, base, ext } = parts(filepath)
    const prefix = `${base}.`
    const stamp = /^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}$/

    const [files, err] = await attempt(() => readdir(dir))

    if (err) {

        return []
    }

    return files
        .filter((f) => f.startsWith(prefix) && f.endsWith(ext) && stamp.test(f.slice(prefix.length, f.length - ext.length)))
        .sort()
        .reverse()
        .map((f) => join(dir, f))
}


/**
 * Rotate `filepath` when it has reached `maxSize`.
 *
 * @example
 * ```typescript
 * const result = await checkAndRotate('/var/log/keel/keel.log', '10mb', 5)
 * // { rotated: true, oldFile: '/var/log/keel/keel.log', newFile: '/var/log/keel/keel.2026-...log' }
 * ```
 */
export async function checkAndRotate(
    filepath: string,
    maxSize: string,
    maxFiles: number,
): Promise<RotationResult> {

    const [stats] = await attempt(() => stat(filepath))

    if (!stats || stats.size < parseSize(maxSize)) {

        return { rotated: false }
    }

    const newFile = rotatedName(filepath)
    const [, renameErr] = await attempt(() => rename(filepath, newFile))

    if (renameErr) {

        throw new Error(`Failed to rotate log file: ${renameErr.message}`)
    }

    const stale = (await listRotatedFiles(filepath)).slice(maxFiles)
    const deletedFiles: string[] = []

    for (const file of stale) {

        const [, err] = await attempt(() => unlink(file))

        if (!err) {

            deletedFiles.push(file)
        }
    }

    return {
        rotated: true,
        oldFile: filepath,
        newFile,
        ...(deletedFiles.length ? { deletedFiles } : {}),
    }
}
