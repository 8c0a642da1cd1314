import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile, mkdtemp, rm, readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import {
    parseSize,
    rotatedName,
    listRotatedFiles,
    checkAndRotate,
} from '../../../src/core/logger/rotation.js'


describe('logger: rotation', () => {

    let testDir: string

    beforeEach(async () => {

        testDir = await mkdtemp(join(tmpdir(), 'keel-rotation-'))
    })

    afterEach(async () => {

        await rm(testDir, { recursive: true, force: true })
    })

    describe('parseSize', () => {

        it('should parse units', () => {

            expect(parseSize('100')).toBe(100)
            expect(parseSize('100b')).toBe(100)
            expect(parseSize('512kb')).toBe(524288)
            expect(parseSize('10mb')).toBe(10485760)
            expect(parseSize('1gb')).toBe(1073741824)
        })

        it('should accept decimals, spaces and upper case', () => {

            expect(parseSize('1.5kb')).toBe(1536)
            expect(parseSize(' 10 MB ')).toBe(10485760)
        })

        it('should reject anything else', () => {

            expect(() => parseSize('ten')).toThrow('Invalid size format: ten')
            expect(() => parseSize('10tb')).toThrow('Invalid size format: 10tb')
        })
    })

    describe('rotatedName', () => {

        it('should put a second-resolution stamp before the extension', () => {

            const at = new Date('2026-01-15T10:30:00.123Z')

            expect(rotatedName('/var/log/keel/keel.log', at)).toBe('/var/log/keel/keel.2026-01-15T10-30-00.log')
        })
    })

    describe('listRotatedFiles', () => {

        it('should list stamped siblings newest first', async () => {

            const log = join(testDir, 'keel.log')

            await writeFile(log, '')
            await writeFile(join(testDir, 'keel.2026-01-01T00-00-00.log'), '')
            await writeFile(join(testDir, 'keel.2026-01-02T00-00-00.log'), '')
            await writeFile(join(testDir, 'keel.backup.log'), '')
            await writeFile(join(testDir, 'other.2026-01-03T00-00-00.log'), '')

            expect(await listRotatedFiles(log)).toEqual([
                join(testDir, 'keel.2026-01-02T00-00-00.log'),
                join(testDir, 'keel.2026-01-01T00-00-00.log'),
            ])
        })

        it('should return nothing for a missing directory', async () => {

            expect(await listRotatedFiles(join(testDir, 'missing', 'keel.log'))).toEqual([])
        })
    })

    describe('checkAndRotate', () => {

        it('should leave a missing file alone', async () => {

            expect(await checkAndRotate(join(testDir, 'keel.log'), '10b', 5)).toEqual({ rotated: false })
        })

        it('should leave a small file alone', async () => {

            const log = join(testDir, 'keel.log')

            await writeFile(log, 'short')

            expect(await checkAndRotate(log, '10b', 5)).toEqual({ rotated: false })
            expect(await readFile(log, 'utf8')).toBe('short')
        })

        it('should rename a full file', async () => {

            const log = join(testDir, 'keel.log')

            await writeFile(log, 'x'.repeat(20))

            const result = await checkAndRotate(log, '10b', 5)

            expect(result.rotated).toBe(true)
            expect(result.oldFile).toBe(log)
            expect(result.deletedFiles).toBeUndefined()

            const files = await readdir(testDir)

            expect(files).toHaveLength(1)
            expect(result.newFile).toBe(join(testDir, files[0] ?? ''))
            expect(files[0]).toMatch(/^keel\.\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/)
        })

        it('should delete rotated files beyond maxFiles', async () => {

            const log = join(testDir, 'keel.log')
            const oldest = join(testDir, 'keel.2020-01-01T00-00-00.log')
            const older = join(testDir, 'keel.2020-01-02T00-00-00.log')

            await writeFile(oldest, '')
            await writeFile(older, '')
            await writeFile(log, 'x'.repeat(20))

            const result = await checkAndRotate(log, '10b', 1)

            expect(result.rotated).toBe(true)
            expect(result.deletedFiles).toEqual([older, oldest])
            expect(await listRotatedFiles(log)).toEqual([result.newFile])
        })
    })
})
