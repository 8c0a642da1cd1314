/**
 * Per-job log file at `<logsDir>/<id>.log`.
 */
import { createWriteStream, type WriteStream } from 'node:fs'
import { mkdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'


export class JobLogs {

    readonly path: string
    #stream: WriteStream | null = null

    constructor(logsDir: string, jobId: number) {

        this.path = join(logsDir, `${jobId}.log`)
    }

    async open(): Promise<void> {

        await mkdir(join(this.path, '..'), { recursive: true })
        this.#stream = createWriteStream(this.path, { flags: 'a' })
    }

    write(text: string): void {

        this.#stream?.write(text.endsWith('\n') ? text : `${text}\n`)
    }

    async close(): Promise<void> {

        const stream = this.#stream

        if (!stream) {

            return
        }

        this.#stream = null

        await new Promise<void>((resolve, reject) => {

            stream.once('error', reject)
            stream.end(() => resolve())
        })
    }

    /**
     * Last `lines` lines of the file.
     */
    async excerpt(lines: number): Promise<string> {

        const content = await readFile(this.path, 'utf8')
        const all = content.split('\n')

        if (all[all.length - 1] === '') {

            all.pop()
        }

        return all.slice(-lines).join('\n')
    }
}
