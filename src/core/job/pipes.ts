/**
 * Byte-stream pipes bound to a job.
 *
 * The caller connects the declared ends before the job starts. With
 * `checkPipes` (the default) the scheduler fails the job with
 * PipeNotReadyError when a declared end is missing; with it off the body
 * probes for itself through `input` / `output`.
 */
import type { Readable, Writable } from 'node:stream'

import { PipeNotReadyError } from '../errors/index.js'
import type { PipeName, PipeStreams } from './types.js'


export class JobPipes {

    readonly declared: ReadonlySet<PipeName>
    #input: Readable | undefined
    #output: Writable | undefined

    constructor(
        private readonly jobId: number,
        declared: PipeName[] = [],
        streams: PipeStreams = {},
    ) {

        this.declared = new Set(declared)
        this.connect(streams)
    }

    connect(streams: PipeStreams): void {

        if (streams.input) this.#input = streams.input
        if (streams.output) this.#output = streams.output
    }

    isConnected(name: PipeName): boolean {

        return name === 'input' ? this.#input !== undefined : this.#output !== undefined
    }

    /**
     * Throw for the first declared pipe that is not connected.
     */
    check(): void {

        for (const name of this.declared) {

            if (!this.isConnected(name)) {

                throw new PipeNotReadyError(this.jobId, name)
            }
        }
    }

    get input(): Readable {

        if (!this.#input) {

            throw new PipeNotReadyError(this.jobId, 'input')
        }

        return this.#input
    }

    get output(): Writable {

        if (!this.#output) {

            throw new PipeNotReadyError(this.jobId, 'output')
        }

        return this.#output
    }
}
