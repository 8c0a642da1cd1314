/**
 * Blocking mutex for worker threads.
 *
 * State lives in one Int32 slot of a SharedArrayBuffer (0 free, 1 held) so
 * the same lock can be taken from any thread that was handed the buffer.
 * `lock()` parks the calling thread with `Atomics.wait`; never call it from
 * the event loop while a job body may hold the slot.
 *
 * The worker bootstrap in scheduler/worker-code.ts takes the same slots
 * with its own `lockSlot`, since evaluated code cannot import this class.
 * Both sides must keep the 0/1 protocol and notify one waiter on unlock.
 */
export class BlockingMutex {

    readonly #view: Int32Array

    constructor(
        public readonly buffer: SharedArrayBuffer,
        public readonly index: number,
    ) {

        this.#view = new Int32Array(buffer)

        if (index < 0 || index >= this.#view.length) {

            throw new RangeError(`Lock slot ${index} outside buffer of ${this.#view.length}`)
        }
    }

    get locked(): boolean {

        return Atomics.load(this.#view, this.index) === 1
    }

    tryLock(): boolean {

        return Atomics.compareExchange(this.#view, this.index, 0, 1) === 0
    }

    /**
     * Block until the slot is claimed.
     */
    lock(timeoutMs = Infinity): boolean {

        const deadline = Date.now() + timeoutMs

        while (!this.tryLock()) {

            const remaining = deadline - Date.now()

            if (remaining <= 0) {

                return false
            }

            Atomics.wait(this.#view, this.index, 1, remaining)
        }

        return true
    }

    unlock(): void {

        Atomics.store(this.#view, this.index, 0)
        Atomics.notify(this.#view, this.index, 1)
    }

    withLock<T>(fn: () => T): T {

        this.lock()

        try {

            return fn()
        }
        finally {

            this.unlock()
        }
    }
}
