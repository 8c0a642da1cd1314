/**
 * Lock registry tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import {
    AsyncLockRegistry,
    ThreadLockRegistry,
    getLockRegistry,
    getThreadLockRegistry,
    resetLockRegistries,
} from '../../../src/core/lock/index.js'
import { observer } from '../../../src/core/observer.js'


describe('lock: AsyncLockRegistry', () => {

    let created: string[]
    let cleanup: () => void

    beforeEach(() => {

        created = []
        cleanup = observer.on('lock:created', ({ registry, key }) => {

            created.push(`${registry}:${key}`)
        })
    })

    afterEach(() => {

        cleanup()
        resetLockRegistries()
    })

    it('should return the same mutex for the same key', () => {

        const locks = new AsyncLockRegistry()

        expect(locks.get('disk:sda')).toBe(locks.get('disk:sda'))
        expect(locks.size).toBe(1)
        expect(created).toEqual(['async:disk:sda'])
    })

    it('should keep locks after release', async () => {

        const locks = new AsyncLockRegistry()

        await locks.withLock('pool:tank', () => undefined)

        expect(locks.has('pool:tank')).toBe(true)
        expect(locks.stats()).toEqual([
            { key: 'pool:tank', locked: false, waiting: 0, owner: undefined },
        ])
    })

    it('should serialize withLock callers on one key', async () => {

        const locks = new AsyncLockRegistry()
        const events: string[] = []
        let release: () => void = () => undefined
        const gate = new Promise<void>((resolve) => {

            release = resolve
        })

        const first = locks.withLock('k', async () => {

            events.push('first:start')
            await gate
            events.push('first:end')
        })
        const second = locks.withLock('k', () => {

            events.push('second')
        })

        await Promise.resolve()
        release()
        await Promise.all([first, second])

        expect(events).toEqual(['first:start', 'first:end', 'second'])
    })

    it('should not exclude callers on different keys', async () => {

        const locks = new AsyncLockRegistry()
        const a = await locks.acquire('a')
        const b = await locks.acquire('b')

        expect(locks.get('a').locked).toBe(true)
        expect(locks.get('b').locked).toBe(true)

        a.release()
        b.release()
    })

    it('should ignore a second release of the same handle', async () => {

        const locks = new AsyncLockRegistry()
        const handle = await locks.acquire('k', { owner: 7 })
        const waiter = locks.acquire('k', { owner: 8 })

        handle.release()
        const next = await waiter
        handle.release()

        expect(locks.get('k').locked).toBe(true)
        expect(locks.get('k').owner).toBe(8)

        next.release()
    })

    it('should hand out a singleton until reset', () => {

        const first = getLockRegistry()

        expect(getLockRegistry()).toBe(first)

        resetLockRegistries()

        expect(getLockRegistry()).not.toBe(first)
    })
})


describe('lock: ThreadLockRegistry', () => {

    afterEach(() => {

        resetLockRegistries()
    })

    it('should give each key a stable slot', () => {

        const locks = new ThreadLockRegistry(2)
        const a = locks.ref('a')

        expect(locks.ref('a')).toBe(a)
        expect(a.index).toBe(0)
        expect(locks.ref('b').index).toBe(1)
    })

    it('should allocate a new segment when one fills up', () => {

        const locks = new ThreadLockRegistry(2)
        const a = locks.ref('a')

        locks.ref('b')
        const c = locks.ref('c')

        expect(c.buffer).not.toBe(a.buffer)
        expect(c.index).toBe(0)
        expect(locks.size).toBe(3)
    })

    it('should report held slots', () => {

        const locks = getThreadLockRegistry()
        const slot = locks.get('disk:sda')

        expect(slot.tryLock()).toBe(true)
        expect(locks.get('disk:sda').tryLock()).toBe(false)
        expect(locks.stats()).toEqual([{ key: 'disk:sda', locked: true, waiting: 0 }])

        slot.unlock()

        expect(locks.get('disk:sda').locked).toBe(false)
    })
})
