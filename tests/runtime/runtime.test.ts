/**
 * Runtime tests.
 */
import { describe, it, expect } from 'vitest'
import { z } from 'zod'

import { CallError } from '../../src/core/errors/index.js'
import { observer } from '../../src/core/observer.js'
import {
    CoreService,
    Service,
    ServiceManager,
    defineMethod,
    type MethodTable,
} from '../../src/core/service/index.js'
import { createDefaultSettings } from '../../src/core/settings/index.js'
import { createRuntime } from '../../src/runtime/index.js'
import { MemoryBackend } from '../core/replicated/memory-backend.js'


class EchoService extends Service {

    constructor(manager: ServiceManager) {

        super(manager, { namespace: 'echo' })
    }

    override methods(): MethodTable {

        return {
            say: defineMethod(z.tuple([z.string()]), (_ctx, word) => word.toUpperCase()),
        }
    }
}


describe('runtime: createRuntime', () => {

    it('should dispatch calls without a datastore', async () => {

        const runtime = await createRuntime({
            settings: createDefaultSettings(),
            datastore: false,
            logger: false,
        })

        expect(runtime.connection).toBeNull()
        expect(runtime.logger).toBeNull()
        expect(runtime.scheduler).toBe(runtime.manager.scheduler)
        expect(await runtime.call('core.ping')).toBe('pong')

        await runtime.close()

        expect(runtime.closed).toBe(true)
    })

    it('should register the given services after core', async () => {

        const runtime = await createRuntime({
            settings: createDefaultSettings(),
            datastore: false,
            logger: false,
            services: (manager) => [new EchoService(manager)],
        })

        expect(await runtime.call('echo.say', ['hello'])).toBe('HELLO')

        await runtime.close()
    })

    it('should open the datastore named in settings', async () => {

        const runtime = await createRuntime({
            settings: createDefaultSettings(),
            logger: false,
        })

        expect(runtime.connection?.datastore.dialect).toBe('sqlite')

        await runtime.close()
    })

    it('should reject when a service cannot be registered', async () => {

        const attempt = createRuntime({
            settings: createDefaultSettings(),
            datastore: false,
            logger: false,
            services: (manager) => [new CoreService(manager)],
        })

        await expect(attempt).rejects.toThrow(CallError)
        await expect(attempt).rejects.toThrow("Service 'core' is already registered")
    })
})


describe('runtime: Runtime', () => {

    it('should announce shutdown once', async () => {

        const reasons: string[] = []
        const cleanup = observer.on('app:shutdown', ({ reason }) => {

            reasons.push(reason)
        })

        const runtime = await createRuntime({
            settings: createDefaultSettings(),
            datastore: false,
            logger: false,
        })

        await runtime.close('test')
        await runtime.close('again')
        cleanup()

        expect(reasons).toEqual(['test'])
    })

    it('should fill the health check interval from settings', async () => {

        const settings = createDefaultSettings()

        settings.replication.healthCheckInterval = 5

        const runtime = await createRuntime({ settings, datastore: false, logger: false })
        const healthy = (): boolean => true
        const options = runtime.replication({
            backend: new MemoryBackend(),
            defaults: { port: 22 },
            isClustered: () => false,
            clusterHealthy: healthy,
        })

        expect(options.healthCheckInterval).toBe(5)
        expect(options.defaults).toEqual({ port: 22 })

        await runtime.close()
    })
})
