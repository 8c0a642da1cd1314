/**
 * One namespace assembled from several services.
 *
 * Parts must agree on every config key they set explicitly, and no two
 * parts may expose the same method name. Both are checked when the
 * compound is built, so a conflict fails at startup.
 */
import { CallError, ERRNO } from '../errors/index.js'
import { Service } from './service.js'
import type { ServiceManager } from './manager.js'
import type { MethodTable, ServiceConfig, ServiceType } from './types.js'


export class CompoundService extends Service {

    override readonly type: ServiceType = 'compound'
    readonly parts: readonly Service[]
    readonly #methods: MethodTable

    constructor(manager: ServiceManager, parts: Service[]) {

        super(manager, mergeConfig(parts))

        this.parts = Object.freeze([...parts])
        this.#methods = mergeMethods(parts)
    }

    override methods(): MethodTable {

        return this.#methods
    }

    override async setup(): Promise<void> {

        for (const part of this.parts) {

            await part.setup()
        }
    }
}


function mergeConfig(parts: Service[]): ServiceConfig {

    const [first] = parts

    if (!first) {

        throw new CallError('A compound service needs at least one part', ERRNO.EINVAL)
    }

    const merged: Record<string, unknown> = {}
    const owner = new Map<string, Service>()

    for (const part of parts) {

        for (const [key, value] of Object.entries(part.specified)) {

            const previous = owner.get(key)

            if (previous && merged[key] !== value) {

                throw new CallError(
                    `${describePart(previous)} has ${key}=${JSON.stringify(merged[key])}, `
                    + `but ${describePart(part)} has ${key}=${JSON.stringify(value)}`,
                    ERRNO.EINVAL,
                )
            }

            merged[key] = value
            owner.set(key, part)
        }
    }

    return parts.reduce<ServiceConfig>(
        (config, part) => ({ ...config, ...part.specified }),
        { namespace: first.namespace },
    )
}


function mergeMethods(parts: Service[]): MethodTable {

    const methods: MethodTable = {}
    const owner = new Map<string, Service>()

    for (const part of parts) {

        for (const [name, definition] of Object.entries(part.methods())) {

            const previous = owner.get(name)

            if (previous) {

                throw new CallError(
                    `Duplicate method name ${name} for service parts ${describePart(previous)} and ${describePart(part)}`,
                    ERRNO.EINVAL,
                )
            }

            methods[name] = definition
            owner.set(name, part)
        }
    }

    return methods
}


function describePart(part: Service): string {

    return `${part.constructor.name}(${part.namespace})`
}
