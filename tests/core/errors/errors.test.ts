/**
 * Error taxonomy tests.
 */
import { describe, it, expect } from 'vitest'
import { z } from 'zod'

import {
    CallError,
    DependencyConflictError,
    ERRNO,
    NotFoundError,
    UnhealthyBackendError,
    ValidationErrors,
    VersionMismatchError,
    WorkerError,
    isExpectedError,
    toError,
} from '../../../src/core/errors/index.js'


describe('errors: ValidationErrors', () => {

    it('should render every issue into the message', () => {

        const verrors = new ValidationErrors()
            .add('disk_update.name', 'Name is required')
            .add('disk_update.size', 'Too small', ERRNO.EEXIST)

        expect(verrors.length).toBe(2)
        expect(verrors.message).toBe(
            '[22] disk_update.name: Name is required\n[17] disk_update.size: Too small'
        )
    })

    it('should only throw from check() when not empty', () => {

        expect(() => new ValidationErrors().check()).not.toThrow()
        expect(() => new ValidationErrors().add('a', 'b').check()).toThrow(ValidationErrors)
    })

    it('should prefix zod paths with the schema name', () => {

        const result = z.object({ size: z.number() }).strict().safeParse({ size: 'big' })

        expect(result.success).toBe(false)

        if (!result.success) {

            const verrors = ValidationErrors.fromZod('disk_create', result.error.issues)

            expect(verrors.errors.map((e) => e.attribute)).toEqual(['disk_create.size'])
        }
    })

    it('should merge collections with extend', () => {

        const a = new ValidationErrors().add('a', 'first')
        const b = new ValidationErrors().add('b', 'second')

        a.extend(b)

        expect(a.errors.map((e) => e.attribute)).toEqual(['a', 'b'])
    })
})


describe('errors: messages', () => {

    it('should name the entity and id in NotFoundError', () => {

        expect(new NotFoundError('Disk', 7).message).toBe('Disk 7 does not exist')
        expect(new NotFoundError('Disk').message).toBe('Disk does not exist')
    })

    it('should enumerate dependents in DependencyConflictError', () => {

        const err = new DependencyConflictError([
            { service: 'sharing.smb', datastore: 'sharing_cifs_share', objects: [{ id: 1 }] },
            { service: null, datastore: 'audit_log' },
        ])

        expect(err.message).toBe(
            "This object is being used by following service(s):\n1) 'sharing.smb' Service\n2) 'audit_log' Datastore\n"
        )
        expect(err.errno).toBe(ERRNO.EBUSY)
    })

    it('should show both versions in VersionMismatchError', () => {

        const err = new VersionMismatchError('smb', { major: 0, minor: 2 }, { major: 0, minor: 1 })

        expect(err.message).toBe("Version mismatch for 'smb': local 0.2, stored 0.1")
        expect(new VersionMismatchError('smb', { major: 1, minor: 0 }, null).message)
            .toBe("Version mismatch for 'smb': local 1.0, stored unknown")
    })

    it('should append the reason to UnhealthyBackendError', () => {

        expect(new UnhealthyBackendError('smb', 'no quorum').message)
            .toBe("Clustered store for 'smb' is unhealthy: no quorum")
    })
})


describe('errors: classification', () => {

    it('should treat the taxonomy as expected', () => {

        expect(isExpectedError(new NotFoundError('Disk', 1))).toBe(true)
        expect(isExpectedError(new CallError('busy', ERRNO.EBUSY))).toBe(true)
        expect(isExpectedError(new TypeError('x is undefined'))).toBe(false)
    })

    it('should judge worker errors by their remote name', () => {

        expect(isExpectedError(new WorkerError('gone', 'NotFoundError'))).toBe(true)
        expect(isExpectedError(new WorkerError('oops', 'RangeError'))).toBe(false)
    })

    it('should wrap non-errors', () => {

        const original = new Error('same')

        expect(toError(original)).toBe(original)
        expect(toError('text').message).toBe('text')
    })
})
