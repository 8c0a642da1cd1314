import { describe, it, expect } from 'vitest';

import { classifyEvent, passes, shouldLog } from '../../../src/core/logger/classifier.js';

describe('logger: classifier', () => {

    describe('classifyEvent', () => {

        it('should classify "error" as error level', () => {

            expect(classifyEvent('error')).toBe('error');

        });

        it('should classify failures and mismatches as error level', () => {

            expect(classifyEvent('hook:failed')).toBe('error');
            expect(classifyEvent('datastore:error')).toBe('error');
            expect(classifyEvent('replicated:version-mismatch')).toBe('error');

        });

        it('should classify degraded states as warn level', () => {

            expect(classifyEvent('replicated:unhealthy')).toBe('warn');
            expect(classifyEvent('job:coalesced')).toBe('warn');
            expect(classifyEvent('lock:blocked')).toBe('warn');

        });

        it('should classify lifecycle events as info level', () => {

            expect(classifyEvent('job:complete')).toBe('info');
            expect(classifyEvent('service:registered')).toBe('info');
            expect(classifyEvent('settings:loaded')).toBe('info');
            expect(classifyEvent('app:shutdown')).toBe('info');
            expect(classifyEvent('replicated:defaults-inserted')).toBe('info');

        });

        it('should classify everything else as debug level', () => {

            expect(classifyEvent('job:changed')).toBe('debug');
            expect(classifyEvent('lock:created')).toBe('debug');
            expect(classifyEvent('service:event')).toBe('debug');

        });

    });

    describe('passes', () => {

        it('should let nothing through at silent', () => {

            expect(passes('error', 'silent')).toBe(false);

        });

        it('should compare entry severity against the configured level', () => {

            expect(passes('error', 'error')).toBe(true);
            expect(passes('warn', 'error')).toBe(false);
            expect(passes('info', 'warn')).toBe(false);
            expect(passes('info', 'info')).toBe(true);
            expect(passes('debug', 'info')).toBe(false);
            expect(passes('debug', 'verbose')).toBe(true);

        });

    });

    describe('shouldLog', () => {

        it('should combine classification and level', () => {

            expect(shouldLog('job:complete', 'info')).toBe(true);
            expect(shouldLog('job:changed', 'info')).toBe(false);
            expect(shouldLog('job:changed', 'verbose')).toBe(true);
            expect(shouldLog('job:coalesced', 'error')).toBe(false);
            expect(shouldLog('hook:failed', 'error')).toBe(true);

        });

    });

});
