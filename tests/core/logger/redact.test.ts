import { describe, it, expect } from 'vitest';

import {
    addMaskedFields,
    filterData,
    isMaskedField,
    maskValue,
} from '../../../src/core/logger/redact.js';

describe('logger: redact', () => {

    describe('maskValue', () => {

        it('should hide the whole value below verbose', () => {

            expect(maskValue('test-secret-value', 'password', 'info')).toBe('<Password ************... (17) />');

        });

        it('should keep the first four characters at verbose', () => {

            expect(maskValue('test-secret-value', 'password', 'verbose')).toBe('<Password test********... (17) />');

        });

        it('should not add an ellipsis to short values', () => {

            expect(maskValue('abc', 'token', 'verbose')).toBe('<Token *** (3) />');
            expect(maskValue('hunter2x', 'passwd', 'info')).toBe('<Passwd ******** (8) />');

        });

        it('should build the label from the field words', () => {

            expect(maskValue('abcd', 'api_key', 'info')).toBe('<ApiKey **** (4) />');

        });

    });

    describe('isMaskedField', () => {

        it('should match every case variant of a registered name', () => {

            expect(isMaskedField('api_key')).toBe(true);
            expect(isMaskedField('apiKey')).toBe(true);
            expect(isMaskedField('ApiKey')).toBe(true);
            expect(isMaskedField('API_KEY')).toBe(true);
            expect(isMaskedField('api-key')).toBe(true);
            expect(isMaskedField('apikey')).toBe(true);

        });

        it('should not match unrelated fields', () => {

            expect(isMaskedField('username')).toBe(false);
            expect(isMaskedField('pool')).toBe(false);

        });

        it('should register extra fields', () => {

            expect(isMaskedField('bindPw')).toBe(false);

            addMaskedFields(['bind_pw']);

            expect(isMaskedField('bindPw')).toBe(true);
            expect(isMaskedField('BIND_PW')).toBe(true);

        });

    });

    describe('filterData', () => {

        it('should mask nested records and arrays', () => {

            const input = {
                user: 'root',
                auth: { password: 'hunter2x' },
                items: [{ token: 'abcd' }, 'plain'],
            };

            expect(filterData(input, 'info')).toEqual({
                user: 'root',
                auth: { password: '<Password ******** (8) />' },
                items: [{ token: '<Token **** (4) />' }, 'plain'],
            });

        });

        it('should not modify the input', () => {

            const input = { secret: 'test-secret' };

            filterData(input, 'info');

            expect(input.secret).toBe('test-secret');

        });

        it('should leave non-string masked values alone', () => {

            expect(filterData({ password: 1234 }, 'info')).toEqual({ password: 1234 });

        });

        it('should pass errors through untouched', () => {

            const error = new Error('boom');
            const result = filterData({ error }, 'info');

            expect(result['error']).toBe(error);

        });

    });

});
