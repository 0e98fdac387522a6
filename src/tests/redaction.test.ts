import assert from 'assert';
import { describe, test } from 'node:test';
import { sanitizeForLogs, sanitizeString } from '../security/redaction';

describe('sanitizeString', () => {
    test('chiavi API in forma sk-', () => {
        assert.equal(sanitizeString('key=sk-placeholder-value-0000 used'), 'key=[REDACTED] used');
    });

    test('header Bearer', () => {
        assert.equal(sanitizeString('Authorization: Bearer placeholdertoken123'), 'Authorization: Bearer [REDACTED]');
    });

    test('api_key in query string', () => {
        assert.equal(
            sanitizeString('GET https://sl.test/api/v1/campaigns?api_key=test-secret&offset=0'),
            'GET https://sl.test/api/v1/campaigns?api_key=[REDACTED]&offset=0'
        );
    });

    test('testo normale invariato', () => {
        assert.equal(sanitizeString('lead shop.com researched in 3 pages'), 'lead shop.com researched in 3 pages');
    });
});

describe('sanitizeForLogs', () => {
    test('chiavi sensibili oscurate a ogni livello', () => {
        const output = sanitizeForLogs({
            leadId: 'lead-1',
            apiKey: 'test-secret',
            nested: { password: 'test-secret', count: 2, ok: true },
            list: [{ token: 'test-secret' }, 'plain'],
        });
        assert.deepEqual(output, {
            leadId: 'lead-1',
            apiKey: '[REDACTED]',
            nested: { password: '[REDACTED]', count: 2, ok: true },
            list: [{ token: '[REDACTED]' }, 'plain'],
        });
    });

    test('errori ridotti al messaggio sanificato', () => {
        const output = sanitizeForLogs({ error: new Error('failed with Bearer placeholdertoken123') });
        assert.deepEqual(output, { error: 'failed with Bearer [REDACTED]' });
    });
});
