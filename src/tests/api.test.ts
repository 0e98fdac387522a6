import assert from 'assert';
import http from 'http';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { startServer } from '../api/server';
import { createHarness, TestHarness } from './helpers';

interface JsonReply {
    status: number;
    headers: Headers;
    body: Record<string, unknown>;
}

let harness: TestHarness;
let server: http.Server;
let baseUrl = '';

async function call(method: 'GET' | 'POST', path: string, body?: unknown, headers: Record<string, string> = {}): Promise<JsonReply> {
    const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers: { 'content-type': 'application/json', ...headers },
        body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await response.json();
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new Error(`Risposta JSON non oggetto su ${path}`);
    }
    return { status: response.status, headers: response.headers, body: { ...parsed } };
}

function text(value: unknown): string {
    if (typeof value !== 'string') {
        throw new Error(`Attesa stringa, ricevuto ${typeof value}`);
    }
    return value;
}

const LEAD_BODY = {
    companyName: 'Shop Co',
    website: 'https://shop.com/',
    contactEmail: 'Buyer@Shop.com',
    channel: 'amazon',
    niche: 'home goods',
};

beforeEach(async () => {
    harness = await createHarness();
    server = await startServer(harness.context, { webhookSecret: 'test-secret', rateLimitPerMinute: 100 }, 0);
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await harness.db.close();
});

describe('API HTTP', () => {
    test('health con provider e correlation id restituito', async () => {
        const reply = await call('GET', '/api/health', undefined, { 'x-correlation-id': 'req-test-1' });
        assert.equal(reply.status, 200);
        assert.equal(reply.body.status, 'ok');
        assert.equal(reply.body.dialect, 'sqlite');
        assert.equal(reply.body.provider, 'stub');
        assert.equal(reply.headers.get('x-correlation-id'), 'req-test-1');
        assert.equal(reply.headers.get('x-content-type-options'), 'nosniff');
    });

    test('intake valida il body e deduplica', async () => {
        const invalid = await call('POST', '/api/leads', { website: 'https://shop.com' });
        assert.equal(invalid.status, 400);
        assert.equal(invalid.body.error, 'Richiesta non valida.');

        const created = await call('POST', '/api/leads', LEAD_BODY);
        assert.equal(created.status, 201);
        assert.equal(created.body.status, 'created');

        const again = await call('POST', '/api/leads', { ...LEAD_BODY, website: 'https://SHOP.com' });
        assert.equal(again.status, 200);
        assert.deepEqual(again.body, { status: 'dedupe', leadId: created.body.leadId, dedupe: true });
    });

    test('process, dettaglio lead e 404', async () => {
        const created = await call('POST', '/api/leads', LEAD_BODY);
        const leadId = text(created.body.leadId);

        const processed = await call('POST', '/api/process', {});
        assert.deepEqual(processed.body, { success: true, processedCount: 1, skippedCount: 0, errors: [] });

        const detail = await call('GET', `/api/leads/${leadId}`);
        assert.equal(detail.status, 200);
        const lead = detail.body.lead;
        assert.ok(lead && typeof lead === 'object' && 'status' in lead);
        assert.equal(lead.status, 'contacted');
        const messages = detail.body.messages;
        assert.ok(Array.isArray(messages));
        assert.equal(messages.length, 5);

        const missing = await call('GET', '/api/leads/does-not-exist');
        assert.equal(missing.status, 404);
        assert.deepEqual(missing.body, { error: 'Lead does-not-exist non trovato', code: 'LEAD_NOT_FOUND' });
    });

    test('risposta, revisione ed esito fuori sequenza', async () => {
        const created = await call('POST', '/api/leads', LEAD_BODY);
        const leadId = text(created.body.leadId);
        await call('POST', '/api/process', {});

        const outcomeTooEarly = await call('POST', `/api/leads/${leadId}/outcome`, { outcome: 'follow_up' });
        assert.equal(outcomeTooEarly.status, 409);
        assert.equal(outcomeTooEarly.body.code, 'INVALID_TRANSITION');

        const reply = await call('POST', '/api/replies', { leadId, text: 'Interested.' });
        assert.equal(reply.status, 201);
        assert.equal(reply.body.leadStatus, 'interested');
        const replyId = text(reply.body.replyId);

        const reviewed = await call('POST', `/api/replies/${replyId}/review`, { decision: 'approve' });
        assert.deepEqual(reviewed.body, { replyId, approval: 'approved' });
        const reviewedAgain = await call('POST', `/api/replies/${replyId}/review`, { decision: 'approve' });
        assert.equal(reviewedAgain.status, 409);

        const booked = await call('POST', `/api/leads/${leadId}/outcome`, { outcome: 'closed', notes: 'Signed' });
        assert.deepEqual(booked.body, { leadId, status: 'booked', outcome: 'closed' });
    });

    test('webhook protetto dal segreto condiviso', async () => {
        const created = await call('POST', '/api/leads', LEAD_BODY);
        const leadId = text(created.body.leadId);
        await call('POST', '/api/process', {});
        const bounce = { event: 'bounced', email: 'buyer@shop.com' };

        const unauthorized = await call('POST', '/api/webhooks/stub', bounce, { 'x-webhook-secret': 'wrong-secret' });
        assert.equal(unauthorized.status, 401);

        const otherProvider = await call('POST', '/api/webhooks/smartlead', bounce, { 'x-webhook-secret': 'test-secret' });
        assert.equal(otherProvider.status, 404);

        const accepted = await call('POST', '/api/webhooks/stub', bounce, { 'x-webhook-secret': 'test-secret' });
        assert.equal(accepted.status, 200);
        assert.deepEqual(accepted.body, { status: 'suppressed', leadId, deadLeadIds: [leadId] });
    });

    test('endpoint sconosciuto', async () => {
        const reply = await call('GET', '/api/nothing-here');
        assert.equal(reply.status, 404);
        assert.deepEqual(reply.body, { error: 'Endpoint non trovato.' });
    });
});
