import assert from 'assert';
import { describe, test } from 'node:test';
import { InvalidTransitionError, LeadNotFoundError } from '../core/errors';
import { isTerminalStatus, isValidLeadTransition, transitionLead } from '../core/leadStateService';
import { getLeadById, insertLead } from '../core/repositories/leads';
import { createTestDatabase, START_TIME } from './helpers';

describe('tabella delle transizioni', () => {
    test('percorso principale consentito', () => {
        assert.equal(isValidLeadTransition('new', 'researched'), true);
        assert.equal(isValidLeadTransition('researched', 'qualified'), true);
        assert.equal(isValidLeadTransition('qualified', 'contacted'), true);
        assert.equal(isValidLeadTransition('contacted', 'objection'), true);
        assert.equal(isValidLeadTransition('objection', 'interested'), true);
        assert.equal(isValidLeadTransition('interested', 'booked'), true);
    });

    test('salti e ritorni indietro rifiutati', () => {
        assert.equal(isValidLeadTransition('new', 'contacted'), false);
        assert.equal(isValidLeadTransition('contacted', 'qualified'), false);
        assert.equal(isValidLeadTransition('booked', 'interested'), false);
    });

    test('dead è terminale, booked e disqualified accettano solo dead', () => {
        assert.equal(isValidLeadTransition('dead', 'new'), false);
        assert.equal(isValidLeadTransition('booked', 'dead'), true);
        assert.equal(isValidLeadTransition('disqualified', 'dead'), true);
        assert.equal(isValidLeadTransition('disqualified', 'qualified'), false);
        assert.equal(isTerminalStatus('dead'), true);
        assert.equal(isTerminalStatus('disqualified'), true);
        assert.equal(isTerminalStatus('booked'), false);
    });
});

describe('transitionLead', () => {
    test('scrive lo stato e restituisce il precedente', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co', website: 'https://shop.com' }, START_TIME);
        const at = '2026-03-02T11:00:00.000Z';

        const result = await transitionLead(db, lead.id, 'researched', at);
        assert.equal(result.changed, true);
        assert.equal(result.fromStatus, 'new');
        assert.equal(result.lead.status, 'researched');

        const stored = await getLeadById(db, lead.id);
        assert.equal(stored?.status, 'researched');
        assert.equal(stored?.updated_at, at);
        await db.close();
    });

    test('stesso stato è un no-op', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        const result = await transitionLead(db, lead.id, 'new', '2026-03-02T11:00:00.000Z');
        assert.equal(result.changed, false);
        assert.equal((await getLeadById(db, lead.id))?.updated_at, START_TIME);
        await db.close();
    });

    test('motivo di squalifica salvato insieme allo stato', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        await transitionLead(db, lead.id, 'researched', START_TIME);
        const result = await transitionLead(db, lead.id, 'disqualified', START_TIME, 'private_label_only');
        assert.equal(result.lead.disqualify_reason, 'private_label_only');
        assert.equal((await getLeadById(db, lead.id))?.disqualify_reason, 'private_label_only');
        await db.close();
    });

    test('transizione fuori tabella lancia e non scrive', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        await assert.rejects(
            () => transitionLead(db, lead.id, 'booked', START_TIME),
            (error: unknown) => error instanceof InvalidTransitionError && error.from === 'new' && error.to === 'booked'
        );
        assert.equal((await getLeadById(db, lead.id))?.status, 'new');
        await db.close();
    });

    test('lead inesistente', async () => {
        const db = await createTestDatabase();
        await assert.rejects(() => transitionLead(db, 'missing', 'dead', START_TIME), LeadNotFoundError);
        await db.close();
    });
});
