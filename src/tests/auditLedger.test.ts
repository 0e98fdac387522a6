import assert from 'assert';
import { describe, test } from 'node:test';
import { getLeadAuditTrail, recordAudit } from '../core/audit';
import { listAuditEntriesByCorrelation } from '../core/repositories/audit';
import { runWithCorrelationId } from '../telemetry/correlation';
import { createTestDatabase, START_TIME } from './helpers';

describe('audit ledger', () => {
    test('traccia del lead in ordine di scrittura con payload decodificato', async () => {
        const db = await createTestDatabase();
        await recordAudit(db, 'lead_created', { leadId: 'lead-1', actor: 'api', payload: { website: 'shop.com' } }, START_TIME);
        await recordAudit(db, 'job_created', { leadId: 'lead-1', jobId: 'job-1', actor: 'api' }, START_TIME);
        await recordAudit(db, 'lead_created', { leadId: 'lead-2', actor: 'cli' }, START_TIME);

        const trail = await getLeadAuditTrail(db, 'lead-1');
        assert.deepEqual(trail.map((entry) => entry.event), ['lead_created', 'job_created']);
        assert.deepEqual(trail[0].payload, { website: 'shop.com' });
        assert.equal(trail[0].jobId, null);
        assert.equal(trail[1].jobId, 'job-1');
        assert.deepEqual(trail[1].payload, {});
        assert.ok(trail[0].id < trail[1].id);
        await db.close();
    });

    test('correlation id ereditato dal contesto asincrono', async () => {
        const db = await createTestDatabase();
        await runWithCorrelationId('req-42', async () => {
            await recordAudit(db, 'reply_received', { leadId: 'lead-1', actor: 'webhook' }, START_TIME);
            await recordAudit(db, 'reply_classified', { leadId: 'lead-1', actor: 'webhook' }, START_TIME);
        });
        await recordAudit(db, 'suppression_added', { leadId: 'lead-1', actor: 'operator', correlationId: 'manual-1' }, START_TIME);

        const correlated = await listAuditEntriesByCorrelation(db, 'req-42');
        assert.deepEqual(correlated.map((row) => row.event), ['reply_received', 'reply_classified']);
        const trail = await getLeadAuditTrail(db, 'lead-1');
        assert.equal(trail[2].correlationId, 'manual-1');
        await db.close();
    });

    test('scrittura dentro una transazione annullata non resta nel ledger', async () => {
        const db = await createTestDatabase();
        await assert.rejects(
            () => db.transaction(async (tx) => {
                await recordAudit(tx, 'lead_created', { leadId: 'lead-1', actor: 'api' }, START_TIME);
                throw new Error('stage fallito');
            }),
            /stage fallito/
        );
        assert.deepEqual(await getLeadAuditTrail(db, 'lead-1'), []);
        await db.close();
    });
});
