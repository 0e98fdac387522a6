import assert from 'assert';
import { describe, test } from 'node:test';
import { getLeadAuditTrail } from '../core/audit';
import { handleDeliveryEvent, launchSequence } from '../core/deliveryService';
import { reviewDraft, sendApprovedResponse } from '../core/replyService';
import { getLeadById } from '../core/repositories/leads';
import { listMessagesForLead } from '../core/repositories/messages';
import { insertSuppressionEntry } from '../core/repositories/suppression';
import { isSuppressed, suppressAddress } from '../core/suppression';
import { SequenceStep } from '../types/collaborators';
import { contactedLead, createHarness, intakeNewLead, SHOP_LEAD, START_TIME, TestHarness } from './helpers';

async function launchedLead(harness: TestHarness): Promise<string> {
    const { leadId } = await contactedLead(harness);
    const launched = await launchSequence(harness.context, leadId);
    if (launched.status !== 'launched') {
        throw new Error(`Avvio inatteso: ${launched.status}`);
    }
    return leadId;
}

describe('launchSequence', () => {
    test('campagna, lead e step con ritardo in giorni', async () => {
        const harness = await createHarness();
        const { leadId } = await contactedLead(harness);

        const result = await launchSequence(harness.context, leadId);
        assert.equal(result.status, 'launched');
        if (result.status === 'launched') {
            assert.equal(result.campaignId, 'camp-1');
            assert.equal(result.providerLeadId, `prov-${leadId}`);
            assert.equal(result.steps, 5);
        }

        assert.deepEqual(harness.delivery.calls.map((call) => call.method), ['ensureCampaign', 'pushLead', 'startSequence']);
        assert.deepEqual(harness.delivery.callsTo('ensureCampaign')[0].args, ['test-campaign', 'sender@example.com', 'Test Sender']);
        const pushArgs = harness.delivery.callsTo('pushLead')[0].args;
        assert.equal(pushArgs[1], 'buyer@shop.com');
        assert.deepEqual(pushArgs[4], { company_name: 'Shop Co', niche: 'home goods' });

        const startArgs = harness.delivery.callsTo('startSequence')[0].args;
        const steps = startArgs[2];
        assert.ok(Array.isArray(steps));
        assert.deepEqual(steps.map((step: SequenceStep) => step.delayDays), [0, 1, 4, 7, 30]);

        const messages = await listMessagesForLead(harness.db, leadId);
        assert.ok(messages.every((message) => message.provider === 'stub' && message.provider_campaign_id === 'camp-1'));
        await harness.db.close();
    });

    test('lead senza messaggi renderizzati', async () => {
        const harness = await createHarness();
        const { leadId } = await intakeNewLead(harness);
        assert.deepEqual(await launchSequence(harness.context, leadId), { status: 'nothing_to_launch' });
        assert.equal(harness.delivery.calls.length, 0);
        await harness.db.close();
    });

    test('lead senza indirizzo', async () => {
        const harness = await createHarness();
        const { leadId } = await intakeNewLead(harness, { companyName: 'Quiet Co', website: 'https://quiet.example' });
        assert.deepEqual(await launchSequence(harness.context, leadId), { status: 'missing_address' });
        await harness.db.close();
    });

    test('indirizzo soppresso: nessuna chiamata al provider', async () => {
        const harness = await createHarness();
        const { leadId } = await contactedLead(harness);
        await suppressAddress(harness.db, 'buyer@shop.com', 'manual', { actor: 'operator' }, START_TIME);
        assert.deepEqual(await launchSequence(harness.context, leadId), { status: 'suppressed' });
        assert.equal(harness.delivery.calls.length, 0);
        await harness.db.close();
    });

    test('dominio del sito soppresso con indirizzo su altro dominio', async () => {
        const harness = await createHarness();
        const { leadId } = await contactedLead(harness, { ...SHOP_LEAD, contactEmail: 'buyer@gmail.example' });
        await insertSuppressionEntry(harness.db, { email: null, domain: 'shop.com', reason: 'complaint', sourceLeadId: null }, START_TIME);
        assert.deepEqual(await launchSequence(harness.context, leadId), { status: 'suppressed' });
        assert.equal(harness.delivery.calls.length, 0);
        await harness.db.close();
    });
});

describe('handleDeliveryEvent', () => {
    test('sent e delivered avanzano il primo touch', async () => {
        const harness = await createHarness();
        const leadId = await launchedLead(harness);

        const sent = await handleDeliveryEvent(harness.context, { event: 'sent', address: 'Buyer@Shop.com', providerMessageId: 'pm-1' });
        const messages = await listMessagesForLead(harness.db, leadId);
        assert.deepEqual(sent, { status: 'recorded', event: 'sent', leadId, messageId: messages[0].id });
        assert.equal(messages[0].status, 'sent');
        assert.equal(messages[0].provider_message_id, 'pm-1');
        assert.equal(messages[0].sent_at, START_TIME);

        const delivered = await handleDeliveryEvent(harness.context, { event: 'delivered', address: 'buyer@shop.com' });
        assert.deepEqual(delivered, { status: 'recorded', event: 'delivered', leadId, messageId: messages[0].id });
        const statuses = (await listMessagesForLead(harness.db, leadId)).map((message) => message.status);
        assert.deepEqual(statuses, ['delivered', 'rendered', 'rendered', 'rendered', 'rendered']);
        await harness.db.close();
    });

    test('bounce: messaggio bounced, indirizzo soppresso, resto in pausa', async () => {
        const harness = await createHarness();
        const leadId = await launchedLead(harness);
        await handleDeliveryEvent(harness.context, { event: 'sent', address: 'buyer@shop.com' });
        await handleDeliveryEvent(harness.context, { event: 'delivered', address: 'buyer@shop.com' });

        const result = await handleDeliveryEvent(harness.context, { event: 'bounced', address: 'buyer@shop.com' });
        assert.deepEqual(result, { status: 'suppressed', leadId, deadLeadIds: [leadId] });

        const messages = await listMessagesForLead(harness.db, leadId);
        assert.deepEqual(messages.map((message) => message.status), ['bounced', 'paused', 'paused', 'paused', 'paused']);
        assert.equal(messages[0].error, 'bounce');
        assert.equal((await getLeadById(harness.db, leadId))?.disqualify_reason, 'suppressed: bounce');
        const events = (await getLeadAuditTrail(harness.db, leadId)).map((entry) => entry.event);
        assert.deepEqual(events.slice(-3), ['email_bounced', 'suppression_added', 'lead_suppressed']);
        await harness.db.close();
    });

    test('bounce di indirizzo sconosciuto: soppresso comunque', async () => {
        const harness = await createHarness();
        const result = await handleDeliveryEvent(harness.context, { event: 'bounced', address: 'stranger@nowhere.example' });
        assert.deepEqual(result, { status: 'suppressed', leadId: null, deadLeadIds: [] });
        assert.equal(await isSuppressed(harness.db, 'stranger@nowhere.example'), true);
        await harness.db.close();
    });

    test('unsubscribe dal provider', async () => {
        const harness = await createHarness();
        const leadId = await launchedLead(harness);
        const result = await handleDeliveryEvent(harness.context, { event: 'unsubscribed', address: 'buyer@shop.com' });
        assert.deepEqual(result, { status: 'suppressed', leadId, deadLeadIds: [leadId] });
        assert.equal((await getLeadById(harness.db, leadId))?.disqualify_reason, 'suppressed: unsubscribe');
        await harness.db.close();
    });

    test('eventi ignorati', async () => {
        const harness = await createHarness();
        await launchedLead(harness);
        assert.deepEqual(await handleDeliveryEvent(harness.context, { event: 'sent', address: null }), {
            status: 'ignored',
            reason: 'missing_address',
        });
        assert.deepEqual(await handleDeliveryEvent(harness.context, { event: 'sent', address: 'stranger@nowhere.example' }), {
            status: 'ignored',
            reason: 'unknown_address',
        });
        assert.deepEqual(await handleDeliveryEvent(harness.context, { event: 'replied', address: 'buyer@shop.com' }), {
            status: 'ignored',
            reason: 'empty_reply',
        });
        assert.deepEqual(await handleDeliveryEvent(harness.context, { event: 'unknown', address: 'buyer@shop.com', rawType: 'EMAIL_CLICKED' }), {
            status: 'ignored',
            reason: 'unsupported_event',
        });
        await harness.db.close();
    });

    test('risposta via webhook: sequenza fermata anche dal provider, invio sulla campagna esistente', async () => {
        const harness = await createHarness();
        const leadId = await launchedLead(harness);

        const result = await handleDeliveryEvent(harness.context, { event: 'replied', address: 'buyer@shop.com', replyText: 'Interested.' });
        assert.equal(result.status, 'reply_handled');
        if (result.status !== 'reply_handled') return;
        assert.equal(result.reply.leadStatus, 'interested');
        assert.equal(result.reply.pausedMessages, 5);
        assert.deepEqual(harness.delivery.callsTo('pauseSequence')[0].args, ['camp-1', `prov-${leadId}`]);

        await reviewDraft(harness.context, result.reply.replyId, 'approve');
        const sent = await sendApprovedResponse(harness.context, result.reply.replyId);
        assert.equal(sent.status, 'sent');
        assert.equal(harness.delivery.callsTo('ensureCampaign').length, 1);
        assert.equal(harness.delivery.callsTo('pushLead').length, 1);
        assert.deepEqual(harness.delivery.callsTo('sendReply')[0].args.slice(0, 3), ['camp-1', `prov-${leadId}`, 'Re: Shop Co']);
        await harness.db.close();
    });
});
