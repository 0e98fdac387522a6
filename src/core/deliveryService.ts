/**
 * deliveryService.ts — confine tra orchestratore e provider email.
 * Avvio sequenza verso il provider ed eventi webhook normalizzati.
 */

import { logInfo, logWarn } from '../telemetry/logger';
import { DeliveryEvent, SequenceStep } from '../types/collaborators';
import { AuditActor, LeadRecord } from '../types/domain';
import { recordAudit } from './audit';
import { nowIso, PipelineContext } from './context';
import { LeadNotFoundError } from './errors';
import { getLatestLeadByEmail, getLeadById } from './repositories/leads';
import {
    attachProviderRefs,
    getLatestSentMessage,
    getNextRenderedMessage,
    listRenderedSequence,
    markMessageSent,
    updateMessageStatus,
} from './repositories/messages';
import { normalizeEmail } from './repositories/shared';
import { handleReply, ReplyOutcome } from './replyService';
import { isLeadSuppressed, suppressAddress } from './suppression';

const DAY_MS = 86_400_000;

export type LaunchResult =
    | { status: 'launched'; sequenceId: string; campaignId: string; providerLeadId: string; steps: number }
    | { status: 'nothing_to_launch' }
    | { status: 'suppressed' }
    | { status: 'missing_address' };

export type DeliveryEventResult =
    | { status: 'recorded'; event: DeliveryEvent['event']; leadId: string | null; messageId: string | null }
    | { status: 'reply_handled'; leadId: string; reply: ReplyOutcome }
    | { status: 'suppressed'; leadId: string | null; deadLeadIds: string[] }
    | { status: 'ignored'; reason: string };

// ─── Launch Sequence ──────────────────────────────────────────────────────────

export async function launchSequence(context: PipelineContext, leadId: string): Promise<LaunchResult> {
    const { db, delivery, sender } = context;
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        throw new LeadNotFoundError(leadId);
    }
    if (!lead.contact_email) {
        await logWarn('delivery.launch.missing_address', { leadId });
        return { status: 'missing_address' };
    }
    if (lead.status === 'dead' || (await isLeadSuppressed(db, lead))) {
        await logWarn('delivery.launch.suppressed', { leadId });
        return { status: 'suppressed' };
    }

    const messages = await listRenderedSequence(db, leadId);
    const first = messages[0];
    if (!first) {
        return { status: 'nothing_to_launch' };
    }
    const sequenceId = first.sequence_id;
    const startMs = Date.parse(first.scheduled_at);
    const steps: SequenceStep[] = messages
        .filter((message) => message.sequence_id === sequenceId)
        .map((message) => ({
            subject: message.subject,
            body: message.body,
            delayDays: Math.max(0, Math.round((Date.parse(message.scheduled_at) - startMs) / DAY_MS)),
        }));

    const campaignId = await delivery.ensureCampaign(sender.campaignKey, sender.senderEmail, sender.senderName);
    const providerLeadId = await delivery.pushLead(campaignId, lead.contact_email, lead.id, sequenceId, {
        company_name: lead.company_name,
        niche: lead.niche ?? '',
    });
    await delivery.startSequence(campaignId, providerLeadId, steps);
    await attachProviderRefs(db, sequenceId, { provider: delivery.name, campaignId, providerLeadId }, nowIso(context));

    await logInfo('delivery.launch.started', { leadId, sequenceId, provider: delivery.name, steps: steps.length });
    return { status: 'launched', sequenceId, campaignId, providerLeadId, steps: steps.length };
}

// ─── Handle Delivery Event ────────────────────────────────────────────────────

async function suppressFromEvent(
    context: PipelineContext,
    address: string,
    lead: LeadRecord | undefined,
    reason: 'bounce' | 'unsubscribe',
    actor: AuditActor
): Promise<DeliveryEventResult> {
    const at = nowIso(context);
    const outcome = await context.db.transaction(async (tx) => {
        if (reason === 'bounce' && lead) {
            const message = await getLatestSentMessage(tx, lead.id);
            if (message) {
                await updateMessageStatus(tx, message.id, 'bounced', at, 'bounce');
            }
            await recordAudit(tx, 'email_bounced', { leadId: lead.id, actor, payload: { messageId: message?.id ?? null } }, at);
        }
        return suppressAddress(tx, address, reason, { actor, sourceLeadId: lead?.id }, at);
    });
    await logInfo('delivery.event.suppressed', { leadId: lead?.id ?? null, reason, inserted: outcome.inserted });
    return { status: 'suppressed', leadId: lead?.id ?? null, deadLeadIds: outcome.deadLeadIds };
}

export async function handleDeliveryEvent(
    context: PipelineContext,
    event: DeliveryEvent,
    actor: AuditActor = 'webhook'
): Promise<DeliveryEventResult> {
    const { db } = context;
    const address = normalizeEmail(event.address);
    if (!address) {
        await logWarn('delivery.event.missing_address', { event: event.event, rawType: event.rawType ?? null });
        return { status: 'ignored', reason: 'missing_address' };
    }

    const lead = await getLatestLeadByEmail(db, address);

    if (event.event === 'bounced' || event.event === 'unsubscribed') {
        if (!lead) {
            await logWarn('delivery.event.unknown_address', { event: event.event });
        }
        return suppressFromEvent(context, address, lead, event.event === 'bounced' ? 'bounce' : 'unsubscribe', actor);
    }

    if (!lead) {
        await logWarn('delivery.event.unknown_address', { event: event.event });
        return { status: 'ignored', reason: 'unknown_address' };
    }

    const at = nowIso(context);
    switch (event.event) {
        case 'sent': {
            const messageId = await db.transaction(async (tx) => {
                const message = await getNextRenderedMessage(tx, lead.id);
                if (!message) return null;
                await markMessageSent(tx, message.id, at, event.providerMessageId ?? null);
                await recordAudit(
                    tx,
                    'email_sent',
                    { leadId: lead.id, actor, payload: { messageId: message.id, touch: message.touch_index } },
                    at
                );
                return message.id;
            });
            if (!messageId) {
                await logWarn('delivery.event.no_rendered_message', { leadId: lead.id });
            }
            return { status: 'recorded', event: 'sent', leadId: lead.id, messageId };
        }
        case 'delivered': {
            const messageId = await db.transaction(async (tx) => {
                const message = await getLatestSentMessage(tx, lead.id);
                if (message && message.status === 'sent') {
                    await updateMessageStatus(tx, message.id, 'delivered', at);
                }
                await recordAudit(tx, 'email_delivered', { leadId: lead.id, actor, payload: { messageId: message?.id ?? null } }, at);
                return message?.id ?? null;
            });
            return { status: 'recorded', event: 'delivered', leadId: lead.id, messageId };
        }
        case 'opened':
            await logInfo('delivery.event.opened', { leadId: lead.id });
            return { status: 'recorded', event: 'opened', leadId: lead.id, messageId: null };
        case 'replied': {
            if (!event.replyText) {
                await logWarn('delivery.event.empty_reply', { leadId: lead.id });
                return { status: 'ignored', reason: 'empty_reply' };
            }
            const reply = await handleReply(
                context,
                { leadId: lead.id, rawText: event.replyText, providerMessageId: event.providerMessageId ?? null },
                actor
            );
            return { status: 'reply_handled', leadId: lead.id, reply };
        }
        default:
            await logWarn('delivery.event.unsupported', { leadId: lead.id, rawType: event.rawType ?? null });
            return { status: 'ignored', reason: 'unsupported_event' };
    }
}
