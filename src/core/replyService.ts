/**
 * replyService.ts — gestione delle risposte in ingresso e delle bozze.
 */

import { DatabaseManager } from '../db';
import { logInfo, logWarn } from '../telemetry/logger';
import { ReplyClassificationResult } from '../types/collaborators';
import {
    ApprovalState,
    AuditActor,
    LeadRecord,
    LeadStatus,
    MessageDraft,
    ReplyAction,
    ReplyClassification,
    ReplyRecord,
} from '../types/domain';
import { containsOptOutLanguage, lintMessage } from '../validation/contentLinter';
import { recordAudit } from './audit';
import { defaultReplyClassification } from './collaboratorDefaults';
import { nowIso, PipelineContext } from './context';
import { DraftStateError, errorMessage, InvalidTransitionError, LeadNotFoundError, ReplyNotFoundError } from './errors';
import { transitionLead } from './leadStateService';
import { buildInterestResponse, buildObjectionResponse } from './replyDrafts';
import { getCatalogItemsByIds } from './repositories/catalog';
import { DRAFTED_REPLY_COUNTER, incrementCounter } from './repositories/counters';
import { getLeadById } from './repositories/leads';
import { getLeverageAssignment } from './repositories/leverage';
import {
    getProviderRefsForLead,
    insertOutboundMessage,
    markMessageSent,
    pauseOpenMessagesForLeads,
    ProviderRefs,
} from './repositories/messages';
import { getActiveObjectionTemplate } from './repositories/objections';
import {
    attachReplyDraft,
    getReplyById,
    insertReply,
    markReplyResponseSent,
    releaseReplyResponse,
    setReplyApproval,
    updateReplyClassification,
} from './repositories/replies';
import { parseStringArray } from './repositories/shared';
import { isLeadSuppressed, suppressAddress } from './suppression';

export interface InboundReply {
    leadId: string;
    rawText: string;
    outboundMessageId?: string | null;
    providerMessageId?: string | null;
}

export interface DraftSummary extends MessageDraft {
    approval: ApprovalState;
    lintOk: boolean;
}

export interface ReplyOutcome {
    replyId: string;
    classification: ReplyClassification;
    action: ReplyAction;
    leadStatus: LeadStatus;
    draft: DraftSummary | null;
    pausedMessages: number;
}

export type SendResponseResult =
    | { status: 'sent'; replyId: string; messageId: string; providerMessageId: string | null }
    | { status: 'suppressed'; replyId: string }
    | { status: 'already_sent'; replyId: string };

const PREVIEW_LENGTH = 100;

async function requireLead(db: DatabaseManager, leadId: string): Promise<LeadRecord> {
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        throw new LeadNotFoundError(leadId);
    }
    return lead;
}

async function requireReply(db: DatabaseManager, replyId: string): Promise<ReplyRecord> {
    const reply = await getReplyById(db, replyId);
    if (!reply) {
        throw new ReplyNotFoundError(replyId);
    }
    return reply;
}

/** Transizione best-effort: una transizione fuori tabella lascia lo stato invariato. */
async function tryTransition(
    tx: DatabaseManager,
    leadId: string,
    toStatus: LeadStatus,
    at: string,
    warnings: string[]
): Promise<void> {
    try {
        await transitionLead(tx, leadId, toStatus, at);
    } catch (error) {
        if (!(error instanceof InvalidTransitionError)) {
            throw error;
        }
        warnings.push(error.message);
    }
}

async function suppressReplyingLead(
    tx: DatabaseManager,
    lead: LeadRecord,
    replyId: string,
    actor: AuditActor,
    at: string
): Promise<number> {
    if (lead.contact_email) {
        const outcome = await suppressAddress(tx, lead.contact_email, 'unsubscribe', { actor, sourceLeadId: lead.id }, at);
        // un lead senza match per indirizzo (es. email cambiata) va comunque chiuso
        if (!outcome.deadLeadIds.includes(lead.id)) {
            await transitionLead(tx, lead.id, 'dead', at, 'suppressed: unsubscribe');
        }
        return outcome.pausedMessages;
    }
    await transitionLead(tx, lead.id, 'dead', at, 'suppressed: unsubscribe');
    await recordAudit(tx, 'lead_suppressed', { leadId: lead.id, actor, payload: { reason: 'unsubscribe', replyId } }, at);
    return pauseOpenMessagesForLeads(tx, [lead.id], at);
}

async function pauseAtProvider(context: PipelineContext, refs: ProviderRefs | null, leadId: string): Promise<void> {
    if (!refs) return;
    try {
        await context.delivery.pauseSequence(refs.campaignId, refs.providerLeadId);
    } catch (error) {
        await logWarn('reply.provider_pause_failed', { leadId, provider: refs.provider, error: errorMessage(error) });
    }
}

async function buildDraft(
    tx: DatabaseManager,
    context: PipelineContext,
    lead: LeadRecord,
    result: ReplyClassificationResult
): Promise<MessageDraft & { itemCount: number }> {
    if (result.classification === 'interested') {
        return { ...buildInterestResponse(lead.company_name, context.pipeline), itemCount: 0 };
    }
    const leverage = await getLeverageAssignment(tx, lead.id);
    const items = await getCatalogItemsByIds(tx, parseStringArray(leverage?.selected_item_ids_json));
    const itemNames = items.map((item) => item.name);
    const template = result.objectionType ? await getActiveObjectionTemplate(tx, result.objectionType) : undefined;
    const draft = buildObjectionResponse(template, lead.company_name, itemNames, context.pipeline);
    return { subject: draft.subject, body: draft.body, itemCount: Math.min(context.pipeline.maxItemsPerMessage, itemNames.length) };
}

// ─── Handle Reply ─────────────────────────────────────────────────────────────

export async function handleReply(context: PipelineContext, inbound: InboundReply, actor: AuditActor = 'webhook'): Promise<ReplyOutcome> {
    const { db, pipeline } = context;
    if (typeof inbound.rawText !== 'string') {
        throw new Error('Testo della risposta mancante.');
    }
    const lead = await requireLead(db, inbound.leadId);

    const receivedAt = nowIso(context);
    const replyId = await db.transaction(async (tx) => {
        const id = await insertReply(
            tx,
            {
                leadId: lead.id,
                rawText: inbound.rawText,
                outboundMessageId: inbound.outboundMessageId ?? null,
                providerMessageId: inbound.providerMessageId ?? null,
            },
            receivedAt
        );
        await recordAudit(
            tx,
            'reply_received',
            { leadId: lead.id, actor, payload: { replyId: id, preview: inbound.rawText.slice(0, PREVIEW_LENGTH) } },
            receivedAt
        );
        return id;
    });

    const refs = await getProviderRefsForLead(db, lead.id);

    // gate 3: opt-out esplicito, nessuna classificazione
    if (containsOptOutLanguage(inbound.rawText, pipeline.optOutPhrases)) {
        const at = nowIso(context);
        const paused = await db.transaction(async (tx) => {
            await updateReplyClassification(
                tx,
                replyId,
                { classification: 'unsubscribe', objectionType: null, action: 'suppress', interestLevel: null, callId: null },
                at
            );
            return suppressReplyingLead(tx, lead, replyId, actor, at);
        });
        await pauseAtProvider(context, refs, lead.id);
        await logInfo('reply.opt_out', { leadId: lead.id, replyId });
        return { replyId, classification: 'unsubscribe', action: 'suppress', leadStatus: 'dead', draft: null, pausedMessages: paused };
    }

    // gate 4: indirizzo o dominio già nel registro, nessuna classificazione né bozza
    const alreadySuppressed = lead.status === 'dead' && (lead.disqualify_reason ?? '').startsWith('suppressed');
    if (alreadySuppressed || (await isLeadSuppressed(db, lead))) {
        const at = nowIso(context);
        const suppressed = await db.transaction<ReplyOutcome>(async (tx) => {
            await updateReplyClassification(
                tx,
                replyId,
                { classification: 'unsubscribe', objectionType: null, action: 'suppress', interestLevel: null, callId: null },
                at
            );
            await recordAudit(
                tx,
                'reply_classified',
                { leadId: lead.id, actor, payload: { replyId, classification: 'unsubscribe', action: 'suppress', gate: 'suppression' } },
                at
            );
            const current = await requireLead(tx, lead.id);
            if (current.status !== 'dead') {
                await transitionLead(tx, lead.id, 'dead', at, 'suppressed');
                await recordAudit(tx, 'lead_suppressed', { leadId: lead.id, actor, payload: { gate: 'reply', replyId, fromStatus: current.status } }, at);
            }
            const pausedMessages = await pauseOpenMessagesForLeads(tx, [lead.id], at);
            return { replyId, classification: 'unsubscribe', action: 'suppress', leadStatus: 'dead', draft: null, pausedMessages };
        });
        await pauseAtProvider(context, refs, lead.id);
        await logWarn('reply.suppressed_lead', { leadId: lead.id, replyId });
        return suppressed;
    }

    const leverage = await getLeverageAssignment(db, lead.id);
    let result = defaultReplyClassification();
    let callId: string | null = null;
    try {
        const outcome = await context.replyClassifier.classify(inbound.rawText, {
            companyName: lead.company_name,
            niche: lead.niche,
            angle: leverage?.primary_angle ?? null,
        });
        result = outcome.result;
        callId = outcome.callId;
    } catch (error) {
        await logWarn('reply.classify.collaborator_failed', { leadId: lead.id, replyId, error: errorMessage(error) });
    }

    const at = nowIso(context);
    const warnings: string[] = [];
    const outcome = await db.transaction<ReplyOutcome>(async (tx) => {
        const classification = result.classification;
        let action: ReplyAction = result.action;
        let draft: DraftSummary | null = null;
        let pausedMessages = 0;

        if (classification === 'unsubscribe') {
            action = 'suppress';
        } else if (classification !== 'interested' && classification !== 'objection' && classification !== 'not_interested') {
            action = 'handoff_to_human';
        }

        await updateReplyClassification(
            tx,
            replyId,
            { classification, objectionType: result.objectionType, action, interestLevel: result.interestLevel, callId },
            at
        );
        await recordAudit(
            tx,
            'reply_classified',
            { leadId: lead.id, actor, payload: { replyId, classification, action, objectionType: result.objectionType, callId } },
            at
        );

        if (classification === 'unsubscribe') {
            pausedMessages = await suppressReplyingLead(tx, lead, replyId, actor, at);
        } else if (classification === 'interested' || classification === 'objection') {
            await tryTransition(tx, lead.id, classification, at, warnings);
            const built = await buildDraft(tx, context, lead, result);
            const lint = lintMessage(built.subject, built.body, built.itemCount, pipeline);
            let approval: ApprovalState = 'rejected';
            if (lint.ok) {
                const drafted = await incrementCounter(tx, DRAFTED_REPLY_COUNTER);
                approval = drafted <= pipeline.humanApprovalThreshold ? 'pending' : 'approved';
            }
            await attachReplyDraft(
                tx,
                replyId,
                { subject: built.subject, body: built.body, approval, lintViolations: lint.violations },
                at
            );
            draft = { subject: built.subject, body: built.body, approval, lintOk: lint.ok };
            pausedMessages = await pauseOpenMessagesForLeads(tx, [lead.id], at);
        } else if (classification === 'not_interested') {
            await tryTransition(tx, lead.id, 'dead', at, warnings);
        }

        const current = await requireLead(tx, lead.id);
        return { replyId, classification, action, leadStatus: current.status, draft, pausedMessages };
    });

    for (const warning of warnings) {
        await logWarn('reply.transition_skipped', { leadId: lead.id, replyId, warning });
    }
    if (outcome.pausedMessages > 0 || outcome.classification === 'unsubscribe') {
        await pauseAtProvider(context, refs, lead.id);
    }
    await logInfo('reply.handled', {
        leadId: lead.id,
        replyId,
        classification: outcome.classification,
        action: outcome.action,
        approval: outcome.draft?.approval ?? null,
    });
    return outcome;
}

// ─── Review Draft ─────────────────────────────────────────────────────────────

export async function reviewDraft(context: PipelineContext, replyId: string, decision: 'approve' | 'reject'): Promise<ReplyRecord> {
    const at = nowIso(context);
    const reviewed = await context.db.transaction(async (tx) => {
        const reply = await requireReply(tx, replyId);
        if (reply.approval !== 'pending') {
            throw new DraftStateError(`La bozza ${replyId} non è in attesa di revisione (stato: ${reply.approval ?? 'nessuna bozza'}).`);
        }
        await setReplyApproval(tx, replyId, decision === 'approve' ? 'approved' : 'rejected', at);
        return requireReply(tx, replyId);
    });
    await logInfo('reply.draft.reviewed', { replyId, decision });
    return reviewed;
}

// ─── Send Approved Response ───────────────────────────────────────────────────

async function resolveProviderRefs(context: PipelineContext, lead: LeadRecord, address: string): Promise<ProviderRefs> {
    const existing = await getProviderRefsForLead(context.db, lead.id);
    if (existing) {
        return existing;
    }
    const { sender } = context;
    const campaignId = await context.delivery.ensureCampaign(sender.campaignKey, sender.senderEmail, sender.senderName);
    const providerLeadId = await context.delivery.pushLead(campaignId, address, lead.id, `reply-${lead.id}`, {
        company_name: lead.company_name,
    });
    return { provider: context.delivery.name, campaignId, providerLeadId };
}

export async function sendApprovedResponse(context: PipelineContext, replyId: string, actor: AuditActor = 'operator'): Promise<SendResponseResult> {
    const { db } = context;
    const reply = await requireReply(db, replyId);
    if (reply.approval !== 'approved' || !reply.draft_response) {
        throw new DraftStateError(`La bozza ${replyId} non è approvata.`);
    }
    if (Number(reply.response_sent) === 1) {
        return { status: 'already_sent', replyId };
    }
    const lead = await requireLead(db, reply.lead_id);

    if (!lead.contact_email || lead.status === 'dead' || (await isLeadSuppressed(db, lead))) {
        await logWarn('reply.response.blocked', { replyId, leadId: lead.id, status: lead.status });
        return { status: 'suppressed', replyId };
    }
    const address = lead.contact_email;

    const claimed = await markReplyResponseSent(db, replyId, nowIso(context));
    if (!claimed) {
        return { status: 'already_sent', replyId };
    }

    const subject = reply.draft_subject ?? `Re: ${lead.company_name}`;
    let providerMessageId: string | null;
    let refs: ProviderRefs;
    try {
        refs = await resolveProviderRefs(context, lead, address);
        providerMessageId = await context.delivery.sendReply(refs.campaignId, refs.providerLeadId, subject, reply.draft_response);
    } catch (error) {
        await releaseReplyResponse(db, replyId, nowIso(context));
        await logWarn('reply.response.send_failed', { replyId, leadId: lead.id, error: errorMessage(error) });
        throw error;
    }

    const at = nowIso(context);
    const draftBody = reply.draft_response;
    const messageId = await db.transaction(async (tx) => {
        const id = await insertOutboundMessage(
            tx,
            {
                leadId: lead.id,
                sequenceId: `reply-${replyId}`,
                touchIndex: 0,
                messageType: 'reply',
                subject,
                body: draftBody,
                status: 'rendered',
                scheduledAt: at,
                replyId,
            },
            at
        );
        await markMessageSent(tx, id, at, providerMessageId);
        await recordAudit(
            tx,
            'reply_response_sent',
            { leadId: lead.id, actor, payload: { replyId, messageId: id, provider: refs.provider, providerMessageId } },
            at
        );
        return id;
    });

    await logInfo('reply.response.sent', { replyId, leadId: lead.id, messageId });
    return { status: 'sent', replyId, messageId, providerMessageId };
}
