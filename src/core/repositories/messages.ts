/**
 * repositories/messages.ts
 * Outbound message jobs: una riga per touch, raggruppate per sequence_id.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { LintViolation, OutboundMessageRecord, OutboundMessageStatus, OutboundMessageType } from '../../types/domain';
import { toJson } from './shared';

export interface NewOutboundMessage {
    leadId: string;
    sequenceId: string;
    touchIndex: number;
    messageType: OutboundMessageType;
    subject: string;
    body: string;
    status: OutboundMessageStatus;
    scheduledAt: string;
    error?: string | null;
    lintViolations?: LintViolation[];
    replyId?: string | null;
}

export async function insertOutboundMessage(db: DatabaseManager, input: NewOutboundMessage, at: string): Promise<string> {
    const id = randomUUID();
    await db.run(
        `INSERT INTO outbound_messages (
            id, lead_id, sequence_id, touch_index, message_type, subject, body, status, scheduled_at, error,
            lint_violations_json, reply_id, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
            id,
            input.leadId,
            input.sequenceId,
            input.touchIndex,
            input.messageType,
            input.subject,
            input.body,
            input.status,
            input.scheduledAt,
            input.error ?? null,
            toJson(input.lintViolations ?? []),
            input.replyId ?? null,
            at,
            at,
        ]
    );
    return id;
}

export async function listMessagesForLead(db: DatabaseManager, leadId: string): Promise<OutboundMessageRecord[]> {
    return db.query<OutboundMessageRecord>(
        `SELECT * FROM outbound_messages WHERE lead_id = ? ORDER BY message_type ASC, touch_index ASC, created_at ASC`,
        [leadId]
    );
}

/** Mette in pausa i messaggi non ancora inviati (queued/rendered) dei lead indicati. */
export async function pauseOpenMessagesForLeads(db: DatabaseManager, leadIds: string[], at: string): Promise<number> {
    if (leadIds.length === 0) return 0;
    const placeholders = leadIds.map(() => '?').join(', ');
    const result = await db.run(
        `UPDATE outbound_messages
         SET status = 'paused', updated_at = ?
         WHERE lead_id IN (${placeholders}) AND status IN ('queued', 'rendered')`,
        [at, ...leadIds]
    );
    return result.changes ?? 0;
}

export async function getNextRenderedMessage(db: DatabaseManager, leadId: string): Promise<OutboundMessageRecord | undefined> {
    return db.get<OutboundMessageRecord>(
        `SELECT * FROM outbound_messages
         WHERE lead_id = ? AND message_type = 'sequence' AND status = 'rendered'
         ORDER BY touch_index ASC
         LIMIT 1`,
        [leadId]
    );
}

export async function getLatestSentMessage(db: DatabaseManager, leadId: string): Promise<OutboundMessageRecord | undefined> {
    return db.get<OutboundMessageRecord>(
        `SELECT * FROM outbound_messages
         WHERE lead_id = ? AND status IN ('sent', 'delivered')
         ORDER BY sent_at DESC, touch_index DESC
         LIMIT 1`,
        [leadId]
    );
}

export async function markMessageSent(
    db: DatabaseManager,
    messageId: string,
    at: string,
    providerMessageId: string | null
): Promise<void> {
    await db.run(
        `UPDATE outbound_messages
         SET status = 'sent', sent_at = ?, provider_message_id = COALESCE(?, provider_message_id), updated_at = ?
         WHERE id = ?`,
        [at, providerMessageId, at, messageId]
    );
}

export async function updateMessageStatus(
    db: DatabaseManager,
    messageId: string,
    status: OutboundMessageStatus,
    at: string,
    error: string | null = null
): Promise<void> {
    await db.run(
        `UPDATE outbound_messages SET status = ?, error = COALESCE(?, error), updated_at = ? WHERE id = ?`,
        [status, error, at, messageId]
    );
}

export async function attachProviderRefs(
    db: DatabaseManager,
    sequenceId: string,
    refs: { provider: string; campaignId: string; providerLeadId: string },
    at: string
): Promise<void> {
    await db.run(
        `UPDATE outbound_messages
         SET provider = ?, provider_campaign_id = ?, provider_lead_id = ?, updated_at = ?
         WHERE sequence_id = ?`,
        [refs.provider, refs.campaignId, refs.providerLeadId, at, sequenceId]
    );
}

export async function listRenderedSequence(db: DatabaseManager, leadId: string): Promise<OutboundMessageRecord[]> {
    return db.query<OutboundMessageRecord>(
        `SELECT * FROM outbound_messages
         WHERE lead_id = ? AND message_type = 'sequence' AND status = 'rendered'
         ORDER BY touch_index ASC`,
        [leadId]
    );
}

export interface ProviderRefs {
    provider: string;
    campaignId: string;
    providerLeadId: string;
}

export async function getProviderRefsForLead(db: DatabaseManager, leadId: string): Promise<ProviderRefs | null> {
    const row = await db.get<{ provider: string | null; provider_campaign_id: string | null; provider_lead_id: string | null }>(
        `SELECT provider, provider_campaign_id, provider_lead_id FROM outbound_messages
         WHERE lead_id = ? AND provider_campaign_id IS NOT NULL AND provider_lead_id IS NOT NULL
         ORDER BY updated_at DESC
         LIMIT 1`,
        [leadId]
    );
    if (!row || !row.provider || !row.provider_campaign_id || !row.provider_lead_id) {
        return null;
    }
    return { provider: row.provider, campaignId: row.provider_campaign_id, providerLeadId: row.provider_lead_id };
}

export async function countSequenceMessages(db: DatabaseManager, leadId: string): Promise<number> {
    const row = await db.get<{ total: number | string }>(
        `SELECT COUNT(*) as total FROM outbound_messages WHERE lead_id = ? AND message_type = 'sequence'`,
        [leadId]
    );
    return Number(row?.total ?? 0);
}
