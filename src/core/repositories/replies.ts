/**
 * repositories/replies.ts
 * Risposte in ingresso, classificazione, bozza e stato di approvazione.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { ApprovalState, LintViolation, ReplyAction, ReplyClassification, ReplyRecord } from '../../types/domain';
import { toJson } from './shared';

export async function insertReply(
    db: DatabaseManager,
    input: { leadId: string; rawText: string; outboundMessageId: string | null; providerMessageId: string | null },
    at: string
): Promise<string> {
    const id = randomUUID();
    await db.run(
        `INSERT INTO replies (id, lead_id, outbound_message_id, raw_text, provider_message_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [id, input.leadId, input.outboundMessageId, input.rawText, input.providerMessageId, at, at]
    );
    return id;
}

export interface ReplyClassificationUpdate {
    classification: ReplyClassification;
    objectionType: string | null;
    action: ReplyAction;
    interestLevel: number | null;
    callId: string | null;
}

export async function updateReplyClassification(
    db: DatabaseManager,
    replyId: string,
    update: ReplyClassificationUpdate,
    at: string
): Promise<void> {
    await db.run(
        `UPDATE replies
         SET classification = ?, objection_type = ?, action = ?, interest_level = ?, call_id = ?, updated_at = ?
         WHERE id = ?`,
        [update.classification, update.objectionType, update.action, update.interestLevel, update.callId, at, replyId]
    );
}

export async function attachReplyDraft(
    db: DatabaseManager,
    replyId: string,
    draft: { subject: string; body: string; approval: ApprovalState; lintViolations: LintViolation[] },
    at: string
): Promise<void> {
    await db.run(
        `UPDATE replies
         SET draft_subject = ?, draft_response = ?, approval = ?, lint_violations_json = ?, updated_at = ?
         WHERE id = ?`,
        [draft.subject, draft.body, draft.approval, toJson(draft.lintViolations), at, replyId]
    );
}

export async function getReplyById(db: DatabaseManager, replyId: string): Promise<ReplyRecord | undefined> {
    return db.get<ReplyRecord>(`SELECT * FROM replies WHERE id = ?`, [replyId]);
}

export async function listRepliesForLead(db: DatabaseManager, leadId: string): Promise<ReplyRecord[]> {
    return db.query<ReplyRecord>(`SELECT * FROM replies WHERE lead_id = ? ORDER BY created_at ASC`, [leadId]);
}

export async function listPendingApprovals(db: DatabaseManager, limit: number = 50): Promise<ReplyRecord[]> {
    return db.query<ReplyRecord>(
        `SELECT * FROM replies WHERE approval = 'pending' ORDER BY created_at ASC LIMIT ?`,
        [Math.max(1, limit)]
    );
}

/** Transizione solo da pending: restituisce false se la bozza era già stata decisa. */
export async function setReplyApproval(
    db: DatabaseManager,
    replyId: string,
    approval: Exclude<ApprovalState, 'pending'>,
    at: string
): Promise<boolean> {
    const result = await db.run(
        `UPDATE replies SET approval = ?, updated_at = ? WHERE id = ? AND approval = 'pending'`,
        [approval, at, replyId]
    );
    return (result.changes ?? 0) > 0;
}

export async function markReplyResponseSent(db: DatabaseManager, replyId: string, at: string): Promise<boolean> {
    const result = await db.run(
        `UPDATE replies SET response_sent = 1, updated_at = ? WHERE id = ? AND response_sent = 0`,
        [at, replyId]
    );
    return (result.changes ?? 0) > 0;
}

/** Rilascia la marcatura di invio quando il provider rifiuta la risposta. */
export async function releaseReplyResponse(db: DatabaseManager, replyId: string, at: string): Promise<void> {
    await db.run(`UPDATE replies SET response_sent = 0, updated_at = ? WHERE id = ? AND response_sent = 1`, [at, replyId]);
}
