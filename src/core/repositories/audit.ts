/**
 * repositories/audit.ts
 * Append-only: esistono solo INSERT e SELECT su audit_log.
 */

import { DatabaseManager } from '../../db';
import { AuditActor, AuditEntryRecord, AuditEventName } from '../../types/domain';
import { toJson } from './shared';

export interface AuditEntryInput {
    correlationId: string;
    event: AuditEventName;
    leadId: string | null;
    jobId: string | null;
    actor: AuditActor;
    payload: Record<string, unknown>;
}

export async function insertAuditEntry(db: DatabaseManager, entry: AuditEntryInput, at: string): Promise<void> {
    await db.run(
        `INSERT INTO audit_log (correlation_id, event, lead_id, job_id, actor, payload_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [entry.correlationId, entry.event, entry.leadId, entry.jobId, entry.actor, toJson(entry.payload), at]
    );
}

export async function listAuditEntriesForLead(db: DatabaseManager, leadId: string): Promise<AuditEntryRecord[]> {
    return db.query<AuditEntryRecord>(`SELECT * FROM audit_log WHERE lead_id = ? ORDER BY id ASC`, [leadId]);
}

export async function listAuditEntriesByCorrelation(db: DatabaseManager, correlationId: string): Promise<AuditEntryRecord[]> {
    return db.query<AuditEntryRecord>(`SELECT * FROM audit_log WHERE correlation_id = ? ORDER BY id ASC`, [correlationId]);
}

export async function listRecentAuditEntries(db: DatabaseManager, limit: number = 100): Promise<AuditEntryRecord[]> {
    return db.query<AuditEntryRecord>(`SELECT * FROM audit_log ORDER BY id DESC LIMIT ?`, [Math.max(1, limit)]);
}
