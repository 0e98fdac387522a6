/**
 * audit.ts — Audit Ledger
 *
 * Unico punto di scrittura su audit_log. Ogni stage passa l'handle della propria
 * transazione, così stato e traccia vengono committati insieme.
 */

import { DatabaseManager } from '../db';
import { currentOrNewCorrelationId } from '../telemetry/correlation';
import { AuditActor, AuditEntryRecord, AuditEventName } from '../types/domain';
import { insertAuditEntry, listAuditEntriesForLead } from './repositories/audit';
import { parsePayload } from './repositories/shared';

export interface AuditContext {
    leadId?: string | null;
    jobId?: string | null;
    actor: AuditActor;
    correlationId?: string;
    payload?: Record<string, unknown>;
}

export interface AuditEntryView {
    id: number;
    correlationId: string;
    event: AuditEventName;
    leadId: string | null;
    jobId: string | null;
    actor: AuditActor;
    payload: Record<string, unknown>;
    createdAt: string;
}

export async function recordAudit(
    db: DatabaseManager,
    event: AuditEventName,
    context: AuditContext,
    at: string
): Promise<void> {
    await insertAuditEntry(
        db,
        {
            correlationId: context.correlationId ?? currentOrNewCorrelationId(),
            event,
            leadId: context.leadId ?? null,
            jobId: context.jobId ?? null,
            actor: context.actor,
            payload: context.payload ?? {},
        },
        at
    );
}

export function toAuditEntryView(record: AuditEntryRecord): AuditEntryView {
    return {
        id: Number(record.id),
        correlationId: record.correlation_id,
        event: record.event,
        leadId: record.lead_id,
        jobId: record.job_id,
        actor: record.actor,
        payload: parsePayload(record.payload_json),
        createdAt: record.created_at,
    };
}

/** Traccia completa di un lead, in ordine di scrittura. */
export async function getLeadAuditTrail(db: DatabaseManager, leadId: string): Promise<AuditEntryView[]> {
    const rows = await listAuditEntriesForLead(db, leadId);
    return rows.map(toAuditEntryView);
}
