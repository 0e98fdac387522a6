/**
 * suppression.ts — Suppression Registry
 *
 * Opt-out permanente per indirizzo o dominio. Ogni inserimento porta a `dead`
 * i lead collegati e mette in pausa i loro messaggi non inviati, nella stessa
 * transazione del chiamante.
 */

import { DatabaseManager } from '../db';
import { AuditActor, LeadRecord, SuppressionEntryRecord } from '../types/domain';
import { recordAudit } from './audit';
import { transitionLead } from './leadStateService';
import { listLeadsByEmail, listLeadsByEmailDomain, listLeadsByWebsiteDomain } from './repositories/leads';
import { pauseOpenMessagesForLeads } from './repositories/messages';
import { emailDomain, normalizeEmail } from './repositories/shared';
import { findSuppressionMatch, insertSuppressionEntry } from './repositories/suppression';

export type SuppressionReason = 'unsubscribe' | 'bounce' | 'complaint' | 'manual' | 'opt_out_reply';

export interface SuppressionContext {
    actor: AuditActor;
    sourceLeadId?: string | null;
    jobId?: string | null;
    correlationId?: string;
}

export interface SuppressionOutcome {
    inserted: boolean;
    deadLeadIds: string[];
    pausedMessages: number;
}

export async function findSuppression(db: DatabaseManager, email: string | null | undefined): Promise<SuppressionEntryRecord | undefined> {
    const normalized = normalizeEmail(email);
    if (!normalized) return undefined;
    return findSuppressionMatch(db, normalized, emailDomain(normalized));
}

export async function isSuppressed(db: DatabaseManager, email: string | null | undefined): Promise<boolean> {
    return (await findSuppression(db, email)) !== undefined;
}

/** Host del sito senza `www.`; null se il valore non è un URL. */
export function websiteDomain(website: string | null | undefined): string | null {
    if (!website) return null;
    try {
        const url = new URL(website.includes('://') ? website : `https://${website}`);
        return url.hostname.toLowerCase().replace(/^www\./, '') || null;
    } catch {
        return null;
    }
}

export interface LeadSuppressionMatch {
    entry: SuppressionEntryRecord;
    matchedOn: 'email' | 'website_domain';
}

/**
 * Gate unico per intake, ricerca e invio: indirizzo esatto, dominio dell'indirizzo
 * e dominio del sito del lead.
 */
export async function findLeadSuppression(
    db: DatabaseManager,
    lead: Pick<LeadRecord, 'contact_email' | 'website'>
): Promise<LeadSuppressionMatch | undefined> {
    const byEmail = await findSuppression(db, lead.contact_email);
    if (byEmail) {
        return { entry: byEmail, matchedOn: 'email' };
    }
    const domain = websiteDomain(lead.website);
    if (!domain) return undefined;
    const byWebsite = await findSuppressionMatch(db, null, domain);
    return byWebsite ? { entry: byWebsite, matchedOn: 'website_domain' } : undefined;
}

export async function isLeadSuppressed(db: DatabaseManager, lead: Pick<LeadRecord, 'contact_email' | 'website'>): Promise<boolean> {
    return (await findLeadSuppression(db, lead)) !== undefined;
}

export async function isDomainSuppressed(db: DatabaseManager, domain: string): Promise<boolean> {
    const normalized = domain.trim().toLowerCase();
    if (!normalized) return false;
    return (await findSuppressionMatch(db, null, normalized)) !== undefined;
}

async function killLeads(
    db: DatabaseManager,
    leads: LeadRecord[],
    reason: string,
    context: SuppressionContext,
    at: string
): Promise<string[]> {
    const killed: string[] = [];
    for (const lead of leads) {
        if (lead.status === 'dead') continue;
        const previous = lead.status;
        await transitionLead(db, lead.id, 'dead', at, `suppressed: ${reason}`);
        killed.push(lead.id);
        await recordAudit(
            db,
            'lead_suppressed',
            {
                leadId: lead.id,
                jobId: context.jobId,
                actor: context.actor,
                correlationId: context.correlationId,
                payload: { reason, fromStatus: previous },
            },
            at
        );
    }
    return killed;
}

/**
 * Idempotente: un secondo inserimento dello stesso indirizzo non crea righe né audit,
 * ma ricontrolla lead e messaggi collegati.
 */
export async function suppressAddress(
    db: DatabaseManager,
    email: string,
    reason: SuppressionReason,
    context: SuppressionContext,
    at: string
): Promise<SuppressionOutcome> {
    const normalized = normalizeEmail(email);
    if (!normalized) {
        throw new Error(`Indirizzo non valido per la soppressione: ${email}`);
    }
    const domain = emailDomain(normalized);

    const inserted = await insertSuppressionEntry(
        db,
        { email: normalized, domain, reason, sourceLeadId: context.sourceLeadId ?? null },
        at
    );
    if (inserted) {
        await recordAudit(
            db,
            'suppression_added',
            {
                leadId: context.sourceLeadId,
                jobId: context.jobId,
                actor: context.actor,
                correlationId: context.correlationId,
                payload: { email: normalized, domain, reason },
            },
            at
        );
    }

    const leads = await listLeadsByEmail(db, normalized);
    const deadLeadIds = await killLeads(db, leads, reason, context, at);
    const pausedMessages = await pauseOpenMessagesForLeads(db, leads.map((lead) => lead.id), at);
    return { inserted, deadLeadIds, pausedMessages };
}

export async function suppressDomain(
    db: DatabaseManager,
    domain: string,
    reason: SuppressionReason,
    context: SuppressionContext,
    at: string
): Promise<SuppressionOutcome> {
    const normalized = domain.trim().toLowerCase().replace(/^@/, '');
    if (!normalized || !normalized.includes('.')) {
        throw new Error(`Dominio non valido per la soppressione: ${domain}`);
    }

    const inserted = await insertSuppressionEntry(
        db,
        { email: null, domain: normalized, reason, sourceLeadId: context.sourceLeadId ?? null },
        at
    );
    if (inserted) {
        await recordAudit(
            db,
            'suppression_added',
            {
                leadId: context.sourceLeadId,
                actor: context.actor,
                correlationId: context.correlationId,
                payload: { email: null, domain: normalized, reason },
            },
            at
        );
    }

    const byEmail = await listLeadsByEmailDomain(db, normalized);
    const byWebsite = (await listLeadsByWebsiteDomain(db, normalized)).filter(
        (lead) => websiteDomain(lead.website) === normalized && !byEmail.some((other) => other.id === lead.id)
    );
    const leads = [...byEmail, ...byWebsite];
    const deadLeadIds = await killLeads(db, leads, reason, context, at);
    const pausedMessages = await pauseOpenMessagesForLeads(db, leads.map((lead) => lead.id), at);
    return { inserted, deadLeadIds, pausedMessages };
}
