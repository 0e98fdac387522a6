/**
 * repositories/leads.ts
 * Lead CRUD e query di stato. Ogni funzione riceve l'handle DB (o di transazione)
 * dal chiamante; nessuna lettura di stato globale.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { LeadOutcome, LeadRecord, LeadStatus } from '../../types/domain';
import { nullableText, normalizeEmail, normalizeWebsite } from './shared';

export interface NewLeadInput {
    companyName: string;
    website?: string | null;
    contactEmail?: string | null;
    channel?: string | null;
    niche?: string | null;
    location?: string | null;
    notes?: string | null;
}

export async function insertLead(db: DatabaseManager, input: NewLeadInput, at: string): Promise<LeadRecord> {
    const lead: LeadRecord = {
        id: randomUUID(),
        company_name: input.companyName.trim(),
        website: normalizeWebsite(input.website),
        contact_email: normalizeEmail(input.contactEmail),
        channel: nullableText(input.channel)?.toLowerCase() ?? null,
        niche: nullableText(input.niche),
        location: nullableText(input.location),
        notes: nullableText(input.notes),
        status: 'new',
        disqualify_reason: null,
        outcome: null,
        outcome_notes: null,
        booked_at: null,
        created_at: at,
        updated_at: at,
    };
    await db.run(
        `INSERT INTO leads (id, company_name, website, contact_email, channel, niche, location, notes, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
            lead.id,
            lead.company_name,
            lead.website,
            lead.contact_email,
            lead.channel,
            lead.niche,
            lead.location,
            lead.notes,
            lead.status,
            lead.created_at,
            lead.updated_at,
        ]
    );
    return lead;
}

export async function getLeadById(db: DatabaseManager, leadId: string): Promise<LeadRecord | undefined> {
    return db.get<LeadRecord>(`SELECT * FROM leads WHERE id = ?`, [leadId]);
}

export async function getLeadByWebsite(db: DatabaseManager, website: string): Promise<LeadRecord | undefined> {
    const normalized = normalizeWebsite(website);
    if (!normalized) return undefined;
    return db.get<LeadRecord>(`SELECT * FROM leads WHERE website = ?`, [normalized]);
}

export async function listLeadsByEmail(db: DatabaseManager, email: string): Promise<LeadRecord[]> {
    const normalized = normalizeEmail(email);
    if (!normalized) return [];
    return db.query<LeadRecord>(`SELECT * FROM leads WHERE contact_email = ? ORDER BY created_at ASC`, [normalized]);
}

/** Ultimo lead creato per l'indirizzo: usato per instradare eventi webhook. */
export async function getLatestLeadByEmail(db: DatabaseManager, email: string): Promise<LeadRecord | undefined> {
    const normalized = normalizeEmail(email);
    if (!normalized) return undefined;
    return db.get<LeadRecord>(
        `SELECT * FROM leads WHERE contact_email = ? ORDER BY created_at DESC, id DESC LIMIT 1`,
        [normalized]
    );
}

export async function setLeadStatus(
    db: DatabaseManager,
    leadId: string,
    status: LeadStatus,
    at: string,
    disqualifyReason?: string
): Promise<void> {
    if (disqualifyReason !== undefined) {
        await db.run(
            `UPDATE leads SET status = ?, disqualify_reason = ?, updated_at = ? WHERE id = ?`,
            [status, disqualifyReason, at, leadId]
        );
        return;
    }
    await db.run(`UPDATE leads SET status = ?, updated_at = ? WHERE id = ?`, [status, at, leadId]);
}

export async function setLeadOutcome(
    db: DatabaseManager,
    leadId: string,
    outcome: LeadOutcome,
    notes: string | null,
    at: string
): Promise<void> {
    await db.run(
        `UPDATE leads
         SET outcome = ?, outcome_notes = COALESCE(?, outcome_notes), booked_at = COALESCE(booked_at, ?), updated_at = ?
         WHERE id = ?`,
        [outcome, notes, at, at, leadId]
    );
}

export async function listLeadsByEmailDomain(db: DatabaseManager, domain: string): Promise<LeadRecord[]> {
    const normalized = domain.trim().toLowerCase();
    if (!normalized) return [];
    return db.query<LeadRecord>(
        `SELECT * FROM leads WHERE contact_email LIKE ? ORDER BY created_at ASC`,
        [`%@${normalized}`]
    );
}

/** Candidati per dominio del sito: il confronto esatto sull'host lo fa il chiamante. */
export async function listLeadsByWebsiteDomain(db: DatabaseManager, domain: string): Promise<LeadRecord[]> {
    const normalized = domain.trim().toLowerCase();
    if (!normalized) return [];
    return db.query<LeadRecord>(
        `SELECT * FROM leads WHERE website LIKE ? ORDER BY created_at ASC`,
        [`%${normalized}%`]
    );
}

/** Scrive l'indirizzo solo se il lead non ne ha già uno; false se la riga non è cambiata. */
export async function setLeadContactEmail(db: DatabaseManager, leadId: string, email: string, at: string): Promise<boolean> {
    const result = await db.run(
        `UPDATE leads SET contact_email = ?, updated_at = ? WHERE id = ? AND contact_email IS NULL`,
        [normalizeEmail(email), at, leadId]
    );
    return (result.changes ?? 0) > 0;
}

/** Lead con sito e senza indirizzo, esclusi quelli chiusi. */
export async function listLeadsMissingEmail(db: DatabaseManager, limit: number): Promise<LeadRecord[]> {
    return db.query<LeadRecord>(
        `SELECT * FROM leads
         WHERE contact_email IS NULL AND website IS NOT NULL AND status NOT IN ('dead', 'disqualified')
         ORDER BY created_at ASC
         LIMIT ?`,
        [limit]
    );
}
