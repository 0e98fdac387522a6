/**
 * repositories/suppression.ts
 * Registro opt-out permanente. Nessun percorso di cancellazione.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { SuppressionEntryRecord } from '../../types/domain';

export async function findSuppressionMatch(
    db: DatabaseManager,
    email: string | null,
    domain: string | null
): Promise<SuppressionEntryRecord | undefined> {
    if (!email && !domain) return undefined;
    if (email) {
        const exact = await db.get<SuppressionEntryRecord>(`SELECT * FROM suppression_entries WHERE email = ?`, [email]);
        if (exact) return exact;
    }
    if (domain) {
        return db.get<SuppressionEntryRecord>(
            `SELECT * FROM suppression_entries WHERE email IS NULL AND domain = ? ORDER BY created_at ASC LIMIT 1`,
            [domain]
        );
    }
    return undefined;
}

/** Restituisce true solo se la riga è stata effettivamente inserita. */
export async function insertSuppressionEntry(
    db: DatabaseManager,
    entry: { email: string | null; domain: string | null; reason: string; sourceLeadId: string | null },
    at: string
): Promise<boolean> {
    if (entry.email === null) {
        // vincolo UNIQUE non applicabile ai NULL: dedupe esplicito per dominio
        const existing = await db.get<{ id: string }>(
            `SELECT id FROM suppression_entries WHERE email IS NULL AND domain = ?`,
            [entry.domain]
        );
        if (existing) return false;
    }
    const result = await db.run(
        `INSERT OR IGNORE INTO suppression_entries (id, email, domain, reason, source_lead_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [randomUUID(), entry.email, entry.domain, entry.reason, entry.sourceLeadId, at]
    );
    return (result.changes ?? 0) > 0;
}

export async function listSuppressionEntries(db: DatabaseManager, limit: number = 200): Promise<SuppressionEntryRecord[]> {
    return db.query<SuppressionEntryRecord>(
        `SELECT * FROM suppression_entries ORDER BY created_at DESC LIMIT ?`,
        [Math.max(1, limit)]
    );
}
