/**
 * repositories/jobs.ts
 * Domain queries: accodamento, claim atomico, esito, recupero job bloccati.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { JobRecord, JobStatus, JobType } from '../../types/domain';

export type JobStatusCounts = Record<JobStatus, number>;

export async function insertJob(db: DatabaseManager, type: JobType, leadId: string, at: string): Promise<string> {
    const id = randomUUID();
    await db.run(
        `INSERT INTO jobs (id, type, lead_id, status, attempts, created_at, updated_at)
         VALUES (?, ?, ?, 'queued', 0, ?, ?)`,
        [id, type, leadId, at, at]
    );
    return id;
}

export async function getJobById(db: DatabaseManager, jobId: string): Promise<JobRecord | undefined> {
    return db.get<JobRecord>(`SELECT * FROM jobs WHERE id = ?`, [jobId]);
}

export async function listQueuedJobs(db: DatabaseManager, type: JobType, limit: number = 500): Promise<JobRecord[]> {
    return db.query<JobRecord>(
        `SELECT * FROM jobs WHERE type = ? AND status = 'queued' ORDER BY created_at ASC, id ASC LIMIT ?`,
        [type, Math.max(1, limit)]
    );
}

/**
 * Claim: singolo UPDATE condizionato sullo stato 'queued'. Se un altro worker
 * ha già preso il job, changes = 0 e si restituisce null (race persa).
 */
export async function claimJob(db: DatabaseManager, jobId: string, workerId: string, at: string): Promise<JobRecord | null> {
    const result = await db.run(
        `UPDATE jobs
         SET status = 'running', attempts = attempts + 1, locked_by = ?, locked_at = ?, started_at = ?, updated_at = ?
         WHERE id = ? AND status = 'queued'`,
        [workerId, at, at, at, jobId]
    );
    if ((result.changes ?? 0) === 0) {
        return null;
    }
    return (await getJobById(db, jobId)) ?? null;
}

export async function markJobSucceeded(db: DatabaseManager, jobId: string, at: string): Promise<void> {
    await db.run(
        `UPDATE jobs
         SET status = 'succeeded', locked_by = NULL, locked_at = NULL, completed_at = ?, updated_at = ?
         WHERE id = ?`,
        [at, at, jobId]
    );
}

export async function markJobFailed(db: DatabaseManager, jobId: string, errorMessage: string, at: string): Promise<void> {
    await db.run(
        `UPDATE jobs
         SET status = 'failed', last_error = ?, locked_by = NULL, locked_at = NULL, completed_at = ?, updated_at = ?
         WHERE id = ?`,
        [errorMessage, at, at, jobId]
    );
}

export async function getJobStatusCounts(db: DatabaseManager): Promise<JobStatusCounts> {
    const rows = await db.query<{ status: string; total: number | string }>(
        `SELECT status, COUNT(*) as total FROM jobs GROUP BY status`
    );

    const counts: JobStatusCounts = {
        queued: 0,
        running: 0,
        succeeded: 0,
        failed: 0,
    };

    for (const row of rows) {
        if (row.status === 'queued' || row.status === 'running' || row.status === 'succeeded' || row.status === 'failed') {
            counts[row.status] = Number(row.total);
        }
    }

    return counts;
}

/** Job rimasti 'running' oltre la soglia (worker morto) tornano in coda. */
export async function recoverStuckJobs(db: DatabaseManager, staleAfterMinutes: number, now: Date): Promise<number> {
    const cutoff = new Date(now.getTime() - Math.max(1, staleAfterMinutes) * 60_000).toISOString();
    const result = await db.run(
        `UPDATE jobs
         SET status = 'queued',
             locked_by = NULL,
             locked_at = NULL,
             updated_at = ?,
             last_error = 'Recovered from running on startup'
         WHERE status = 'running'
           AND (locked_at IS NULL OR locked_at <= ?)`,
        [now.toISOString(), cutoff]
    );
    return result.changes ?? 0;
}

/** Rilascio cooperativo: un job interrotto tra due stage torna in coda e riprende dallo stato del lead. */
export async function requeueJob(db: DatabaseManager, jobId: string, reason: string, at: string): Promise<void> {
    await db.run(
        `UPDATE jobs
         SET status = 'queued', locked_by = NULL, locked_at = NULL, last_error = ?, updated_at = ?
         WHERE id = ? AND status = 'running'`,
        [reason, at, jobId]
    );
}
