/**
 * repositories/stats.ts
 * Snapshot aggregato della pipeline per CLI e API.
 */

import { DatabaseManager } from '../../db';
import { LeadStatus } from '../../types/domain';
import { getJobStatusCounts, JobStatusCounts } from './jobs';

const LEAD_STATUSES: LeadStatus[] = [
    'new',
    'researched',
    'qualified',
    'disqualified',
    'contacted',
    'interested',
    'objection',
    'booked',
    'dead',
];

export interface PipelineStats {
    totalLeads: number;
    byStatus: Record<LeadStatus, number>;
    messagesSent: number;
    messagesPaused: number;
    messagesFailed: number;
    replies: number;
    pendingApprovals: number;
    suppressed: number;
    conversionRate: number;
    jobs: JobStatusCounts;
}

function isLeadStatus(value: string): value is LeadStatus {
    return LEAD_STATUSES.some((status) => status === value);
}

async function countWhere(db: DatabaseManager, sql: string, params: unknown[] = []): Promise<number> {
    const row = await db.get<{ total: number | string }>(sql, params);
    return Number(row?.total ?? 0);
}

export async function getPipelineStats(db: DatabaseManager): Promise<PipelineStats> {
    const byStatus: Record<LeadStatus, number> = {
        new: 0,
        researched: 0,
        qualified: 0,
        disqualified: 0,
        contacted: 0,
        interested: 0,
        objection: 0,
        booked: 0,
        dead: 0,
    };
    const rows = await db.query<{ status: string; total: number | string }>(
        `SELECT status, COUNT(*) as total FROM leads GROUP BY status`
    );
    let totalLeads = 0;
    for (const row of rows) {
        const total = Number(row.total);
        totalLeads += total;
        if (isLeadStatus(row.status)) {
            byStatus[row.status] = total;
        }
    }

    const [messagesSent, messagesPaused, messagesFailed, replies, pendingApprovals, suppressed, jobs] = await Promise.all([
        countWhere(db, `SELECT COUNT(*) as total FROM outbound_messages WHERE status IN ('sent', 'delivered')`),
        countWhere(db, `SELECT COUNT(*) as total FROM outbound_messages WHERE status = 'paused'`),
        countWhere(db, `SELECT COUNT(*) as total FROM outbound_messages WHERE status = 'failed'`),
        countWhere(db, `SELECT COUNT(*) as total FROM replies`),
        countWhere(db, `SELECT COUNT(*) as total FROM replies WHERE approval = 'pending'`),
        countWhere(db, `SELECT COUNT(*) as total FROM suppression_entries`),
        getJobStatusCounts(db),
    ]);

    const conversionRate = totalLeads > 0 ? Math.round((byStatus.booked / totalLeads) * 1000) / 10 : 0;

    return {
        totalLeads,
        byStatus,
        messagesSent,
        messagesPaused,
        messagesFailed,
        replies,
        pendingApprovals,
        suppressed,
        conversionRate,
        jobs,
    };
}
