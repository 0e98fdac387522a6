/**
 * repositories/system.ts
 * Log applicativi persistiti (run_logs).
 */

import { DatabaseManager } from '../../db';
import { toJson } from './shared';

export type RunLogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface RunLogRecord {
    id: number;
    level: RunLogLevel;
    event: string;
    payload_json: string;
    created_at: string;
}

export async function insertRunLog(
    db: DatabaseManager,
    level: RunLogLevel,
    event: string,
    payload: Record<string, unknown>,
    at: string
): Promise<void> {
    await db.run(
        `INSERT INTO run_logs (level, event, payload_json, created_at) VALUES (?, ?, ?, ?)`,
        [level, event, toJson(payload), at]
    );
}

export async function listRecentRunLogs(db: DatabaseManager, limit: number = 100): Promise<RunLogRecord[]> {
    return db.query<RunLogRecord>(`SELECT * FROM run_logs ORDER BY id DESC LIMIT ?`, [Math.max(1, limit)]);
}
