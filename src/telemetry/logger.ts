import { DatabaseManager } from '../db';
import { insertRunLog, RunLogLevel } from '../core/repositories/system';
import { sanitizeForLogs } from '../security/redaction';
import { publishLiveEvent } from './liveEvents';

let runLogSink: DatabaseManager | null = null;

/**
 * Abilita la persistenza dei log su `run_logs`. La scrittura non viene attesa:
 * i log possono partire dentro una transazione sqlite e la coda della
 * connessione è occupata fino al COMMIT.
 */
export function attachRunLogSink(db: DatabaseManager): void {
    runLogSink = db;
}

export function detachRunLogSink(): void {
    runLogSink = null;
}

function persist(level: RunLogLevel, event: string, payload: Record<string, unknown>): void {
    const sink = runLogSink;
    if (!sink) return;
    void insertRunLog(sink, level, event, payload, new Date().toISOString()).catch((error: unknown) => {
        console.error('[ERROR] run_log.persist_failed', {
            event,
            error: error instanceof Error ? error.message : String(error),
        });
    });
}

export async function logInfo(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    const safePayload = sanitizeForLogs(payload);
    console.log(`[INFO] ${event}`, safePayload);
    persist('INFO', event, safePayload);
    publishLiveEvent('run.log', { level: 'INFO', event, payload: safePayload });
}

export async function logWarn(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    const safePayload = sanitizeForLogs(payload);
    console.warn(`[WARN] ${event}`, safePayload);
    persist('WARN', event, safePayload);
    publishLiveEvent('run.log', { level: 'WARN', event, payload: safePayload });
}

export async function logError(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    const safePayload = sanitizeForLogs(payload);
    console.error(`[ERROR] ${event}`, safePayload);
    persist('ERROR', event, safePayload);
    publishLiveEvent('run.log', { level: 'ERROR', event, payload: safePayload });
}
