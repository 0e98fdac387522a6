import { DatabaseManager } from '../../db';

export const DRAFTED_REPLY_COUNTER = 'drafted_replies';

/**
 * Incremento atomico con lettura del nuovo valore nello stesso statement.
 * Va chiamato con l'handle della transazione che scrive la riga collegata.
 */
export async function incrementCounter(db: DatabaseManager, key: string): Promise<number> {
    const row = await db.get<{ value: number | string }>(
        `INSERT INTO counters (key, value) VALUES (?, 1)
         ON CONFLICT(key) DO UPDATE SET value = counters.value + 1
         RETURNING value`,
        [key]
    );
    if (!row) {
        throw new Error(`Contatore ${key} non aggiornato.`);
    }
    return Number(row.value);
}

export async function readCounter(db: DatabaseManager, key: string): Promise<number> {
    const row = await db.get<{ value: number | string }>(`SELECT value FROM counters WHERE key = ?`, [key]);
    return Number(row?.value ?? 0);
}
