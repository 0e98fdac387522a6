/**
 * cliParser.ts — Utility di parsing degli argomenti CLI
 *
 * Funzioni pure per leggere, validare e normalizzare i parametri passati
 * da riga di comando. Nessuna dipendenza da DB o config.
 */

import { DeliveryEventType } from '../types/collaborators';
import { LeadOutcome } from '../types/domain';

// ─── Lettura argomenti ────────────────────────────────────────────────────────

export function getOptionValue(args: string[], optionName: string): string | undefined {
    const index = args.findIndex((value) => value === optionName);
    if (index === -1 || index + 1 >= args.length) {
        return undefined;
    }
    return args[index + 1];
}

export function hasOption(args: string[], optionName: string): boolean {
    return args.includes(optionName);
}

/** Argomenti posizionali: esclude i flag e i valori che li seguono. */
export function getPositionalArgs(args: string[]): string[] {
    const positional: string[] = [];
    for (let index = 0; index < args.length; index++) {
        const value = args[index] ?? '';
        if (value.startsWith('--')) {
            const next = args[index + 1];
            if (next !== undefined && !next.startsWith('--')) index++;
            continue;
        }
        positional.push(value);
    }
    return positional;
}

export function requireValue(value: string | undefined, usage: string): string {
    if (value === undefined || value.trim() === '') {
        throw new Error(`Parametro mancante. Uso: ${usage}`);
    }
    return value;
}

// ─── Parsing valori ───────────────────────────────────────────────────────────

export function parseIntStrict(raw: string, optionName: string): number {
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) {
        throw new Error(`Valore non valido per ${optionName}: ${raw}`);
    }
    return parsed;
}

const OUTCOMES: readonly LeadOutcome[] = ['not_fit', 'follow_up', 'deal_in_progress', 'closed'];

export function parseOutcome(raw: string): LeadOutcome {
    const match = OUTCOMES.find((outcome) => outcome === raw.trim().toLowerCase());
    if (!match) {
        throw new Error(`Esito non valido: ${raw} (usa ${OUTCOMES.join(' / ')}).`);
    }
    return match;
}

const DELIVERY_EVENTS: readonly DeliveryEventType[] = ['sent', 'delivered', 'opened', 'replied', 'bounced', 'unsubscribed'];

export function parseDeliveryEventType(raw: string): DeliveryEventType {
    const match = DELIVERY_EVENTS.find((event) => event === raw.trim().toLowerCase());
    if (!match) {
        throw new Error(`Evento non valido: ${raw} (usa ${DELIVERY_EVENTS.join(' / ')}).`);
    }
    return match;
}

export function parseReviewDecision(raw: string): 'approve' | 'reject' {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'approve' || normalized === 'approved' || normalized === 'yes') return 'approve';
    if (normalized === 'reject' || normalized === 'rejected' || normalized === 'no') return 'reject';
    throw new Error(`Decisione non valida: ${raw} (usa approve / reject).`);
}
