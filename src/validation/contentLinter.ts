/**
 * contentLinter.ts — gate di contenuto per ogni messaggio in uscita.
 *
 * Funzioni pure: nessun accesso a DB o config globale, la policy arriva dal chiamante.
 * Le violazioni sono restituite come dati; si lancia solo su input malformato.
 */

import { ContentPolicyError } from '../core/errors';
import { PipelineConfig } from '../config/types';
import { LintLocation, LintResult, LintViolation, VariableLintResult } from '../types/domain';

export type MessageLintPolicy = Pick<PipelineConfig, 'forbiddenPhrases' | 'maxItemsPerMessage'>;
export type VariableLintPolicy = Pick<PipelineConfig, 'forbiddenVariableKeys' | 'maxItemsPerMessage'>;

/** Chiave della lista nomi articolo nel set di variabili passato al generatore. */
export const ITEM_NAMES_VARIABLE = 'item_names';

function normalizeForMatch(text: string): string {
    return text.replace(/[‘’]/g, "'").replace(/\s+/g, ' ').toLowerCase();
}

function scan(text: string, location: LintLocation, phrases: readonly string[]): LintViolation[] {
    const haystack = normalizeForMatch(text);
    const violations: LintViolation[] = [];
    for (const phrase of phrases) {
        if (haystack.includes(normalizeForMatch(phrase))) {
            violations.push({ phrase, location });
        }
    }
    return violations;
}

export function lintMessage(subject: string, body: string, referencedItemCount: number, policy: MessageLintPolicy): LintResult {
    if (typeof subject !== 'string' || typeof body !== 'string') {
        throw new ContentPolicyError('Subject e body devono essere stringhe.');
    }
    if (!Number.isInteger(referencedItemCount) || referencedItemCount < 0) {
        throw new ContentPolicyError(`Conteggio articoli non valido: ${referencedItemCount}`);
    }

    const violations = [
        ...scan(subject, 'subject', policy.forbiddenPhrases),
        ...scan(body, 'body', policy.forbiddenPhrases),
    ];
    const itemCapViolation = referencedItemCount > policy.maxItemsPerMessage;

    return {
        ok: violations.length === 0 && !itemCapViolation,
        violations,
        itemCapViolation,
    };
}

function isPresent(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    if (typeof value === 'string') return value.trim().length > 0;
    if (Array.isArray(value)) return value.length > 0;
    return true;
}

/** Controllo del set di variabili prima della generazione: lista articoli oltre il cap o chiavi vietate valorizzate. */
export function lintVariables(variables: Record<string, unknown>, policy: VariableLintPolicy): VariableLintResult {
    if (variables === null || typeof variables !== 'object' || Array.isArray(variables)) {
        throw new ContentPolicyError('Il set di variabili deve essere un oggetto.');
    }

    const reasons: string[] = [];
    const itemNames = variables[ITEM_NAMES_VARIABLE];
    if (itemNames !== undefined && !Array.isArray(itemNames)) {
        throw new ContentPolicyError(`${ITEM_NAMES_VARIABLE} deve essere una lista.`);
    }
    if (Array.isArray(itemNames) && itemNames.length > policy.maxItemsPerMessage) {
        reasons.push(`item_cap_exceeded:${itemNames.length}>${policy.maxItemsPerMessage}`);
    }

    const forbiddenKeys = new Set(policy.forbiddenVariableKeys.map((key) => key.toLowerCase()));
    for (const [key, value] of Object.entries(variables)) {
        if (forbiddenKeys.has(key.toLowerCase()) && isPresent(value)) {
            reasons.push(`forbidden_variable:${key}`);
        }
    }

    return { ok: reasons.length === 0, reasons };
}

/** Linguaggio di opt-out esplicito (unsubscribe, remove me, stop emailing...). */
export function containsOptOutLanguage(text: string, optOutPhrases: readonly string[]): boolean {
    const haystack = normalizeForMatch(text);
    return optOutPhrases.some((phrase) => haystack.includes(normalizeForMatch(phrase)));
}

export function formatViolations(result: LintResult): string {
    const parts = result.violations.map((violation) => `${violation.location}:${violation.phrase}`);
    if (result.itemCapViolation) {
        parts.push('item_cap_exceeded');
    }
    return parts.join(', ');
}
