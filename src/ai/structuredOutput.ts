import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { logWarn } from '../telemetry/logger';
import { OpenAITextRequest, OpenAITextResponse, TextRequester } from './openaiClient';

export interface StructuredOutcome<T> {
    value: T;
    callId: string;
    usedDefault: boolean;
    attempts: number;
}

export interface StructuredRequest<T> {
    purpose: string;
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    request: OpenAITextRequest;
    /** Esempio JSON valido mostrato al modello nel prompt di riparazione. */
    schemaHint: string;
    fallback: () => T;
}

/**
 * JSON stretto: l'intero testo, oppure il primo oggetto `{...}` se il modello
 * lo ha avvolto in testo o in un blocco di codice.
 */
export function parseStrictJson(raw: string): unknown {
    const trimmed = raw.trim();
    try {
        return JSON.parse(trimmed);
    } catch {
        const start = trimmed.indexOf('{');
        const end = trimmed.lastIndexOf('}');
        if (start < 0 || end <= start) {
            return undefined;
        }
        try {
            return JSON.parse(trimmed.slice(start, end + 1));
        } catch {
            return undefined;
        }
    }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): { ok: true; value: T } | { ok: false; problem: string } {
    const parsed = parseStrictJson(raw);
    if (parsed === undefined) {
        return { ok: false, problem: 'not_json' };
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
        return { ok: false, problem: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ') };
    }
    return { ok: true, value: result.data };
}

/**
 * Chiamata con output JSON validato: un solo tentativo di riparazione, poi default.
 * Errori di trasporto (rete, circuito aperto) portano direttamente al default.
 */
export async function requestStructuredOutput<T>(requester: TextRequester, input: StructuredRequest<T>): Promise<StructuredOutcome<T>> {
    let first: OpenAITextResponse;
    try {
        first = await requester(input.request);
    } catch (error) {
        await logWarn('ai.structured.request_failed', { purpose: input.purpose, error: errorMessage(error) });
        return { value: input.fallback(), callId: 'unavailable', usedDefault: true, attempts: 1 };
    }

    const initial = validate(input.schema, first.text);
    if (initial.ok) {
        return { value: initial.value, callId: first.callId, usedDefault: false, attempts: 1 };
    }
    await logWarn('ai.structured.invalid_output', { purpose: input.purpose, callId: first.callId, problem: initial.problem });

    const repairRequest: OpenAITextRequest = {
        ...input.request,
        user: [
            'Your previous output was not valid for the required schema.',
            `Problem: ${initial.problem}`,
            'Previous output:',
            first.text.slice(0, 2000),
            '',
            'Return ONLY a valid JSON object shaped like this example:',
            input.schemaHint,
        ].join('\n'),
        temperature: 0,
    };

    let repaired: OpenAITextResponse;
    try {
        repaired = await requester(repairRequest);
    } catch (error) {
        await logWarn('ai.structured.repair_failed', { purpose: input.purpose, callId: first.callId, error: errorMessage(error) });
        return { value: input.fallback(), callId: first.callId, usedDefault: true, attempts: 2 };
    }

    const second = validate(input.schema, repaired.text);
    if (second.ok) {
        return { value: second.value, callId: first.callId, usedDefault: false, attempts: 2 };
    }
    await logWarn('ai.structured.default_used', { purpose: input.purpose, callId: first.callId, problem: second.problem });
    return { value: input.fallback(), callId: first.callId, usedDefault: true, attempts: 2 };
}
