import { randomUUID } from 'crypto';
import { z } from 'zod';
import { AppConfig, config } from '../config';
import { isLocalAiEndpoint } from '../config/env';
import { fetchWithRetryPolicy, HttpStatusError } from '../core/integrationPolicy';

export type OpenAiSettings = Pick<
    AppConfig,
    'openaiBaseUrl' | 'openaiApiKey' | 'aiModel' | 'aiRequestTimeoutMs' | 'aiAllowRemoteEndpoint' | 'aiEnabled'
>;

export interface OpenAITextRequest {
    system: string;
    user: string;
    maxOutputTokens: number;
    temperature: number;
    responseFormat?: 'json_object' | 'text';
}

export interface OpenAITextResponse {
    text: string;
    /** Id della chiamata, salvato accanto all'esito per tracciabilità. */
    callId: string;
}

/** Firma comune: i classificatori ricevono la funzione, i test ne passano una finta. */
export type TextRequester = (request: OpenAITextRequest) => Promise<OpenAITextResponse>;

const chatCompletionSchema = z.object({
    id: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable().optional() }).optional(),
            })
        )
        .min(1),
});

function safeJoinUrl(baseUrl: string, suffix: string): string {
    return `${baseUrl.replace(/\/+$/, '')}${suffix}`;
}

function extractOutputText(payload: unknown): { text: string; id: string | null } {
    const parsed = chatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
        return { text: '', id: null };
    }
    const content = parsed.data.choices[0]?.message?.content ?? '';
    return { text: content.trim(), id: parsed.data.id ?? null };
}

export function isOpenAIConfigured(settings: OpenAiSettings = config): boolean {
    if (!settings.aiEnabled) return false;
    const local = isLocalAiEndpoint(settings.openaiBaseUrl);
    if (!local && !settings.aiAllowRemoteEndpoint) return false;
    return local || !!settings.openaiApiKey;
}

export async function requestOpenAIText(input: OpenAITextRequest, settings: OpenAiSettings = config): Promise<OpenAITextResponse> {
    const localEndpoint = isLocalAiEndpoint(settings.openaiBaseUrl);
    if (!settings.aiAllowRemoteEndpoint && !localEndpoint) {
        throw new Error(
            'Endpoint AI remoto bloccato: imposta OPENAI_BASE_URL su localhost oppure AI_ALLOW_REMOTE_ENDPOINT=true.'
        );
    }
    if (!settings.openaiApiKey && !localEndpoint) {
        throw new Error('OPENAI_API_KEY mancante.');
    }

    const headers: Record<string, string> = {
        'content-type': 'application/json',
    };
    if (settings.openaiApiKey) {
        headers.authorization = `Bearer ${settings.openaiApiKey}`;
    }

    const response = await fetchWithRetryPolicy(
        safeJoinUrl(settings.openaiBaseUrl, '/chat/completions'),
        {
            method: 'POST',
            headers,
            body: JSON.stringify({
                model: settings.aiModel,
                messages: [
                    { role: 'system', content: input.system },
                    { role: 'user', content: input.user },
                ],
                temperature: input.temperature,
                max_tokens: input.maxOutputTokens,
                ...(input.responseFormat ? { response_format: { type: input.responseFormat } } : {}),
            }),
        },
        { integration: 'openai', timeoutMs: settings.aiRequestTimeoutMs }
    );

    if (!response.ok) {
        const text = (await response.text().catch(() => '')).slice(0, 500);
        throw new HttpStatusError('openai', response.status, text);
    }

    const payload: unknown = await response.json().catch(() => null);
    const output = extractOutputText(payload);
    if (!output.text) {
        throw new Error('Risposta AI vuota o non parseabile.');
    }
    return { text: output.text, callId: output.id ?? `llm-${randomUUID().slice(0, 12)}` };
}
