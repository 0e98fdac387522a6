import { z } from 'zod';
import { defaultReplyClassification } from '../core/collaboratorDefaults';
import {
    ReplyClassificationOutcome,
    ReplyClassificationResult,
    ReplyClassifier,
    ReplyContext,
} from '../types/collaborators';
import { isOpenAIConfigured, OpenAiSettings, requestOpenAIText, TextRequester } from './openaiClient';
import { requestStructuredOutput } from './structuredOutput';

export const replyClassificationSchema = z
    .object({
        classification: z.enum(['interested', 'objection', 'not_interested', 'unsubscribe', 'out_of_office', 'unknown']),
        objection_type: z.string().trim().min(1).nullable().default(null),
        action: z.enum(['send_calendar', 'send_curated_catalog', 'suppress', 'handoff_to_human']),
        interest_level: z.coerce.number().int().min(1).max(10).default(5),
    })
    .transform(
        (raw): ReplyClassificationResult => ({
            classification: raw.classification,
            objectionType: raw.objection_type,
            action: raw.action,
            interestLevel: raw.interest_level,
        })
    );

const SCHEMA_HINT = JSON.stringify({
    classification: 'unknown',
    objection_type: null,
    action: 'handoff_to_human',
    interest_level: 5,
});

const OBJECTION_TYPES = [
    'catalog_request',
    'pricing',
    'margins',
    'already_have_supplier',
    'timing',
    'identity',
    'minimums',
    'authenticity',
    'MAP',
    'samples',
    'returns',
    'need_approval',
    'send_email_info',
];

const SYSTEM_PROMPT = 'You classify inbound email replies from wholesale leads. Return STRICT JSON only.';

function buildUserPrompt(text: string, context: ReplyContext): string {
    return `Context: company=${context.companyName}; niche=${context.niche ?? 'unknown'}; angle=${context.angle ?? 'none'}

Reply text:
${text.slice(0, 4000)}

Return STRICT JSON only:
{
  "classification": "interested" | "objection" | "not_interested" | "unsubscribe" | "out_of_office" | "unknown",
  "objection_type": null | ${OBJECTION_TYPES.map((type) => `"${type}"`).join(' | ')},
  "action": "send_calendar" | "send_curated_catalog" | "suppress" | "handoff_to_human",
  "interest_level": 1 to 10
}

Rules:
- "remove me" / "unsubscribe" / "stop emailing" -> classification "unsubscribe", action "suppress"
- interest / wants to talk / asks for time -> classification "interested", action "send_calendar"
- objection but engaging -> set objection_type, action "send_curated_catalog" or "handoff_to_human"
- clearly not interested -> classification "not_interested", action "handoff_to_human"
- interest_level: 1=hostile, 5=neutral, 10=very interested`;
}

export class OpenAiReplyClassifier implements ReplyClassifier {
    constructor(
        private readonly requester: TextRequester = requestOpenAIText,
        private readonly settings?: OpenAiSettings
    ) {}

    async classify(text: string, context: ReplyContext): Promise<ReplyClassificationOutcome> {
        if (!isOpenAIConfigured(this.settings)) {
            return { result: defaultReplyClassification(), callId: 'ai-disabled', usedDefault: true };
        }
        const outcome = await requestStructuredOutput<ReplyClassificationResult>(this.requester, {
            purpose: 'reply_classification',
            schema: replyClassificationSchema,
            request: {
                system: SYSTEM_PROMPT,
                user: buildUserPrompt(text, context),
                maxOutputTokens: 200,
                temperature: 0.1,
                responseFormat: 'json_object',
            },
            schemaHint: SCHEMA_HINT,
            fallback: defaultReplyClassification,
        });
        return { result: outcome.value, callId: outcome.callId, usedDefault: outcome.usedDefault };
    }
}
