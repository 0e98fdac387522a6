import { z } from 'zod';
import { fallbackSequenceMessage } from '../core/collaboratorDefaults';
import { PipelineConfig } from '../config';
import { GeneratedMessage, MessageGenerationInput, MessageGenerator } from '../types/collaborators';
import { isOpenAIConfigured, OpenAiSettings, requestOpenAIText, TextRequester } from './openaiClient';
import { requestStructuredOutput } from './structuredOutput';

// Un framework per touch: il numero di touch è fissato dalla tabella dei tempi.
export const TOUCH_FRAMEWORKS: Readonly<Record<number, string>> = {
    1: 'Cold intro. Mention something specific about their store. Introduce curated sourcing. End with calendar link.',
    2: 'Follow-up. Quick and casual. Reference touch 1. Maybe mention a specific brand relevant to them. Calendar link.',
    3: 'Value add. Share a brief insight about their niche/market. Position meeting as next step. Calendar link.',
    4: 'Social proof. Reference types of retailers you work with (not names). Quick meeting push. Calendar link.',
    5: "Last touch. Respectful. Quick note that you're available if timing ever changes. Calendar link. No breakup energy.",
};

export function touchFramework(touchIndex: number): string {
    return TOUCH_FRAMEWORKS[touchIndex] ?? TOUCH_FRAMEWORKS[1] ?? '';
}

const SYSTEM_PROMPT = `You write outbound emails for a wholesale distributor of premium brands at deep discounts.
Persona: calm, strategic, direct, confident executive.
- Short paragraphs, no filler, under 120 words
- Never reveal cost basis, margins, full catalog or pricing details
- Position the offer as a curated opportunity
- Store references must come from the provided data or be omitted`;

const generatedMessageSchema = z
    .object({
        subject: z.string().trim().min(1).max(200),
        body: z.string().trim().min(1),
    })
    .transform((raw): GeneratedMessage => ({ subject: raw.subject, body: raw.body, usedFallback: false }));

type MeetingPolicy = Pick<PipelineConfig, 'maxItemsPerMessage' | 'meeting'>;

function buildUserPrompt(input: MessageGenerationInput, policy: MeetingPolicy): string {
    const items = input.itemNames.slice(0, policy.maxItemsPerMessage);
    return `Write a cold email for this lead:
Company: ${input.companyName}
Niche: ${input.niche ?? 'retail'}
Leverage angle: ${input.angle}
Touch: ${input.touchIndex} of ${input.totalTouches}
Framework: ${touchFramework(input.touchIndex)}
Brands to mention (max ${policy.maxItemsPerMessage}): ${items.length > 0 ? items.join(', ') : 'none specific'}
Store categories: ${input.categories.join(', ')}
Store excerpt (for specific references): ${(input.siteExcerpt ?? '').slice(0, 500)}
Calendar link: ${input.bookingLink}
Meeting: ${policy.meeting.duration}, ${policy.meeting.days}, ${policy.meeting.hours}

Return ONLY a JSON object:
{"subject": "email subject line", "body": "email body text"}`;
}

/** Testo del touch via modello; il lint resta compito dell'orchestratore. */
export class OpenAiMessageGenerator implements MessageGenerator {
    constructor(
        private readonly policy: MeetingPolicy,
        private readonly requester: TextRequester = requestOpenAIText,
        private readonly settings?: OpenAiSettings
    ) {}

    async generate(input: MessageGenerationInput): Promise<GeneratedMessage> {
        if (!isOpenAIConfigured(this.settings)) {
            return fallbackSequenceMessage(input);
        }
        const outcome = await requestStructuredOutput<GeneratedMessage>(this.requester, {
            purpose: `sequence_touch_${input.touchIndex}`,
            schema: generatedMessageSchema,
            request: {
                system: SYSTEM_PROMPT,
                user: buildUserPrompt(input, this.policy),
                maxOutputTokens: 512,
                temperature: 0.6,
                responseFormat: 'json_object',
            },
            schemaHint: JSON.stringify({ subject: 'email subject line', body: 'email body text' }),
            fallback: () => fallbackSequenceMessage(input),
        });
        return outcome.value;
    }
}
