import { z } from 'zod';
import { defaultLeadClassification } from '../core/collaboratorDefaults';
import {
    LeadClassification,
    LeadClassificationOutcome,
    LeadClassifier,
    SignalSnapshot,
} from '../types/collaborators';
import { PriceTier } from '../types/domain';
import { isOpenAIConfigured, OpenAiSettings, requestOpenAIText, TextRequester } from './openaiClient';
import { requestStructuredOutput } from './structuredOutput';

const PRICE_TIERS: readonly PriceTier[] = ['budget', 'mid', 'premium', 'luxury', 'mixed'];

function toPriceTier(value: unknown): PriceTier {
    const normalized = String(value ?? '').trim().toLowerCase();
    if (normalized === 'discount') return 'budget';
    return PRICE_TIERS.find((tier) => tier === normalized) ?? 'mixed';
}

const score = z.coerce.number().min(0).max(100);

export const leadClassificationSchema = z.object({
    brand_list: z.array(z.string()).default([]),
    price_tier: z.unknown().transform(toPriceTier),
    scale_score: score.default(0),
    map_behavior_score: score.default(0),
    store_count: z.coerce.number().int().min(0).default(0),
    qualifies: z.boolean().default(true),
    disqualify_reason: z.string().nullable().default(null),
});

const SCHEMA_HINT = JSON.stringify({
    brand_list: [],
    price_tier: 'mixed',
    scale_score: 0,
    map_behavior_score: 0,
    store_count: 0,
    qualifies: true,
    disqualify_reason: null,
});

const SYSTEM_PROMPT = `You are a wholesale lead qualification analyst for a distributor of premium branded products.
Analyze scraped storefront data and return a STRICT JSON object. No text outside the JSON.`;

function buildUserPrompt(snapshot: SignalSnapshot, companyName: string, niche: string | null): string {
    return `Scraped signals:
- Platform: ${snapshot.platform ?? 'unknown'}
- Categories: ${snapshot.categories.join(', ') || 'none'}
- Brand mentions: ${snapshot.brandMentions.join(', ') || 'none'}
- SKU estimate: ${snapshot.skuEstimate ?? 0}
- Price range: ${snapshot.priceMin ?? '?'} - ${snapshot.priceMax ?? '?'}
- Site excerpt: ${(snapshot.siteExcerpt ?? '').slice(0, 1000)}
- MAP policy text found: ${snapshot.policyTextFound}
- Company: ${companyName}
- Niche: ${niche ?? 'unknown'}

Return this exact JSON schema:
{
  "brand_list": ["cleaned brand names found"],
  "price_tier": "budget" | "mid" | "premium" | "luxury" | "mixed",
  "scale_score": 0 to 100,
  "map_behavior_score": 0 to 100,
  "store_count": integer,
  "qualifies": true | false,
  "disqualify_reason": null | "private_label_only" | "arbitrage_no_scale" | "unknown"
}

Rules:
- scale_score: 0=tiny/dropship, 50=medium, 100=large multi-location
- map_behavior_score: 0=no MAP respect, 50=some, 100=strict MAP compliance
- brand_list: only real brand names, not the store's own name`;
}

/**
 * Normalizza i segnali grezzi via modello. Il verdetto `qualifies` del modello
 * viene registrato ma la qualifica la decidono i gate deterministici.
 */
export class OpenAiLeadClassifier implements LeadClassifier {
    constructor(
        private readonly requester: TextRequester = requestOpenAIText,
        private readonly settings?: OpenAiSettings
    ) {}

    async classify(snapshot: SignalSnapshot, companyName: string, niche: string | null): Promise<LeadClassificationOutcome> {
        if (!isOpenAIConfigured(this.settings)) {
            return { classification: defaultLeadClassification(), callId: 'ai-disabled', usedDefault: true };
        }
        const outcome = await requestStructuredOutput<LeadClassification>(this.requester, {
            purpose: 'lead_classification',
            schema: leadClassificationSchema.transform((raw) => ({
                brandList: raw.brand_list.map((brand) => brand.trim()).filter((brand) => brand.length > 0),
                priceTier: raw.price_tier,
                scaleScore: raw.scale_score,
                mapBehaviorScore: raw.map_behavior_score,
                storeCount: raw.store_count,
                qualifies: raw.qualifies,
                disqualifyReason: raw.disqualify_reason,
            })),
            request: {
                system: SYSTEM_PROMPT,
                user: buildUserPrompt(snapshot, companyName, niche),
                maxOutputTokens: 400,
                temperature: 0.1,
                responseFormat: 'json_object',
            },
            schemaHint: SCHEMA_HINT,
            fallback: defaultLeadClassification,
        });
        return { classification: outcome.value, callId: outcome.callId, usedDefault: outcome.usedDefault };
    }
}
