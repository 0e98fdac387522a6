/**
 * Esiti conservativi usati quando un collaboratore esterno fallisce o non è
 * configurato. Nessuno stage si blocca per un collaboratore.
 */

import {
    GeneratedMessage,
    LeadClassification,
    MessageGenerationInput,
    ReplyClassificationResult,
    ResearchResult,
} from '../types/collaborators';

export function defaultLeadClassification(): LeadClassification {
    return {
        brandList: [],
        priceTier: 'mixed',
        scaleScore: 0,
        mapBehaviorScore: 0,
        storeCount: 0,
        qualifies: true,
        disqualifyReason: null,
    };
}

export function defaultReplyClassification(): ReplyClassificationResult {
    return {
        classification: 'unknown',
        objectionType: null,
        action: 'handoff_to_human',
        interestLevel: 5,
    };
}

export function emptyResearchResult(error: string | null): ResearchResult {
    return {
        success: false,
        ...(error ? { error } : {}),
        platform: null,
        siteExcerpt: null,
        categories: [],
        sampleItems: [],
        brandMentions: [],
        skuEstimate: null,
        priceMin: null,
        priceMax: null,
        policyTextFound: false,
        policyTextExcerpt: null,
        privateLabelRatio: null,
        artifactPath: null,
        artifactHash: null,
        pagesFetched: 0,
    };
}

export function fallbackSequenceMessage(input: Pick<MessageGenerationInput, 'companyName' | 'niche' | 'bookingLink'>): GeneratedMessage {
    return {
        subject: `${input.companyName} — quick brand sourcing idea`,
        body: [
            'Hi,',
            '',
            `Noticed your ${input.niche ?? 'retail'} catalog. We source premium brands at competitive terms.`,
            '',
            'Worth a quick chat?',
            '',
            input.bookingLink,
        ].join('\n'),
        usedFallback: true,
    };
}
