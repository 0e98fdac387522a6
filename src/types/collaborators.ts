/**
 * Contratti dei collaboratori esterni consumati dall'orchestratore.
 * Le implementazioni concrete (HTTP, AI, provider email) vivono in ai/ e integrations/;
 * i test iniettano stub che rispettano le stesse interfacce.
 */

import { PriceTier, ReplyAction, ReplyClassification } from './domain';

// ─── Research ─────────────────────────────────────────────────────────────────

export interface ResearchBudget {
    maxDurationMs: number;
    maxPages: number;
    signal?: AbortSignal;
}

export interface ResearchResult {
    success: boolean;
    error?: string;
    platform: string | null;
    siteExcerpt: string | null;
    categories: string[];
    sampleItems: string[];
    brandMentions: string[];
    skuEstimate: number | null;
    priceMin: number | null;
    priceMax: number | null;
    policyTextFound: boolean;
    policyTextExcerpt: string | null;
    privateLabelRatio: number | null;
    artifactPath: string | null;
    artifactHash: string | null;
    pagesFetched: number;
}

export interface ResearchCollaborator {
    research(url: string, leadId: string, budget: ResearchBudget): Promise<ResearchResult>;
}

// ─── Ricerca indirizzo email ──────────────────────────────────────────────────

/** Cerca un indirizzo di contatto sul sito; null se non ne trova uno usabile. */
export interface EmailFinder {
    findEmail(companyName: string, website: string): Promise<string | null>;
}

// ─── Classificazione lead ─────────────────────────────────────────────────────

export interface SignalSnapshot {
    platform: string | null;
    categories: string[];
    sampleItems: string[];
    brandMentions: string[];
    skuEstimate: number | null;
    priceMin: number | null;
    priceMax: number | null;
    policyTextFound: boolean;
    privateLabelRatio: number | null;
    siteExcerpt: string | null;
}

export interface LeadClassification {
    brandList: string[];
    priceTier: PriceTier;
    scaleScore: number;
    mapBehaviorScore: number;
    storeCount: number;
    qualifies: boolean;
    disqualifyReason: string | null;
}

export interface LeadClassificationOutcome {
    classification: LeadClassification;
    callId: string;
    usedDefault: boolean;
}

export interface LeadClassifier {
    classify(snapshot: SignalSnapshot, companyName: string, niche: string | null): Promise<LeadClassificationOutcome>;
}

// ─── Generazione messaggi ─────────────────────────────────────────────────────

export interface MessageGenerationInput {
    companyName: string;
    niche: string | null;
    angle: string;
    touchIndex: number;
    totalTouches: number;
    itemNames: string[];
    siteExcerpt: string | null;
    categories: string[];
    bookingLink: string;
}

export interface GeneratedMessage {
    subject: string;
    body: string;
    usedFallback: boolean;
}

export interface MessageGenerator {
    generate(input: MessageGenerationInput): Promise<GeneratedMessage>;
}

// ─── Classificazione risposte ─────────────────────────────────────────────────

export interface ReplyContext {
    companyName: string;
    niche: string | null;
    angle: string | null;
}

export interface ReplyClassificationResult {
    classification: ReplyClassification;
    objectionType: string | null;
    action: ReplyAction;
    interestLevel: number;
}

export interface ReplyClassificationOutcome {
    result: ReplyClassificationResult;
    callId: string;
    usedDefault: boolean;
}

export interface ReplyClassifier {
    classify(text: string, context: ReplyContext): Promise<ReplyClassificationOutcome>;
}

// ─── Delivery provider ────────────────────────────────────────────────────────

export type DeliveryEventType = 'sent' | 'opened' | 'delivered' | 'replied' | 'bounced' | 'unsubscribed' | 'unknown';

export interface DeliveryEvent {
    event: DeliveryEventType;
    address: string | null;
    replyText?: string;
    providerMessageId?: string;
    providerCampaignId?: string;
    rawType?: string;
}

export interface SequenceStep {
    subject: string;
    body: string;
    delayDays: number;
}

export interface DeliveryProvider {
    readonly name: string;
    ensureCampaign(campaignKey: string, senderEmail: string, senderName: string): Promise<string>;
    pushLead(campaignId: string, address: string, leadId: string, sequenceId: string, customVars: Record<string, string>): Promise<string>;
    startSequence(campaignId: string, providerLeadId: string, steps: SequenceStep[]): Promise<void>;
    sendReply(campaignId: string, providerLeadId: string, subject: string, body: string): Promise<string | null>;
    pauseSequence(campaignId: string, providerLeadId: string): Promise<void>;
    parseWebhook(payload: unknown): DeliveryEvent;
}
