/**
 * Harness condiviso dai test: DB sqlite in memoria con migrazioni, orologio
 * controllabile e collaboratori finti che registrano le chiamate.
 */

import { buildPipelineConfig, PipelineConfig } from '../config';
import { PipelineContext } from '../core/context';
import { drainQueue } from '../core/jobRunner';
import { intakeLead } from '../core/orchestrator';
import { NewLeadInput } from '../core/repositories/leads';
import { seedReferenceData } from '../core/seedData';
import { applyMigrations, DatabaseManager, openDatabase } from '../db';
import { NoopDeliveryProvider } from '../integrations/deliveryProviders';
import {
    DeliveryEvent,
    DeliveryProvider,
    EmailFinder,
    GeneratedMessage,
    LeadClassification,
    LeadClassificationOutcome,
    LeadClassifier,
    MessageGenerationInput,
    MessageGenerator,
    ReplyClassificationResult,
    ReplyClassificationOutcome,
    ReplyClassifier,
    ResearchBudget,
    ResearchCollaborator,
    ResearchResult,
    SequenceStep,
    SignalSnapshot,
} from '../types/collaborators';

export const BOOKING_LINK = 'https://calendar.example.com/intro-call';
export const START_TIME = '2026-03-02T10:00:00.000Z';

export async function createTestDatabase(): Promise<DatabaseManager> {
    const db = await openDatabase({ databaseUrl: '', dbPath: ':memory:' });
    await applyMigrations(db);
    return db;
}

/** Parametri fissi: i test non dipendono dalle variabili d'ambiente della macchina. */
export function testPipelineConfig(overrides: Partial<PipelineConfig> = {}): Readonly<PipelineConfig> {
    return buildPipelineConfig({
        maxItemsPerMessage: 3,
        defaultItemCap: 3,
        maxPerPrimaryCategory: 2,
        priorityDiscountThreshold: 45,
        highDiscountThreshold: 60,
        marketplaceChannel: 'amazon',
        multiChannelMarker: 'multi-channel',
        touchOffsetsHours: [0, 24, 96, 168, 720],
        humanApprovalThreshold: 200,
        researchBudgetMs: 25_000,
        researchMaxPages: 6,
        fallbackAngle: 'growth',
        privateLabelDisqualifyRatio: 0.95,
        minSkuEstimate: 10,
        minScaleScore: 20,
        bookingLink: BOOKING_LINK,
        meeting: { duration: '30 min', days: 'Mon-Thu', hours: '11am-4pm EST', titleTemplate: 'Intro x {company_name}' },
        ...overrides,
    });
}

export class TestClock {
    private current: number;

    constructor(start: string = START_TIME) {
        this.current = Date.parse(start);
    }

    now(): Date {
        return new Date(this.current);
    }

    advanceMinutes(minutes: number): void {
        this.current += minutes * 60_000;
    }
}

// ─── Collaboratori finti ──────────────────────────────────────────────────────

export function researchResult(overrides: Partial<ResearchResult> = {}): ResearchResult {
    return {
        success: true,
        platform: 'shopify',
        siteExcerpt: 'Kitchen and home essentials for everyday cooks.',
        categories: ['kitchen', 'home'],
        sampleItems: ['Cast iron skillet', 'Linen apron'],
        brandMentions: ['Acme'],
        skuEstimate: 120,
        priceMin: 12,
        priceMax: 240,
        policyTextFound: false,
        policyTextExcerpt: null,
        privateLabelRatio: 0.2,
        artifactPath: null,
        artifactHash: 'hash-test-1',
        pagesFetched: 3,
        ...overrides,
    };
}

export class StubResearch implements ResearchCollaborator {
    readonly calls: Array<{ url: string; leadId: string; budget: ResearchBudget }> = [];
    result: ResearchResult = researchResult();
    failWith: Error | null = null;
    onCall: (() => void | Promise<void>) | null = null;

    async research(url: string, leadId: string, budget: ResearchBudget): Promise<ResearchResult> {
        this.calls.push({ url, leadId, budget });
        if (this.onCall) {
            await this.onCall();
        }
        if (this.failWith) {
            throw this.failWith;
        }
        return this.result;
    }
}

export class StubEmailFinder implements EmailFinder {
    readonly calls: Array<{ companyName: string; website: string }> = [];
    resolve: (companyName: string, website: string) => string | null = () => null;
    failWith: Error | null = null;

    async findEmail(companyName: string, website: string): Promise<string | null> {
        this.calls.push({ companyName, website });
        if (this.failWith) {
            throw this.failWith;
        }
        return this.resolve(companyName, website);
    }
}

export class StubLeadClassifier implements LeadClassifier {
    readonly calls: SignalSnapshot[] = [];
    classification: LeadClassification = {
        brandList: ['Acme'],
        priceTier: 'mid',
        scaleScore: 70,
        mapBehaviorScore: 40,
        storeCount: 1,
        qualifies: true,
        disqualifyReason: null,
    };
    failWith: Error | null = null;
    onCall: (() => Promise<void>) | null = null;

    async classify(snapshot: SignalSnapshot): Promise<LeadClassificationOutcome> {
        this.calls.push(snapshot);
        if (this.onCall) {
            await this.onCall();
        }
        if (this.failWith) {
            throw this.failWith;
        }
        return { classification: this.classification, callId: 'call-lead-1', usedDefault: false };
    }
}

export function stubSequenceMessage(input: MessageGenerationInput): GeneratedMessage {
    return {
        subject: `Idea for ${input.companyName} (${input.touchIndex}/${input.totalTouches})`,
        body: [
            'Hi team,',
            '',
            `Thinking about ${input.itemNames.join(', ')} for your ${input.angle} plans.`,
            '',
            input.bookingLink,
        ].join('\n'),
        usedFallback: false,
    };
}

export class StubMessageGenerator implements MessageGenerator {
    readonly calls: MessageGenerationInput[] = [];
    render: (input: MessageGenerationInput) => GeneratedMessage = stubSequenceMessage;
    failWith: Error | null = null;
    onCall: ((input: MessageGenerationInput) => Promise<void>) | null = null;

    async generate(input: MessageGenerationInput): Promise<GeneratedMessage> {
        this.calls.push(input);
        if (this.onCall) {
            await this.onCall(input);
        }
        if (this.failWith) {
            throw this.failWith;
        }
        return this.render(input);
    }
}

export class StubReplyClassifier implements ReplyClassifier {
    readonly calls: string[] = [];
    result: ReplyClassificationResult = {
        classification: 'interested',
        objectionType: null,
        action: 'send_calendar',
        interestLevel: 8,
    };

    async classify(text: string): Promise<ReplyClassificationOutcome> {
        this.calls.push(text);
        return { result: this.result, callId: 'call-reply-1', usedDefault: false };
    }
}

export interface RecordedDeliveryCall {
    method: 'ensureCampaign' | 'pushLead' | 'startSequence' | 'sendReply' | 'pauseSequence';
    args: unknown[];
}

/** Provider in processo: registra le chiamate, id deterministici. */
export class RecordingDeliveryProvider implements DeliveryProvider {
    readonly name = 'stub';
    readonly calls: RecordedDeliveryCall[] = [];
    private readonly webhookParser = new NoopDeliveryProvider();

    async ensureCampaign(campaignKey: string, senderEmail: string, senderName: string): Promise<string> {
        this.calls.push({ method: 'ensureCampaign', args: [campaignKey, senderEmail, senderName] });
        return 'camp-1';
    }

    async pushLead(campaignId: string, address: string, leadId: string, sequenceId: string, customVars: Record<string, string>): Promise<string> {
        this.calls.push({ method: 'pushLead', args: [campaignId, address, leadId, sequenceId, customVars] });
        return `prov-${leadId}`;
    }

    async startSequence(campaignId: string, providerLeadId: string, steps: SequenceStep[]): Promise<void> {
        this.calls.push({ method: 'startSequence', args: [campaignId, providerLeadId, steps] });
    }

    async sendReply(campaignId: string, providerLeadId: string, subject: string, body: string): Promise<string | null> {
        this.calls.push({ method: 'sendReply', args: [campaignId, providerLeadId, subject, body] });
        return 'provider-msg-1';
    }

    async pauseSequence(campaignId: string, providerLeadId: string): Promise<void> {
        this.calls.push({ method: 'pauseSequence', args: [campaignId, providerLeadId] });
    }

    parseWebhook(payload: unknown): DeliveryEvent {
        return this.webhookParser.parseWebhook(payload);
    }

    callsTo(method: RecordedDeliveryCall['method']): RecordedDeliveryCall[] {
        return this.calls.filter((call) => call.method === method);
    }
}

// ─── Harness ──────────────────────────────────────────────────────────────────

export interface TestHarness {
    db: DatabaseManager;
    clock: TestClock;
    context: PipelineContext;
    research: StubResearch;
    emailFinder: StubEmailFinder;
    leadClassifier: StubLeadClassifier;
    messageGenerator: StubMessageGenerator;
    replyClassifier: StubReplyClassifier;
    delivery: RecordingDeliveryProvider;
}

export interface HarnessOptions {
    pipeline?: Partial<PipelineConfig>;
    seed?: boolean;
}

export async function createHarness(options: HarnessOptions = {}): Promise<TestHarness> {
    const db = await createTestDatabase();
    const clock = new TestClock();
    const pipeline = testPipelineConfig(options.pipeline);
    const research = new StubResearch();
    const emailFinder = new StubEmailFinder();
    const leadClassifier = new StubLeadClassifier();
    const messageGenerator = new StubMessageGenerator();
    const replyClassifier = new StubReplyClassifier();
    const delivery = new RecordingDeliveryProvider();

    if (options.seed ?? true) {
        await seedReferenceData(db, pipeline, clock.now().toISOString());
    }

    const context: PipelineContext = {
        db,
        pipeline,
        research,
        emailFinder,
        leadClassifier,
        messageGenerator,
        replyClassifier,
        delivery,
        sender: { campaignKey: 'test-campaign', senderEmail: 'sender@example.com', senderName: 'Test Sender' },
        workerId: 'worker-test',
        now: () => clock.now(),
    };
    return { db, clock, context, research, emailFinder, leadClassifier, messageGenerator, replyClassifier, delivery };
}

// ─── Scenari ricorrenti ───────────────────────────────────────────────────────

export const SHOP_LEAD: NewLeadInput = {
    companyName: 'Shop Co',
    website: 'https://shop.com/',
    contactEmail: 'Buyer@Shop.com',
    channel: 'amazon',
    niche: 'home goods',
};

export async function intakeNewLead(harness: TestHarness, input: NewLeadInput = SHOP_LEAD): Promise<{ leadId: string; jobId: string }> {
    const result = await intakeLead(harness.context, input);
    if (result.status !== 'created') {
        throw new Error(`Intake inatteso: ${result.status}`);
    }
    return { leadId: result.leadId, jobId: result.jobId };
}

/** Intake più drain completo: il lead arriva a `contacted` con cinque touch renderizzati. */
export async function contactedLead(harness: TestHarness, input: NewLeadInput = SHOP_LEAD): Promise<{ leadId: string; jobId: string }> {
    const created = await intakeNewLead(harness, input);
    const result = await drainQueue(harness.context);
    if (result.errors.length > 0) {
        throw new Error(`Drain fallito: ${result.errors.map((error) => error.message).join('; ')}`);
    }
    return created;
}
