import { OpenAiLeadClassifier } from './ai/leadClassifier';
import { OpenAiMessageGenerator } from './ai/messageGenerator';
import { OpenAiReplyClassifier } from './ai/replyClassifier';
import { config } from './config';
import { PipelineContext } from './core/context';
import { DatabaseManager } from './db';
import { createDeliveryProvider } from './integrations/deliveryProviders';
import { SiteEmailFinder } from './integrations/emailFinder';
import { SiteResearcher } from './integrations/siteResearcher';

/**
 * Contesto di produzione: collaboratori reali costruiti dalla config congelata.
 * CLI e API lo creano una volta per processo; i test compongono il proprio.
 */
export function buildDefaultContext(db: DatabaseManager, overrides: Partial<PipelineContext> = {}): PipelineContext {
    return {
        db,
        pipeline: config.pipeline,
        research: new SiteResearcher(config),
        emailFinder: new SiteEmailFinder(config),
        leadClassifier: new OpenAiLeadClassifier(),
        messageGenerator: new OpenAiMessageGenerator(config.pipeline),
        replyClassifier: new OpenAiReplyClassifier(),
        delivery: createDeliveryProvider(config),
        sender: {
            campaignKey: config.campaignKey,
            senderEmail: config.senderEmail,
            senderName: config.senderName,
        },
        workerId: config.workerId,
        now: () => new Date(),
        ...overrides,
    };
}
