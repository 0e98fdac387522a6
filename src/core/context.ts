import { PipelineConfig } from '../config/types';
import { DatabaseManager } from '../db';
import {
    DeliveryProvider,
    EmailFinder,
    LeadClassifier,
    MessageGenerator,
    ReplyClassifier,
    ResearchCollaborator,
} from '../types/collaborators';

export interface SenderIdentity {
    campaignKey: string;
    senderEmail: string;
    senderName: string;
}

/**
 * Dipendenze dell'orchestratore, iniettate dal runtime (CLI/API) o dai test.
 * Nessuno stage legge config o stato globale fuori da qui.
 */
export interface PipelineContext {
    db: DatabaseManager;
    pipeline: Readonly<PipelineConfig>;
    research: ResearchCollaborator;
    emailFinder: EmailFinder;
    leadClassifier: LeadClassifier;
    messageGenerator: MessageGenerator;
    replyClassifier: ReplyClassifier;
    delivery: DeliveryProvider;
    sender: SenderIdentity;
    workerId: string;
    now: () => Date;
}

export function nowIso(context: Pick<PipelineContext, 'now'>): string {
    return context.now().toISOString();
}

export function addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * 3_600_000);
}
