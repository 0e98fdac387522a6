import { LeadStatus } from '../types/domain';

export class LeadNotFoundError extends Error {
    public readonly code = 'LEAD_NOT_FOUND';
    readonly leadId: string;

    constructor(leadId: string) {
        super(`Lead ${leadId} non trovato`);
        this.name = 'LeadNotFoundError';
        this.leadId = leadId;
    }
}

export class ReplyNotFoundError extends Error {
    public readonly code = 'REPLY_NOT_FOUND';
    readonly replyId: string;

    constructor(replyId: string) {
        super(`Risposta ${replyId} non trovata`);
        this.name = 'ReplyNotFoundError';
        this.replyId = replyId;
    }
}

export class InvalidTransitionError extends Error {
    public readonly code = 'INVALID_TRANSITION';
    readonly from: LeadStatus;
    readonly to: LeadStatus;

    constructor(from: LeadStatus, to: LeadStatus) {
        super(`Transizione non consentita: ${from} -> ${to}`);
        this.name = 'InvalidTransitionError';
        this.from = from;
        this.to = to;
    }
}

/** Input del linter malformato. Le violazioni di policy sono dati, non eccezioni. */
export class ContentPolicyError extends Error {
    public readonly code = 'CONTENT_POLICY_INPUT';

    constructor(message: string) {
        super(message);
        this.name = 'ContentPolicyError';
    }
}

export class DraftStateError extends Error {
    public readonly code = 'DRAFT_STATE';

    constructor(message: string) {
        super(message);
        this.name = 'DraftStateError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
