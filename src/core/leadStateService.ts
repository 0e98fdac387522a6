import { DatabaseManager } from '../db';
import { LeadRecord, LeadStatus } from '../types/domain';
import { InvalidTransitionError, LeadNotFoundError } from './errors';
import { getLeadById, setLeadStatus } from './repositories/leads';

// booked e disqualified accettano solo dead (soppressione); dead è terminale.
const allowedTransitions: Record<LeadStatus, LeadStatus[]> = {
    new: ['researched', 'dead'],
    researched: ['qualified', 'disqualified', 'dead'],
    qualified: ['contacted', 'dead'],
    contacted: ['interested', 'objection', 'dead'],
    interested: ['booked', 'objection', 'dead'],
    objection: ['interested', 'booked', 'dead'],
    booked: ['dead'],
    disqualified: ['dead'],
    dead: [],
};

export function isValidLeadTransition(fromStatus: LeadStatus, toStatus: LeadStatus): boolean {
    return allowedTransitions[fromStatus].includes(toStatus);
}

export function isTerminalStatus(status: LeadStatus): boolean {
    return status === 'dead' || status === 'disqualified';
}

export interface TransitionResult {
    lead: LeadRecord;
    fromStatus: LeadStatus;
    changed: boolean;
}

/**
 * Unico percorso di scrittura dello stato lead. Lo stesso stato è un no-op;
 * una transizione fuori tabella lancia InvalidTransitionError.
 */
export async function transitionLead(
    db: DatabaseManager,
    leadId: string,
    toStatus: LeadStatus,
    at: string,
    disqualifyReason?: string
): Promise<TransitionResult> {
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        throw new LeadNotFoundError(leadId);
    }

    const fromStatus = lead.status;
    if (fromStatus === toStatus) {
        return { lead, fromStatus, changed: false };
    }
    if (!isValidLeadTransition(fromStatus, toStatus)) {
        throw new InvalidTransitionError(fromStatus, toStatus);
    }

    await setLeadStatus(db, leadId, toStatus, at, disqualifyReason);
    return {
        lead: {
            ...lead,
            status: toStatus,
            disqualify_reason: disqualifyReason ?? lead.disqualify_reason,
            updated_at: at,
        },
        fromStatus,
        changed: true,
    };
}
