/**
 * enrichment.ts — arricchimento dell'indirizzo di contatto.
 * L'email finder gira fuori transazione; la scrittura avviene solo se il lead
 * è ancora senza indirizzo e quello trovato non è nel registro di soppressione.
 */

import { logInfo, logWarn } from '../telemetry/logger';
import { AuditActor, LeadStatus } from '../types/domain';
import { recordAudit } from './audit';
import { nowIso, PipelineContext } from './context';
import { errorMessage, LeadNotFoundError } from './errors';
import { getLeadById, listLeadsMissingEmail, setLeadContactEmail } from './repositories/leads';
import { normalizeEmail } from './repositories/shared';
import { findSuppression } from './suppression';

export type EmailEnrichmentResult =
    | { status: 'enriched'; leadId: string; email: string }
    | { status: 'already_enriched'; leadId: string; email: string }
    | { status: 'no_website'; leadId: string }
    | { status: 'not_found'; leadId: string }
    | { status: 'suppressed'; leadId: string; email: string }
    | { status: 'skipped'; leadId: string; leadStatus: LeadStatus };

export interface BulkEnrichmentSummary {
    scanned: number;
    enriched: number;
    notFound: number;
    suppressed: number;
    failed: number;
}

const CLOSED_STATUSES: ReadonlySet<LeadStatus> = new Set(['dead', 'disqualified']);

export async function enrichLeadEmail(
    context: PipelineContext,
    leadId: string,
    actor: AuditActor = 'cli'
): Promise<EmailEnrichmentResult> {
    const lead = await getLeadById(context.db, leadId);
    if (!lead) {
        throw new LeadNotFoundError(leadId);
    }
    if (lead.contact_email) {
        return { status: 'already_enriched', leadId, email: lead.contact_email };
    }
    if (!lead.website) {
        return { status: 'no_website', leadId };
    }
    if (CLOSED_STATUSES.has(lead.status)) {
        return { status: 'skipped', leadId, leadStatus: lead.status };
    }

    const found = normalizeEmail(await context.emailFinder.findEmail(lead.company_name, lead.website));
    if (!found) {
        await logInfo('lead.enrich.not_found', { leadId });
        return { status: 'not_found', leadId };
    }

    const at = nowIso(context);
    const result = await context.db.transaction<EmailEnrichmentResult>(async (tx) => {
        const current = await getLeadById(tx, leadId);
        if (!current) {
            throw new LeadNotFoundError(leadId);
        }
        // un indirizzo arrivato nel frattempo (intake, operatore) ha la precedenza
        if (current.contact_email) {
            return { status: 'already_enriched', leadId, email: current.contact_email };
        }
        if (await findSuppression(tx, found)) {
            return { status: 'suppressed', leadId, email: found };
        }
        await setLeadContactEmail(tx, leadId, found, at);
        await recordAudit(
            tx,
            'lead_enriched',
            { leadId, actor, payload: { field: 'contact_email', email: found, source: 'email_finder' } },
            at
        );
        return { status: 'enriched', leadId, email: found };
    });

    if (result.status === 'suppressed') {
        await logWarn('lead.enrich.suppressed', { leadId });
    } else {
        await logInfo('lead.enrich.completed', { leadId, status: result.status });
    }
    return result;
}

/** Arricchisce in sequenza i lead aperti con sito e senza indirizzo. */
export async function enrichMissingEmails(
    context: PipelineContext,
    options: { limit?: number; actor?: AuditActor } = {}
): Promise<BulkEnrichmentSummary> {
    const leads = await listLeadsMissingEmail(context.db, options.limit ?? 100);
    const summary: BulkEnrichmentSummary = { scanned: leads.length, enriched: 0, notFound: 0, suppressed: 0, failed: 0 };

    for (const lead of leads) {
        try {
            const result = await enrichLeadEmail(context, lead.id, options.actor ?? 'cli');
            if (result.status === 'enriched') summary.enriched++;
            else if (result.status === 'not_found') summary.notFound++;
            else if (result.status === 'suppressed') summary.suppressed++;
        } catch (error) {
            summary.failed++;
            await logWarn('lead.enrich.failed', { leadId: lead.id, error: errorMessage(error) });
        }
    }

    await logInfo('lead.enrich.batch_completed', { ...summary });
    return summary;
}
