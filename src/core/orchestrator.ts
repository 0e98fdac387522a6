/**
 * orchestrator.ts — Lifecycle Orchestrator (stage della pipeline)
 *
 * Ogni stage: chiamata al collaboratore fuori transazione, poi stato + audit
 * committati insieme. Dentro `db.transaction` si usa solo l'handle `tx`.
 */

import { DatabaseManager } from '../db';
import { logInfo, logWarn } from '../telemetry/logger';
import { GeneratedMessage, ResearchResult } from '../types/collaborators';
import { AuditActor, JobRecord, LeadOutcome, LeadRecord, LintViolation } from '../types/domain';
import { ITEM_NAMES_VARIABLE, lintMessage, lintVariables } from '../validation/contentLinter';
import { recordAudit } from './audit';
import { selectCatalogItems, toCatalogItem } from './catalogMatcher';
import {
    defaultLeadClassification,
    emptyResearchResult,
    fallbackSequenceMessage,
} from './collaboratorDefaults';
import { addHours, nowIso, PipelineContext } from './context';
import { errorMessage, InvalidTransitionError, LeadNotFoundError } from './errors';
import { transitionLead } from './leadStateService';
import {
    buildLeadProfile,
    evaluateQualification,
    matchLeverageRule,
    toLeverageRule,
} from './leverageEngine';
import { getCatalogItemsByIds, listActiveCatalogItems } from './repositories/catalog';
import { insertJob, markJobSucceeded } from './repositories/jobs';
import { getLeadById, getLeadByWebsite, insertLead, NewLeadInput, setLeadOutcome } from './repositories/leads';
import {
    getLeverageAssignment,
    listActiveLeverageRules,
    upsertLeverageAssignment,
    upsertQualification,
} from './repositories/leverage';
import { countSequenceMessages, insertOutboundMessage } from './repositories/messages';
import { isUniqueViolation, normalizeEmail, normalizeWebsite, parseStringArray } from './repositories/shared';
import {
    getSignalSet,
    insertResearchRun,
    mergeClassifiedSignals,
    toSignalSnapshot,
    upsertRawSignals,
} from './repositories/signals';
import { findLeadSuppression, isLeadSuppressed } from './suppression';

// ─── Tipi risultato ───────────────────────────────────────────────────────────

export type IntakeResult =
    | { status: 'suppressed'; suppressed: true; reason: string }
    | { status: 'dedupe'; leadId: string; dedupe: true }
    | { status: 'created'; leadId: string; jobId: string };

export type ResearchStageResult =
    | { status: 'suppressed' }
    | { status: 'researched'; success: boolean; error: string | null };

export type QualifyStageResult =
    | { status: 'suppressed' }
    | { status: 'qualified'; callId: string; usedDefault: boolean }
    | { status: 'disqualified'; reason: string; callId: string; usedDefault: boolean };

export type LeverageStageResult =
    | { status: 'suppressed' }
    | {
        status: 'leveraged';
        matchedRuleId: string | null;
        primaryAngle: string;
        matchReason: string;
        selectedItemIds: string[];
    };

export type SequenceStageResult =
    | { status: 'sequence_created'; sequenceId: string; rendered: number; failed: number }
    | { status: 'already_created'; messages: number }
    | { status: 'lint_failed'; reasons: string[] }
    | { status: 'no_leverage' }
    | { status: 'suppressed' };

// ─── Helper ───────────────────────────────────────────────────────────────────

async function requireLead(db: DatabaseManager, leadId: string): Promise<LeadRecord> {
    const lead = await getLeadById(db, leadId);
    if (!lead) {
        throw new LeadNotFoundError(leadId);
    }
    return lead;
}

/** Chiude il job come riuscito nella transazione che ha deciso l'esito. */
export async function finalizeJobSucceeded(
    tx: DatabaseManager,
    job: Pick<JobRecord, 'id' | 'lead_id'>,
    outcome: string,
    at: string
): Promise<void> {
    await markJobSucceeded(tx, job.id, at);
    await recordAudit(tx, 'job_completed', { leadId: job.lead_id, jobId: job.id, actor: 'worker', payload: { outcome } }, at);
}

/**
 * Porta a dead un lead bloccato da soppressione rilevata a un gate successivo all'intake.
 * Il chiamante passa l'handle della propria transazione.
 */
async function markLeadSuppressed(
    tx: DatabaseManager,
    lead: LeadRecord,
    gate: string,
    jobId: string | null,
    at: string
): Promise<void> {
    const result = await transitionLead(tx, lead.id, 'dead', at, 'suppressed');
    await recordAudit(
        tx,
        'lead_suppressed',
        { leadId: lead.id, jobId, actor: 'worker', payload: { gate, fromStatus: result.fromStatus } },
        at
    );
}

/**
 * Gate di soppressione dentro la transazione dello stage: un lead soppresso mentre il
 * collaboratore lavorava non avanza, e il job si chiude come riuscito.
 */
async function haltIfSuppressed(
    tx: DatabaseManager,
    leadId: string,
    gate: string,
    job: JobRecord | null,
    at: string
): Promise<boolean> {
    const current = await requireLead(tx, leadId);
    if (current.status !== 'dead') {
        if (!(await isLeadSuppressed(tx, current))) {
            return false;
        }
        await markLeadSuppressed(tx, current, gate, job?.id ?? null, at);
    }
    if (job) {
        await finalizeJobSucceeded(tx, job, 'suppressed', at);
    }
    return true;
}

// ─── Intake ───────────────────────────────────────────────────────────────────

export async function intakeLead(context: PipelineContext, request: NewLeadInput, actor: AuditActor = 'api'): Promise<IntakeResult> {
    const companyName = request.companyName.trim();
    if (!companyName) {
        throw new Error('companyName obbligatorio.');
    }
    const email = normalizeEmail(request.contactEmail);
    const website = normalizeWebsite(request.website);
    const at = nowIso(context);

    try {
        const result = await context.db.transaction<IntakeResult>(async (tx) => {
            const match = await findLeadSuppression(tx, { contact_email: email, website });
            if (match) {
                const reason = match.matchedOn === 'email' ? match.entry.reason : 'domain_suppressed';
                await recordAudit(
                    tx,
                    'lead_suppressed',
                    { actor, payload: { gate: 'intake', email, website, reason } },
                    at
                );
                return { status: 'suppressed', suppressed: true, reason };
            }

            if (website) {
                const existing = await getLeadByWebsite(tx, website);
                if (existing) {
                    return { status: 'dedupe', leadId: existing.id, dedupe: true };
                }
            }

            const lead = await insertLead(tx, { ...request, companyName, website, contactEmail: email }, at);
            const jobId = await insertJob(tx, 'lead_research', lead.id, at);
            await recordAudit(
                tx,
                'lead_created',
                { leadId: lead.id, actor, payload: { companyName, website, channel: lead.channel } },
                at
            );
            await recordAudit(tx, 'job_created', { leadId: lead.id, jobId, actor, payload: { type: 'lead_research' } }, at);
            return { status: 'created', leadId: lead.id, jobId };
        });

        await logInfo('lead.intake', { status: result.status, website, leadId: 'leadId' in result ? result.leadId : null });
        return result;
    } catch (error) {
        // due intake concorrenti sullo stesso sito: il secondo legge la riga del primo
        if (website && isUniqueViolation(error)) {
            const existing = await getLeadByWebsite(context.db, website);
            if (existing) {
                await logInfo('lead.intake', { status: 'dedupe', website, leadId: existing.id, race: true });
                return { status: 'dedupe', leadId: existing.id, dedupe: true };
            }
        }
        throw error;
    }
}

// ─── Research ─────────────────────────────────────────────────────────────────

export async function researchLead(context: PipelineContext, leadId: string, job: JobRecord | null): Promise<ResearchStageResult> {
    const { db, pipeline } = context;
    const lead = await requireLead(db, leadId);
    const jobId = job?.id ?? null;

    const blocked = await db.transaction((tx) => haltIfSuppressed(tx, leadId, 'research', job, nowIso(context)));
    if (blocked) {
        await logWarn('lead.research.suppressed', { leadId, jobId });
        return { status: 'suppressed' };
    }

    await recordAudit(
        db,
        'scrape_requested',
        {
            leadId,
            jobId,
            actor: 'worker',
            payload: { website: lead.website, budgetMs: pipeline.researchBudgetMs, maxPages: pipeline.researchMaxPages },
        },
        nowIso(context)
    );

    let research: ResearchResult;
    if (!lead.website) {
        research = emptyResearchResult('no_website');
    } else {
        try {
            research = await context.research.research(lead.website, leadId, {
                maxDurationMs: pipeline.researchBudgetMs,
                maxPages: pipeline.researchMaxPages,
                signal: AbortSignal.timeout(pipeline.researchBudgetMs),
            });
        } catch (error) {
            research = emptyResearchResult(errorMessage(error));
        }
    }
    const error = research.success ? null : research.error ?? 'research_failed';

    const at = nowIso(context);
    const halted = await db.transaction(async (tx) => {
        await insertResearchRun(
            tx,
            {
                leadId,
                jobId,
                success: research.success,
                pagesFetched: research.pagesFetched,
                budgetMs: pipeline.researchBudgetMs,
                maxPages: pipeline.researchMaxPages,
                error,
            },
            at
        );
        if (await haltIfSuppressed(tx, leadId, 'research', job, at)) {
            return true;
        }
        await upsertRawSignals(tx, leadId, research, at);
        await transitionLead(tx, leadId, 'researched', at);
        await recordAudit(
            tx,
            research.success ? 'scrape_completed' : 'scrape_failed',
            {
                leadId,
                jobId,
                actor: 'worker',
                payload: {
                    success: research.success,
                    pagesFetched: research.pagesFetched,
                    artifactHash: research.artifactHash,
                    ...(error ? { error } : {}),
                },
            },
            at
        );
        return false;
    });

    if (halted) {
        await logWarn('lead.research.suppressed', { leadId, jobId, inFlight: true });
        return { status: 'suppressed' };
    }
    if (research.success) {
        await logInfo('lead.research.completed', { leadId, pagesFetched: research.pagesFetched });
    } else {
        await logWarn('lead.research.failed', { leadId, error });
    }
    return { status: 'researched', success: research.success, error };
}

// ─── Classify & Qualify ───────────────────────────────────────────────────────

export async function classifyAndQualify(context: PipelineContext, leadId: string, job: JobRecord | null): Promise<QualifyStageResult> {
    const { db, pipeline } = context;
    const lead = await requireLead(db, leadId);
    const jobId = job?.id ?? null;
    if (await db.transaction((tx) => haltIfSuppressed(tx, leadId, 'classify', job, nowIso(context)))) {
        await logWarn('lead.classify.suppressed', { leadId, jobId });
        return { status: 'suppressed' };
    }
    const signals = await getSignalSet(db, leadId);
    const snapshot = toSignalSnapshot(signals);

    let classification = defaultLeadClassification();
    let callId = 'default';
    let usedDefault = true;
    try {
        const outcome = await context.leadClassifier.classify(snapshot, lead.company_name, lead.niche);
        classification = outcome.classification;
        callId = outcome.callId;
        usedDefault = outcome.usedDefault;
    } catch (error) {
        await logWarn('lead.classify.collaborator_failed', { leadId, error: errorMessage(error) });
    }

    const profile = buildLeadProfile({
        channel: lead.channel,
        skuEstimate: snapshot.skuEstimate,
        scaleScore: classification.scaleScore,
        privateLabelRatio: snapshot.privateLabelRatio,
        mapBehaviorScore: classification.mapBehaviorScore,
        storeCount: classification.storeCount,
        brandListJson: JSON.stringify(classification.brandList),
        categoriesJson: JSON.stringify(snapshot.categories),
    });
    const verdict = evaluateQualification(profile, pipeline);

    const at = nowIso(context);
    const halted = await db.transaction(async (tx) => {
        if (await haltIfSuppressed(tx, leadId, 'classify', job, at)) {
            return true;
        }
        await mergeClassifiedSignals(tx, leadId, classification, at);
        await upsertQualification(
            tx,
            {
                leadId,
                qualifies: verdict.qualifies,
                disqualifyReason: verdict.reason,
                callId,
                schemaVersion: pipeline.schemaVersion,
            },
            at
        );
        await recordAudit(
            tx,
            'lead_classified',
            {
                leadId,
                jobId,
                actor: 'worker',
                payload: {
                    callId,
                    usedDefault,
                    qualifies: verdict.qualifies,
                    collaboratorQualifies: classification.qualifies,
                    collaboratorReason: classification.disqualifyReason,
                },
            },
            at
        );
        if (verdict.reason) {
            await transitionLead(tx, leadId, 'disqualified', at, verdict.reason);
            await recordAudit(tx, 'lead_disqualified', { leadId, jobId, actor: 'worker', payload: { reason: verdict.reason } }, at);
            if (job) {
                await finalizeJobSucceeded(tx, job, 'disqualified', at);
            }
        } else {
            await recordAudit(
                tx,
                'lead_qualified',
                { leadId, jobId, actor: 'worker', payload: { scaleScore: profile.scaleScore, skuEstimate: profile.skuEstimate } },
                at
            );
        }
        return false;
    });

    if (halted) {
        await logWarn('lead.classify.suppressed', { leadId, jobId, inFlight: true });
        return { status: 'suppressed' };
    }
    if (verdict.reason) {
        await logInfo('lead.disqualified', { leadId, reason: verdict.reason });
        return { status: 'disqualified', reason: verdict.reason, callId, usedDefault };
    }
    return { status: 'qualified', callId, usedDefault };
}

// ─── Assign Leverage & Items ──────────────────────────────────────────────────

export async function assignLeverage(context: PipelineContext, leadId: string, job: JobRecord | null = null): Promise<LeverageStageResult> {
    const { db, pipeline } = context;
    const jobId = job?.id ?? null;
    const lead = await requireLead(db, leadId);
    const signals = await getSignalSet(db, leadId);

    const profile = buildLeadProfile({
        channel: lead.channel,
        skuEstimate: signals?.sku_estimate ?? null,
        scaleScore: signals?.scale_score ?? null,
        privateLabelRatio: signals?.private_label_ratio ?? null,
        mapBehaviorScore: signals?.map_behavior_score ?? null,
        storeCount: signals?.store_count ?? null,
        brandListJson: signals?.brand_list_json ?? null,
        categoriesJson: signals?.categories_json ?? null,
    });

    const rules = (await listActiveLeverageRules(db)).map((record) => toLeverageRule(record, pipeline));
    const decision = matchLeverageRule(rules, profile, pipeline);
    const catalog = (await listActiveCatalogItems(db)).map(toCatalogItem);
    const selection = selectCatalogItems(
        catalog,
        { channel: lead.channel, categories: profile.categories },
        decision.selectionQuery,
        pipeline
    );

    const at = nowIso(context);
    const halted = await db.transaction(async (tx) => {
        if (await haltIfSuppressed(tx, leadId, 'leverage', job, at)) {
            return true;
        }
        await upsertLeverageAssignment(
            tx,
            {
                leadId,
                matchedRuleId: decision.matchedRuleId,
                primaryAngle: decision.primaryAngle,
                secondaryAngle: decision.secondaryAngle,
                matchReason: decision.matchReason,
                selectionQuery: decision.selectionQuery,
                selectedItemIds: selection.selectedIds,
            },
            at
        );
        await transitionLead(tx, leadId, 'qualified', at);
        await recordAudit(
            tx,
            'leverage_assigned',
            {
                leadId,
                jobId,
                actor: 'worker',
                payload: {
                    ruleId: decision.matchedRuleId,
                    primaryAngle: decision.primaryAngle,
                    secondaryAngle: decision.secondaryAngle,
                    matchReason: decision.matchReason,
                    fallback: decision.fallback,
                },
            },
            at
        );
        await recordAudit(
            tx,
            'item_matched',
            {
                leadId,
                jobId,
                actor: 'worker',
                payload: { selectedItemIds: selection.selectedIds, poolSize: selection.poolSize, cap: selection.cap },
            },
            at
        );
        return false;
    });

    if (halted) {
        await logWarn('lead.leverage.suppressed', { leadId, jobId });
        return { status: 'suppressed' };
    }
    await logInfo('lead.leverage.assigned', {
        leadId,
        primaryAngle: decision.primaryAngle,
        ruleId: decision.matchedRuleId,
        items: selection.selectedIds.length,
    });
    return {
        status: 'leveraged',
        matchedRuleId: decision.matchedRuleId,
        primaryAngle: decision.primaryAngle,
        matchReason: decision.matchReason,
        selectedItemIds: selection.selectedIds,
    };
}

// ─── Create Outbound Sequence ─────────────────────────────────────────────────

interface RenderedTouch {
    touchIndex: number;
    subject: string;
    body: string;
    scheduledAt: string;
    violations: LintViolation[];
    itemCapViolation: boolean;
    usedFallback: boolean;
}

export async function createOutboundSequence(context: PipelineContext, leadId: string, job: JobRecord | null = null): Promise<SequenceStageResult> {
    const { db, pipeline } = context;
    const jobId = job?.id ?? null;
    const lead = await requireLead(db, leadId);
    const leverage = await getLeverageAssignment(db, leadId);
    if (!leverage) {
        return { status: 'no_leverage' };
    }

    const existing = await countSequenceMessages(db, leadId);
    if (existing > 0) {
        return { status: 'already_created', messages: existing };
    }

    const items = await getCatalogItemsByIds(db, parseStringArray(leverage.selected_item_ids_json));
    const itemNames = items.map((item) => item.name);
    const variableCheck = lintVariables(
        { company_name: lead.company_name, [ITEM_NAMES_VARIABLE]: itemNames, booking_link: pipeline.bookingLink },
        pipeline
    );
    if (!variableCheck.ok) {
        await logWarn('lead.sequence.lint_failed', { leadId, reasons: variableCheck.reasons });
        return { status: 'lint_failed', reasons: variableCheck.reasons };
    }

    const signals = await getSignalSet(db, leadId);
    const snapshot = toSignalSnapshot(signals);
    const baseTime = context.now();
    const totalTouches = pipeline.touchOffsetsHours.length;
    const referencedItems = new Set(itemNames).size;
    const touches: RenderedTouch[] = [];

    for (const [position, offsetHours] of pipeline.touchOffsetsHours.entries()) {
        const input = {
            companyName: lead.company_name,
            niche: lead.niche,
            angle: leverage.primary_angle,
            touchIndex: position + 1,
            totalTouches,
            itemNames,
            siteExcerpt: snapshot.siteExcerpt,
            categories: snapshot.categories,
            bookingLink: pipeline.bookingLink,
        };
        let message: GeneratedMessage;
        try {
            message = await context.messageGenerator.generate(input);
        } catch (error) {
            await logWarn('lead.sequence.generator_failed', { leadId, touch: input.touchIndex, error: errorMessage(error) });
            message = fallbackSequenceMessage(input);
        }
        const lint = lintMessage(message.subject, message.body, referencedItems, pipeline);
        touches.push({
            touchIndex: input.touchIndex,
            subject: message.subject,
            body: message.body,
            scheduledAt: addHours(baseTime, offsetHours).toISOString(),
            violations: lint.violations,
            itemCapViolation: lint.itemCapViolation,
            usedFallback: message.usedFallback,
        });
    }

    const sequenceId = `seq-${leadId.slice(0, 8)}-${baseTime.getTime().toString(36)}`;
    const at = nowIso(context);
    const result = await db.transaction<SequenceStageResult>(async (tx) => {
        // gate prima dell'invio: la soppressione può essere arrivata durante la generazione
        if (await haltIfSuppressed(tx, leadId, 'before_send', job, at)) {
            return { status: 'suppressed' };
        }

        let rendered = 0;
        let failed = 0;
        for (const touch of touches) {
            const ok = touch.violations.length === 0 && !touch.itemCapViolation;
            const error = ok
                ? null
                : [
                    ...touch.violations.map((violation) => `${violation.location}:${violation.phrase}`),
                    ...(touch.itemCapViolation ? ['item_cap_exceeded'] : []),
                ].join(', ');
            await insertOutboundMessage(
                tx,
                {
                    leadId,
                    sequenceId,
                    touchIndex: touch.touchIndex,
                    messageType: 'sequence',
                    subject: touch.subject,
                    body: touch.body,
                    status: ok ? 'rendered' : 'failed',
                    scheduledAt: touch.scheduledAt,
                    error,
                    lintViolations: touch.violations,
                },
                at
            );
            await recordAudit(
                tx,
                'email_rendered',
                {
                    leadId,
                    jobId,
                    actor: 'worker',
                    payload: {
                        touch: touch.touchIndex,
                        sequenceId,
                        lintOk: ok,
                        violations: touch.violations,
                        usedFallback: touch.usedFallback,
                    },
                },
                at
            );
            if (ok) rendered++;
            else failed++;
        }
        await transitionLead(tx, leadId, 'contacted', at);
        return { status: 'sequence_created', sequenceId, rendered, failed };
    });

    if (result.status === 'suppressed') {
        await logWarn('lead.sequence.suppressed', { leadId });
    } else {
        await logInfo('lead.sequence.created', { leadId, ...result });
    }
    return result;
}

// ─── Record Outcome ───────────────────────────────────────────────────────────

/** Prenotazione con esito: da interested/objection a booked; su un lead booked aggiorna solo l'etichetta. */
export async function recordOutcome(
    context: PipelineContext,
    leadId: string,
    outcome: LeadOutcome,
    notes: string | null = null
): Promise<LeadRecord> {
    const at = nowIso(context);
    const updated = await context.db.transaction(async (tx) => {
        const lead = await requireLead(tx, leadId);
        if (lead.status !== 'booked' && lead.status !== 'interested' && lead.status !== 'objection') {
            throw new InvalidTransitionError(lead.status, 'booked');
        }
        await transitionLead(tx, leadId, 'booked', at);
        await setLeadOutcome(tx, leadId, outcome, notes, at);
        return requireLead(tx, leadId);
    });
    await logInfo('lead.outcome.recorded', { leadId, outcome });
    return updated;
}
