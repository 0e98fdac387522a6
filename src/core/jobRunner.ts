import { DatabaseManager } from '../db';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { resolveCorrelationId, runWithCorrelationId } from '../telemetry/correlation';
import { JobRecord } from '../types/domain';
import { WorkerExecutionError, WorkerExecutionResult, workerResult } from '../workers/result';
import { recordAudit } from './audit';
import { nowIso, PipelineContext } from './context';
import { errorMessage } from './errors';
import {
    assignLeverage,
    classifyAndQualify,
    createOutboundSequence,
    finalizeJobSucceeded,
    researchLead,
} from './orchestrator';
import { claimJob, listQueuedJobs, markJobFailed, recoverStuckJobs, requeueJob } from './repositories/jobs';
import { getLeadById } from './repositories/leads';
import { getQualification } from './repositories/leverage';

export interface DrainQueueOptions {
    signal?: AbortSignal;
    limit?: number;
}

type PipelineRunOutcome =
    | { kind: 'completed'; outcome: string }
    // job già chiuso dallo stage che ha deciso (soppressione, squalifica)
    | { kind: 'finalized'; outcome: string }
    | { kind: 'failed'; error: string }
    | { kind: 'interrupted' };

// new → researched → qualified → contacted: al massimo uno stage per stato
const MAX_STAGE_STEPS = 6;

async function claimWithAudit(context: PipelineContext, job: JobRecord): Promise<JobRecord | null> {
    const at = nowIso(context);
    return context.db.transaction(async (tx) => {
        const claimed = await claimJob(tx, job.id, context.workerId, at);
        if (!claimed) return null;
        await recordAudit(
            tx,
            'job_started',
            { leadId: claimed.lead_id, jobId: claimed.id, actor: 'worker', payload: { attempt: claimed.attempts, workerId: context.workerId } },
            at
        );
        return claimed;
    });
}

async function failJob(db: DatabaseManager, job: JobRecord, error: string, at: string): Promise<void> {
    await db.transaction(async (tx) => {
        await markJobFailed(tx, job.id, error, at);
        await recordAudit(tx, 'job_failed', { leadId: job.lead_id, jobId: job.id, actor: 'worker', payload: { error } }, at);
    });
}

/**
 * Esegue gli stage a partire dallo stato corrente del lead: un job recuperato
 * dopo un crash riprende dove si era fermato senza ripetere lavoro già committato.
 */
async function runLeadPipeline(context: PipelineContext, job: JobRecord, signal?: AbortSignal): Promise<PipelineRunOutcome> {
    for (let step = 0; step < MAX_STAGE_STEPS; step++) {
        if (step > 0 && signal?.aborted) {
            return { kind: 'interrupted' };
        }
        const lead = await getLeadById(context.db, job.lead_id);
        if (!lead) {
            return { kind: 'failed', error: `Lead ${job.lead_id} non trovato.` };
        }

        switch (lead.status) {
            case 'new': {
                const research = await researchLead(context, lead.id, job);
                if (research.status === 'suppressed') {
                    return { kind: 'finalized', outcome: 'suppressed' };
                }
                break;
            }
            case 'researched': {
                const qualification = await getQualification(context.db, lead.id);
                if (!qualification || Number(qualification.qualifies) !== 1) {
                    const verdict = await classifyAndQualify(context, lead.id, job);
                    if (verdict.status === 'disqualified' || verdict.status === 'suppressed') {
                        return { kind: 'finalized', outcome: verdict.status };
                    }
                }
                const leverage = await assignLeverage(context, lead.id, job);
                if (leverage.status === 'suppressed') {
                    return { kind: 'finalized', outcome: 'suppressed' };
                }
                break;
            }
            case 'qualified': {
                const sequence = await createOutboundSequence(context, lead.id, job);
                if (sequence.status === 'suppressed') {
                    return { kind: 'finalized', outcome: 'suppressed' };
                }
                if (sequence.status === 'lint_failed') {
                    return { kind: 'failed', error: `lint_failed: ${sequence.reasons.join(', ')}` };
                }
                if (sequence.status === 'no_leverage') {
                    return { kind: 'failed', error: 'no_leverage' };
                }
                return { kind: 'completed', outcome: sequence.status };
            }
            case 'dead':
                // soppresso prima del claim: nessuno stage ha chiuso il job
                return { kind: 'completed', outcome: lead.disqualify_reason?.startsWith('suppressed') ? 'suppressed' : 'already_dead' };
            default:
                // stato già oltre la pipeline (contattato, terminale): niente da rifare
                return { kind: 'completed', outcome: `already_${lead.status}` };
        }
    }
    return { kind: 'failed', error: 'pipeline_step_limit' };
}

async function processJob(context: PipelineContext, job: JobRecord, signal?: AbortSignal): Promise<PipelineRunOutcome> {
    let outcome: PipelineRunOutcome;
    try {
        outcome = await runLeadPipeline(context, job, signal);
    } catch (error) {
        outcome = { kind: 'failed', error: errorMessage(error) };
    }

    const at = nowIso(context);
    if (outcome.kind === 'completed') {
        const label = outcome.outcome;
        await context.db.transaction((tx) => finalizeJobSucceeded(tx, job, label, at));
        await logInfo('job.completed', { jobId: job.id, leadId: job.lead_id, outcome: label });
    } else if (outcome.kind === 'finalized') {
        await logInfo('job.completed', { jobId: job.id, leadId: job.lead_id, outcome: outcome.outcome });
    } else if (outcome.kind === 'failed') {
        await failJob(context.db, job, outcome.error, at);
        await logError('job.failed', { jobId: job.id, leadId: job.lead_id, error: outcome.error });
    } else {
        await requeueJob(context.db, job.id, 'interrupted', at);
        await logWarn('job.interrupted', { jobId: job.id, leadId: job.lead_id });
    }
    return outcome;
}

/**
 * Drain della coda di ricerca: claim esclusivo per job, un lead alla volta.
 * Con `signal` abortito non si fanno nuovi claim; il lead in corso chiude lo stage attivo.
 */
export async function drainQueue(context: PipelineContext, options: DrainQueueOptions = {}): Promise<WorkerExecutionResult> {
    const queued = await listQueuedJobs(context.db, 'lead_research', options.limit ?? 500);
    const errors: WorkerExecutionError[] = [];
    let processed = 0;
    let skipped = 0;

    for (const candidate of queued) {
        if (options.signal?.aborted) {
            await logWarn('queue.drain.aborted', { remaining: queued.length - processed - skipped });
            break;
        }
        const correlationId = resolveCorrelationId(candidate.id);
        const outcome = await runWithCorrelationId(correlationId, async () => {
            const job = await claimWithAudit(context, candidate);
            if (!job) {
                return null;
            }
            return processJob(context, job, options.signal);
        });
        if (!outcome) {
            skipped++;
            continue;
        }
        if (outcome.kind === 'interrupted') {
            skipped++;
            continue;
        }
        processed++;
        if (outcome.kind === 'failed') {
            errors.push({ leadId: candidate.lead_id, jobId: candidate.id, message: outcome.error });
        }
    }

    await logInfo('queue.drain.completed', { processed, skipped, failed: errors.length });
    return workerResult(processed, errors, skipped);
}

/** Manutenzione all'avvio: job 'running' di worker morti tornano in coda. */
export async function recoverStaleJobs(context: PipelineContext, staleAfterMinutes: number): Promise<number> {
    const recovered = await recoverStuckJobs(context.db, staleAfterMinutes, context.now());
    if (recovered > 0) {
        await logWarn('queue.jobs.recovered', { recovered, staleAfterMinutes });
    }
    return recovered;
}
