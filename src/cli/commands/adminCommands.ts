/**
 * adminCommands.ts — Comandi CLI di amministrazione
 *
 * init, seed, stats, audit, approvals, approve, send-response, suppress
 */

import { getLeadAuditTrail, toAuditEntryView } from '../../core/audit';
import { PipelineContext, nowIso } from '../../core/context';
import { reviewDraft, sendApprovedResponse } from '../../core/replyService';
import {
    getPipelineStats,
    listAuditEntriesByCorrelation,
    listPendingApprovals,
    listRecentAuditEntries,
    listRecentRunLogs,
    listSuppressionEntries,
} from '../../core/repositories';
import { seedReferenceData } from '../../core/seedData';
import { suppressAddress, suppressDomain } from '../../core/suppression';
import { applyMigrations } from '../../db';
import { getCorrelationId } from '../../telemetry/correlation';
import {
    getOptionValue,
    getPositionalArgs,
    hasOption,
    parseIntStrict,
    parseReviewDecision,
    requireValue,
} from '../cliParser';

// ─── Command handlers ─────────────────────────────────────────────────────────

export async function runInitCommand(context: PipelineContext): Promise<void> {
    const applied = await applyMigrations(context.db);
    const seeded = await seedReferenceData(context.db, context.pipeline, nowIso(context));
    console.log(JSON.stringify({ migrationsApplied: applied, seeded }, null, 2));
}

export async function runSeedCommand(context: PipelineContext): Promise<void> {
    const report = await seedReferenceData(context.db, context.pipeline, nowIso(context));
    const describe = (value: number | null): string => (value === null ? 'già popolata' : `${value} inseriti`);
    console.log(`Regole leverage: ${describe(report.leverageRules)}`);
    console.log(`Articoli catalogo: ${describe(report.catalogItems)}`);
    console.log(`Template obiezioni: ${describe(report.objectionTemplates)}`);
}

export async function runStatsCommand(context: PipelineContext): Promise<void> {
    const stats = await getPipelineStats(context.db);
    console.log(JSON.stringify(stats, null, 2));
}

export async function runAuditCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const leadId = getOptionValue(args, '--lead') ?? positional[0];
    const correlationId = getOptionValue(args, '--correlation');
    const limitRaw = getOptionValue(args, '--limit');
    const limit = limitRaw ? Math.max(1, parseIntStrict(limitRaw, '--limit')) : 50;

    if (leadId) {
        console.log(JSON.stringify(await getLeadAuditTrail(context.db, leadId), null, 2));
        return;
    }
    if (correlationId) {
        const rows = await listAuditEntriesByCorrelation(context.db, correlationId);
        console.log(JSON.stringify(rows.map(toAuditEntryView), null, 2));
        return;
    }
    if (hasOption(args, '--logs')) {
        console.log(JSON.stringify(await listRecentRunLogs(context.db, limit), null, 2));
        return;
    }
    const rows = await listRecentAuditEntries(context.db, limit);
    console.log(JSON.stringify(rows.map(toAuditEntryView), null, 2));
}

export async function runApprovalsCommand(context: PipelineContext, args: string[]): Promise<void> {
    const limitRaw = getOptionValue(args, '--limit');
    const limit = limitRaw ? Math.max(1, parseIntStrict(limitRaw, '--limit')) : 50;
    const pending = await listPendingApprovals(context.db, limit);
    console.log(JSON.stringify(pending.map((reply) => ({
        replyId: reply.id,
        leadId: reply.lead_id,
        classification: reply.classification,
        subject: reply.draft_subject,
        body: reply.draft_response,
    })), null, 2));
}

export async function runApproveCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const usage = 'npm start -- approve <replyId> [--decision approve|reject] [--send]';
    const replyId = requireValue(getOptionValue(args, '--reply') ?? positional[0], usage);
    const decision = parseReviewDecision(getOptionValue(args, '--decision') ?? positional[1] ?? 'approve');
    const reply = await reviewDraft(context, replyId, decision);
    console.log(`Bozza ${reply.id}: ${reply.approval ?? 'nessuna'}`);

    if (decision === 'approve' && hasOption(args, '--send')) {
        const result = await sendApprovedResponse(context, replyId, 'cli');
        console.log(JSON.stringify(result, null, 2));
    }
}

export async function runSendResponseCommand(context: PipelineContext, args: string[]): Promise<void> {
    const replyId = requireValue(getPositionalArgs(args)[0], 'npm start -- send-response <replyId>');
    const result = await sendApprovedResponse(context, replyId, 'cli');
    console.log(JSON.stringify(result, null, 2));
}

export async function runSuppressCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const domain = getOptionValue(args, '--domain');
    const at = nowIso(context);
    const suppressionContext = { actor: 'cli' as const, correlationId: getCorrelationId() ?? undefined };

    if (hasOption(args, '--list')) {
        console.log(JSON.stringify(await listSuppressionEntries(context.db), null, 2));
        return;
    }

    const outcome = domain
        ? await context.db.transaction((tx) => suppressDomain(tx, domain, 'manual', suppressionContext, at))
        : await context.db.transaction((tx) =>
              suppressAddress(
                  tx,
                  requireValue(getOptionValue(args, '--email') ?? positional[0], 'npm start -- suppress <email> | --domain <dominio> | --list'),
                  'manual',
                  suppressionContext,
                  at
              )
          );
    console.log(JSON.stringify(outcome, null, 2));
}
