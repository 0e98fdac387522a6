/**
 * leadCommands.ts — Comandi CLI sul ciclo di vita del lead
 *
 * intake, enrich, process, reply, event, launch, outcome
 */

import { PipelineContext } from '../../core/context';
import { handleDeliveryEvent, launchSequence } from '../../core/deliveryService';
import { enrichLeadEmail, enrichMissingEmails } from '../../core/enrichment';
import { drainQueue } from '../../core/jobRunner';
import { intakeLead, recordOutcome } from '../../core/orchestrator';
import { handleReply } from '../../core/replyService';
import {
    getOptionValue,
    getPositionalArgs,
    parseDeliveryEventType,
    parseIntStrict,
    parseOutcome,
    requireValue,
} from '../cliParser';

// ─── Command handlers ─────────────────────────────────────────────────────────

export async function runIntakeCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const companyName = requireValue(
        getOptionValue(args, '--company') ?? positional[0],
        'npm start -- intake --company <nome> [--website url] [--email addr] [--channel c] [--niche n] [--location l] [--notes testo]'
    );
    const result = await intakeLead(
        context,
        {
            companyName,
            website: getOptionValue(args, '--website') ?? positional[1] ?? null,
            contactEmail: getOptionValue(args, '--email') ?? null,
            channel: getOptionValue(args, '--channel') ?? null,
            niche: getOptionValue(args, '--niche') ?? null,
            location: getOptionValue(args, '--location') ?? null,
            notes: getOptionValue(args, '--notes') ?? null,
        },
        'cli'
    );
    console.log(JSON.stringify(result, null, 2));
}

/** Con un id arricchisce quel lead, altrimenti tutti quelli aperti senza indirizzo. */
export async function runEnrichCommand(context: PipelineContext, args: string[]): Promise<void> {
    const leadId = getOptionValue(args, '--lead') ?? getPositionalArgs(args)[0];
    if (leadId) {
        console.log(JSON.stringify(await enrichLeadEmail(context, leadId, 'cli'), null, 2));
        return;
    }
    const limitRaw = getOptionValue(args, '--limit');
    const limit = limitRaw ? Math.max(1, parseIntStrict(limitRaw, '--limit')) : undefined;
    console.log(JSON.stringify(await enrichMissingEmails(context, { limit, actor: 'cli' }), null, 2));
}

export async function runProcessCommand(context: PipelineContext, args: string[], signal?: AbortSignal): Promise<void> {
    const limitRaw = getOptionValue(args, '--limit') ?? getPositionalArgs(args)[0];
    const limit = limitRaw ? Math.max(1, parseIntStrict(limitRaw, '--limit')) : undefined;
    const result = await drainQueue(context, { limit, signal });
    console.log(JSON.stringify(result, null, 2));
}

export async function runReplyCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const usage = 'npm start -- reply <leadId> --text "<testo risposta>" [--message <outboundMessageId>]';
    const leadId = requireValue(getOptionValue(args, '--lead') ?? positional[0], usage);
    const rawText = requireValue(getOptionValue(args, '--text') ?? positional[1], usage);
    const outcome = await handleReply(
        context,
        { leadId, rawText, outboundMessageId: getOptionValue(args, '--message') ?? null },
        'cli'
    );
    console.log(JSON.stringify(outcome, null, 2));
}

export async function runEventCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const usage = 'npm start -- event <sent|delivered|opened|replied|bounced|unsubscribed> <email> [--text testo]';
    const event = parseDeliveryEventType(requireValue(getOptionValue(args, '--type') ?? positional[0], usage));
    const address = requireValue(getOptionValue(args, '--email') ?? positional[1], usage);
    const replyText = getOptionValue(args, '--text');
    const providerMessageId = getOptionValue(args, '--provider-message');
    const result = await handleDeliveryEvent(
        context,
        {
            event,
            address,
            ...(replyText !== undefined ? { replyText } : {}),
            ...(providerMessageId !== undefined ? { providerMessageId } : {}),
        },
        'cli'
    );
    console.log(JSON.stringify(result, null, 2));
}

export async function runLaunchCommand(context: PipelineContext, args: string[]): Promise<void> {
    const leadId = requireValue(getPositionalArgs(args)[0], 'npm start -- launch <leadId>');
    const result = await launchSequence(context, leadId);
    console.log(JSON.stringify(result, null, 2));
}

export async function runOutcomeCommand(context: PipelineContext, args: string[]): Promise<void> {
    const positional = getPositionalArgs(args);
    const usage = 'npm start -- outcome <leadId> <not_fit|follow_up|deal_in_progress|closed> [--notes testo]';
    const leadId = requireValue(positional[0], usage);
    const outcome = parseOutcome(requireValue(positional[1], usage));
    const lead = await recordOutcome(context, leadId, outcome, getOptionValue(args, '--notes') ?? null);
    console.log(`Lead ${lead.id}: ${lead.status} (${lead.outcome ?? '-'})`);
}
