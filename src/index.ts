#!/usr/bin/env node
import { config, validateCriticalConfig } from './config';
import { closeDatabase, initDatabase } from './db';
import { buildDefaultContext } from './runtime';
import { recoverStaleJobs } from './core/jobRunner';
import { attachRunLogSink, detachRunLogSink } from './telemetry/logger';
import { resolveCorrelationId, runWithCorrelationId } from './telemetry/correlation';
import {
    runApprovalsCommand,
    runApproveCommand,
    runAuditCommand,
    runInitCommand,
    runSeedCommand,
    runSendResponseCommand,
    runStatsCommand,
    runSuppressCommand,
} from './cli/commands/adminCommands';
import {
    runEnrichCommand,
    runEventCommand,
    runIntakeCommand,
    runLaunchCommand,
    runOutcomeCommand,
    runProcessCommand,
    runReplyCommand,
} from './cli/commands/leadCommands';
import { runLoopCommand, runServeCommand } from './cli/commands/loopCommand';

// Graceful shutdown: il primo segnale ferma i claim, il secondo forza l'uscita.
const shutdown = new AbortController();
function setupGracefulShutdown(): void {
    const handler = (signal: string): void => {
        if (shutdown.signal.aborted) {
            console.warn(`[SIGNAL] ${signal} ricevuto di nuovo, uscita forzata.`);
            process.exit(1);
        }
        console.warn(`[SIGNAL] ${signal} ricevuto, chiusura dopo lo stage in corso...`);
        shutdown.abort();
    };
    process.on('SIGINT', () => handler('SIGINT'));
    process.on('SIGTERM', () => handler('SIGTERM'));
}

function printHelp(): void {
    console.log(`Uso: npm start -- <comando> [opzioni]

  init                               migrazioni + dati di riferimento
  seed                               popola regole, catalogo e template (solo tabelle vuote)
  intake --company <nome> [--website url] [--email addr] [--channel c] [--niche n]
  enrich [leadId] [--limit n]        cerca l'email dei lead che non ce l'hanno
  process [--limit n]                drena la coda dei job di ricerca
  run-loop [--interval-sec n] [--cycles n] [--once]
  reply <leadId> --text "<testo>"    gestisce una risposta in arrivo
  event <tipo> <email> [--text t]    evento di consegna normalizzato
  launch <leadId>                    invia la sequenza al provider
  outcome <leadId> <esito> [--notes t]
  approvals                          bozze in attesa di revisione
  approve <replyId> [--decision approve|reject] [--send]
  send-response <replyId>
  suppress <email> | --domain <dominio> | --list
  stats                              statistiche della pipeline
  audit [leadId] [--correlation id] [--logs] [--limit n]
  serve [--port n]                   API HTTP`);
}

const RECOVERING_COMMANDS = new Set(['process', 'run-loop', 'serve']);

async function main(): Promise<void> {
    setupGracefulShutdown();
    const args = process.argv.slice(2);
    const command = args[0];
    const commandArgs = args.slice(1);

    if (!command || command === 'help' || command === '--help') {
        printHelp();
        return;
    }

    const problems = validateCriticalConfig();
    for (const problem of problems) {
        console.warn(`[CONFIG] ${problem}`);
    }

    const db = await initDatabase();
    if (config.runLogPersistenceEnabled) {
        attachRunLogSink(db);
    }
    const context = buildDefaultContext(db);

    if (RECOVERING_COMMANDS.has(command)) {
        const recovered = await recoverStaleJobs(context, config.stuckJobMinutes);
        if (recovered > 0) {
            console.warn(`[BOOT] Ripristinati ${recovered} job running bloccati da oltre ${config.stuckJobMinutes} minuti.`);
        }
    }

    await runWithCorrelationId(resolveCorrelationId(null), async () => {
        switch (command) {
            case 'init':
                await runInitCommand(context);
                break;
            case 'seed':
                await runSeedCommand(context);
                break;
            case 'intake':
                await runIntakeCommand(context, commandArgs);
                break;
            case 'enrich':
                await runEnrichCommand(context, commandArgs);
                break;
            case 'process':
                await runProcessCommand(context, commandArgs, shutdown.signal);
                break;
            case 'run-loop':
                await runLoopCommand(context, commandArgs, shutdown.signal);
                break;
            case 'reply':
                await runReplyCommand(context, commandArgs);
                break;
            case 'event':
                await runEventCommand(context, commandArgs);
                break;
            case 'launch':
                await runLaunchCommand(context, commandArgs);
                break;
            case 'outcome':
                await runOutcomeCommand(context, commandArgs);
                break;
            case 'approvals':
                await runApprovalsCommand(context, commandArgs);
                break;
            case 'approve':
                await runApproveCommand(context, commandArgs);
                break;
            case 'send-response':
                await runSendResponseCommand(context, commandArgs);
                break;
            case 'suppress':
                await runSuppressCommand(context, commandArgs);
                break;
            case 'stats':
                await runStatsCommand(context);
                break;
            case 'audit':
                await runAuditCommand(context, commandArgs);
                break;
            case 'serve':
                await runServeCommand(context, commandArgs, shutdown.signal);
                break;
            default:
                printHelp();
                process.exitCode = 1;
                break;
        }
    });
}

main()
    .catch((error: unknown) => {
        console.error('[FATAL]', error);
        process.exitCode = 1;
    })
    .finally(async () => {
        detachRunLogSink();
        await closeDatabase();
    });
