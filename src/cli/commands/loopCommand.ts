/**
 * loopCommand.ts — Comandi run-loop e serve
 *
 * Il loop drena la coda a intervalli fissi finché non arriva un segnale di
 * arresto; il job in corso completa lo stage corrente prima dell'uscita.
 */

import { startServer } from '../../api/server';
import { config } from '../../config';
import { PipelineContext } from '../../core/context';
import { drainQueue, recoverStaleJobs } from '../../core/jobRunner';
import { logError, logInfo } from '../../telemetry/logger';
import { getOptionValue, hasOption, parseIntStrict } from '../cliParser';

// ─── Helper ───────────────────────────────────────────────────────────────────

/** Attesa interrompibile: si risolve subito quando il segnale viene abortito. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

// ─── Command handlers ─────────────────────────────────────────────────────────

export async function runLoopCommand(context: PipelineContext, args: string[], signal: AbortSignal): Promise<void> {
    const intervalRaw = getOptionValue(args, '--interval-sec');
    const intervalSec = intervalRaw ? Math.max(1, parseIntStrict(intervalRaw, '--interval-sec')) : config.workerPollIntervalSec;
    const maxCyclesRaw = getOptionValue(args, '--cycles');
    const maxCycles = maxCyclesRaw ? Math.max(1, parseIntStrict(maxCyclesRaw, '--cycles')) : null;
    const once = hasOption(args, '--once');

    await logInfo('loop.started', { workerId: context.workerId, intervalSec, maxCycles, once });
    let cycle = 0;
    while (!signal.aborted) {
        cycle++;
        try {
            const recovered = await recoverStaleJobs(context, config.stuckJobMinutes);
            const result = await drainQueue(context, { signal });
            await logInfo('loop.cycle', { cycle, recovered, processed: result.processedCount, errors: result.errors.length });
        } catch (error) {
            // un ciclo fallito non ferma il loop
            await logError('loop.cycle_failed', { cycle, error: error instanceof Error ? error.message : String(error) });
        }
        if (once || (maxCycles !== null && cycle >= maxCycles)) {
            break;
        }
        await sleep(intervalSec * 1000, signal);
    }
    await logInfo('loop.stopped', { cycles: cycle, aborted: signal.aborted });
}

export async function runServeCommand(context: PipelineContext, args: string[], signal: AbortSignal): Promise<void> {
    const portRaw = getOptionValue(args, '--port');
    const port = portRaw ? parseIntStrict(portRaw, '--port') : config.apiPort;
    const server = await startServer(
        context,
        { webhookSecret: config.webhookSecret, rateLimitPerMinute: config.apiRateLimitPerMinute },
        port
    );
    console.log(`API in ascolto su http://127.0.0.1:${port}`);

    await new Promise<void>((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        signal.addEventListener('abort', () => resolve(), { once: true });
    });
    await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
    await logInfo('api.server.stopped', { port });
}
