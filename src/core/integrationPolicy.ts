/**
 * integrationPolicy.ts — retry, timeout e circuit breaker per le chiamate esterne
 * (provider email, endpoint AI, siti dei lead).
 */

import { AppConfig, config } from '../config';

export type IntegrationSettings = Pick<
    AppConfig,
    | 'retryBaseMs'
    | 'integrationRetryMaxAttempts'
    | 'integrationRetryMaxDelayMs'
    | 'integrationRequestTimeoutMs'
    | 'integrationCircuitBreakerEnabled'
    | 'integrationCircuitFailureThreshold'
    | 'integrationCircuitOpenMs'
>;

export interface RetryPolicyOptions {
    integration: string;
    /** Default: il nome dell'integrazione. Il researcher usa una chiave per host. */
    circuitKey?: string;
    timeoutMs?: number;
    maxAttempts?: number;
    settings?: IntegrationSettings;
}

export class CircuitOpenError extends Error {
    readonly code = 'CIRCUIT_OPEN';

    constructor(readonly circuitKey: string, readonly retryAfterMs: number) {
        super(`Circuito "${circuitKey}" aperto, riprova tra ${retryAfterMs}ms.`);
        this.name = 'CircuitOpenError';
    }
}

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504]);

/** Risposta non 2xx di un'integrazione; `transient` decide se ritentare. */
export class HttpStatusError extends Error {
    readonly transient: boolean;

    constructor(readonly integration: string, readonly status: number, detail: string) {
        super(`${integration}: HTTP ${status}${detail ? ` ${detail}` : ''}`);
        this.name = 'HttpStatusError';
        this.transient = TRANSIENT_STATUSES.has(status);
    }
}

// ─── Circuit breaker ──────────────────────────────────────────────────────────

interface CircuitEntry {
    failures: number;
    openUntilMs: number;
}

class CircuitRegistry {
    private readonly entries = new Map<string, CircuitEntry>();

    /** Millisecondi di apertura residui, null se il circuito è chiuso. */
    remainingOpenMs(key: string, nowMs: number): number | null {
        const entry = this.entries.get(key);
        if (!entry || entry.openUntilMs <= nowMs) return null;
        return entry.openUntilMs - nowMs;
    }

    recordFailure(key: string, settings: IntegrationSettings, nowMs: number): void {
        const entry = this.entries.get(key) ?? { failures: 0, openUntilMs: 0 };
        entry.failures += 1;
        if (entry.failures >= settings.integrationCircuitFailureThreshold) {
            this.entries.set(key, { failures: 0, openUntilMs: nowMs + settings.integrationCircuitOpenMs });
            return;
        }
        this.entries.set(key, entry);
    }

    recordSuccess(key: string): void {
        this.entries.delete(key);
    }

    snapshot(): Array<{ key: string; consecutiveFailures: number; openUntilMs: number }> {
        return [...this.entries.entries()]
            .map(([key, entry]) => ({ key, consecutiveFailures: entry.failures, openUntilMs: entry.openUntilMs }))
            .sort((a, b) => a.key.localeCompare(b.key));
    }

    clear(): void {
        this.entries.clear();
    }
}

const circuits = new CircuitRegistry();

export function getCircuitBreakerSnapshot(): Array<{ key: string; consecutiveFailures: number; openUntilMs: number }> {
    return circuits.snapshot();
}

export function resetCircuitBreakers(): void {
    circuits.clear();
}

// ─── Retry ────────────────────────────────────────────────────────────────────

const TRANSIENT_ERROR_PATTERN = /timeout|timed out|network|fetch failed|socket hang up|econnreset|econnrefused|enotfound|eai_again/i;

function isTransient(error: unknown): boolean {
    if (error instanceof CircuitOpenError) return false;
    if (error instanceof HttpStatusError) return error.transient;
    return TRANSIENT_ERROR_PATTERN.test(error instanceof Error ? error.message : String(error));
}

/** Backoff esponenziale con jitter fino a un quarto del ritardo, limitato a `maxMs`. */
function backoffMs(attempt: number, settings: IntegrationSettings): number {
    const baseMs = Math.max(1, settings.retryBaseMs);
    const maxMs = Math.max(baseMs, settings.integrationRetryMaxDelayMs);
    const delay = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
    return Math.min(maxMs, delay + Math.floor(Math.random() * Math.max(50, delay / 4)));
}

function wait(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Esegue `operation` con retry sugli errori transitori. Ogni fallimento transitorio
 * conta verso l'apertura del circuito; quelli terminali escono subito.
 */
export async function executeWithRetryPolicy<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryPolicyOptions
): Promise<T> {
    const settings = options.settings ?? config;
    const breakerOn = settings.integrationCircuitBreakerEnabled;
    const key = options.circuitKey ?? options.integration;
    const maxAttempts = Math.max(1, options.maxAttempts ?? settings.integrationRetryMaxAttempts);

    let lastError: unknown = new Error(`${options.integration}: nessun tentativo eseguito`);
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const openMs = breakerOn ? circuits.remainingOpenMs(key, Date.now()) : null;
        if (openMs !== null) {
            throw new CircuitOpenError(key, openMs);
        }
        try {
            const result = await operation(attempt);
            if (breakerOn) circuits.recordSuccess(key);
            return result;
        } catch (error) {
            if (!isTransient(error)) {
                throw error;
            }
            lastError = error;
            if (breakerOn) circuits.recordFailure(key, settings, Date.now());
            if (attempt < maxAttempts) {
                await wait(backoffMs(attempt, settings));
            }
        }
    }
    throw lastError;
}

/** Signal che scatta al timeout del tentativo o quando scatta quello del chiamante. */
function attemptSignal(parent: AbortSignal | null | undefined, timeoutMs: number): { signal: AbortSignal; release: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`timeout dopo ${timeoutMs}ms`)), timeoutMs);
    const forward = (): void => controller.abort(parent?.reason);
    if (parent?.aborted) {
        forward();
    } else {
        parent?.addEventListener('abort', forward, { once: true });
    }
    return {
        signal: controller.signal,
        release: () => {
            clearTimeout(timer);
            parent?.removeEventListener('abort', forward);
        },
    };
}

/**
 * fetch con timeout per tentativo: gli status transitori diventano HttpStatusError
 * e vengono ritentati, gli altri non-2xx tornano al chiamante.
 */
export async function fetchWithRetryPolicy(url: string, init: RequestInit, options: RetryPolicyOptions): Promise<Response> {
    const settings = options.settings ?? config;
    const timeoutMs = Math.max(250, options.timeoutMs ?? settings.integrationRequestTimeoutMs);

    return executeWithRetryPolicy(async () => {
        const { signal, release } = attemptSignal(init.signal, timeoutMs);
        try {
            const response = await fetch(url, { ...init, signal });
            if (TRANSIENT_STATUSES.has(response.status)) {
                throw new HttpStatusError(options.integration, response.status, 'transient');
            }
            return response;
        } finally {
            release();
        }
    }, options);
}
