import express from 'express';
import cors from 'cors';
import http from 'http';
import { timingSafeEqual } from 'crypto';
import rateLimit from 'express-rate-limit';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { PipelineContext } from '../core/context';
import { handleDeliveryEvent, launchSequence } from '../core/deliveryService';
import { enrichLeadEmail } from '../core/enrichment';
import { DraftStateError, InvalidTransitionError, LeadNotFoundError, ReplyNotFoundError } from '../core/errors';
import { getCircuitBreakerSnapshot } from '../core/integrationPolicy';
import { drainQueue } from '../core/jobRunner';
import { intakeLead, recordOutcome } from '../core/orchestrator';
import { handleReply, reviewDraft, sendApprovedResponse } from '../core/replyService';
import { getLeadAuditTrail } from '../core/audit';
import {
    getLeadById,
    getLeverageAssignment,
    getPipelineStats,
    getQualification,
    getSignalSet,
    listMessagesForLead,
    listPendingApprovals,
    listRepliesForLead,
} from '../core/repositories';
import { DeliveryEvent } from '../types/collaborators';
import { logError, logInfo } from '../telemetry/logger';
import { getLiveEventSubscribersCount, subscribeLiveEvents, type LiveEventMessage } from '../telemetry/liveEvents';
import { resolveCorrelationId, runWithCorrelationId } from '../telemetry/correlation';

export interface ApiOptions {
    webhookSecret: string;
    rateLimitPerMinute: number;
}

// ── Schemi body ──────────────────────────────────────────────────────────────
const optionalText = z.string().trim().max(500).nullable().optional();

const intakeSchema = z.object({
    companyName: z.string().trim().min(1).max(200),
    website: optionalText,
    contactEmail: z.string().trim().email().nullable().optional(),
    channel: optionalText,
    niche: optionalText,
    location: optionalText,
    notes: z.string().max(5000).nullable().optional(),
});

const processSchema = z.object({ limit: z.coerce.number().int().min(1).max(500).optional() });

const replySchema = z.object({
    leadId: z.string().trim().min(1),
    text: z.string().min(1).max(20_000),
    outboundMessageId: z.string().trim().min(1).nullable().optional(),
});

const reviewSchema = z.object({ decision: z.enum(['approve', 'reject']) });

const outcomeSchema = z.object({
    outcome: z.enum(['not_fit', 'follow_up', 'deal_in_progress', 'closed']),
    notes: z.string().max(5000).nullable().optional(),
});

// ── Helper ───────────────────────────────────────────────────────────────────
function secureEquals(a: string, b: string): boolean {
    const aBuffer = Buffer.from(a);
    const bBuffer = Buffer.from(b);
    if (aBuffer.length !== bBuffer.length) return false;
    return timingSafeEqual(aBuffer, bBuffer);
}

function writeSseEvent(res: Response, eventType: string, data: unknown): void {
    res.write(`event: ${eventType}\n`);
    res.write(`data: ${JSON.stringify(data)}\n\n`);
}

/** Errori di dominio → status HTTP; tutto il resto è un 500 senza dettagli interni. */
function handleApiError(res: Response, err: unknown, context: string): void {
    if (err instanceof z.ZodError) {
        res.status(400).json({ error: 'Richiesta non valida.', issues: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) });
        return;
    }
    if (err instanceof LeadNotFoundError || err instanceof ReplyNotFoundError) {
        res.status(404).json({ error: err.message, code: err.code });
        return;
    }
    if (err instanceof InvalidTransitionError || err instanceof DraftStateError) {
        res.status(409).json({ error: err.message, code: err.code });
        return;
    }
    const message = err instanceof Error ? err.message : String(err);
    void logError(context, { error: message });
    res.status(500).json({ error: 'Errore interno del server.' });
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(context: string, handler: AsyncHandler): (req: Request, res: Response) => void {
    return (req, res) => {
        handler(req, res).catch((err: unknown) => handleApiError(res, err, context));
    };
}

export function buildApp(pipeline: PipelineContext, options: ApiOptions): express.Express {
    const app = express();
    app.set('trust proxy', false);

    // ── CORS ristretto ──────────────────────────────────────────────────────
    app.use(cors({
        origin: (origin, callback) => {
            if (!origin) return callback(null, true);
            return callback(null, /^http:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin));
        },
        methods: ['GET', 'POST'],
        allowedHeaders: ['Content-Type', 'x-correlation-id', 'x-webhook-secret'],
        credentials: false,
    }));

    app.use(express.json({ limit: '256kb' }));

    app.use((req, res, next) => {
        const incomingCorrelation = req.header('x-correlation-id') ?? req.header('x-request-id');
        const correlationId = resolveCorrelationId(incomingCorrelation);
        res.setHeader('x-correlation-id', correlationId);
        runWithCorrelationId(correlationId, () => {
            res.locals.correlationId = correlationId;
            next();
        });
    });

    // ── Rate Limiting ────────────────────────────────────────────────────────
    app.use('/api/', rateLimit({
        windowMs: 60_000,
        max: Math.max(1, options.rateLimitPerMinute),
        standardHeaders: true,
        legacyHeaders: false,
        skip: (req) => (req.originalUrl ?? '').startsWith('/api/events'),
        message: { error: 'Troppe richieste. Attendi prima di riprovare.' },
    }));

    app.use((_req, res, next) => {
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
        next();
    });

    const requireWebhookSecret = (req: Request, res: Response, next: NextFunction): void => {
        if (!options.webhookSecret) {
            next();
            return;
        }
        const provided = req.header('x-webhook-secret') ?? '';
        if (!secureEquals(provided, options.webhookSecret)) {
            res.status(401).json({ error: 'Webhook non autorizzato.' });
            return;
        }
        next();
    };

    // ── Health ───────────────────────────────────────────────────────────────
    app.get('/api/health', (_req, res) => {
        res.json({
            status: 'ok',
            dialect: pipeline.db.dialect,
            provider: pipeline.delivery.name,
            circuitBreakers: getCircuitBreakerSnapshot(),
            liveSubscribers: getLiveEventSubscribersCount(),
        });
    });

    // ── Live events (SSE) ────────────────────────────────────────────────────
    app.get('/api/events', (_req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders?.();

        const unsubscribe = subscribeLiveEvents((event: LiveEventMessage) => {
            writeSseEvent(res, event.type, event);
        });
        writeSseEvent(res, 'connected', { timestamp: new Date().toISOString(), subscribers: getLiveEventSubscribersCount() });

        const heartbeat = setInterval(() => {
            writeSseEvent(res, 'heartbeat', { timestamp: new Date().toISOString() });
        }, 20_000);

        res.on('close', () => {
            clearInterval(heartbeat);
            unsubscribe();
        });
    });

    // ── Lead ─────────────────────────────────────────────────────────────────
    app.post('/api/leads', route('api.leads.intake', async (req, res) => {
        const body = intakeSchema.parse(req.body);
        const result = await intakeLead(pipeline, body, 'api');
        res.status(result.status === 'created' ? 201 : 200).json(result);
    }));

    app.get('/api/leads/:id', route('api.leads.detail', async (req, res) => {
        const leadId = req.params.id ?? '';
        const lead = await getLeadById(pipeline.db, leadId);
        if (!lead) {
            throw new LeadNotFoundError(leadId);
        }
        const [signals, qualification, leverage, messages, replies] = await Promise.all([
            getSignalSet(pipeline.db, leadId),
            getQualification(pipeline.db, leadId),
            getLeverageAssignment(pipeline.db, leadId),
            listMessagesForLead(pipeline.db, leadId),
            listRepliesForLead(pipeline.db, leadId),
        ]);
        res.json({ lead, signals: signals ?? null, qualification: qualification ?? null, leverage: leverage ?? null, messages, replies });
    }));

    app.get('/api/leads/:id/audit', route('api.leads.audit', async (req, res) => {
        const leadId = req.params.id ?? '';
        if (!(await getLeadById(pipeline.db, leadId))) {
            throw new LeadNotFoundError(leadId);
        }
        res.json(await getLeadAuditTrail(pipeline.db, leadId));
    }));

    app.post('/api/leads/:id/enrich', route('api.leads.enrich', async (req, res) => {
        res.json(await enrichLeadEmail(pipeline, req.params.id ?? '', 'api'));
    }));

    app.post('/api/leads/:id/launch', route('api.leads.launch', async (req, res) => {
        res.json(await launchSequence(pipeline, req.params.id ?? ''));
    }));

    app.post('/api/leads/:id/outcome', route('api.leads.outcome', async (req, res) => {
        const body = outcomeSchema.parse(req.body);
        const lead = await recordOutcome(pipeline, req.params.id ?? '', body.outcome, body.notes ?? null);
        res.json({ leadId: lead.id, status: lead.status, outcome: lead.outcome });
    }));

    // ── Coda ─────────────────────────────────────────────────────────────────
    app.post('/api/process', route('api.process', async (req, res) => {
        const body = processSchema.parse(req.body ?? {});
        const result = await drainQueue(pipeline, { limit: body.limit });
        res.json(result);
    }));

    // ── Risposte e bozze ─────────────────────────────────────────────────────
    app.post('/api/replies', route('api.replies.create', async (req, res) => {
        const body = replySchema.parse(req.body);
        const outcome = await handleReply(
            pipeline,
            { leadId: body.leadId, rawText: body.text, outboundMessageId: body.outboundMessageId ?? null },
            'api'
        );
        res.status(201).json(outcome);
    }));

    app.get('/api/approvals', route('api.approvals', async (_req, res) => {
        res.json(await listPendingApprovals(pipeline.db));
    }));

    app.post('/api/replies/:id/review', route('api.replies.review', async (req, res) => {
        const body = reviewSchema.parse(req.body);
        const reply = await reviewDraft(pipeline, req.params.id ?? '', body.decision);
        res.json({ replyId: reply.id, approval: reply.approval });
    }));

    app.post('/api/replies/:id/send', route('api.replies.send', async (req, res) => {
        res.json(await sendApprovedResponse(pipeline, req.params.id ?? '', 'operator'));
    }));

    // ── Webhook provider ─────────────────────────────────────────────────────
    app.post('/api/webhooks/:provider', requireWebhookSecret, route('api.webhooks', async (req, res) => {
        const provider = req.params.provider ?? '';
        if (provider !== pipeline.delivery.name) {
            res.status(404).json({ error: `Provider ${provider} non configurato.` });
            return;
        }
        let event: DeliveryEvent;
        try {
            event = pipeline.delivery.parseWebhook(req.body);
        } catch (err) {
            res.status(400).json({ error: err instanceof Error ? err.message : String(err) });
            return;
        }
        const result = await handleDeliveryEvent(pipeline, event, 'webhook');
        res.json(result);
    }));

    // ── Statistiche ──────────────────────────────────────────────────────────
    app.get('/api/stats', route('api.stats', async (_req, res) => {
        res.json(await getPipelineStats(pipeline.db));
    }));

    // ── 404 catch-all ────────────────────────────────────────────────────────
    app.use('/api/', (_req, res) => {
        res.status(404).json({ error: 'Endpoint non trovato.' });
    });

    return app;
}

/** Avvia il server; con port 0 il sistema assegna una porta libera (usato nei test). */
export function startServer(pipeline: PipelineContext, options: ApiOptions, port: number): Promise<http.Server> {
    const app = buildApp(pipeline, options);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, '127.0.0.1', () => {
            const address = server.address();
            const effectivePort = typeof address === 'object' && address ? address.port : port;
            void logInfo('api.server.started', { port: effectivePort });
            resolve(server);
        });
        server.once('error', reject);
    });
}
