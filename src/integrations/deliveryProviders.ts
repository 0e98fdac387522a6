/**
 * deliveryProviders.ts — adapter verso i provider di invio (SmartLead, Instantly).
 *
 * Il motore non invia email in proprio: campagna, lead, sequenza, risposte e pausa
 * passano da qui. I webhook vengono normalizzati in DeliveryEvent.
 */

import { z } from 'zod';
import { AppConfig, config } from '../config';
import { fetchWithRetryPolicy, HttpStatusError } from '../core/integrationPolicy';
import { logInfo } from '../telemetry/logger';
import { DeliveryEvent, DeliveryEventType, DeliveryProvider, SequenceStep } from '../types/collaborators';

export type DeliverySettings = Pick<
    AppConfig,
    'emailProvider' | 'smartleadApiKey' | 'smartleadBaseUrl' | 'instantlyApiKey' | 'instantlyBaseUrl'
>;

/** Trasporto HTTP iniettabile: in produzione fetch con retry/circuit breaker. */
export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

function retryingTransport(integration: string): HttpTransport {
    return (url, init) => fetchWithRetryPolicy(url, init, { integration });
}

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const campaignSchema = z.object({ id: idSchema, name: z.string().optional() }).passthrough();
const campaignListSchema = z.union([
    z.array(campaignSchema),
    z.object({ data: z.array(campaignSchema) }).transform((value) => value.data),
]);
const createdSchema = z
    .object({ id: idSchema.optional(), campaign_id: idSchema.optional() })
    .passthrough()
    .transform((value) => value.id ?? value.campaign_id ?? null);
const messageIdSchema = z
    .object({ message_id: idSchema.optional(), id: idSchema.optional() })
    .passthrough()
    .transform((value) => value.message_id ?? value.id ?? null);

const webhookPayloadSchema = z
    .object({
        event_type: z.string().optional(),
        event: z.string().optional(),
        lead_email: z.string().optional(),
        email: z.string().optional(),
        reply_text: z.string().optional(),
        reply_body: z.string().optional(),
        message_id: idSchema.optional(),
        campaign_id: idSchema.optional(),
    })
    .passthrough();

type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

function parseWebhookPayload(payload: unknown): WebhookPayload {
    const parsed = webhookPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        throw new Error('Payload webhook non valido: atteso un oggetto JSON.');
    }
    return parsed.data;
}

function normalizedEvent(
    event: DeliveryEventType,
    payload: WebhookPayload,
    rawType: string,
    replyText: string | undefined
): DeliveryEvent {
    const address = (payload.lead_email ?? payload.email ?? '').trim();
    return {
        event,
        address: address || null,
        ...(event === 'replied' ? { replyText: replyText ?? '' } : {}),
        ...(payload.message_id !== undefined ? { providerMessageId: payload.message_id } : {}),
        ...(payload.campaign_id !== undefined ? { providerCampaignId: payload.campaign_id } : {}),
        rawType,
    };
}

abstract class HttpDeliveryProvider implements DeliveryProvider {
    abstract readonly name: string;

    protected constructor(
        protected readonly baseUrl: string,
        protected readonly transport: HttpTransport
    ) {}

    protected abstract decorate(url: URL, headers: Record<string, string>): void;

    protected async request(method: 'GET' | 'POST', pathname: string, body?: unknown): Promise<unknown> {
        const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}${pathname}`);
        const headers: Record<string, string> = { accept: 'application/json' };
        if (body !== undefined) {
            headers['content-type'] = 'application/json';
        }
        this.decorate(url, headers);
        const response = await this.transport(url.toString(), {
            method,
            headers,
            ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        });
        if (!response.ok) {
            const detail = (await response.text().catch(() => '')).slice(0, 300);
            throw new HttpStatusError(this.name, response.status, detail);
        }
        const text = await response.text();
        if (!text) return {};
        try {
            return JSON.parse(text);
        } catch {
            throw new Error(`${this.name}: risposta non JSON su ${pathname}`);
        }
    }

    protected async findCampaign(pathname: string, campaignKey: string): Promise<string | null> {
        const campaigns = campaignListSchema.safeParse(await this.request('GET', pathname));
        if (!campaigns.success) return null;
        return campaigns.data.find((campaign) => campaign.name === campaignKey)?.id ?? null;
    }

    abstract ensureCampaign(campaignKey: string, senderEmail: string, senderName: string): Promise<string>;
    abstract pushLead(campaignId: string, address: string, leadId: string, sequenceId: string, customVars: Record<string, string>): Promise<string>;
    abstract startSequence(campaignId: string, providerLeadId: string, steps: SequenceStep[]): Promise<void>;
    abstract sendReply(campaignId: string, providerLeadId: string, subject: string, body: string): Promise<string | null>;
    abstract pauseSequence(campaignId: string, providerLeadId: string): Promise<void>;
    abstract parseWebhook(payload: unknown): DeliveryEvent;
}

// ─── SmartLead ────────────────────────────────────────────────────────────────

const SMARTLEAD_EVENTS: Readonly<Record<string, DeliveryEventType>> = {
    EMAIL_SENT: 'sent',
    EMAIL_OPENED: 'opened',
    EMAIL_DELIVERED: 'delivered',
    EMAIL_REPLIED: 'replied',
    EMAIL_BOUNCED: 'bounced',
    EMAIL_UNSUBSCRIBED: 'unsubscribed',
};

export class SmartleadProvider extends HttpDeliveryProvider {
    readonly name = 'smartlead';

    constructor(
        private readonly apiKey: string,
        baseUrl: string,
        transport: HttpTransport = retryingTransport('smartlead')
    ) {
        super(baseUrl, transport);
    }

    protected decorate(url: URL): void {
        url.searchParams.set('api_key', this.apiKey);
    }

    async ensureCampaign(campaignKey: string, senderEmail: string, senderName: string): Promise<string> {
        const existing = await this.findCampaign('/campaigns', campaignKey);
        if (existing) return existing;

        const created = createdSchema.safeParse(await this.request('POST', '/campaigns/create', { name: campaignKey }));
        const campaignId = created.success ? created.data : null;
        if (!campaignId) {
            throw new Error(`smartlead: creazione campagna ${campaignKey} fallita.`);
        }
        await this.request('POST', `/campaigns/${campaignId}/settings`, { from_email: senderEmail, from_name: senderName });
        await logInfo('delivery.smartlead.campaign_created', { campaignKey, campaignId });
        return campaignId;
    }

    async pushLead(campaignId: string, address: string, leadId: string, sequenceId: string, customVars: Record<string, string>): Promise<string> {
        await this.request('POST', `/campaigns/${campaignId}/leads`, {
            lead_list: [{ email: address, custom_fields: { lead_id: leadId, sequence_id: sequenceId, ...customVars } }],
        });
        return `sl-${leadId}`;
    }

    async startSequence(campaignId: string, _providerLeadId: string, steps: SequenceStep[]): Promise<void> {
        for (const [index, step] of steps.entries()) {
            await this.request('POST', `/campaigns/${campaignId}/sequences`, {
                seq_number: index + 1,
                subject: step.subject,
                email_body: step.body,
                seq_delay_details: { delay_in_days: step.delayDays },
            });
        }
        await this.request('POST', `/campaigns/${campaignId}/status`, { status: 'START' });
    }

    async sendReply(campaignId: string, providerLeadId: string, subject: string, body: string): Promise<string | null> {
        const result = messageIdSchema.safeParse(
            await this.request('POST', `/campaigns/${campaignId}/reply`, { lead_id: providerLeadId, subject, body })
        );
        return result.success ? result.data : null;
    }

    async pauseSequence(campaignId: string, providerLeadId: string): Promise<void> {
        await this.request('POST', `/campaigns/${campaignId}/leads/status`, { lead_id: providerLeadId, status: 'PAUSED' });
    }

    parseWebhook(payload: unknown): DeliveryEvent {
        const parsed = parseWebhookPayload(payload);
        const rawType = parsed.event_type ?? '';
        return normalizedEvent(SMARTLEAD_EVENTS[rawType] ?? 'unknown', parsed, rawType, parsed.reply_text);
    }
}

// ─── Instantly ────────────────────────────────────────────────────────────────

const INSTANTLY_EVENTS: Readonly<Record<string, DeliveryEventType>> = {
    email_sent: 'sent',
    email_opened: 'opened',
    email_delivered: 'delivered',
    reply_received: 'replied',
    email_bounced: 'bounced',
    lead_unsubscribed: 'unsubscribed',
};

export class InstantlyProvider extends HttpDeliveryProvider {
    readonly name = 'instantly';

    constructor(
        private readonly apiKey: string,
        baseUrl: string,
        transport: HttpTransport = retryingTransport('instantly')
    ) {
        super(baseUrl, transport);
    }

    protected decorate(_url: URL, headers: Record<string, string>): void {
        headers.authorization = `Bearer ${this.apiKey}`;
    }

    async ensureCampaign(campaignKey: string, senderEmail: string, senderName: string): Promise<string> {
        const existing = await this.findCampaign('/campaign/list', campaignKey);
        if (existing) return existing;

        const created = createdSchema.safeParse(
            await this.request('POST', '/campaign/create', { name: campaignKey, from_email: senderEmail, from_name: senderName })
        );
        const campaignId = created.success ? created.data : null;
        if (!campaignId) {
            throw new Error(`instantly: creazione campagna ${campaignKey} fallita.`);
        }
        await logInfo('delivery.instantly.campaign_created', { campaignKey, campaignId });
        return campaignId;
    }

    async pushLead(campaignId: string, address: string, leadId: string, sequenceId: string, customVars: Record<string, string>): Promise<string> {
        await this.request('POST', '/lead/add', {
            campaign_id: campaignId,
            email: address,
            custom_variables: { lead_id: leadId, sequence_id: sequenceId, ...customVars },
        });
        return `inst-${leadId}`;
    }

    async startSequence(campaignId: string, _providerLeadId: string, steps: SequenceStep[]): Promise<void> {
        for (const [index, step] of steps.entries()) {
            await this.request('POST', `/campaign/${campaignId}/sequence/add`, {
                step: index + 1,
                subject: step.subject,
                body: step.body,
                delay: step.delayDays,
            });
        }
        await this.request('POST', `/campaign/${campaignId}/launch`, {});
    }

    async sendReply(campaignId: string, providerLeadId: string, subject: string, body: string): Promise<string | null> {
        const result = messageIdSchema.safeParse(
            await this.request('POST', '/unibox/reply', { campaign_id: campaignId, lead_id: providerLeadId, subject, body })
        );
        return result.success ? result.data : null;
    }

    async pauseSequence(campaignId: string, providerLeadId: string): Promise<void> {
        await this.request('POST', '/lead/update', { campaign_id: campaignId, lead_id: providerLeadId, status: 'paused' });
    }

    parseWebhook(payload: unknown): DeliveryEvent {
        const parsed = parseWebhookPayload(payload);
        const rawType = parsed.event ?? '';
        return normalizedEvent(INSTANTLY_EVENTS[rawType] ?? 'unknown', parsed, rawType, parsed.reply_body);
    }
}

// ─── Nessun provider ──────────────────────────────────────────────────────────

const GENERIC_EVENTS: ReadonlySet<string> = new Set(['sent', 'opened', 'delivered', 'replied', 'bounced', 'unsubscribed']);

function isDeliveryEventType(value: string): value is DeliveryEventType {
    return GENERIC_EVENTS.has(value);
}

/**
 * Provider non configurato: le chiamate non escono dal processo e restituiscono
 * id sintetici. I webhook accettano la forma già normalizzata.
 */
export class NoopDeliveryProvider implements DeliveryProvider {
    readonly name = 'none';

    async ensureCampaign(campaignKey: string): Promise<string> {
        return `noop-${campaignKey}`;
    }

    async pushLead(_campaignId: string, _address: string, leadId: string): Promise<string> {
        return `noop-${leadId}`;
    }

    async startSequence(campaignId: string, providerLeadId: string, steps: SequenceStep[]): Promise<void> {
        await logInfo('delivery.noop.sequence', { campaignId, providerLeadId, steps: steps.length });
    }

    async sendReply(campaignId: string, providerLeadId: string): Promise<string | null> {
        await logInfo('delivery.noop.reply', { campaignId, providerLeadId });
        return null;
    }

    async pauseSequence(campaignId: string, providerLeadId: string): Promise<void> {
        await logInfo('delivery.noop.pause', { campaignId, providerLeadId });
    }

    parseWebhook(payload: unknown): DeliveryEvent {
        const parsed = parseWebhookPayload(payload);
        const rawType = (parsed.event ?? parsed.event_type ?? '').toLowerCase();
        return normalizedEvent(isDeliveryEventType(rawType) ? rawType : 'unknown', parsed, rawType, parsed.reply_text ?? parsed.reply_body);
    }
}

/** Provider scelto una volta da EMAIL_PROVIDER; senza chiave si ripiega sul Noop. */
export function createDeliveryProvider(settings: DeliverySettings = config): DeliveryProvider {
    if (settings.emailProvider === 'smartlead' && settings.smartleadApiKey) {
        return new SmartleadProvider(settings.smartleadApiKey, settings.smartleadBaseUrl);
    }
    if (settings.emailProvider === 'instantly' && settings.instantlyApiKey) {
        return new InstantlyProvider(settings.instantlyApiKey, settings.instantlyBaseUrl);
    }
    return new NoopDeliveryProvider();
}
