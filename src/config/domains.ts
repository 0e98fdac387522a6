import fs from 'fs';
import os from 'os';
import { z } from 'zod';
import {
    parseBoolEnv,
    parseCsvEnv,
    parseEmailProviderEnv,
    parseFloatEnv,
    parseHoursListEnv,
    parseIntEnv,
    parseStringEnv,
    resolveDataFile,
    resolvePathFromEnv,
} from './env';
import { AppConfig, PipelineConfig } from './types';

const DEFAULT_TOUCH_OFFSETS_HOURS = [0, 24, 96, 168, 720] as const;
const SCHEMA_VERSION = '2026_02_15_001';

const contentPolicySchema = z.object({
    forbiddenPhrases: z.array(z.string().min(1)),
    forbiddenVariableKeys: z.array(z.string().min(1)),
    optOutPhrases: z.array(z.string().min(1)),
});

export type ContentPolicy = z.infer<typeof contentPolicySchema>;

export function loadContentPolicy(filePath?: string): ContentPolicy {
    const resolved = filePath ?? resolveDataFile('content_policy.json');
    const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    const parsed = contentPolicySchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Content policy non valida (${resolved}): ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    return parsed.data;
}

function dedupeCaseInsensitive(values: string[]): string[] {
    const seen = new Set<string>();
    const output: string[] = [];
    for (const value of values) {
        const key = value.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        output.push(value);
    }
    return output;
}

export function buildPipelineDomainConfig(): PipelineConfig {
    const policyPath = parseStringEnv('CONTENT_POLICY_PATH');
    const policy = loadContentPolicy(policyPath ? resolvePathFromEnv('CONTENT_POLICY_PATH', policyPath) : undefined);
    const itemCap = Math.max(1, parseIntEnv('MAX_ITEMS_PER_MESSAGE', 3));

    return {
        forbiddenPhrases: dedupeCaseInsensitive([...policy.forbiddenPhrases, ...parseCsvEnv('FORBIDDEN_PHRASES_EXTRA')]),
        forbiddenVariableKeys: policy.forbiddenVariableKeys,
        optOutPhrases: policy.optOutPhrases,
        maxItemsPerMessage: itemCap,
        defaultItemCap: Math.min(itemCap, Math.max(1, parseIntEnv('DEFAULT_ITEM_CAP', 3))),
        maxPerPrimaryCategory: Math.max(1, parseIntEnv('MAX_ITEMS_PER_CATEGORY', 2)),
        priorityDiscountThreshold: parseFloatEnv('PRIORITY_DISCOUNT_THRESHOLD', 45),
        highDiscountThreshold: parseFloatEnv('HIGH_DISCOUNT_THRESHOLD', 60),
        marketplaceChannel: parseStringEnv('MARKETPLACE_CHANNEL', 'amazon').toLowerCase(),
        multiChannelMarker: parseStringEnv('MULTI_CHANNEL_MARKER', 'multi-channel').toLowerCase(),
        touchOffsetsHours: parseHoursListEnv('FOLLOWUP_TIMING_HOURS', DEFAULT_TOUCH_OFFSETS_HOURS),
        humanApprovalThreshold: Math.max(0, parseIntEnv('HUMAN_APPROVAL_THRESHOLD', 200)),
        researchBudgetMs: Math.max(1000, parseIntEnv('RESEARCH_BUDGET_MS', 25_000)),
        researchMaxPages: Math.max(1, parseIntEnv('RESEARCH_MAX_PAGES', 6)),
        fallbackAngle: parseStringEnv('FALLBACK_ANGLE', 'growth') || 'growth',
        privateLabelDisqualifyRatio: parseFloatEnv('PRIVATE_LABEL_DISQUALIFY_RATIO', 0.95),
        minSkuEstimate: parseIntEnv('MIN_SKU_ESTIMATE', 10),
        minScaleScore: parseIntEnv('MIN_SCALE_SCORE', 20),
        bookingLink: parseStringEnv('BOOKING_LINK', 'https://calendar.example.com/intro-call'),
        meeting: {
            duration: parseStringEnv('MEETING_DURATION', '30 min'),
            days: parseStringEnv('MEETING_DAYS', 'Mon-Thu'),
            hours: parseStringEnv('MEETING_HOURS', '11am-4pm EST'),
            titleTemplate: parseStringEnv('MEETING_TITLE_TEMPLATE', 'Intro x {company_name}'),
        },
        schemaVersion: SCHEMA_VERSION,
    };
}

export function buildRuntimeDomainConfig(): Pick<
    AppConfig,
    'dbPath' | 'databaseUrl' | 'allowSqliteInProduction' | 'runLogPersistenceEnabled' | 'apiPort' | 'apiRateLimitPerMinute'
    | 'webhookSecret' | 'workerId' | 'workerPollIntervalSec' | 'stuckJobMinutes'
> {
    return {
        dbPath: resolvePathFromEnv('DB_PATH', 'data/leads.sqlite'),
        databaseUrl: parseStringEnv('DATABASE_URL'),
        allowSqliteInProduction: parseBoolEnv('ALLOW_SQLITE_IN_PRODUCTION', false),
        runLogPersistenceEnabled: parseBoolEnv('RUN_LOG_PERSISTENCE_ENABLED', true),
        apiPort: parseIntEnv('API_PORT', 8000),
        apiRateLimitPerMinute: Math.max(1, parseIntEnv('API_RATE_LIMIT_PER_MINUTE', 120)),
        webhookSecret: parseStringEnv('WEBHOOK_SECRET'),
        workerId: parseStringEnv('WORKER_ID') || `${os.hostname()}:${process.pid}`,
        workerPollIntervalSec: Math.max(1, parseIntEnv('WORKER_POLL_INTERVAL_SEC', 30)),
        stuckJobMinutes: Math.max(1, parseIntEnv('STUCK_JOB_MINUTES', 30)),
    };
}

export function buildAiDomainConfig(): Pick<
    AppConfig,
    'openaiBaseUrl' | 'openaiApiKey' | 'aiModel' | 'aiRequestTimeoutMs' | 'aiAllowRemoteEndpoint' | 'aiEnabled'
> {
    return {
        openaiBaseUrl: parseStringEnv('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
        openaiApiKey: parseStringEnv('OPENAI_API_KEY'),
        aiModel: parseStringEnv('AI_MODEL', 'gpt-4o-mini'),
        aiRequestTimeoutMs: Math.max(1000, parseIntEnv('AI_REQUEST_TIMEOUT_MS', 30_000)),
        aiAllowRemoteEndpoint: parseBoolEnv('AI_ALLOW_REMOTE_ENDPOINT', true),
        aiEnabled: parseBoolEnv('AI_ENABLED', true),
    };
}

export function buildResearchDomainConfig(): Pick<AppConfig, 'researchUserAgent' | 'artifactsDir'> {
    return {
        researchUserAgent: parseStringEnv('RESEARCH_USER_AGENT', 'Mozilla/5.0 (compatible; LeadResearchBot/1.0)'),
        artifactsDir: resolvePathFromEnv('ARTIFACTS_DIR', 'artifacts'),
    };
}

export function buildDeliveryDomainConfig(): Pick<
    AppConfig,
    'emailProvider' | 'smartleadApiKey' | 'smartleadBaseUrl' | 'instantlyApiKey' | 'instantlyBaseUrl'
    | 'senderName' | 'senderEmail' | 'campaignKey'
> {
    return {
        emailProvider: parseEmailProviderEnv('EMAIL_PROVIDER', 'smartlead'),
        smartleadApiKey: parseStringEnv('SMARTLEAD_API_KEY'),
        smartleadBaseUrl: parseStringEnv('SMARTLEAD_BASE_URL', 'https://server.smartlead.ai/api/v1'),
        instantlyApiKey: parseStringEnv('INSTANTLY_API_KEY'),
        instantlyBaseUrl: parseStringEnv('INSTANTLY_BASE_URL', 'https://api.instantly.ai/api/v1'),
        senderName: parseStringEnv('SENDER_NAME'),
        senderEmail: parseStringEnv('SENDER_EMAIL'),
        campaignKey: parseStringEnv('CAMPAIGN_KEY', 'lead-engine-outbound'),
    };
}

export function buildIntegrationDomainConfig(): Pick<
    AppConfig,
    'retryBaseMs' | 'integrationRetryMaxAttempts' | 'integrationRetryMaxDelayMs' | 'integrationRequestTimeoutMs'
    | 'integrationCircuitBreakerEnabled' | 'integrationCircuitFailureThreshold' | 'integrationCircuitOpenMs'
> {
    return {
        retryBaseMs: parseIntEnv('RETRY_BASE_MS', 500),
        integrationRetryMaxAttempts: parseIntEnv('INTEGRATION_RETRY_MAX_ATTEMPTS', 3),
        integrationRetryMaxDelayMs: parseIntEnv('INTEGRATION_RETRY_MAX_DELAY_MS', 8_000),
        integrationRequestTimeoutMs: parseIntEnv('INTEGRATION_REQUEST_TIMEOUT_MS', 15_000),
        integrationCircuitBreakerEnabled: parseBoolEnv('INTEGRATION_CIRCUIT_BREAKER_ENABLED', true),
        integrationCircuitFailureThreshold: parseIntEnv('INTEGRATION_CIRCUIT_FAILURE_THRESHOLD', 5),
        integrationCircuitOpenMs: parseIntEnv('INTEGRATION_CIRCUIT_OPEN_MS', 60_000),
    };
}
