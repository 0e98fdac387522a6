export type EmailProviderName = 'smartlead' | 'instantly' | 'none';

export interface MeetingDetails {
    duration: string;
    days: string;
    hours: string;
    titleTemplate: string;
}

/**
 * Parametri del motore decisionale. Caricati una sola volta, congelati
 * e passati esplicitamente a linter, rule engine e matcher.
 */
export interface PipelineConfig {
    forbiddenPhrases: readonly string[];
    forbiddenVariableKeys: readonly string[];
    optOutPhrases: readonly string[];
    maxItemsPerMessage: number;
    defaultItemCap: number;
    maxPerPrimaryCategory: number;
    priorityDiscountThreshold: number;
    highDiscountThreshold: number;
    marketplaceChannel: string;
    multiChannelMarker: string;
    touchOffsetsHours: readonly number[];
    humanApprovalThreshold: number;
    researchBudgetMs: number;
    researchMaxPages: number;
    fallbackAngle: string;
    privateLabelDisqualifyRatio: number;
    minSkuEstimate: number;
    minScaleScore: number;
    bookingLink: string;
    meeting: Readonly<MeetingDetails>;
    schemaVersion: string;
}

export interface AppConfig {
    dbPath: string;
    databaseUrl: string;
    allowSqliteInProduction: boolean;
    runLogPersistenceEnabled: boolean;

    apiPort: number;
    apiRateLimitPerMinute: number;
    webhookSecret: string;

    workerId: string;
    workerPollIntervalSec: number;
    stuckJobMinutes: number;

    openaiBaseUrl: string;
    openaiApiKey: string;
    aiModel: string;
    aiRequestTimeoutMs: number;
    aiAllowRemoteEndpoint: boolean;
    aiEnabled: boolean;

    researchUserAgent: string;
    artifactsDir: string;

    emailProvider: EmailProviderName;
    smartleadApiKey: string;
    smartleadBaseUrl: string;
    instantlyApiKey: string;
    instantlyBaseUrl: string;
    senderName: string;
    senderEmail: string;
    campaignKey: string;

    retryBaseMs: number;
    integrationRetryMaxAttempts: number;
    integrationRetryMaxDelayMs: number;
    integrationRequestTimeoutMs: number;
    integrationCircuitBreakerEnabled: boolean;
    integrationCircuitFailureThreshold: number;
    integrationCircuitOpenMs: number;

    pipeline: PipelineConfig;
}
