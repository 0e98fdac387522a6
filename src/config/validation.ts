import { AppConfig } from './types';
import { isAiRequestConfigured } from './env';

interface ConfigValidationRule {
    message: string;
    when: (cfg: AppConfig, nodeEnv: string) => boolean;
}

function isStrictlyAscending(values: readonly number[]): boolean {
    for (let index = 1; index < values.length; index++) {
        if (values[index] <= values[index - 1]) {
            return false;
        }
    }
    return true;
}

const CONFIG_VALIDATION_RULES: ConfigValidationRule[] = [
    {
        message: '[CONFIG] AI_ENABLED=true ma OPENAI_BASE_URL non è locale e OPENAI_API_KEY è mancante — classificatori e generatore useranno i default',
        when: (cfg) => cfg.aiEnabled && !isAiRequestConfigured(cfg.openaiBaseUrl, cfg.openaiApiKey),
    },
    {
        message: '[CONFIG] EMAIL_PROVIDER=smartlead ma SMARTLEAD_API_KEY è mancante — invio disattivato',
        when: (cfg) => cfg.emailProvider === 'smartlead' && !cfg.smartleadApiKey,
    },
    {
        message: '[CONFIG] EMAIL_PROVIDER=instantly ma INSTANTLY_API_KEY è mancante — invio disattivato',
        when: (cfg) => cfg.emailProvider === 'instantly' && !cfg.instantlyApiKey,
    },
    {
        message: '[CONFIG] SENDER_EMAIL mancante — le campagne verranno create senza mittente',
        when: (cfg) => cfg.emailProvider !== 'none' && !cfg.senderEmail,
    },
    {
        message: '[CONFIG] FOLLOWUP_TIMING_HOURS deve contenere 5 valori strettamente crescenti a partire da 0',
        when: (cfg) => cfg.pipeline.touchOffsetsHours.length !== 5
            || cfg.pipeline.touchOffsetsHours[0] !== 0
            || !isStrictlyAscending(cfg.pipeline.touchOffsetsHours),
    },
    {
        message: '[CONFIG] DEFAULT_ITEM_CAP deve essere <= MAX_ITEMS_PER_MESSAGE',
        when: (cfg) => cfg.pipeline.defaultItemCap > cfg.pipeline.maxItemsPerMessage,
    },
    {
        message: '[CONFIG] PRIVATE_LABEL_DISQUALIFY_RATIO deve essere compreso tra 0 e 1',
        when: (cfg) => cfg.pipeline.privateLabelDisqualifyRatio < 0 || cfg.pipeline.privateLabelDisqualifyRatio > 1,
    },
    {
        message: '[CONFIG] BOOKING_LINK mancante — le risposte non possono chiudere con il link calendario',
        when: (cfg) => !cfg.pipeline.bookingLink,
    },
    {
        message: '[CONFIG] INTEGRATION_RETRY_MAX_DELAY_MS deve essere >= RETRY_BASE_MS',
        when: (cfg) => cfg.integrationRetryMaxDelayMs < cfg.retryBaseMs,
    },
    {
        message: '[CONFIG] INTEGRATION_CIRCUIT_FAILURE_THRESHOLD deve essere >= 1',
        when: (cfg) => cfg.integrationCircuitFailureThreshold < 1,
    },
    {
        message: '[CONFIG] INTEGRATION_CIRCUIT_OPEN_MS deve essere >= 1000',
        when: (cfg) => cfg.integrationCircuitOpenMs < 1000,
    },
    {
        message: '[CONFIG] NODE_ENV=production ma DATABASE_URL non configurata — verrà usato SQLite (non raccomandato in produzione)',
        when: (cfg, nodeEnv) => nodeEnv === 'production' && !cfg.databaseUrl,
    },
];

export function validateConfigSchema(config: AppConfig, nodeEnv: string = process.env.NODE_ENV ?? ''): string[] {
    const errors: string[] = [];
    for (const rule of CONFIG_VALIDATION_RULES) {
        if (rule.when(config, nodeEnv)) {
            errors.push(rule.message);
        }
    }
    return errors;
}
