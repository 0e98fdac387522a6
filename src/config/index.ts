import {
    buildAiDomainConfig,
    buildDeliveryDomainConfig,
    buildIntegrationDomainConfig,
    buildPipelineDomainConfig,
    buildResearchDomainConfig,
    buildRuntimeDomainConfig,
} from './domains';
import { loadDotEnv } from './env';
import { AppConfig, EmailProviderName, MeetingDetails, PipelineConfig } from './types';
import { validateConfigSchema } from './validation';

loadDotEnv();

function deepFreeze<T extends object>(value: T): T {
    for (const nested of Object.values(value)) {
        if (nested !== null && typeof nested === 'object') {
            deepFreeze(nested);
        }
    }
    Object.freeze(value);
    return value;
}

export function buildConfig(): Readonly<AppConfig> {
    return deepFreeze<AppConfig>({
        ...buildRuntimeDomainConfig(),
        ...buildAiDomainConfig(),
        ...buildResearchDomainConfig(),
        ...buildDeliveryDomainConfig(),
        ...buildIntegrationDomainConfig(),
        pipeline: buildPipelineDomainConfig(),
    });
}

/**
 * Parametri di pipeline a partire dai valori d'ambiente, con override puntuali.
 * Usato dai test e da chi compone il motore fuori dal processo principale.
 */
export function buildPipelineConfig(overrides: Partial<PipelineConfig> = {}): Readonly<PipelineConfig> {
    return deepFreeze<PipelineConfig>({
        ...buildPipelineDomainConfig(),
        ...overrides,
    });
}

export const config: Readonly<AppConfig> = buildConfig();

export function validateCriticalConfig(): string[] {
    return validateConfigSchema(config);
}

export type { AppConfig, EmailProviderName, MeetingDetails, PipelineConfig };
