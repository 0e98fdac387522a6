import assert from 'assert';
import { afterEach, describe, test } from 'node:test';
import { AppConfig } from '../config';
import { loadContentPolicy } from '../config/domains';
import { isAiRequestConfigured, parseBoolEnv, parseEmailProviderEnv, parseHoursListEnv } from '../config/env';
import { validateConfigSchema } from '../config/validation';
import { testPipelineConfig } from './helpers';

function baseConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        dbPath: ':memory:',
        databaseUrl: '',
        allowSqliteInProduction: false,
        runLogPersistenceEnabled: false,
        apiPort: 8000,
        apiRateLimitPerMinute: 120,
        webhookSecret: 'test-secret',
        workerId: 'worker-test',
        workerPollIntervalSec: 30,
        stuckJobMinutes: 30,
        openaiBaseUrl: 'http://localhost:11434/v1',
        openaiApiKey: '',
        aiModel: 'test-model',
        aiRequestTimeoutMs: 30_000,
        aiAllowRemoteEndpoint: true,
        aiEnabled: true,
        researchUserAgent: 'test-agent',
        artifactsDir: '/tmp/artifacts',
        emailProvider: 'none',
        smartleadApiKey: '',
        smartleadBaseUrl: 'https://sl.test/api/v1',
        instantlyApiKey: '',
        instantlyBaseUrl: 'https://inst.test/api/v1',
        senderName: 'Test Sender',
        senderEmail: 'sender@example.com',
        campaignKey: 'test-campaign',
        retryBaseMs: 500,
        integrationRetryMaxAttempts: 3,
        integrationRetryMaxDelayMs: 8_000,
        integrationRequestTimeoutMs: 10_000,
        integrationCircuitBreakerEnabled: true,
        integrationCircuitFailureThreshold: 5,
        integrationCircuitOpenMs: 60_000,
        pipeline: testPipelineConfig(),
        ...overrides,
    };
}

describe('validateConfigSchema', () => {
    test('configurazione coerente non produce errori', () => {
        assert.deepEqual(validateConfigSchema(baseConfig(), 'test'), []);
    });

    test('endpoint AI remoto senza chiave', () => {
        const errors = validateConfigSchema(baseConfig({ openaiBaseUrl: 'https://api.openai.com/v1' }), 'test');
        assert.equal(errors.length, 1);
        assert.ok(errors[0].startsWith('[CONFIG] AI_ENABLED=true'));
    });

    test('provider selezionato senza chiave API', () => {
        const errors = validateConfigSchema(baseConfig({ emailProvider: 'smartlead' }), 'test');
        assert.deepEqual(errors, ['[CONFIG] EMAIL_PROVIDER=smartlead ma SMARTLEAD_API_KEY è mancante — invio disattivato']);
    });

    test('offset dei touch non crescenti o non a partire da zero', () => {
        const expected = ['[CONFIG] FOLLOWUP_TIMING_HOURS deve contenere 5 valori strettamente crescenti a partire da 0'];
        const unordered = baseConfig({ pipeline: testPipelineConfig({ touchOffsetsHours: [0, 24, 24, 168, 720] }) });
        const shifted = baseConfig({ pipeline: testPipelineConfig({ touchOffsetsHours: [1, 24, 96, 168, 720] }) });
        const short = baseConfig({ pipeline: testPipelineConfig({ touchOffsetsHours: [0, 24, 96] }) });
        assert.deepEqual(validateConfigSchema(unordered, 'test'), expected);
        assert.deepEqual(validateConfigSchema(shifted, 'test'), expected);
        assert.deepEqual(validateConfigSchema(short, 'test'), expected);
    });

    test('cap di default oltre il massimo e booking link mancante', () => {
        const cfg = baseConfig({ pipeline: testPipelineConfig({ defaultItemCap: 4, bookingLink: '' }) });
        assert.deepEqual(validateConfigSchema(cfg, 'test'), [
            '[CONFIG] DEFAULT_ITEM_CAP deve essere <= MAX_ITEMS_PER_MESSAGE',
            '[CONFIG] BOOKING_LINK mancante — le risposte non possono chiudere con il link calendario',
        ]);
    });

    test('produzione senza DATABASE_URL', () => {
        const errors = validateConfigSchema(baseConfig(), 'production');
        assert.deepEqual(errors, [
            '[CONFIG] NODE_ENV=production ma DATABASE_URL non configurata — verrà usato SQLite (non raccomandato in produzione)',
        ]);
        assert.deepEqual(validateConfigSchema(baseConfig({ databaseUrl: 'postgres://localhost/test' }), 'production'), []);
    });
});

describe('parsing variabili d\'ambiente', () => {
    const touched = ['TEST_HOURS', 'TEST_FLAG', 'TEST_PROVIDER'];

    afterEach(() => {
        for (const name of touched) {
            delete process.env[name];
        }
    });

    test('lista ore valida, oppure fallback se un valore è negativo o non numerico', () => {
        process.env.TEST_HOURS = '0, 12, 48';
        assert.deepEqual(parseHoursListEnv('TEST_HOURS', [0, 24]), [0, 12, 48]);
        process.env.TEST_HOURS = '0,-5,48';
        assert.deepEqual(parseHoursListEnv('TEST_HOURS', [0, 24]), [0, 24]);
        process.env.TEST_HOURS = '0,abc';
        assert.deepEqual(parseHoursListEnv('TEST_HOURS', [0, 24]), [0, 24]);
    });

    test('booleani', () => {
        assert.equal(parseBoolEnv('TEST_FLAG', true), true);
        process.env.TEST_FLAG = '1';
        assert.equal(parseBoolEnv('TEST_FLAG', false), true);
        process.env.TEST_FLAG = 'no';
        assert.equal(parseBoolEnv('TEST_FLAG', true), false);
    });

    test('provider email sconosciuto torna al fallback', () => {
        process.env.TEST_PROVIDER = 'Instantly';
        assert.equal(parseEmailProviderEnv('TEST_PROVIDER', 'none'), 'instantly');
        process.env.TEST_PROVIDER = 'mailgun';
        assert.equal(parseEmailProviderEnv('TEST_PROVIDER', 'none'), 'none');
    });

    test('endpoint AI locale non richiede chiave', () => {
        assert.equal(isAiRequestConfigured('http://127.0.0.1:8080/v1', ''), true);
        assert.equal(isAiRequestConfigured('https://api.example.com/v1', ''), false);
        assert.equal(isAiRequestConfigured('https://api.example.com/v1', 'test-secret'), true);
    });
});

describe('content policy', () => {
    test('file dati caricato e validato', () => {
        const policy = loadContentPolicy();
        assert.ok(policy.forbiddenPhrases.includes('wholesale price'));
        assert.ok(policy.forbiddenVariableKeys.includes('catalog_url'));
        assert.ok(policy.optOutPhrases.includes('remove me'));
    });
});
