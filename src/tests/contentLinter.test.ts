import assert from 'assert';
import { describe, test } from 'node:test';
import { ContentPolicyError } from '../core/errors';
import {
    containsOptOutLanguage,
    formatViolations,
    lintMessage,
    lintVariables,
    MessageLintPolicy,
    VariableLintPolicy,
} from '../validation/contentLinter';

const messagePolicy: MessageLintPolicy = {
    forbiddenPhrases: ['wholesale price', 'full catalog', "don't share"],
    maxItemsPerMessage: 3,
};

const variablePolicy: VariableLintPolicy = {
    forbiddenVariableKeys: ['catalog_url', 'price_list'],
    maxItemsPerMessage: 3,
};

describe('lintMessage', () => {
    test('messaggio pulito con tre articoli passa', () => {
        const result = lintMessage('Quick idea', 'A few lines that could fit your store.', 3, messagePolicy);
        assert.deepEqual(result, { ok: true, violations: [], itemCapViolation: false });
    });

    test('frasi vietate rilevate senza distinzione di maiuscole, con posizione', () => {
        const result = lintMessage('Our WHOLESALE   price sheet', 'Ask for the Full Catalog today.', 1, messagePolicy);
        assert.equal(result.ok, false);
        assert.deepEqual(result.violations, [
            { phrase: 'wholesale price', location: 'subject' },
            { phrase: 'full catalog', location: 'body' },
        ]);
        assert.equal(formatViolations(result), 'subject:wholesale price, body:full catalog');
    });

    test('apostrofi tipografici normalizzati', () => {
        const result = lintMessage('Hello', 'Please don’t share this.', 0, messagePolicy);
        assert.deepEqual(result.violations, [{ phrase: "don't share", location: 'body' }]);
    });

    test('quattro articoli superano il cap', () => {
        const result = lintMessage('Hello', 'Four lines inside.', 4, messagePolicy);
        assert.equal(result.ok, false);
        assert.equal(result.itemCapViolation, true);
        assert.equal(formatViolations(result), 'item_cap_exceeded');
    });

    test('conteggio negativo o non intero è un errore di input', () => {
        assert.throws(() => lintMessage('a', 'b', -1, messagePolicy), ContentPolicyError);
        assert.throws(() => lintMessage('a', 'b', 1.5, messagePolicy), ContentPolicyError);
    });
});

describe('lintVariables', () => {
    test('lista articoli entro il cap e chiavi ammesse', () => {
        const result = lintVariables({ company_name: 'Shop Co', item_names: ['A', 'B', 'C'] }, variablePolicy);
        assert.deepEqual(result, { ok: true, reasons: [] });
    });

    test('lista oltre il cap e chiave vietata valorizzata', () => {
        const result = lintVariables(
            { item_names: ['A', 'B', 'C', 'D'], catalog_url: 'https://example.com/catalog' },
            variablePolicy
        );
        assert.deepEqual(result, { ok: false, reasons: ['item_cap_exceeded:4>3', 'forbidden_variable:catalog_url'] });
    });

    test('chiave vietata vuota non conta', () => {
        const result = lintVariables({ price_list: '  ', catalog_url: null }, variablePolicy);
        assert.deepEqual(result, { ok: true, reasons: [] });
    });

    test('item_names non lista è un errore di input', () => {
        assert.throws(() => lintVariables({ item_names: 'A, B' }, variablePolicy), ContentPolicyError);
    });
});

describe('containsOptOutLanguage', () => {
    const phrases = ['remove me', 'unsubscribe', 'stop emailing'];

    test('riconosce le frasi di opt-out', () => {
        assert.equal(containsOptOutLanguage('please remove me from this list', phrases), true);
        assert.equal(containsOptOutLanguage('UNSUBSCRIBE', phrases), true);
        assert.equal(containsOptOutLanguage('Stop\nemailing us', phrases), true);
    });

    test('ignora il resto', () => {
        assert.equal(containsOptOutLanguage('Sounds interesting, send more info', phrases), false);
    });
});
