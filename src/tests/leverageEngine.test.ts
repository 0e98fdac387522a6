import assert from 'assert';
import { describe, test } from 'node:test';
import {
    buildLeadProfile,
    evaluateQualification,
    failedPredicates,
    LeadProfile,
    LeverageRule,
    matchLeverageRule,
    NO_RULE_MATCHED_FALLBACK,
    NO_RULES_LOADED_FALLBACK,
    normalizeSelectionQuery,
    toLeverageRule,
} from '../core/leverageEngine';
import { LeverageRuleRecord } from '../types/domain';

const qualificationPolicy = { privateLabelDisqualifyRatio: 0.95, minSkuEstimate: 10, minScaleScore: 20 };
const leveragePolicy = { fallbackAngle: 'growth', defaultItemCap: 3, maxItemsPerMessage: 3 };

function profile(overrides: Partial<LeadProfile> = {}): LeadProfile {
    return {
        channel: 'amazon',
        skuEstimate: 120,
        scaleScore: 70,
        privateLabelRatio: 0.2,
        mapBehaviorScore: 40,
        storeCount: 1,
        brandList: [],
        categories: ['kitchen'],
        ...overrides,
    };
}

function rule(overrides: Partial<LeverageRule> & Pick<LeverageRule, 'id' | 'priority'>): LeverageRule {
    return {
        isActive: true,
        channelMatch: null,
        minScaleScore: null,
        maxPrivateLabelRatio: null,
        minMapBehaviorScore: null,
        minStoreCount: null,
        requiresBrandOverlap: false,
        requiresAdjacentBrands: false,
        primaryAngle: `angle-${overrides.id}`,
        secondaryAngle: null,
        selectionQuery: { priorityFirst: true, cap: 3 },
        description: null,
        ...overrides,
    };
}

describe('evaluateQualification', () => {
    test('private label oltre soglia squalifica', () => {
        assert.deepEqual(evaluateQualification(profile({ privateLabelRatio: 0.96 }), qualificationPolicy), {
            qualifies: false,
            reason: 'private_label_only',
        });
    });

    test('valore di confine 0.95 qualifica', () => {
        assert.deepEqual(evaluateQualification(profile({ privateLabelRatio: 0.95 }), qualificationPolicy), {
            qualifies: true,
            reason: null,
        });
    });

    test('pochi SKU e scala bassa squalificano', () => {
        const verdict = evaluateQualification(profile({ skuEstimate: 9, scaleScore: 19 }), qualificationPolicy);
        assert.deepEqual(verdict, { qualifies: false, reason: 'arbitrage_no_scale' });
    });

    test('basta uno dei due valori al confine', () => {
        assert.equal(evaluateQualification(profile({ skuEstimate: 10, scaleScore: 0 }), qualificationPolicy).qualifies, true);
        assert.equal(evaluateQualification(profile({ skuEstimate: 0, scaleScore: 20 }), qualificationPolicy).qualifies, true);
    });

    test('valori assenti contano come zero', () => {
        const verdict = evaluateQualification(
            profile({ skuEstimate: null, scaleScore: null, privateLabelRatio: null }),
            qualificationPolicy
        );
        assert.deepEqual(verdict, { qualifies: false, reason: 'arbitrage_no_scale' });
    });
});

describe('matchLeverageRule', () => {
    test('nessuna regola attiva: fallback con motivo dedicato', () => {
        const decision = matchLeverageRule([rule({ id: 'off', priority: 1, isActive: false })], profile(), leveragePolicy);
        assert.deepEqual(decision, {
            matchedRuleId: null,
            primaryAngle: 'growth',
            secondaryAngle: null,
            matchReason: NO_RULES_LOADED_FALLBACK,
            selectionQuery: { priorityFirst: true, cap: 3 },
            fallback: true,
        });
    });

    test('prima corrispondenza per priorità crescente, non per ordine di input', () => {
        const rules = [
            rule({ id: 'b-late', priority: 50 }),
            rule({ id: 'a-early', priority: 10, channelMatch: 'Amazon', description: 'Marketplace sellers' }),
        ];
        const decision = matchLeverageRule(rules, profile(), leveragePolicy);
        assert.equal(decision.matchedRuleId, 'a-early');
        assert.equal(decision.matchReason, 'Marketplace sellers');
        assert.equal(decision.fallback, false);
    });

    test('a parità di priorità vince l\'id minore', () => {
        const decision = matchLeverageRule([rule({ id: 'z', priority: 5 }), rule({ id: 'm', priority: 5 })], profile(), leveragePolicy);
        assert.equal(decision.matchedRuleId, 'm');
        assert.equal(decision.matchReason, 'rule_5_matched');
    });

    test('tutti i predicati valorizzati devono valere', () => {
        const strict = rule({ id: 'strict', priority: 1, channelMatch: 'amazon', minStoreCount: 3 });
        assert.deepEqual(failedPredicates(strict, profile()), ['min_store_count']);
        const decision = matchLeverageRule([strict], profile(), leveragePolicy);
        assert.equal(decision.matchedRuleId, null);
        assert.equal(decision.matchReason, NO_RULE_MATCHED_FALLBACK);
        assert.equal(decision.primaryAngle, 'growth');
    });

    test('brand adiacenti richiedono una lista non vuota', () => {
        const adjacent = rule({ id: 'adj', priority: 1, requiresAdjacentBrands: true });
        assert.equal(matchLeverageRule([adjacent], profile(), leveragePolicy).matchedRuleId, null);
        assert.equal(matchLeverageRule([adjacent], profile({ brandList: ['Acme'] }), leveragePolicy).matchedRuleId, 'adj');
    });

    test('sovrapposizione brand non è mai soddisfatta', () => {
        const overlap = rule({ id: 'overlap', priority: 1, requiresBrandOverlap: true });
        assert.deepEqual(failedPredicates(overlap, profile({ brandList: ['Acme'] })), ['requires_brand_overlap']);
    });

    test('soglie inclusive sui predicati minimi e massimi', () => {
        const bounded = rule({ id: 'bounded', priority: 1, minScaleScore: 70, maxPrivateLabelRatio: 0.2, minMapBehaviorScore: 40 });
        assert.deepEqual(failedPredicates(bounded, profile()), []);
    });
});

describe('selection query', () => {
    test('cap limitato a [1, maxItemsPerMessage] e chiave snake_case accettata', () => {
        assert.deepEqual(normalizeSelectionQuery({ cap: 10, priority_first: false }, leveragePolicy), { priorityFirst: false, cap: 3 });
        assert.deepEqual(normalizeSelectionQuery({ cap: 0 }, leveragePolicy), { priorityFirst: true, cap: 1 });
        assert.deepEqual(normalizeSelectionQuery('garbage', leveragePolicy), { priorityFirst: true, cap: 3 });
        assert.deepEqual(normalizeSelectionQuery({ categories: ['Kitchen'] }, leveragePolicy), {
            priorityFirst: true,
            cap: 3,
            categories: ['Kitchen'],
        });
    });

    test('record persistito convertito con flag e query normalizzata', () => {
        const record: LeverageRuleRecord = {
            id: 'rule-x',
            priority: 20,
            is_active: 1,
            channel_match: 'shopify',
            min_scale_score: 30,
            max_private_label_ratio: null,
            min_map_behavior_score: null,
            min_store_count: null,
            requires_brand_overlap: 0,
            requires_adjacent_brands: 1,
            primary_angle: 'dtc_growth',
            secondary_angle: 'curation',
            selection_query_json: '{"cap":2}',
            description: null,
            created_at: '2026-03-02T10:00:00.000Z',
        };
        const converted = toLeverageRule(record, leveragePolicy);
        assert.equal(converted.isActive, true);
        assert.equal(converted.requiresAdjacentBrands, true);
        assert.equal(converted.requiresBrandOverlap, false);
        assert.deepEqual(converted.selectionQuery, { priorityFirst: true, cap: 2 });
    });

    test('profilo costruito dalle colonne JSON', () => {
        const built = buildLeadProfile({
            channel: 'amazon',
            skuEstimate: null,
            scaleScore: 55,
            privateLabelRatio: null,
            mapBehaviorScore: null,
            storeCount: null,
            brandListJson: '["Acme", 3]',
            categoriesJson: 'not-json',
        });
        assert.deepEqual(built.brandList, ['Acme']);
        assert.deepEqual(built.categories, []);
    });
});
