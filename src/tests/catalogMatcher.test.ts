import assert from 'assert';
import { describe, test } from 'node:test';
import {
    CatalogItem,
    MatcherPolicy,
    primaryCategory,
    rankCandidates,
    scoreItem,
    selectCatalogItems,
    toCatalogItem,
} from '../core/catalogMatcher';

const policy: MatcherPolicy = {
    maxItemsPerMessage: 3,
    maxPerPrimaryCategory: 2,
    highDiscountThreshold: 60,
    marketplaceChannel: 'amazon',
    multiChannelMarker: 'multi-channel',
};

function item(overrides: Partial<CatalogItem> & Pick<CatalogItem, 'id'>): CatalogItem {
    return {
        name: `Item ${overrides.id}`,
        categories: ['kitchen'],
        discountPct: 30,
        channelFit: [],
        replenishable: false,
        priority: true,
        active: true,
        ...overrides,
    };
}

const target = { channel: 'amazon', categories: ['Kitchen'] };

const catalog: CatalogItem[] = [
    item({ id: 'a', discountPct: 65, channelFit: ['amazon'], replenishable: true }),
    item({ id: 'b', discountPct: 40, channelFit: ['shopify'] }),
    item({ id: 'c', discountPct: 50, channelFit: ['multi-channel'] }),
    item({ id: 'd', categories: ['garden'], discountPct: 30, channelFit: ['amazon'] }),
    item({ id: 'g', discountPct: 45, channelFit: ['amazon'] }),
    item({ id: 'e', categories: ['home'], discountPct: 70, priority: false }),
    item({ id: 'off', discountPct: 90, channelFit: ['amazon'], active: false }),
];

describe('scoreItem', () => {
    test('canale, categoria, sconto alto e replenishable su marketplace', () => {
        assert.equal(scoreItem(catalog[0], target, policy), 55);
    });

    test('marcatore multi-canale vale come corrispondenza di canale', () => {
        assert.equal(scoreItem(catalog[2], target, policy), 35);
    });

    test('replenishable non conta fuori dal marketplace', () => {
        assert.equal(scoreItem(catalog[0], { channel: 'shopify', categories: [] }, policy), 10);
    });
});

describe('rankCandidates', () => {
    test('solo attivi prioritari, punteggio decrescente e sconto come spareggio', () => {
        const ranked = rankCandidates(catalog, target, policy).map((scored) => [scored.item.id, scored.score]);
        assert.deepEqual(ranked, [
            ['a', 55],
            ['c', 35],
            ['g', 35],
            ['d', 20],
            ['b', 15],
        ]);
    });
});

describe('selectCatalogItems', () => {
    test('diversità per categoria primaria senza sostituzioni oltre il pool', () => {
        const selection = selectCatalogItems(catalog, target, { priorityFirst: true, cap: 3 }, policy);
        assert.deepEqual(selection, {
            selectedIds: ['a', 'c', 'd'],
            poolSize: 5,
            cap: 3,
            skippedForDiversity: ['g'],
        });
    });

    test('cap richiesto oltre il limite viene ridotto', () => {
        const selection = selectCatalogItems(catalog, target, { priorityFirst: true, cap: 10 }, policy);
        assert.equal(selection.cap, 3);
        assert.equal(selection.selectedIds.length, 3);
    });

    test('pool prioritario corto esteso con articoli non prioritari per sconto', () => {
        const small = [
            item({ id: 'a', discountPct: 65, channelFit: ['amazon'] }),
            item({ id: 'e', categories: ['home'], discountPct: 70, priority: false }),
            item({ id: 'h', discountPct: 20, priority: false }),
        ];
        const selection = selectCatalogItems(small, target, { priorityFirst: true, cap: 3 }, policy);
        assert.deepEqual(selection.selectedIds, ['a', 'e', 'h']);
        assert.equal(selection.poolSize, 3);
    });

    test('senza priorità: tutti gli attivi per sconto decrescente', () => {
        const selection = selectCatalogItems(catalog, target, { priorityFirst: false, cap: 3 }, policy);
        assert.deepEqual(selection.selectedIds, ['e', 'a', 'c']);
        assert.deepEqual(selection.skippedForDiversity, []);
    });

    test('categorie della query sommate a quelle del lead', () => {
        const gardenFirst = selectCatalogItems(
            catalog,
            { channel: 'amazon', categories: [] },
            { priorityFirst: true, cap: 1, categories: ['garden'] },
            policy
        );
        assert.deepEqual(gardenFirst.selectedIds, ['a']);
        const ranked = rankCandidates(catalog, { channel: 'amazon', categories: ['garden'] }, policy);
        assert.equal(ranked[1].item.id, 'd');
        assert.equal(ranked[1].score, 35);
    });

    test('catalogo vuoto', () => {
        assert.deepEqual(selectCatalogItems([], target, { priorityFirst: true, cap: 3 }, policy), {
            selectedIds: [],
            poolSize: 0,
            cap: 3,
            skippedForDiversity: [],
        });
    });
});

describe('selectCatalogItems su pool casuali', () => {
    // generatore con seme fisso: stessi pool a ogni esecuzione
    function seededRandom(seed: number): () => number {
        let state = seed >>> 0;
        return () => {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        };
    }

    const CATEGORIES = ['kitchen', 'home', 'garden', 'bath', 'outdoor'];
    const CHANNELS = ['amazon', 'shopify', 'multi-channel', 'walmart'];

    test('tetto, massimo due per categoria primaria e nessun duplicato su pool da 0 a 40', () => {
        const random = seededRandom(20260302);
        const pick = <T>(values: readonly T[]): T => values[Math.floor(random() * values.length)];

        for (let round = 0; round < 300; round++) {
            const size = round % 41;
            const pool: CatalogItem[] = [];
            for (let index = 0; index < size; index++) {
                const categoryCount = Math.floor(random() * 3);
                const categories: string[] = [];
                for (let c = 0; c < categoryCount; c++) {
                    categories.push(pick(CATEGORIES));
                }
                pool.push(
                    item({
                        id: `r${round}-${index}`,
                        categories,
                        discountPct: Math.floor(random() * 91),
                        channelFit: random() < 0.7 ? [pick(CHANNELS)] : [],
                        replenishable: random() < 0.5,
                        priority: random() < 0.6,
                        active: random() < 0.9,
                    })
                );
            }
            const cap = Math.floor(random() * 6);
            const query = { priorityFirst: random() < 0.8, cap, categories: random() < 0.3 ? [pick(CATEGORIES)] : undefined };

            const selection = selectCatalogItems(pool, { channel: pick(CHANNELS), categories: [pick(CATEGORIES)] }, query, policy);
            const label = `round ${round}, pool ${size}, cap ${cap}`;

            assert.ok(selection.selectedIds.length <= Math.min(cap, policy.maxItemsPerMessage), label);
            assert.equal(new Set(selection.selectedIds).size, selection.selectedIds.length, label);

            const byId = new Map(pool.map((candidate) => [candidate.id, candidate]));
            const perCategory = new Map<string, number>();
            for (const id of selection.selectedIds) {
                const chosen = byId.get(id);
                assert.ok(chosen && chosen.active, label);
                const category = primaryCategory(chosen);
                perCategory.set(category, (perCategory.get(category) ?? 0) + 1);
            }
            for (const count of perCategory.values()) {
                assert.ok(count <= policy.maxPerPrimaryCategory, label);
            }
        }
    });
});

describe('toCatalogItem', () => {
    test('record con flag numerici e canali in minuscolo', () => {
        const converted = toCatalogItem({
            id: 'item-x',
            name: 'Test Skillet',
            categories_json: '["Kitchen","home"]',
            discount_pct: 55,
            minimum_order_value: null,
            lead_time_min_days: null,
            lead_time_max_days: null,
            origin: null,
            channel_fit_json: '["Amazon"]',
            replenishable: 1,
            priority: 0,
            catalog_url: null,
            notes: null,
            active: 1,
            created_at: '2026-03-02T10:00:00.000Z',
        });
        assert.deepEqual(converted.channelFit, ['amazon']);
        assert.equal(converted.replenishable, true);
        assert.equal(converted.priority, false);
        assert.equal(primaryCategory(converted), 'kitchen');
        assert.equal(primaryCategory(item({ id: 'z', categories: [] })), 'general');
    });
});
