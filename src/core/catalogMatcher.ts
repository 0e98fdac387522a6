/**
 * catalogMatcher.ts — Catalog Matcher
 *
 * Selezione pura di al massimo `cap` articoli: pool prioritario con punteggio,
 * estensione con articoli non prioritari se il pool è corto, poi diversità
 * per categoria primaria. Nessuna sostituzione degli scartati.
 */

import { PipelineConfig } from '../config/types';
import { CatalogItemRecord, ItemSelectionQuery } from '../types/domain';
import { parseStringArray } from './repositories/shared';

export interface CatalogItem {
    id: string;
    name: string;
    categories: string[];
    discountPct: number;
    channelFit: string[];
    replenishable: boolean;
    priority: boolean;
    active: boolean;
}

export interface MatchTarget {
    channel: string | null;
    categories: readonly string[];
}

export interface ScoredItem {
    item: CatalogItem;
    score: number;
}

export interface CatalogSelection {
    selectedIds: string[];
    poolSize: number;
    cap: number;
    skippedForDiversity: string[];
}

export type MatcherPolicy = Pick<
    PipelineConfig,
    'maxItemsPerMessage' | 'maxPerPrimaryCategory' | 'highDiscountThreshold' | 'marketplaceChannel' | 'multiChannelMarker'
>;

const DEFAULT_PRIMARY_CATEGORY = 'general';

export function toCatalogItem(record: CatalogItemRecord): CatalogItem {
    return {
        id: record.id,
        name: record.name,
        categories: parseStringArray(record.categories_json),
        discountPct: Number(record.discount_pct),
        channelFit: parseStringArray(record.channel_fit_json).map((channel) => channel.toLowerCase()),
        replenishable: Number(record.replenishable) === 1,
        priority: Number(record.priority) === 1,
        active: Number(record.active) === 1,
    };
}

export function primaryCategory(item: CatalogItem): string {
    return (item.categories[0] ?? DEFAULT_PRIMARY_CATEGORY).toLowerCase();
}

export function scoreItem(item: CatalogItem, target: MatchTarget, policy: MatcherPolicy): number {
    const channel = (target.channel ?? '').toLowerCase();
    let score = 0;

    if ((channel && item.channelFit.includes(channel)) || item.channelFit.includes(policy.multiChannelMarker)) {
        score += 20;
    }

    const leadCategories = new Set(target.categories.map((category) => category.toLowerCase()));
    const itemCategories = new Set(item.categories.map((category) => category.toLowerCase()));
    for (const category of itemCategories) {
        if (leadCategories.has(category)) {
            score += 15;
        }
    }

    if (item.discountPct >= policy.highDiscountThreshold) {
        score += 10;
    }
    if (item.replenishable && channel === policy.marketplaceChannel) {
        score += 10;
    }
    return score;
}

function byDiscountDesc(a: CatalogItem, b: CatalogItem): number {
    return b.discountPct - a.discountPct || a.id.localeCompare(b.id);
}

export function rankCandidates(items: readonly CatalogItem[], target: MatchTarget, policy: MatcherPolicy): ScoredItem[] {
    return items
        .filter((item) => item.active && item.priority)
        .map((item) => ({ item, score: scoreItem(item, target, policy) }))
        .sort((a, b) => b.score - a.score || byDiscountDesc(a.item, b.item));
}

export function selectCatalogItems(
    items: readonly CatalogItem[],
    target: MatchTarget,
    query: ItemSelectionQuery,
    policy: MatcherPolicy
): CatalogSelection {
    const cap = Math.max(0, Math.min(policy.maxItemsPerMessage, Math.floor(query.cap)));
    const effectiveTarget: MatchTarget = {
        channel: target.channel,
        categories: [...target.categories, ...(query.categories ?? [])],
    };

    const pool = query.priorityFirst
        ? rankCandidates(items, effectiveTarget, policy).map((scored) => scored.item)
        : items.filter((item) => item.active).slice().sort(byDiscountDesc);

    if (pool.length < cap) {
        const present = new Set(pool.map((item) => item.id));
        const extension = items
            .filter((item) => item.active && !item.priority && !present.has(item.id))
            .sort(byDiscountDesc)
            .slice(0, cap);
        pool.push(...extension);
    }

    const selectedIds: string[] = [];
    const skippedForDiversity: string[] = [];
    const perCategory = new Map<string, number>();
    for (const item of pool) {
        if (selectedIds.length >= cap) break;
        const category = primaryCategory(item);
        const count = perCategory.get(category) ?? 0;
        if (count >= policy.maxPerPrimaryCategory) {
            skippedForDiversity.push(item.id);
            continue;
        }
        perCategory.set(category, count + 1);
        selectedIds.push(item.id);
    }

    return { selectedIds, poolSize: pool.length, cap, skippedForDiversity };
}
