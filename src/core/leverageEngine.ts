/**
 * leverageEngine.ts — Leverage Rule Engine
 *
 * Deterministico: gate di qualifica a soglia fissa, poi regole attive in ordine di
 * priorità crescente, prima corrispondenza vince. Ogni regola è una lista di
 * predicati opzionali; quelli valorizzati devono valere tutti.
 */

import { z } from 'zod';
import { PipelineConfig } from '../config/types';
import { DisqualifyReason, ItemSelectionQuery, LeverageRuleRecord } from '../types/domain';
import { parseStringArray } from './repositories/shared';

export interface LeadProfile {
    channel: string | null;
    skuEstimate: number | null;
    scaleScore: number | null;
    privateLabelRatio: number | null;
    mapBehaviorScore: number | null;
    storeCount: number | null;
    brandList: readonly string[];
    categories: readonly string[];
}

export interface LeverageRule {
    id: string;
    priority: number;
    isActive: boolean;
    channelMatch: string | null;
    minScaleScore: number | null;
    maxPrivateLabelRatio: number | null;
    minMapBehaviorScore: number | null;
    minStoreCount: number | null;
    requiresBrandOverlap: boolean;
    requiresAdjacentBrands: boolean;
    primaryAngle: string;
    secondaryAngle: string | null;
    selectionQuery: ItemSelectionQuery;
    description: string | null;
}

export interface QualificationVerdict {
    qualifies: boolean;
    reason: DisqualifyReason | null;
}

export interface LeverageDecision {
    matchedRuleId: string | null;
    primaryAngle: string;
    secondaryAngle: string | null;
    matchReason: string;
    selectionQuery: ItemSelectionQuery;
    fallback: boolean;
}

export type QualificationPolicy = Pick<PipelineConfig, 'privateLabelDisqualifyRatio' | 'minSkuEstimate' | 'minScaleScore'>;
export type LeveragePolicy = Pick<PipelineConfig, 'fallbackAngle' | 'defaultItemCap' | 'maxItemsPerMessage'>;

export const NO_RULES_LOADED_FALLBACK = 'no_rules_loaded_fallback';
export const NO_RULE_MATCHED_FALLBACK = 'no_rule_matched_fallback';

// ─── Gate di qualifica ────────────────────────────────────────────────────────

/** Valori assenti contano come 0. I valori di confine qualificano. */
export function evaluateQualification(profile: LeadProfile, policy: QualificationPolicy): QualificationVerdict {
    if ((profile.privateLabelRatio ?? 0) > policy.privateLabelDisqualifyRatio) {
        return { qualifies: false, reason: 'private_label_only' };
    }
    if ((profile.skuEstimate ?? 0) < policy.minSkuEstimate && (profile.scaleScore ?? 0) < policy.minScaleScore) {
        return { qualifies: false, reason: 'arbitrage_no_scale' };
    }
    return { qualifies: true, reason: null };
}

// ─── Predicati di regola ──────────────────────────────────────────────────────

interface RulePredicate {
    name: string;
    applies: (rule: LeverageRule) => boolean;
    holds: (rule: LeverageRule, profile: LeadProfile) => boolean;
}

const RULE_PREDICATES: readonly RulePredicate[] = [
    {
        name: 'channel_match',
        applies: (rule) => rule.channelMatch !== null,
        holds: (rule, profile) => (profile.channel ?? '').toLowerCase() === (rule.channelMatch ?? '').toLowerCase(),
    },
    {
        name: 'min_scale_score',
        applies: (rule) => rule.minScaleScore !== null,
        holds: (rule, profile) => (profile.scaleScore ?? 0) >= (rule.minScaleScore ?? 0),
    },
    {
        name: 'max_private_label_ratio',
        applies: (rule) => rule.maxPrivateLabelRatio !== null,
        holds: (rule, profile) => (profile.privateLabelRatio ?? 0) <= (rule.maxPrivateLabelRatio ?? 0),
    },
    {
        name: 'min_map_behavior_score',
        applies: (rule) => rule.minMapBehaviorScore !== null,
        holds: (rule, profile) => (profile.mapBehaviorScore ?? 0) >= (rule.minMapBehaviorScore ?? 0),
    },
    {
        name: 'min_store_count',
        applies: (rule) => rule.minStoreCount !== null,
        holds: (rule, profile) => (profile.storeCount ?? 0) >= (rule.minStoreCount ?? 0),
    },
    {
        // Manca una lista di riferimento con cui confrontare i brand: mai soddisfatto.
        name: 'requires_brand_overlap',
        applies: (rule) => rule.requiresBrandOverlap,
        holds: () => false,
    },
    {
        name: 'requires_adjacent_brands',
        applies: (rule) => rule.requiresAdjacentBrands,
        holds: (_rule, profile) => profile.brandList.length > 0,
    },
];

export function failedPredicates(rule: LeverageRule, profile: LeadProfile): string[] {
    return RULE_PREDICATES
        .filter((predicate) => predicate.applies(rule) && !predicate.holds(rule, profile))
        .map((predicate) => predicate.name);
}

export function ruleMatches(rule: LeverageRule, profile: LeadProfile): boolean {
    return RULE_PREDICATES.every((predicate) => !predicate.applies(rule) || predicate.holds(rule, profile));
}

// ─── Query di selezione ───────────────────────────────────────────────────────

const selectionQuerySchema = z
    .object({
        priorityFirst: z.boolean().optional(),
        priority_first: z.boolean().optional(),
        cap: z.number().int().optional(),
        categories: z.array(z.string()).optional(),
    })
    .passthrough();

export function defaultSelectionQuery(policy: LeveragePolicy): ItemSelectionQuery {
    return { priorityFirst: true, cap: policy.defaultItemCap };
}

/** Normalizza la query salvata sulla regola; il cap resta sempre in [1, maxItemsPerMessage]. */
export function normalizeSelectionQuery(raw: unknown, policy: LeveragePolicy): ItemSelectionQuery {
    const parsed = selectionQuerySchema.safeParse(raw);
    const base = defaultSelectionQuery(policy);
    if (!parsed.success) {
        return base;
    }
    const value = parsed.data;
    const cap = Math.min(policy.maxItemsPerMessage, Math.max(1, value.cap ?? base.cap));
    const query: ItemSelectionQuery = {
        priorityFirst: value.priorityFirst ?? value.priority_first ?? true,
        cap,
    };
    if (value.categories && value.categories.length > 0) {
        query.categories = value.categories;
    }
    return query;
}

function parseJson(raw: string | null): unknown {
    if (!raw) return null;
    try {
        return JSON.parse(raw);
    } catch {
        return null;
    }
}

export function toLeverageRule(record: LeverageRuleRecord, policy: LeveragePolicy): LeverageRule {
    return {
        id: record.id,
        priority: Number(record.priority),
        isActive: Number(record.is_active) === 1,
        channelMatch: record.channel_match,
        minScaleScore: record.min_scale_score,
        maxPrivateLabelRatio: record.max_private_label_ratio,
        minMapBehaviorScore: record.min_map_behavior_score,
        minStoreCount: record.min_store_count,
        requiresBrandOverlap: Number(record.requires_brand_overlap) === 1,
        requiresAdjacentBrands: Number(record.requires_adjacent_brands) === 1,
        primaryAngle: record.primary_angle,
        secondaryAngle: record.secondary_angle,
        selectionQuery: normalizeSelectionQuery(parseJson(record.selection_query_json), policy),
        description: record.description,
    };
}

export function buildLeadProfile(input: {
    channel: string | null;
    skuEstimate: number | null;
    scaleScore: number | null;
    privateLabelRatio: number | null;
    mapBehaviorScore: number | null;
    storeCount: number | null;
    brandListJson: string | null;
    categoriesJson: string | null;
}): LeadProfile {
    return {
        channel: input.channel,
        skuEstimate: input.skuEstimate,
        scaleScore: input.scaleScore,
        privateLabelRatio: input.privateLabelRatio,
        mapBehaviorScore: input.mapBehaviorScore,
        storeCount: input.storeCount,
        brandList: parseStringArray(input.brandListJson),
        categories: parseStringArray(input.categoriesJson),
    };
}

// ─── Matching ─────────────────────────────────────────────────────────────────

function fallbackDecision(matchReason: string, policy: LeveragePolicy): LeverageDecision {
    return {
        matchedRuleId: null,
        primaryAngle: policy.fallbackAngle,
        secondaryAngle: null,
        matchReason,
        selectionQuery: defaultSelectionQuery(policy),
        fallback: true,
    };
}

export function matchLeverageRule(
    rules: readonly LeverageRule[],
    profile: LeadProfile,
    policy: LeveragePolicy
): LeverageDecision {
    const active = rules
        .filter((rule) => rule.isActive)
        .sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id));
    if (active.length === 0) {
        return fallbackDecision(NO_RULES_LOADED_FALLBACK, policy);
    }

    const winner = active.find((rule) => ruleMatches(rule, profile));
    if (!winner) {
        return fallbackDecision(NO_RULE_MATCHED_FALLBACK, policy);
    }

    return {
        matchedRuleId: winner.id,
        primaryAngle: winner.primaryAngle,
        secondaryAngle: winner.secondaryAngle,
        matchReason: winner.description ?? `rule_${winner.priority}_matched`,
        selectionQuery: winner.selectionQuery,
        fallback: false,
    };
}
