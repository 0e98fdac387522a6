/**
 * repositories/signals.ts
 * Signal set (1:1 col lead): campi grezzi dalla ricerca, campi normalizzati
 * dalla classificazione, puntatori all'artefatto di evidenza.
 */

import { randomUUID } from 'crypto';
import { DatabaseManager } from '../../db';
import { LeadClassification, ResearchResult, SignalSnapshot } from '../../types/collaborators';
import { SignalSetRecord } from '../../types/domain';
import { parseStringArray, toJson, toSqlBool } from './shared';

export async function getSignalSet(db: DatabaseManager, leadId: string): Promise<SignalSetRecord | undefined> {
    return db.get<SignalSetRecord>(`SELECT * FROM lead_signals WHERE lead_id = ?`, [leadId]);
}

/**
 * Inserisce o aggiorna in place i campi grezzi. Un lead ha al massimo un signal set.
 * Le evidenze già registrate non vengono cancellate da una ricerca senza artefatto.
 */
export async function upsertRawSignals(db: DatabaseManager, leadId: string, research: ResearchResult, at: string): Promise<void> {
    await db.run(
        `INSERT INTO lead_signals (
            id, lead_id, platform, site_excerpt, categories_json, sample_items_json, brand_mentions_json,
            sku_estimate, price_min, price_max, policy_text_found, policy_text_excerpt, private_label_ratio,
            artifact_path, artifact_hash, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(lead_id) DO UPDATE SET
            platform = excluded.platform,
            site_excerpt = excluded.site_excerpt,
            categories_json = excluded.categories_json,
            sample_items_json = excluded.sample_items_json,
            brand_mentions_json = excluded.brand_mentions_json,
            sku_estimate = excluded.sku_estimate,
            price_min = excluded.price_min,
            price_max = excluded.price_max,
            policy_text_found = excluded.policy_text_found,
            policy_text_excerpt = excluded.policy_text_excerpt,
            private_label_ratio = excluded.private_label_ratio,
            artifact_path = COALESCE(excluded.artifact_path, lead_signals.artifact_path),
            artifact_hash = COALESCE(excluded.artifact_hash, lead_signals.artifact_hash),
            updated_at = excluded.updated_at`,
        [
            randomUUID(),
            leadId,
            research.platform,
            research.siteExcerpt,
            toJson(research.categories),
            toJson(research.sampleItems),
            toJson(research.brandMentions),
            research.skuEstimate,
            research.priceMin,
            research.priceMax,
            toSqlBool(research.policyTextFound),
            research.policyTextExcerpt,
            research.privateLabelRatio,
            research.artifactPath,
            research.artifactHash,
            at,
            at,
        ]
    );
}

export async function mergeClassifiedSignals(
    db: DatabaseManager,
    leadId: string,
    classification: LeadClassification,
    at: string
): Promise<void> {
    await db.run(
        `UPDATE lead_signals
         SET brand_list_json = ?, price_tier = ?, scale_score = ?, map_behavior_score = ?, store_count = ?,
             classified_at = ?, updated_at = ?
         WHERE lead_id = ?`,
        [
            toJson(classification.brandList),
            classification.priceTier,
            classification.scaleScore,
            classification.mapBehaviorScore,
            classification.storeCount,
            at,
            at,
            leadId,
        ]
    );
}

export function toSignalSnapshot(record: SignalSetRecord | undefined): SignalSnapshot {
    return {
        platform: record?.platform ?? null,
        categories: parseStringArray(record?.categories_json),
        sampleItems: parseStringArray(record?.sample_items_json),
        brandMentions: parseStringArray(record?.brand_mentions_json),
        skuEstimate: record?.sku_estimate ?? null,
        priceMin: record?.price_min ?? null,
        priceMax: record?.price_max ?? null,
        policyTextFound: (record?.policy_text_found ?? 0) === 1,
        privateLabelRatio: record?.private_label_ratio ?? null,
        siteExcerpt: record?.site_excerpt ?? null,
    };
}

export interface ResearchRunInput {
    leadId: string;
    jobId: string | null;
    success: boolean;
    pagesFetched: number;
    budgetMs: number;
    maxPages: number;
    error: string | null;
}

export async function insertResearchRun(db: DatabaseManager, input: ResearchRunInput, at: string): Promise<string> {
    const id = randomUUID();
    await db.run(
        `INSERT INTO research_runs (id, lead_id, job_id, status, pages_fetched, budget_ms, max_pages, error, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
            id,
            input.leadId,
            input.jobId,
            input.success ? 'success' : 'failed',
            input.pagesFetched,
            input.budgetMs,
            input.maxPages,
            input.error,
            at,
        ]
    );
    return id;
}

export async function countResearchRuns(db: DatabaseManager, leadId: string): Promise<number> {
    const row = await db.get<{ total: number | string }>(`SELECT COUNT(*) as total FROM research_runs WHERE lead_id = ?`, [leadId]);
    return Number(row?.total ?? 0);
}
