/**
 * repositories/leverage.ts
 * Regole di leverage (dati di riferimento), esito di qualifica e assegnazione per lead.
 */

import { DatabaseManager } from '../../db';
import {
    ItemSelectionQuery,
    LeverageAssignmentRecord,
    LeverageRuleRecord,
    QualificationRecord,
} from '../../types/domain';
import { toJson, toSqlBool } from './shared';

export interface LeverageRuleInput {
    id: string;
    priority: number;
    isActive?: boolean;
    channelMatch?: string | null;
    minScaleScore?: number | null;
    maxPrivateLabelRatio?: number | null;
    minMapBehaviorScore?: number | null;
    minStoreCount?: number | null;
    requiresBrandOverlap?: boolean;
    requiresAdjacentBrands?: boolean;
    primaryAngle: string;
    secondaryAngle?: string | null;
    selectionQuery?: Partial<ItemSelectionQuery>;
    description?: string | null;
}

export async function insertLeverageRule(db: DatabaseManager, rule: LeverageRuleInput, at: string): Promise<boolean> {
    const result = await db.run(
        `INSERT OR IGNORE INTO leverage_rules (
            id, priority, is_active, channel_match, min_scale_score, max_private_label_ratio, min_map_behavior_score,
            min_store_count, requires_brand_overlap, requires_adjacent_brands, primary_angle, secondary_angle,
            selection_query_json, description, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
            rule.id,
            rule.priority,
            toSqlBool(rule.isActive ?? true),
            rule.channelMatch ?? null,
            rule.minScaleScore ?? null,
            rule.maxPrivateLabelRatio ?? null,
            rule.minMapBehaviorScore ?? null,
            rule.minStoreCount ?? null,
            toSqlBool(rule.requiresBrandOverlap ?? false),
            toSqlBool(rule.requiresAdjacentBrands ?? false),
            rule.primaryAngle,
            rule.secondaryAngle ?? null,
            toJson(rule.selectionQuery ?? {}),
            rule.description ?? null,
            at,
        ]
    );
    return (result.changes ?? 0) > 0;
}

export async function listActiveLeverageRules(db: DatabaseManager): Promise<LeverageRuleRecord[]> {
    return db.query<LeverageRuleRecord>(
        `SELECT * FROM leverage_rules WHERE is_active = 1 ORDER BY priority ASC, id ASC`
    );
}

export async function countLeverageRules(db: DatabaseManager): Promise<number> {
    const row = await db.get<{ total: number | string }>(`SELECT COUNT(*) as total FROM leverage_rules`);
    return Number(row?.total ?? 0);
}

export async function upsertQualification(
    db: DatabaseManager,
    input: { leadId: string; qualifies: boolean; disqualifyReason: string | null; callId: string | null; schemaVersion: string },
    at: string
): Promise<void> {
    await db.run(
        `INSERT INTO lead_qualifications (lead_id, qualifies, disqualify_reason, call_id, schema_version, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(lead_id) DO UPDATE SET
            qualifies = excluded.qualifies,
            disqualify_reason = excluded.disqualify_reason,
            call_id = excluded.call_id,
            schema_version = excluded.schema_version,
            updated_at = excluded.updated_at`,
        [input.leadId, toSqlBool(input.qualifies), input.disqualifyReason, input.callId, input.schemaVersion, at]
    );
}

export async function getQualification(db: DatabaseManager, leadId: string): Promise<QualificationRecord | undefined> {
    return db.get<QualificationRecord>(`SELECT * FROM lead_qualifications WHERE lead_id = ?`, [leadId]);
}

export interface LeverageAssignmentInput {
    leadId: string;
    matchedRuleId: string | null;
    primaryAngle: string;
    secondaryAngle: string | null;
    matchReason: string;
    selectionQuery: ItemSelectionQuery;
    selectedItemIds: string[];
}

/** Una riga per lead: la rivalutazione sovrascrive, non duplica. */
export async function upsertLeverageAssignment(db: DatabaseManager, input: LeverageAssignmentInput, at: string): Promise<void> {
    await db.run(
        `INSERT INTO lead_leverage (
            lead_id, matched_rule_id, primary_angle, secondary_angle, match_reason, selection_query_json,
            selected_item_ids_json, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(lead_id) DO UPDATE SET
            matched_rule_id = excluded.matched_rule_id,
            primary_angle = excluded.primary_angle,
            secondary_angle = excluded.secondary_angle,
            match_reason = excluded.match_reason,
            selection_query_json = excluded.selection_query_json,
            selected_item_ids_json = excluded.selected_item_ids_json,
            updated_at = excluded.updated_at`,
        [
            input.leadId,
            input.matchedRuleId,
            input.primaryAngle,
            input.secondaryAngle,
            input.matchReason,
            toJson(input.selectionQuery),
            toJson(input.selectedItemIds),
            at,
        ]
    );
}

export async function getLeverageAssignment(db: DatabaseManager, leadId: string): Promise<LeverageAssignmentRecord | undefined> {
    return db.get<LeverageAssignmentRecord>(`SELECT * FROM lead_leverage WHERE lead_id = ?`, [leadId]);
}
