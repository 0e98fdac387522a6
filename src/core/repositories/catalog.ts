/**
 * repositories/catalog.ts
 * Articoli promozionali: dati di riferimento immutabili durante un matching.
 */

import { DatabaseManager } from '../../db';
import { CatalogItemRecord } from '../../types/domain';
import { toJson, toSqlBool } from './shared';

export interface CatalogItemInput {
    id: string;
    name: string;
    categories: string[];
    discountPct: number;
    minimumOrderValue?: number | null;
    leadTimeMinDays?: number | null;
    leadTimeMaxDays?: number | null;
    origin?: string | null;
    channelFit: string[];
    replenishable?: boolean;
    catalogUrl?: string | null;
    notes?: string | null;
    active?: boolean;
}

/** Il flag priority è derivato dalla soglia di sconto al momento dell'inserimento. */
export async function insertCatalogItem(
    db: DatabaseManager,
    item: CatalogItemInput,
    priorityDiscountThreshold: number,
    at: string
): Promise<boolean> {
    const result = await db.run(
        `INSERT OR IGNORE INTO catalog_items (
            id, name, categories_json, discount_pct, minimum_order_value, lead_time_min_days, lead_time_max_days,
            origin, channel_fit_json, replenishable, priority, catalog_url, notes, active, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
            item.id,
            item.name,
            toJson(item.categories),
            item.discountPct,
            item.minimumOrderValue ?? null,
            item.leadTimeMinDays ?? null,
            item.leadTimeMaxDays ?? null,
            item.origin ?? null,
            toJson(item.channelFit),
            toSqlBool(item.replenishable ?? false),
            toSqlBool(item.discountPct >= priorityDiscountThreshold),
            item.catalogUrl ?? null,
            item.notes ?? null,
            toSqlBool(item.active ?? true),
            at,
        ]
    );
    return (result.changes ?? 0) > 0;
}

export async function listActiveCatalogItems(db: DatabaseManager): Promise<CatalogItemRecord[]> {
    return db.query<CatalogItemRecord>(`SELECT * FROM catalog_items WHERE active = 1 ORDER BY id ASC`);
}

export async function getCatalogItemsByIds(db: DatabaseManager, ids: string[]): Promise<CatalogItemRecord[]> {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(', ');
    const rows = await db.query<CatalogItemRecord>(`SELECT * FROM catalog_items WHERE id IN (${placeholders})`, ids);
    const byId = new Map(rows.map((row) => [row.id, row]));
    return ids.flatMap((id) => {
        const row = byId.get(id);
        return row ? [row] : [];
    });
}

export async function countCatalogItems(db: DatabaseManager): Promise<number> {
    const row = await db.get<{ total: number | string }>(`SELECT COUNT(*) as total FROM catalog_items`);
    return Number(row?.total ?? 0);
}
