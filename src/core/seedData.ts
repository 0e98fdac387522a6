/**
 * seedData.ts — Dati di riferimento iniziali
 *
 * Regole di leverage, articoli a catalogo e template di obiezione letti da
 * data/*.json. Ogni tabella viene popolata solo se vuota.
 */

import fs from 'fs';
import { z } from 'zod';
import { resolveDataFile } from '../config/env';
import { PipelineConfig } from '../config/types';
import { DatabaseManager } from '../db';
import { logInfo, logWarn } from '../telemetry/logger';
import {
    countCatalogItems,
    countLeverageRules,
    countObjectionTemplates,
    insertCatalogItem,
    insertLeverageRule,
    insertObjectionTemplate,
} from './repositories';

const nullableNumber = z.number().nullable().optional();

const leverageRuleSchema = z.object({
    id: z.string().min(1),
    priority: z.number().int(),
    isActive: z.boolean().optional(),
    channelMatch: z.string().nullable().optional(),
    minScaleScore: nullableNumber,
    maxPrivateLabelRatio: nullableNumber,
    minMapBehaviorScore: nullableNumber,
    minStoreCount: nullableNumber,
    requiresBrandOverlap: z.boolean().optional(),
    requiresAdjacentBrands: z.boolean().optional(),
    primaryAngle: z.string().min(1),
    secondaryAngle: z.string().nullable().optional(),
    selectionQuery: z
        .object({
            priorityFirst: z.boolean().optional(),
            cap: z.number().int().positive().optional(),
            categories: z.array(z.string()).optional(),
        })
        .optional(),
    description: z.string().nullable().optional(),
});

const catalogItemSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    categories: z.array(z.string()),
    discountPct: z.number().min(0).max(100),
    minimumOrderValue: nullableNumber,
    leadTimeMinDays: nullableNumber,
    leadTimeMaxDays: nullableNumber,
    origin: z.string().nullable().optional(),
    channelFit: z.array(z.string()),
    replenishable: z.boolean().optional(),
    catalogUrl: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    active: z.boolean().optional(),
});

const objectionTemplateSchema = z.object({
    objectionType: z.string().min(1),
    patternKeywords: z.array(z.string()),
    templateSubject: z.string().nullable().optional(),
    templateBody: z.string().min(1),
    isActive: z.boolean().optional(),
    version: z.number().int().positive().optional(),
});

export interface SeedFiles {
    leverageRules: string;
    catalogItems: string;
    objectionTemplates: string;
}

/** Per tabella: righe inserite, oppure `null` se la tabella era già popolata. */
export interface SeedReport {
    leverageRules: number | null;
    catalogItems: number | null;
    objectionTemplates: number | null;
}

export function defaultSeedFiles(): SeedFiles {
    return {
        leverageRules: resolveDataFile('leverage_rules.json'),
        catalogItems: resolveDataFile('catalog_items.json'),
        objectionTemplates: resolveDataFile('objection_templates.json'),
    };
}

function readJsonArray<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const parsed = z.array(schema).safeParse(raw);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        throw new Error(`File seed non valido ${filePath}: ${first ? `${first.path.join('.')} ${first.message}` : 'formato errato'}`);
    }
    return parsed.data;
}

export async function seedReferenceData(
    db: DatabaseManager,
    policy: Pick<PipelineConfig, 'priorityDiscountThreshold'>,
    at: string,
    files: SeedFiles = defaultSeedFiles()
): Promise<SeedReport> {
    const rules = readJsonArray(files.leverageRules, leverageRuleSchema);
    const items = readJsonArray(files.catalogItems, catalogItemSchema);
    const templates = readJsonArray(files.objectionTemplates, objectionTemplateSchema);
    for (const rule of rules.filter((candidate) => candidate.requiresBrandOverlap)) {
        // predicato senza lista di riferimento: la regola non corrisponderà mai
        await logWarn('seed.rule.brand_overlap_unsupported', { ruleId: rule.id });
    }

    const report = await db.transaction(async (tx): Promise<SeedReport> => {
        const result: SeedReport = { leverageRules: null, catalogItems: null, objectionTemplates: null };

        if ((await countLeverageRules(tx)) === 0) {
            let inserted = 0;
            for (const rule of rules) {
                if (await insertLeverageRule(tx, rule, at)) inserted++;
            }
            result.leverageRules = inserted;
        }

        if ((await countCatalogItems(tx)) === 0) {
            let inserted = 0;
            for (const item of items) {
                if (await insertCatalogItem(tx, item, policy.priorityDiscountThreshold, at)) inserted++;
            }
            result.catalogItems = inserted;
        }

        if ((await countObjectionTemplates(tx)) === 0) {
            let inserted = 0;
            for (const template of templates) {
                if (await insertObjectionTemplate(tx, template)) inserted++;
            }
            result.objectionTemplates = inserted;
        }

        return result;
    });

    await logInfo('seed.completed', { ...report });
    return report;
}
