import { DatabaseManager } from '../../db';
import { ObjectionTemplateRecord } from '../../types/domain';
import { toJson, toSqlBool } from './shared';

export interface ObjectionTemplateInput {
    objectionType: string;
    patternKeywords: string[];
    templateSubject?: string | null;
    templateBody: string;
    isActive?: boolean;
    version?: number;
}

export async function insertObjectionTemplate(db: DatabaseManager, input: ObjectionTemplateInput): Promise<boolean> {
    const result = await db.run(
        `INSERT OR IGNORE INTO objection_templates (objection_type, pattern_keywords_json, template_subject, template_body, is_active, version)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
            input.objectionType,
            toJson(input.patternKeywords),
            input.templateSubject ?? null,
            input.templateBody,
            toSqlBool(input.isActive ?? true),
            input.version ?? 1,
        ]
    );
    return (result.changes ?? 0) > 0;
}

export async function getActiveObjectionTemplate(
    db: DatabaseManager,
    objectionType: string
): Promise<ObjectionTemplateRecord | undefined> {
    return db.get<ObjectionTemplateRecord>(
        `SELECT * FROM objection_templates WHERE objection_type = ? AND is_active = 1`,
        [objectionType]
    );
}

export async function countObjectionTemplates(db: DatabaseManager): Promise<number> {
    const row = await db.get<{ total: number | string }>(`SELECT COUNT(*) as total FROM objection_templates`);
    return Number(row?.total ?? 0);
}
