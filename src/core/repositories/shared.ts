export function parsePayload(raw: string | null | undefined): Record<string, unknown> {
    if (!raw) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
            return { ...parsed };
        }
        return {};
    } catch {
        return {};
    }
}

export function parseStringArray(raw: string | null | undefined): string[] {
    if (!raw) return [];
    try {
        const parsed: unknown = JSON.parse(raw);
        if (!Array.isArray(parsed)) return [];
        return parsed.filter((item): item is string => typeof item === 'string');
    } catch {
        return [];
    }
}

export function toJson(value: unknown): string {
    return JSON.stringify(value ?? null);
}

export function toSqlBool(value: boolean): number {
    return value ? 1 : 0;
}

export function normalizeTextValue(value: string | null | undefined): string {
    return (value ?? '').trim();
}

export function nullableText(value: string | null | undefined): string | null {
    const normalized = normalizeTextValue(value);
    return normalized ? normalized : null;
}

/** Identità del lead: host+path in minuscolo, senza slash finale. */
export function normalizeWebsite(value: string | null | undefined): string | null {
    const trimmed = normalizeTextValue(value).toLowerCase();
    if (!trimmed) return null;
    return trimmed.replace(/\/+$/, '') || null;
}

export function normalizeEmail(value: string | null | undefined): string | null {
    const trimmed = normalizeTextValue(value).toLowerCase();
    return trimmed.includes('@') ? trimmed : null;
}

export function emailDomain(email: string): string | null {
    const at = email.lastIndexOf('@');
    if (at < 0 || at === email.length - 1) return null;
    return email.slice(at + 1).toLowerCase();
}

export function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    const code = 'code' in error ? String(error.code) : '';
    if (code === '23505' || code === 'SQLITE_CONSTRAINT') {
        return true;
    }
    return /UNIQUE constraint failed|duplicate key value/i.test(error.message);
}
