const MAX_RECURSION_DEPTH = 6;
const REDACTED = '[REDACTED]';

const SENSITIVE_KEY_PATTERN = /(token|secret|password|api_?key|apikey|cookie|authorization|bearer)/i;

const JWT_PATTERN = /\b[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\b/g;
const API_KEY_PATTERN = /\b(sk|pk|rk)[-_][A-Za-z0-9_-]{16,}\b/gi;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/-]{12,}=*/gi;
const QUERY_KEY_PATTERN = /([?&]api_key=)[^&\s]+/gi;

export function sanitizeString(input: string): string {
    return input
        .replace(JWT_PATTERN, REDACTED)
        .replace(API_KEY_PATTERN, REDACTED)
        .replace(BEARER_PATTERN, `Bearer ${REDACTED}`)
        .replace(QUERY_KEY_PATTERN, `$1${REDACTED}`);
}

function sanitizeValue(value: unknown, depth: number): unknown {
    if (value === null || value === undefined) {
        return value;
    }
    if (typeof value === 'string') {
        return sanitizeString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Error) {
        return sanitizeString(value.message);
    }
    if (Array.isArray(value)) {
        if (depth > MAX_RECURSION_DEPTH) {
            return ['[MAX_DEPTH_REACHED]'];
        }
        return value.map((item) => sanitizeValue(item, depth + 1));
    }
    if (typeof value === 'object') {
        if (depth > MAX_RECURSION_DEPTH) {
            return { note: '[MAX_DEPTH_REACHED]' };
        }
        const output: Record<string, unknown> = {};
        for (const [key, nested] of Object.entries(value)) {
            output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(nested, depth + 1);
        }
        return output;
    }
    return String(value);
}

export function sanitizeForLogs(payload: Record<string, unknown>): Record<string, unknown> {
    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
        output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(value, 1);
    }
    return output;
}
