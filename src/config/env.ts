import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';
import { EmailProviderName } from './types';

export function loadDotEnv(): void {
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
}

export function parseIntEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseFloatEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolEnv(name: string, defaultValue: boolean): boolean {
    const val = process.env[name];
    if (val === undefined || val === '') return defaultValue;
    return val.toLowerCase() === 'true' || val === '1';
}

export function parseStringEnv(name: string, fallback: string = ''): string {
    const raw = process.env[name];
    if (raw === undefined) return fallback;
    return raw.trim();
}

export function parseCsvEnv(name: string): string[] {
    const raw = parseStringEnv(name);
    if (!raw) return [];
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/** Offset in ore per touch, es. "0,24,96,168,720". Valori non numerici o negativi invalidano l'intera lista. */
export function parseHoursListEnv(name: string, fallback: readonly number[]): number[] {
    const items = parseCsvEnv(name);
    if (items.length === 0) return [...fallback];
    const parsed = items.map((item) => Number.parseFloat(item));
    if (parsed.some((value) => !Number.isFinite(value) || value < 0)) {
        return [...fallback];
    }
    return parsed;
}

export function parseEmailProviderEnv(name: string, fallback: EmailProviderName): EmailProviderName {
    const raw = parseStringEnv(name, fallback).toLowerCase();
    if (raw === 'smartlead' || raw === 'instantly' || raw === 'none') {
        return raw;
    }
    return fallback;
}

export function isLocalAiEndpoint(baseUrl: string): boolean {
    try {
        const url = new URL(baseUrl);
        const host = url.hostname.toLowerCase();
        if (host === 'localhost' || host === '127.0.0.1' || host === '::1') {
            return true;
        }
        return host.endsWith('.local');
    } catch {
        return false;
    }
}

export function isAiRequestConfigured(baseUrl: string, apiKey: string): boolean {
    return isLocalAiEndpoint(baseUrl) || !!apiKey;
}

export function resolvePathFromEnv(name: string, fallbackRelativePath: string): string {
    const raw = process.env[name];
    if (!raw) {
        return path.resolve(process.cwd(), fallbackRelativePath);
    }
    return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

/** Cerca un file dati prima in ./data (cwd) poi accanto al codice compilato. */
export function resolveDataFile(fileName: string): string {
    const cwdCandidate = path.resolve(process.cwd(), 'data', fileName);
    if (fs.existsSync(cwdCandidate)) {
        return cwdCandidate;
    }
    const bundledCandidate = path.resolve(__dirname, '..', '..', 'data', fileName);
    if (fs.existsSync(bundledCandidate)) {
        return bundledCandidate;
    }
    throw new Error(`File dati non trovato: ${fileName}`);
}
