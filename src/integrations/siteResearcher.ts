/**
 * siteResearcher.ts — ricerca minima sul sito del lead.
 * Scarica la home entro il budget, salva lo snapshot HTML con hash SHA-256
 * e ricava solo piattaforma e presenza di testo di policy prezzi.
 */

import { createHash } from 'crypto';
import path from 'path';
import { AppConfig, config } from '../config';
import { emptyResearchResult } from '../core/collaboratorDefaults';
import { errorMessage } from '../core/errors';
import { fetchWithRetryPolicy, HttpStatusError } from '../core/integrationPolicy';
import { writePrivateFile } from '../security/filesystem';
import { logWarn } from '../telemetry/logger';
import { ResearchBudget, ResearchCollaborator, ResearchResult } from '../types/collaborators';

export type ResearchSettings = Pick<AppConfig, 'researchUserAgent' | 'artifactsDir'>;

const PLATFORM_SIGNATURES: ReadonlyArray<readonly [string, readonly string[]]> = [
    ['shopify', ['cdn.shopify.com', 'shopify.theme', 'myshopify.com']],
    ['bigcommerce', ['bigcommerce.com', 'stencil-utils']],
    ['woocommerce', ['woocommerce', 'wp-content/plugins/woocommerce']],
    ['magento', ['magento', 'mage/cookies']],
    ['amazon', ['amazon.com', 'amzn.to']],
    ['walmart', ['walmart.com']],
];

const POLICY_KEYWORDS = ['map pricing', 'minimum advertised price', 'msrp', 'pricing policy', 'authorized dealer'];

const EXCERPT_LENGTH = 2000;
const POLICY_EXCERPT_LENGTH = 300;

export function detectPlatform(html: string): string {
    const lowered = html.toLowerCase();
    for (const [platform, signatures] of PLATFORM_SIGNATURES) {
        if (signatures.some((signature) => lowered.includes(signature))) {
            return platform;
        }
    }
    return 'custom';
}

function stripTags(html: string): string {
    return html
        .replace(/<script[\s\S]*?<\/script>/gi, ' ')
        .replace(/<style[\s\S]*?<\/style>/gi, ' ')
        .replace(/<[^>]+>/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

export function detectPolicyText(html: string): { found: boolean; excerpt: string | null } {
    const lowered = html.toLowerCase();
    for (const keyword of POLICY_KEYWORDS) {
        const index = lowered.indexOf(keyword);
        if (index >= 0) {
            const excerpt = stripTags(html.slice(Math.max(0, index - 100), index + 200)).slice(0, POLICY_EXCERPT_LENGTH);
            return { found: true, excerpt };
        }
    }
    return { found: false, excerpt: null };
}

function normalizeSiteUrl(url: string): string {
    return url.includes('://') ? url : `https://${url}`;
}

export class SiteResearcher implements ResearchCollaborator {
    constructor(private readonly settings: ResearchSettings = config) {}

    async research(url: string, leadId: string, budget: ResearchBudget): Promise<ResearchResult> {
        const target = normalizeSiteUrl(url);
        try {
            const response = await fetchWithRetryPolicy(
                target,
                {
                    method: 'GET',
                    headers: { 'user-agent': this.settings.researchUserAgent, accept: 'text/html' },
                    redirect: 'follow',
                    ...(budget.signal ? { signal: budget.signal } : {}),
                },
                {
                    integration: 'site_research',
                    circuitKey: `site_research:${new URL(target).hostname}`,
                    timeoutMs: budget.maxDurationMs,
                    maxAttempts: 1,
                }
            );
            if (!response.ok) {
                throw new HttpStatusError('site_research', response.status, '');
            }
            const html = await response.text();

            const artifactPath = path.resolve(this.settings.artifactsDir, leadId, 'home.html');
            writePrivateFile(artifactPath, html);
            const artifactHash = createHash('sha256').update(html, 'utf8').digest('hex');
            const policy = detectPolicyText(html);

            return {
                ...emptyResearchResult(null),
                success: true,
                platform: detectPlatform(html),
                siteExcerpt: stripTags(html).slice(0, EXCERPT_LENGTH),
                policyTextFound: policy.found,
                policyTextExcerpt: policy.excerpt,
                artifactPath,
                artifactHash,
                pagesFetched: 1,
            };
        } catch (error) {
            await logWarn('research.fetch_failed', { leadId, url: target, error: errorMessage(error) });
            return emptyResearchResult(errorMessage(error));
        }
    }
}
