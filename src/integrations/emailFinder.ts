/**
 * emailFinder.ts — ricerca dell'indirizzo acquisti sul sito del lead.
 * Pagine di contatto, poi home, poi indirizzi di ruolo sul dominio con record MX.
 */

import { promises as dns } from 'dns';
import { AppConfig, config } from '../config';
import { errorMessage } from '../core/errors';
import { fetchWithRetryPolicy } from '../core/integrationPolicy';
import { logInfo } from '../telemetry/logger';
import { EmailFinder } from '../types/collaborators';

export type EmailFinderSettings = Pick<AppConfig, 'researchUserAgent'>;

const CONTACT_PATHS = [
    '/contact',
    '/contact-us',
    '/contactus',
    '/about',
    '/about-us',
    '/team',
    '/wholesale',
    '/wholesale-info',
    '/partnerships',
    '/business',
    '/business-inquiries',
];

// ordine di preferenza delle caselle di ruolo
const ROLE_PREFIXES = [
    /^purchasing@/,
    /^buyers?@/,
    /^wholesale@/,
    /^sales@/,
    /^orders?@/,
    /^procurement@/,
    /^vendor@/,
    /^supplier@/,
    /^contact@/,
    /^info@/,
];

const GUESSED_MAILBOX = 'purchasing';

const FREE_MAIL_DOMAINS = new Set(['gmail.com', 'outlook.com', 'yahoo.com', 'hotmail.com', 'aol.com']);

// asset con `@` nel nome (logo@2x.png) non sono indirizzi
const ASSET_SUFFIX = /\.(png|jpe?g|gif|svg|webp|css|js)$/;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const PAGE_TIMEOUT_MS = 10_000;

/** Indirizzi distinti trovati nell'HTML, minuscoli, senza webmail né asset. */
export function extractEmails(html: string): string[] {
    const found = new Set<string>();
    for (const match of html.matchAll(EMAIL_PATTERN)) {
        const address = match[0].toLowerCase();
        const domain = address.slice(address.lastIndexOf('@') + 1);
        if (FREE_MAIL_DOMAINS.has(domain) || ASSET_SUFFIX.test(address)) continue;
        found.add(address);
    }
    return [...found];
}

/** Prima casella di ruolo in ordine di preferenza, altrimenti il primo indirizzo trovato. */
export function pickContactEmail(addresses: readonly string[]): string | null {
    for (const prefix of ROLE_PREFIXES) {
        const match = addresses.find((address) => prefix.test(address));
        if (match) return match;
    }
    return addresses[0] ?? null;
}

export function siteBaseUrl(website: string): { baseUrl: string; domain: string } | null {
    try {
        const url = new URL(website.includes('://') ? website : `https://${website}`);
        return { baseUrl: url.origin, domain: url.hostname.toLowerCase().replace(/^www\./, '') };
    } catch {
        return null;
    }
}

export class SiteEmailFinder implements EmailFinder {
    constructor(private readonly settings: EmailFinderSettings = config) {}

    async findEmail(companyName: string, website: string): Promise<string | null> {
        const site = siteBaseUrl(website);
        if (!site) return null;

        for (const pagePath of [...CONTACT_PATHS, '']) {
            const html = await this.fetchPage(`${site.baseUrl}${pagePath}`, site.domain);
            const email = html ? pickContactEmail(extractEmails(html)) : null;
            if (email) {
                await logInfo('enrich.email.found', { companyName, source: pagePath || '/' });
                return email;
            }
        }

        // indirizzo indovinato solo su dominio con record MX
        if (await this.hasMailExchanger(site.domain)) {
            const guessed = `${GUESSED_MAILBOX}@${site.domain}`;
            await logInfo('enrich.email.guessed', { companyName, domain: site.domain });
            return guessed;
        }
        return null;
    }

    private async fetchPage(url: string, domain: string): Promise<string | null> {
        try {
            const response = await fetchWithRetryPolicy(
                url,
                { method: 'GET', headers: { 'user-agent': this.settings.researchUserAgent, accept: 'text/html' }, redirect: 'follow' },
                { integration: 'email_finder', circuitKey: `email_finder:${domain}`, timeoutMs: PAGE_TIMEOUT_MS, maxAttempts: 1 }
            );
            return response.status === 200 ? await response.text() : null;
        } catch (error) {
            await logInfo('enrich.page.skipped', { url, error: errorMessage(error) });
            return null;
        }
    }

    private async hasMailExchanger(domain: string): Promise<boolean> {
        try {
            return (await dns.resolveMx(domain)).length > 0;
        } catch {
            return false;
        }
    }
}
