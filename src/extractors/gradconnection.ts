/**
 * src/extractors/gradconnection.ts
 *
 * GradConnection adapter.
 *
 * KEY CHALLENGES
 * ──────────────
 * 1. END OF RESULTS: GradConnection never renders an empty page. Past the
 *    last result it shows a "notify me" card instead, so links are only taken
 *    up to that card, and a page that starts with it counts as empty.
 *
 * 2. EMBEDDED STATE: the detail page assigns the campaign to
 *    `window.__initialState__` in an inline script. The object literal is cut
 *    out of the script text and parsed as JSON; the overview list and the
 *    "box content" list are fallbacks when it is missing.
 *
 * 3. EVENTS: info sessions use the job layout. They are recognised by the
 *    "Sign up to event" button or an "Event" job type and yield null.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import {
    GRADCONNECTION_BASE_URL,
    GradConnectionSelectors,
    buildGradConnectionSearchUrl,
} from '../config/gradconnection.js';
import type { RawJobFields, SourceAdapter, StructuredSalary } from '../sources/types.js';
import { htmlToText, normalizeWhitespace, toAbsoluteUrl } from '../utils/html.js';

const sel = GradConnectionSelectors;

// ─── Embedded State ───────────────────────────────────────────────────────────

const AmountSchema = z.union([z.number(), z.string()]);

const CampaignSchema = z.object({
    locations: z.array(z.string()).optional().catch(undefined),
    salary: z
        .union([
            z.string(),
            z.object({
                min_salary: AmountSchema.nullish(),
                max_salary: AmountSchema.nullish(),
                details: z.string().nullish(),
            }),
        ])
        .nullish()
        .catch(undefined),
    closing_date: z.string().nullish().catch(undefined),
});

const InitialStateSchema = z.object({
    campaignstore: z.object({ campaign: CampaignSchema }),
});

export type GradConnectionCampaign = z.infer<typeof CampaignSchema>;

/**
 * Returns the `{...}` literal starting at `start`, matching braces outside
 * string literals. Null when the braces never balance.
 */
export function sliceJsonObject(text: string, start: number): string | null {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === '"') inString = false;
            continue;
        }
        if (ch === '"') inString = true;
        else if (ch === '{') depth++;
        else if (ch === '}') {
            depth--;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }
    return null;
}

export function extractInitialState($: cheerio.CheerioAPI): GradConnectionCampaign | null {
    let campaign: GradConnectionCampaign | null = null;

    $('script').each((_, el) => {
        const text = $(el).text();
        const marker = text.indexOf(sel.detail.stateMarker);
        if (marker === -1) return undefined;

        const open = text.indexOf('{', marker);
        const literal = open === -1 ? null : sliceJsonObject(text, open);
        if (!literal) return undefined;

        let parsed: unknown;
        try {
            parsed = JSON.parse(literal);
        } catch {
            // Not plain JSON (functions, undefined); fall back to the markup.
            return false;
        }

        const result = InitialStateSchema.safeParse(parsed);
        if (result.success) campaign = result.data.campaignstore.campaign;
        return false;
    });

    return campaign;
}

// ─── Markup Helpers ───────────────────────────────────────────────────────────

/** Value of the overview `<dt>label</dt><dd>value</dd>` pair. */
function overviewValue($: cheerio.CheerioAPI, label: string): string | undefined {
    let value: string | undefined;
    $(sel.detail.overview).first().find('dt').each((_, dt) => {
        if (!$(dt).text().includes(label)) return undefined;
        const text = normalizeWhitespace($(dt).next('dd').text());
        value = text || undefined;
        return false;
    });
    return value;
}

/** Value of the `<li><strong>label</strong> value</li>` entry in the box content list. */
function boxContentValue($: cheerio.CheerioAPI, matches: (label: string) => boolean): string | undefined {
    let value: string | undefined;
    $(sel.detail.boxContent).first().find('li').each((_, li) => {
        const strong = $(li).find('strong').first();
        const label = normalizeWhitespace(strong.text()).toLowerCase();
        if (!label || !matches(label)) return undefined;
        const text = normalizeWhitespace($(li).text().replace(strong.text(), ''));
        value = text || undefined;
        return false;
    });
    return value;
}

export function isEventPosting($: cheerio.CheerioAPI): boolean {
    const hasEventButton = $(sel.detail.eventButton)
        .toArray()
        .some((el) => $(el).text().toLowerCase().includes('sign up to event'));
    if (hasEventButton) return true;

    const boxType = boxContentValue($, (label) => label.includes('job type'));
    if (boxType?.toLowerCase().includes('event')) return true;

    const overviewType = overviewValue($, 'Job Type');
    return overviewType?.toLowerCase().includes('event') ?? false;
}

function locationsFrom($: cheerio.CheerioAPI, campaign: GradConnectionCampaign | null): string[] {
    if (campaign?.locations && campaign.locations.length > 0) return campaign.locations;

    const overview = overviewValue($, 'Location');
    if (overview) return [overview];

    const box = boxContentValue($, (label) => label.includes('location'));
    if (box) {
        return box
            .replace('...show more', '')
            .split(',')
            .map((part) => part.trim())
            .filter(Boolean);
    }
    return [];
}

function salaryFrom(
    $: cheerio.CheerioAPI,
    campaign: GradConnectionCampaign | null,
): { salary?: StructuredSalary; salaryText?: string } {
    const salary = campaign?.salary;
    if (typeof salary === 'string' && salary.trim()) return { salaryText: salary };
    if (salary && typeof salary === 'object') {
        const min = salary.min_salary ?? null;
        const max = salary.max_salary ?? null;
        if (min !== null || max !== null) return { salary: { min, max } };
        if (salary.details?.trim()) return { salaryText: salary.details };
    }

    const overview = overviewValue($, 'Salary');
    return overview ? { salaryText: overview } : {};
}

function descriptionFrom($: cheerio.CheerioAPI): string {
    for (const selector of sel.detail.description) {
        const html = $(selector).first().html();
        if (html) return htmlToText(html);
    }
    return htmlToText($('body').html() ?? '');
}

// ─── Hub Extractor ────────────────────────────────────────────────────────────

export function extractGradConnectionLinks(html: string, pageUrl: string = GRADCONNECTION_BASE_URL): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    for (const el of $(sel.hub.jobLink).toArray()) {
        const href = $(el).attr('href');
        if (!href) continue;
        if (sel.hub.notifyMeMarkers.some((marker) => href.includes(marker))) break;
        const url = toAbsoluteUrl(href, pageUrl);
        if (url) links.push(url);
    }

    return links;
}

// ─── Detail Extractor ─────────────────────────────────────────────────────────

export function extractGradConnectionDetail(html: string): RawJobFields | null {
    const $ = cheerio.load(html);
    if (isEventPosting($)) return null;

    const campaign = extractInitialState($);
    const title = normalizeWhitespace($(sel.detail.title).first().text());
    const company = normalizeWhitespace($(sel.detail.company).first().text());

    return {
        title: title || undefined,
        company: company || undefined,
        description: descriptionFrom($),
        locations: locationsFrom($, campaign),
        ...salaryFrom($, campaign),
        postedAt: boxContentValue($, (label) => label.includes('posted')),
        closingDate:
            campaign?.closing_date ??
            boxContentValue($, (label) => label.includes('deadline') || label.includes('closing')),
    };
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export const gradConnectionAdapter: SourceAdapter = {
    platform: 'gradconnection',
    searchTerms: (settings) => settings.gradconnectionKeywords,
    buildListingUrl: (term, pageIndex) => buildGradConnectionSearchUrl(term, pageIndex + 1),
    extractLinks: extractGradConnectionLinks,
    extractDetail: (html) => extractGradConnectionDetail(html),
};
