/**
 * src/extractors/seek.ts
 *
 * Seek adapter: search-results links and detail-page fields.
 *
 * Both functions are pure over the rendered HTML; navigation, pagination and
 * skip filtering belong to the orchestrator.
 *
 *   listing → absolute /job/<id> URLs, tracking query stripped so the same
 *             job always produces the same URL (and skip-set hits work)
 *   detail  → title, advertiser, location, salary label, description,
 *             "Posted 3d ago" resolved against the current date
 */

import * as cheerio from 'cheerio';
import { SEEK_BASE_URL, SeekSelectors, buildSeekSearchUrl } from '../config/seek.js';
import type { RawJobFields, SourceAdapter } from '../sources/types.js';
import { parseRelativePostedDate } from '../utils/dates.js';
import { htmlToText, normalizeWhitespace, toAbsoluteUrl } from '../utils/html.js';
import { recencyWindowDays } from '../utils/runPolicy.js';

// ─── Hub Extractor ────────────────────────────────────────────────────────────

export function extractSeekLinks(html: string, pageUrl: string = SEEK_BASE_URL): string[] {
    if (html.includes(SeekSelectors.hub.noResultsText)) return [];

    const $ = cheerio.load(html);
    const links: string[] = [];

    $(SeekSelectors.hub.jobLink).each((_, el) => {
        const absolute = toAbsoluteUrl($(el).attr('href'), pageUrl);
        if (!absolute) return;
        const url = new URL(absolute);
        url.search = '';
        url.hash = '';
        links.push(url.toString());
    });

    return links;
}

// ─── Detail Extractor ─────────────────────────────────────────────────────────

function textOf($: cheerio.CheerioAPI, selector: string): string | undefined {
    const text = normalizeWhitespace($(selector).first().text());
    return text || undefined;
}

function findPostedLabel($: cheerio.CheerioAPI): string | undefined {
    let label: string | undefined;
    $(SeekSelectors.detail.postedDate).each((_, el) => {
        const text = normalizeWhitespace($(el).text());
        if (/^posted\b/i.test(text) && text.length < 40) {
            label = text;
            return false;
        }
        return undefined;
    });
    return label;
}

export function extractSeekDetail(html: string, _url: string, now: Date = new Date()): RawJobFields {
    const $ = cheerio.load(html);

    const descriptionHtml = $(SeekSelectors.detail.description).first().html() ?? $('body').html() ?? '';
    const location = textOf($, SeekSelectors.detail.location);
    const posted = findPostedLabel($);

    return {
        title: textOf($, SeekSelectors.detail.title),
        company: textOf($, SeekSelectors.detail.company),
        description: htmlToText(descriptionHtml),
        locations: location ? [location] : [],
        salaryText: textOf($, SeekSelectors.detail.salary),
        postedAt: posted ? parseRelativePostedDate(posted, now) : undefined,
    };
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export const seekAdapter: SourceAdapter = {
    platform: 'seek',
    searchTerms: (settings) => settings.searchKeywords,
    buildListingUrl: (term, pageIndex, policy) =>
        buildSeekSearchUrl(term, pageIndex + 1, recencyWindowDays(policy)),
    extractLinks: extractSeekLinks,
    extractDetail: (html, url) => extractSeekDetail(html, url),
};
