/**
 * src/extractors/prosple.ts
 *
 * Prosple adapter.
 *
 * Detail pages embed a schema.org JobPosting as JSON-LD. It is the primary
 * source for every field; the markup is only a fallback for title and
 * description. Each JSON-LD field is validated on its own so one odd field
 * (say, a baseSalary shaped differently) does not discard the rest.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { PROSPLE_BASE_URL, ProspleSelectors, buildProspleSearchUrl } from '../config/prosple.js';
import type { RawJobFields, SourceAdapter, StructuredSalary } from '../sources/types.js';
import { htmlToText, normalizeWhitespace, toAbsoluteUrl } from '../utils/html.js';

// ─── JSON-LD Schema ───────────────────────────────────────────────────────────

const AmountSchema = z.union([z.number(), z.string()]);

const QuantitativeValueSchema = z.object({
    minValue: AmountSchema.nullish(),
    maxValue: AmountSchema.nullish(),
    value: AmountSchema.nullish(),
    unitText: z.string().nullish(),
});

const BaseSalarySchema = z.union([
    z.string(),
    z.number(),
    z.object({
        value: z.union([AmountSchema, QuantitativeValueSchema]).nullish(),
        unitText: z.string().nullish(),
    }),
]);

const PlaceSchema = z.object({
    address: z.union([
        z.string(),
        z.object({ addressLocality: z.string().nullish() }),
    ]).nullish(),
});

const JsonLdJobPostingSchema = z.object({
    '@type': z.union([z.string(), z.array(z.string())]),
    title: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    datePosted: z.string().optional().catch(undefined),
    validThrough: z.string().optional().catch(undefined),
    hiringOrganization: z
        .union([z.string(), z.object({ name: z.string().nullish() })])
        .optional()
        .catch(undefined),
    jobLocation: z.union([PlaceSchema, z.array(PlaceSchema)]).optional().catch(undefined),
    baseSalary: BaseSalarySchema.optional().catch(undefined),
});

export type JsonLdJobPosting = z.infer<typeof JsonLdJobPostingSchema>;

function isJobPostingType(type: string | string[]): boolean {
    return Array.isArray(type) ? type.includes('JobPosting') : type === 'JobPosting';
}

/** First schema.org JobPosting among the page's JSON-LD blocks, or null. */
export function findJsonLdJobPosting($: cheerio.CheerioAPI): JsonLdJobPosting | null {
    let found: JsonLdJobPosting | null = null;

    $(ProspleSelectors.detail.jsonLd).each((_, el) => {
        let parsed: unknown;
        try {
            parsed = JSON.parse($(el).text());
        } catch {
            // Malformed block; other blocks may still hold the posting.
            return undefined;
        }

        const candidates: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
        for (const candidate of candidates) {
            const result = JsonLdJobPostingSchema.safeParse(candidate);
            if (result.success && isJobPostingType(result.data['@type'])) {
                found = result.data;
                return false;
            }
        }
        return undefined;
    });

    return found;
}

// ─── Field Mappers ────────────────────────────────────────────────────────────

function companyOf(posting: JsonLdJobPosting): string | undefined {
    const org = posting.hiringOrganization;
    if (typeof org === 'string') return org;
    return org?.name ?? undefined;
}

function locationsOf(posting: JsonLdJobPosting): string[] {
    const places = posting.jobLocation;
    if (!places) return [];
    const list = Array.isArray(places) ? places : [places];

    const cities: string[] = [];
    for (const place of list) {
        const address = place.address;
        if (typeof address === 'string') {
            cities.push(address);
        } else if (address?.addressLocality) {
            cities.push(address.addressLocality);
        }
    }
    return cities;
}

function salaryOf(posting: JsonLdJobPosting): { salary?: StructuredSalary; salaryText?: string } {
    const base = posting.baseSalary;
    if (base === undefined) return {};
    if (typeof base === 'string') return { salaryText: base };
    if (typeof base === 'number') return { salary: { min: base, max: base } };

    const value = base.value;
    if (value === undefined || value === null) return {};
    if (typeof value === 'number') return { salary: { min: value, max: value, interval: base.unitText } };
    if (typeof value === 'string') return { salaryText: value };

    const min = value.minValue ?? value.value ?? null;
    const max = value.maxValue ?? value.value ?? null;
    if (min === null && max === null) return {};
    return { salary: { min, max, interval: value.unitText ?? base.unitText } };
}

// ─── Hub Extractor ────────────────────────────────────────────────────────────

export function extractProspleLinks(html: string, pageUrl: string = PROSPLE_BASE_URL): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    $(ProspleSelectors.hub.jobLink).each((_, el) => {
        const url = toAbsoluteUrl($(el).attr('href'), pageUrl);
        if (url) links.push(url);
    });

    return links;
}

// ─── Detail Extractor ─────────────────────────────────────────────────────────

export function extractProspleDetail(html: string): RawJobFields {
    const $ = cheerio.load(html);
    const posting = findJsonLdJobPosting($);

    const heading = normalizeWhitespace($(ProspleSelectors.detail.title).first().text());
    const description = posting?.description
        ? htmlToText(posting.description)
        : htmlToText($('body').html() ?? '');

    return {
        title: posting?.title || heading || undefined,
        company: posting ? companyOf(posting) : undefined,
        description,
        locations: posting ? locationsOf(posting) : [],
        ...(posting ? salaryOf(posting) : {}),
        postedAt: posting?.datePosted,
        closingDate: posting?.validThrough,
    };
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export function createProspleAdapter(itemsPerPage: number): SourceAdapter {
    return {
        platform: 'prosple',
        searchTerms: (settings) => settings.searchKeywords,
        buildListingUrl: (term, pageIndex, policy) =>
            buildProspleSearchUrl(term, pageIndex, itemsPerPage, !policy.initialRun),
        extractLinks: extractProspleLinks,
        extractDetail: (html) => extractProspleDetail(html),
    };
}
