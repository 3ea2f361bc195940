/**
 * src/sources/types.ts
 *
 * Shared types for every job source.
 *
 * Browser-driven sources (Seek, Prosple, GradConnection) implement
 * SourceAdapter and are driven by the orchestrator. Each adapter only knows
 * how to build its listing URL and how to read its own markup; pagination,
 * skip filtering, concurrency and normalisation live in one place.
 */

import type { ScraperSettings } from '../config/settings.js';

// ─── Normalised Output ────────────────────────────────────────────────────────

export interface Location {
    city: string;
    state?: string;
}

export interface AnnualSalary {
    annualMin: number;
    annualMax: number;
}

export interface JobPosting {
    title: string;
    company: string;
    description: string;
    locations: Location[];
    sourceUrls: string[];
    platforms: string[];
    salary?: AnnualSalary;
    postedAt?: string;       // YYYY-MM-DD
    closingDate?: string;    // YYYY-MM-DD
    fingerprint: string;
}

/** One listing page worth of postings. */
export type JobBatch = JobPosting[];

// ─── Run Policy ───────────────────────────────────────────────────────────────

export interface RunPolicy {
    maxPages: number;
    recencyWindowHours: number;
    initialRun: boolean;
}

export type SkipSet = ReadonlySet<string>;

// ─── Raw Extraction ───────────────────────────────────────────────────────────

export type PayInterval = 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly';

/** Salary as published by the source, before annualisation. */
export interface StructuredSalary {
    min?: number | string | null;
    max?: number | string | null;
    interval?: string | null;
}

/**
 * Fields pulled out of one detail page. Everything is raw: locations are the
 * strings shown on the page, dates are whatever format the site uses.
 */
export interface RawJobFields {
    title?: string;
    company?: string;
    description: string;
    locations: string[];
    salary?: StructuredSalary;
    /** Free-text salary label shown on the page, e.g. "$80k - $95k + super". */
    salaryText?: string;
    postedAt?: string;
    closingDate?: string;
}

// ─── Source Capability ────────────────────────────────────────────────────────

export const BROWSER_SOURCES = ['seek', 'prosple', 'gradconnection'] as const;
export const ALL_SOURCES = [...BROWSER_SOURCES, 'indeed'] as const;

export type BrowserSourceName = (typeof BROWSER_SOURCES)[number];
export type SourceName = (typeof ALL_SOURCES)[number];

export interface SourceAdapter {
    platform: BrowserSourceName;
    /** Search terms for this source, in the order they are scraped. */
    searchTerms(settings: ScraperSettings): readonly string[];
    /** pageIndex is zero-based. */
    buildListingUrl(term: string, pageIndex: number, policy: RunPolicy): string;
    /** Absolute detail-page URLs. An empty array means "no more pages". */
    extractLinks(html: string, pageUrl: string): string[];
    /** null when the page is not a job (e.g. an event listing) and should be skipped. */
    extractDetail(html: string, url: string): RawJobFields | null;
}

export function isSourceName(value: string): value is SourceName {
    return ALL_SOURCES.some((name) => name === value);
}
