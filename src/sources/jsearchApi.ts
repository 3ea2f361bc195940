/**
 * src/sources/jsearchApi.ts
 *
 * AGGREGATION CLIENT: JSearch API (RapidAPI)
 *
 * Indeed is not scraped directly; its postings are read through JSearch,
 * which returns structured records including salary bounds and a pay period.
 *
 * API docs: https://rapidapi.com/letscrape-6bRBa3QguO5/api/jsearch
 *
 * KEY MANAGEMENT
 * ──────────────
 * - The key comes from settings (JSEARCH_API_KEY); nothing here reads the
 *   environment.
 * - 429 / 403 responses are reported as AggregationApiError with the status
 *   so the caller can log a quota warning. There is no retry: a failed term
 *   is skipped for this run.
 */

import { log } from 'crawlee';
import { z } from 'zod';

// ─── Constants ────────────────────────────────────────────────────────────────

const API_HOST = 'jsearch.p.rapidapi.com';
const API_BASE = `https://${API_HOST}`;
const RESULTS_PER_PAGE = 10;
const DEFAULT_TIMEOUT_MS = 15_000;

/** JSearch's ISO-3166 country codes for the names used in settings. */
const COUNTRY_CODES: Record<string, string> = {
    australia: 'au',
    'new zealand': 'nz',
    'united kingdom': 'gb',
    'united states': 'us',
    canada: 'ca',
    singapore: 'sg',
};

// ─── Types ────────────────────────────────────────────────────────────────────

export type DatePostedBucket = 'today' | '3days' | 'week' | 'month' | 'all';

export interface AggregationQuery {
    term: string;
    /** Free-text location appended to the query ("… in Melbourne"); may be empty. */
    location: string;
    country: string;
    datePosted: DatePostedBucket;
    resultsWanted: number;
}

export interface AggregatedJob {
    title: string;
    company: string;
    description: string;
    url: string;
    city: string | null;
    state: string | null;
    country: string | null;
    isRemote: boolean;
    postedAt: string | null;
    minSalary: number | null;
    maxSalary: number | null;
    salaryPeriod: string | null;
}

/** The structured-listing collaborator behind the Indeed source. */
export interface AggregationClient {
    search(query: AggregationQuery): Promise<AggregatedJob[]>;
}

export class AggregationApiError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null, cause?: unknown) {
        super(message, { cause });
        this.name = 'AggregationApiError';
        this.status = status;
    }
}

// ─── Response Schema ──────────────────────────────────────────────────────────

const JSearchJobSchema = z.object({
    job_id: z.string().nullish(),
    employer_name: z.string().nullish(),
    job_title: z.string().nullish(),
    job_description: z.string().nullish(),
    job_apply_link: z.string().nullish(),
    job_google_link: z.string().nullish(),
    job_city: z.string().nullish(),
    job_state: z.string().nullish(),
    job_country: z.string().nullish(),
    job_is_remote: z.boolean().nullish(),
    job_posted_at_datetime_utc: z.string().nullish(),
    job_min_salary: z.number().nullish(),
    job_max_salary: z.number().nullish(),
    job_salary_period: z.string().nullish(),
});

const JSearchResponseSchema = z.object({
    status: z.string().optional(),
    data: z.array(z.unknown()),
});

type JSearchJob = z.infer<typeof JSearchJobSchema>;

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Smallest JSearch `date_posted` bucket that covers the window. */
export function datePostedBucket(hours: number): DatePostedBucket {
    if (hours <= 24) return 'today';
    if (hours <= 72) return '3days';
    if (hours <= 24 * 7) return 'week';
    if (hours <= 24 * 31) return 'month';
    return 'all';
}

export function countryCode(country: string): string {
    const trimmed = country.trim().toLowerCase();
    if (/^[a-z]{2}$/.test(trimmed)) return trimmed;
    return COUNTRY_CODES[trimmed] ?? 'au';
}

function mapJSearchJob(job: JSearchJob): AggregatedJob | null {
    const url = job.job_apply_link || job.job_google_link;
    if (!url) return null;

    return {
        title: job.job_title ?? '',
        company: job.employer_name ?? '',
        description: job.job_description ?? '',
        url,
        city: job.job_city ?? null,
        state: job.job_state ?? null,
        country: job.job_country ?? null,
        isRemote: job.job_is_remote ?? false,
        postedAt: job.job_posted_at_datetime_utc ?? null,
        minSalary: job.job_min_salary ?? null,
        maxSalary: job.job_max_salary ?? null,
        salaryPeriod: job.job_salary_period ?? null,
    };
}

// ─── Client ───────────────────────────────────────────────────────────────────

export interface JSearchClientOptions {
    apiKey: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

export class JSearchClient implements AggregationClient {
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: JSearchClientOptions) {
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    buildSearchUrl(query: AggregationQuery): string {
        const params = new URLSearchParams({
            query: query.location ? `${query.term} in ${query.location}` : query.term,
            page: '1',
            num_pages: String(Math.max(1, Math.ceil(query.resultsWanted / RESULTS_PER_PAGE))),
            date_posted: query.datePosted,
            country: countryCode(query.country),
        });
        return `${API_BASE}/search?${params.toString()}`;
    }

    async search(query: AggregationQuery): Promise<AggregatedJob[]> {
        const url = this.buildSearchUrl(query);
        log.debug(`[JSearch] GET ${url}`);

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                headers: {
                    'x-rapidapi-key': this.apiKey,
                    'x-rapidapi-host': API_HOST,
                },
                signal: controller.signal,
            });
        } catch (err) {
            throw new AggregationApiError(
                `Request failed for "${query.term}": ${err instanceof Error ? err.message : String(err)}`,
                null,
                err,
            );
        } finally {
            clearTimeout(timer);
        }

        if (response.status === 429 || response.status === 403) {
            log.warning(`[JSearch] Key rejected or out of quota (HTTP ${response.status}). Check JSEARCH_API_KEY.`);
            throw new AggregationApiError(`HTTP ${response.status} for "${query.term}"`, response.status);
        }
        if (!response.ok) {
            const body = await response.text().catch(() => '');
            throw new AggregationApiError(
                `HTTP ${response.status} for "${query.term}": ${body.slice(0, 200)}`,
                response.status,
            );
        }

        const parsed = JSearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new AggregationApiError(`Unexpected response shape for "${query.term}"`, response.status);
        }

        const jobs: AggregatedJob[] = [];
        for (const item of parsed.data.data) {
            const job = JSearchJobSchema.safeParse(item);
            const mapped = job.success ? mapJSearchJob(job.data) : null;
            if (mapped) jobs.push(mapped);
        }
        return jobs.slice(0, query.resultsWanted);
    }
}
