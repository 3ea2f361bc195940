import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim() === '' ? Number.NaN : Number(v);
    return v;
}, z.number({ invalid_type_error: 'Expected a number' }).finite());

const positiveIntFromEnv = numFromEnv.pipe(z.number().int().positive());

const intOrNullFromTruthy = z.preprocess((v) => {
    if (v === undefined) return null;
    if (typeof v === 'string') {
        const trimmed = v.trim().toLowerCase();
        return trimmed === '' || trimmed === 'none' || trimmed === 'null' ? null : Number(trimmed);
    }
    return v;
}, z.number().int().positive().nullable());

const keywordListJson = z.preprocess((v) => {
    if (typeof v !== 'string') return v;
    try {
        return JSON.parse(v);
    } catch {
        return v;
    }
}, z.array(z.string().trim().min(1), { invalid_type_error: 'Expected a JSON array of strings' }).min(1));

/** "min,max" in milliseconds, e.g. "2000,4000". A single value means a fixed delay. */
const delayRangeFromEnv = z.preprocess((v) => {
    if (typeof v !== 'string') return v;
    const parts = v.split(',').map((p) => Number(p.trim()));
    return parts.length === 1 ? [parts[0], parts[0]] : parts;
}, z.tuple([z.number().finite().min(0), z.number().finite().min(0)]))
    .refine(([min, max]) => min <= max, { message: 'Expected "min,max" with min <= max' });

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF'] as const;

const logLevelFromEnv = z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
    z.enum(LOG_LEVEL_NAMES),
);

const DEFAULT_SEARCH_KEYWORDS = [
    'software engineer',
    'software developer',
    'data scientist',
    'machine learning engineer',
    'ai engineer',
    'data engineer',
];

const DEFAULT_GRADCONNECTION_KEYWORDS = [
    'software engineer',
    'software developer',
    'data science',
    'machine learning engineer',
    'ai engineer',
    'data analyst',
];

export const envSchema = z.object({
    SCRAPER_SEARCH_KEYWORDS: keywordListJson.default(DEFAULT_SEARCH_KEYWORDS),
    SCRAPER_GRADCONNECTION_KEYWORDS: keywordListJson.default(DEFAULT_GRADCONNECTION_KEYWORDS),

    SCRAPER_MAX_PAGES: positiveIntFromEnv.default(20),
    SCRAPER_DAYS_FROM_POSTED: positiveIntFromEnv.default(2),
    SCRAPER_INITIAL_DAYS_FROM_POSTED: positiveIntFromEnv.default(31),
    SCRAPER_INITIAL_RUN: boolStrictTrue.default(false),
    SCRAPER_CONCURRENCY: positiveIntFromEnv.default(5),

    SCRAPER_INDEED_HOURS_OLD: positiveIntFromEnv.default(72),
    SCRAPER_INDEED_INITIAL_HOURS_OLD: positiveIntFromEnv.default(2000),
    SCRAPER_INDEED_RESULTS_WANTED: positiveIntFromEnv.default(20),
    SCRAPER_INDEED_RESULTS_WANTED_TOTAL: intOrNullFromTruthy.default(100),
    SCRAPER_INDEED_TERM_CONCURRENCY: positiveIntFromEnv.default(2),
    SCRAPER_INDEED_LOCATION: z.string().default(''),
    SCRAPER_INDEED_COUNTRY: z.string().default('Australia'),

    SCRAPER_PROSPLE_ITEMS_PER_PAGE: positiveIntFromEnv.default(20),
    SCRAPER_PROSPLE_REGULAR_MAX_PAGES: positiveIntFromEnv.default(3),

    SCRAPER_HEADLESS: boolUnlessFalse.default(true),
    SCRAPER_NAVIGATION_TIMEOUT_MS: positiveIntFromEnv.default(30_000),
    SCRAPER_LISTING_DELAY_MS: delayRangeFromEnv.default([2000, 4000]),
    SCRAPER_DETAIL_DELAY_MS: delayRangeFromEnv.default([1000, 3000]),
    SCRAPER_LOG_LEVEL: logLevelFromEnv.default('INFO'),

    JSEARCH_API_KEY: z.string().trim().optional(),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
