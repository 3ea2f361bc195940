/**
 * src/config/settings.ts
 *
 * Builds the immutable ScraperSettings value from SCRAPER_* environment
 * variables. This is the only place configuration is read; the CLI calls
 * loadScraperSettings() once and passes the result down explicitly.
 *
 * List values are JSON arrays, for example:
 *   SCRAPER_SEARCH_KEYWORDS=["software engineer","data engineer"]
 *
 * Loading a .env file is the caller's job (main.ts imports 'dotenv/config').
 */

import { ZodError } from 'zod';
import { envSchema, LOG_LEVEL_NAMES, type Env } from './envSchema.js';
import { ConfigurationError } from '../utils/errors.js';

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/** Inclusive [min, max] range in milliseconds. */
export type DelayRange = readonly [number, number];

export interface IndeedSettings {
    readonly hoursOld: number;
    readonly initialHoursOld: number;
    readonly resultsWanted: number;
    /** Stop after this many records across all terms; null means no cap. */
    readonly resultsWantedTotal: number | null;
    readonly termConcurrency: number;
    readonly location: string;
    readonly country: string;
    readonly apiKey?: string;
}

export interface ProspleSettings {
    readonly itemsPerPage: number;
    readonly regularMaxPages: number;
}

export interface BrowserSettings {
    readonly headless: boolean;
    readonly navigationTimeoutMs: number;
    readonly listingDelayMs: DelayRange;
    readonly detailDelayMs: DelayRange;
}

export interface ScraperSettings {
    readonly searchKeywords: readonly string[];
    readonly gradconnectionKeywords: readonly string[];
    readonly maxPages: number;
    readonly daysFromPosted: number;
    readonly initialDaysFromPosted: number;
    readonly initialRun: boolean;
    readonly concurrency: number;
    readonly indeed: IndeedSettings;
    readonly prosple: ProspleSettings;
    readonly browser: BrowserSettings;
    readonly logLevel: LogLevelName;
}

function toSettings(env: Env): ScraperSettings {
    return Object.freeze({
        searchKeywords: Object.freeze([...env.SCRAPER_SEARCH_KEYWORDS]),
        gradconnectionKeywords: Object.freeze([...env.SCRAPER_GRADCONNECTION_KEYWORDS]),
        maxPages: env.SCRAPER_MAX_PAGES,
        daysFromPosted: env.SCRAPER_DAYS_FROM_POSTED,
        initialDaysFromPosted: env.SCRAPER_INITIAL_DAYS_FROM_POSTED,
        initialRun: env.SCRAPER_INITIAL_RUN,
        concurrency: env.SCRAPER_CONCURRENCY,
        indeed: Object.freeze({
            hoursOld: env.SCRAPER_INDEED_HOURS_OLD,
            initialHoursOld: env.SCRAPER_INDEED_INITIAL_HOURS_OLD,
            resultsWanted: env.SCRAPER_INDEED_RESULTS_WANTED,
            resultsWantedTotal: env.SCRAPER_INDEED_RESULTS_WANTED_TOTAL,
            termConcurrency: env.SCRAPER_INDEED_TERM_CONCURRENCY,
            location: env.SCRAPER_INDEED_LOCATION,
            country: env.SCRAPER_INDEED_COUNTRY,
            apiKey: env.JSEARCH_API_KEY || undefined,
        }),
        prosple: Object.freeze({
            itemsPerPage: env.SCRAPER_PROSPLE_ITEMS_PER_PAGE,
            regularMaxPages: env.SCRAPER_PROSPLE_REGULAR_MAX_PAGES,
        }),
        browser: Object.freeze({
            headless: env.SCRAPER_HEADLESS,
            navigationTimeoutMs: env.SCRAPER_NAVIGATION_TIMEOUT_MS,
            listingDelayMs: env.SCRAPER_LISTING_DELAY_MS,
            detailDelayMs: env.SCRAPER_DETAIL_DELAY_MS,
        }),
        logLevel: env.SCRAPER_LOG_LEVEL,
    });
}

/**
 * Parses and validates scraper settings.
 *
 * @throws ConfigurationError listing every invalid variable as "- KEY: message".
 */
export function loadScraperSettings(raw: NodeJS.ProcessEnv = process.env): ScraperSettings {
    try {
        return toSettings(envSchema.parse(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new ConfigurationError('Invalid scraper settings:', lines);
        }
        throw err;
    }
}
