/**
 * src/utils/runPolicy.ts
 *
 * Resolves how deep and how far back one source run goes.
 *
 *   initial run  → backfill: the global page cap and the long recency window
 *   regular run  → freshness: per-source regular caps and the short window
 *
 * Indeed is fetched through an API with one request per term, so its "page"
 * cap is always 1 and its window comes from its own hour settings.
 */

import type { ScraperSettings } from '../config/settings.js';
import type { RunPolicy, SourceName } from '../sources/types.js';
import { ConfigurationError } from './errors.js';

const HOURS_PER_DAY = 24;

function requirePositiveInt(name: string, value: unknown): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError('Invalid run policy setting:', [
            `- ${name}: expected a positive integer, got ${String(value)}`,
        ]);
    }
    return value;
}

/**
 * @throws ConfigurationError when a numeric setting the source needs is missing
 *         or not a positive integer.
 */
export function resolveRunPolicy(
    source: SourceName,
    initialRun: boolean,
    settings: ScraperSettings,
): RunPolicy {
    if (source === 'indeed') {
        const hours = initialRun
            ? requirePositiveInt('indeed.initialHoursOld', settings.indeed.initialHoursOld)
            : requirePositiveInt('indeed.hoursOld', settings.indeed.hoursOld);
        return { maxPages: 1, recencyWindowHours: hours, initialRun };
    }

    const days = initialRun
        ? requirePositiveInt('initialDaysFromPosted', settings.initialDaysFromPosted)
        : requirePositiveInt('daysFromPosted', settings.daysFromPosted);

    let maxPages = requirePositiveInt('maxPages', settings.maxPages);
    if (source === 'prosple' && !initialRun) {
        maxPages = requirePositiveInt('prosple.regularMaxPages', settings.prosple.regularMaxPages);
    }

    return { maxPages, recencyWindowHours: days * HOURS_PER_DAY, initialRun };
}

/** The recency window in whole days, rounded up. Never less than one. */
export function recencyWindowDays(policy: RunPolicy): number {
    return Math.max(1, Math.ceil(policy.recencyWindowHours / HOURS_PER_DAY));
}
