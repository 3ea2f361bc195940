/**
 * src/sources/indeed.ts
 *
 * Indeed, read through the aggregation API instead of a browser.
 *
 * One API request per search term. Up to `termConcurrency` requests are in
 * flight, but batches are still yielded in term order: the generator waits
 * for term N before handing out term N+1, and only starts a new request when
 * the caller pulls. A failing term is logged and skipped.
 *
 * Salary comes from the structured min / max / period fields when present;
 * otherwise from the description text.
 */

import { log } from 'crawlee';
import type { ScraperSettings } from '../config/settings.js';
import { InvalidJobPostingError, buildJobPosting } from '../utils/jobPosting.js';
import { errorMessage } from '../utils/errors.js';
import { resolveRunPolicy } from '../utils/runPolicy.js';
import {
    datePostedBucket,
    type AggregatedJob,
    type AggregationClient,
    type AggregationQuery,
} from './jsearchApi.js';
import type { JobBatch, JobPosting, RawJobFields, SkipSet } from './types.js';

export const INDEED_PLATFORM = 'indeed';

export interface IndeedSummary {
    terms: number;
    failedTerms: number;
    received: number;
    skipped: number;
    invalid: number;
    postingsEmitted: number;
    capReached: boolean;
}

type TermOutcome =
    | { ok: true; jobs: AggregatedJob[] }
    | { ok: false; error: unknown };

function settle(promise: Promise<AggregatedJob[]>): Promise<TermOutcome> {
    return promise.then(
        (jobs): TermOutcome => ({ ok: true, jobs }),
        (error: unknown): TermOutcome => ({ ok: false, error }),
    );
}

export function toRawJobFields(job: AggregatedJob): RawJobFields {
    const place = [job.city, job.state].filter(Boolean).join(', ');
    return {
        title: job.title,
        company: job.company,
        description: job.description,
        locations: job.isRemote || !place ? [] : [place],
        salary: { min: job.minSalary, max: job.maxSalary, interval: job.salaryPeriod },
        postedAt: job.postedAt ?? undefined,
    };
}

/**
 * @throws ConfigurationError when the Indeed window settings are invalid.
 */
export async function* scrapeIndeed(
    settings: ScraperSettings,
    skipUrls: SkipSet,
    client: AggregationClient,
): AsyncGenerator<JobBatch, IndeedSummary, undefined> {
    const policy = resolveRunPolicy(INDEED_PLATFORM, settings.initialRun, settings);
    const terms = settings.searchKeywords;
    const cap = settings.indeed.resultsWantedTotal;
    const window = Math.max(1, settings.indeed.termConcurrency);

    const summary: IndeedSummary = {
        terms: terms.length,
        failedTerms: 0,
        received: 0,
        skipped: 0,
        invalid: 0,
        postingsEmitted: 0,
        capReached: false,
    };

    const queryFor = (term: string): AggregationQuery => ({
        term,
        location: settings.indeed.location,
        country: settings.indeed.country,
        datePosted: datePostedBucket(policy.recencyWindowHours),
        resultsWanted: settings.indeed.resultsWanted,
    });

    log.info(
        `[Indeed] ${terms.length} terms, window ${policy.recencyWindowHours}h ` +
        `(${datePostedBucket(policy.recencyWindowHours)}), ${window} in flight, ` +
        `cap ${cap ?? 'none'}`,
    );

    const inFlight: Array<Promise<TermOutcome>> = [];
    let nextToStart = 0;
    const topUp = (): void => {
        while (inFlight.length < window && nextToStart < terms.length) {
            inFlight.push(settle(client.search(queryFor(terms[nextToStart]))));
            nextToStart++;
        }
    };

    const emitted = new Set<string>();

    for (const term of terms) {
        topUp();
        const pending = inFlight.shift();
        if (!pending) break;
        const outcome = await pending;

        if (!outcome.ok) {
            summary.failedTerms++;
            log.warning(`[Indeed] "${term}" failed: ${errorMessage(outcome.error)}. Moving on.`);
            continue;
        }

        summary.received += outcome.jobs.length;
        const batch: JobPosting[] = [];

        for (const job of outcome.jobs) {
            if (cap !== null && summary.postingsEmitted + batch.length >= cap) break;
            if (skipUrls.has(job.url) || emitted.has(job.url)) {
                summary.skipped++;
                continue;
            }

            try {
                batch.push(buildJobPosting(toRawJobFields(job), job.url, INDEED_PLATFORM));
                emitted.add(job.url);
            } catch (err) {
                if (!(err instanceof InvalidJobPostingError)) throw err;
                summary.invalid++;
                log.warning(`[Indeed] Dropped ${job.url}: ${err.message}`);
            }
        }

        log.info(`[Indeed] "${term}": ${batch.length}/${outcome.jobs.length} postings`);

        if (batch.length > 0) {
            summary.postingsEmitted += batch.length;
            yield batch;
        }
        if (cap !== null && summary.postingsEmitted >= cap) {
            summary.capReached = true;
            log.info(`[Indeed] Reached the ${cap} result cap, stopping.`);
            break;
        }
    }

    log.info(
        `[Indeed] Done: ${summary.postingsEmitted} postings, ${summary.skipped} skipped, ` +
        `${summary.invalid} invalid, ${summary.failedTerms}/${summary.terms} terms failed`,
    );
    return summary;
}
