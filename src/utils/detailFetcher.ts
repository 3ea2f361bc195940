/**
 * src/utils/detailFetcher.ts
 *
 * Fetches the detail pages of one listing page under a concurrency cap and
 * turns each into a JobPosting.
 *
 * Every link is isolated: a navigation failure, an extractor exception or a
 * record that fails validation is logged and dropped, and its siblings carry
 * on. Nothing here throws to the orchestrator.
 */

import { log } from 'crawlee';
import type { DelayRange } from '../config/settings.js';
import type { JobPosting, RawJobFields, SourceAdapter } from '../sources/types.js';
import { fetchPageContent, type BrowserSession } from './browserSession.js';
import { mapSettled, randomDelay } from './concurrency.js';
import { DetailPageError, errorMessage } from './errors.js';
import { buildJobPosting } from './jobPosting.js';

export interface DetailFetchOptions {
    session: BrowserSession;
    adapter: SourceAdapter;
    concurrency: number;
    /** Politeness pause after each navigation. */
    delayMs?: DelayRange;
}

export interface DetailFetchResult {
    /** Completion order is not guaranteed to match the input order. */
    postings: JobPosting[];
    failures: DetailPageError[];
    /** Pages the adapter recognised as "not a job" (events, expired ads). */
    notJobs: number;
}

async function fetchOne(url: string, options: DetailFetchOptions): Promise<JobPosting | null> {
    const { session, adapter, delayMs } = options;

    let html: string;
    try {
        html = await fetchPageContent(session, url);
    } catch (err) {
        throw new DetailPageError(url, `navigation failed: ${errorMessage(err)}`, err);
    } finally {
        if (delayMs) await randomDelay(delayMs);
    }

    let raw: RawJobFields | null;
    try {
        raw = adapter.extractDetail(html, url);
    } catch (err) {
        throw new DetailPageError(url, `extraction failed: ${errorMessage(err)}`, err);
    }
    if (!raw) return null;

    try {
        return buildJobPosting(raw, url, adapter.platform);
    } catch (err) {
        throw new DetailPageError(url, errorMessage(err), err);
    }
}

export async function fetchDetails(
    links: readonly string[],
    options: DetailFetchOptions,
): Promise<DetailFetchResult> {
    const result: DetailFetchResult = { postings: [], failures: [], notJobs: 0 };
    if (links.length === 0) return result;

    const settled = await mapSettled(links, options.concurrency, (url) => fetchOne(url, options));

    settled.forEach((outcome, i) => {
        if (outcome.status === 'fulfilled') {
            if (outcome.value) {
                result.postings.push(outcome.value);
            } else {
                result.notJobs++;
                log.debug(`[DetailFetcher] Skipped non-job page: ${links[i]}`);
            }
            return;
        }

        const failure = outcome.reason instanceof DetailPageError
            ? outcome.reason
            : new DetailPageError(links[i], errorMessage(outcome.reason), outcome.reason);
        result.failures.push(failure);
        log.warning(`[DetailFetcher] ${failure.message}`);
    });

    return result;
}
