/**
 * src/scraper.ts
 *
 * Public entry point: scrape one source and receive its postings batch by
 * batch.
 *
 *   for await (const batch of scrape('seek', settings, knownUrls)) {
 *       await store(batch);
 *   }
 *
 * Breaking out of the loop closes the browser session. Calling scrape()
 * again with an updated skip set resumes where the previous run left off.
 *
 * Collaborators (browser, aggregation API) default to the real ones and can
 * be replaced through `deps`.
 */

import type { ScraperSettings } from './config/settings.js';
import { gradConnectionAdapter } from './extractors/gradconnection.js';
import { createProspleAdapter } from './extractors/prosple.js';
import { seekAdapter } from './extractors/seek.js';
import { scrapeSource } from './orchestrator.js';
import { scrapeIndeed } from './sources/indeed.js';
import { JSearchClient, type AggregationClient } from './sources/jsearchApi.js';
import type { BrowserSourceName, JobBatch, SkipSet, SourceAdapter, SourceName } from './sources/types.js';
import { createPlaywrightSessionFactory, type SessionFactory } from './utils/browserSession.js';
import { SessionError } from './utils/errors.js';
import { resolveRunPolicy } from './utils/runPolicy.js';

export interface ScrapeDeps {
    sessionFactory?: SessionFactory;
    aggregationClient?: AggregationClient;
}

export function adapterFor(source: BrowserSourceName, settings: ScraperSettings): SourceAdapter {
    switch (source) {
        case 'seek':
            return seekAdapter;
        case 'prosple':
            return createProspleAdapter(settings.prosple.itemsPerPage);
        case 'gradconnection':
            return gradConnectionAdapter;
    }
}

function aggregationClientFor(settings: ScraperSettings, deps: ScrapeDeps): AggregationClient {
    if (deps.aggregationClient) return deps.aggregationClient;
    if (!settings.indeed.apiKey) {
        throw new SessionError('indeed', new Error('JSEARCH_API_KEY is not set'));
    }
    return new JSearchClient({ apiKey: settings.indeed.apiKey, timeoutMs: settings.browser.navigationTimeoutMs });
}

/**
 * Lazily scrapes one source. Nothing is fetched until the first batch is
 * requested.
 *
 * @throws ConfigurationError when the source's run policy cannot be resolved.
 * @throws SessionError when the browser (or API client) cannot be started.
 */
export async function* scrape(
    source: SourceName,
    settings: ScraperSettings,
    skipUrls: SkipSet = new Set<string>(),
    deps: ScrapeDeps = {},
): AsyncGenerator<JobBatch, void, undefined> {
    resolveRunPolicy(source, settings.initialRun, settings);

    // Snapshot, so a caller adding URLs mid-run cannot change what is skipped.
    const skip: SkipSet = new Set(skipUrls);

    if (source === 'indeed') {
        yield* scrapeIndeed(settings, skip, aggregationClientFor(settings, deps));
        return;
    }

    const sessionFactory = deps.sessionFactory ?? createPlaywrightSessionFactory(settings.browser);
    yield* scrapeSource(adapterFor(source, settings), settings, skip, { sessionFactory });
}
