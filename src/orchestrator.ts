/**
 * src/orchestrator.ts
 *
 * SOURCE SCRAPE ORCHESTRATOR
 *
 * Drives one browser-backed source through its search terms and listing pages
 * and yields one batch of JobPostings per listing page:
 *
 *   for each term (in configured order)
 *     for page = 0 .. policy.maxPages - 1
 *       listing page  → links            (empty → next term)
 *       links         → minus SkipSet, minus links already fetched this run
 *       detail pages  → fetched concurrently, normalised, validated
 *       batch         → yielded to the caller before the next page is fetched
 *
 * FAILURES
 * ────────
 * - Session cannot start        → SessionError thrown to the caller.
 * - One listing page fails      → logged, pagination ends for that term only.
 * - One detail page fails       → logged, item dropped (see detailFetcher).
 *
 * The browser session is closed in a finally block, so it is released on
 * completion, on error, and when the caller stops iterating early.
 */

import { log } from 'crawlee';
import type { ScraperSettings } from './config/settings.js';
import type { JobBatch, RunPolicy, SkipSet, SourceAdapter } from './sources/types.js';
import { fetchPageContent, type BrowserSession, type SessionFactory } from './utils/browserSession.js';
import { randomDelay } from './utils/concurrency.js';
import { fetchDetails } from './utils/detailFetcher.js';
import { ListingPageError, SessionError, errorMessage } from './utils/errors.js';
import { resolveRunPolicy } from './utils/runPolicy.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface OrchestratorDeps {
    sessionFactory: SessionFactory;
}

export interface ScrapeSummary {
    source: string;
    policy: RunPolicy;
    pagesVisited: number;
    listingFailures: number;
    linksFound: number;
    linksSkipped: number;
    linksRepeated: number;
    detailFailures: number;
    notJobs: number;
    postingsEmitted: number;
    batchesEmitted: number;
    aborted: boolean;
    durationMs: number;
}

interface ListingPage {
    url: string;
    links: string[];
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

async function openSession(adapter: SourceAdapter, deps: OrchestratorDeps): Promise<BrowserSession> {
    try {
        return await deps.sessionFactory(adapter.platform);
    } catch (err) {
        throw new SessionError(adapter.platform, err);
    }
}

async function fetchListingPage(
    session: BrowserSession,
    adapter: SourceAdapter,
    url: string,
): Promise<ListingPage> {
    try {
        const html = await fetchPageContent(session, url);
        return { url, links: adapter.extractLinks(html, url) };
    } catch (err) {
        throw new ListingPageError(url, err);
    }
}

function logSummary(summary: ScrapeSummary): void {
    log.info(`\n${'═'.repeat(60)}`);
    log.info(`  [${summary.source}] ${summary.aborted ? 'STOPPED EARLY' : 'COMPLETE'}`);
    log.info(`${'═'.repeat(60)}`);
    log.info(`  Pages visited      : ${summary.pagesVisited} (${summary.listingFailures} failed)`);
    log.info(`  Links found        : ${summary.linksFound}`);
    log.info(`  Skipped (known)    : ${summary.linksSkipped}`);
    log.info(`  Skipped (repeat)   : ${summary.linksRepeated}`);
    log.info(`  Detail failures    : ${summary.detailFailures}`);
    log.info(`  Not a job          : ${summary.notJobs}`);
    log.info(`  Postings emitted   : ${summary.postingsEmitted} in ${summary.batchesEmitted} batches`);
    log.info(`  Duration           : ${(summary.durationMs / 1000).toFixed(1)}s`);
}

// ─── Main Orchestrator ────────────────────────────────────────────────────────

/**
 * Scrapes one source. Batches arrive in term order, then page order; the
 * generator does not fetch the next page until the caller asks for it.
 *
 * Pages whose links were all skipped, or whose detail fetches all failed,
 * produce no batch.
 *
 * @throws ConfigurationError before any navigation when the run policy cannot be resolved.
 * @throws SessionError when the browser session cannot be started.
 */
export async function* scrapeSource(
    adapter: SourceAdapter,
    settings: ScraperSettings,
    skipUrls: SkipSet,
    deps: OrchestratorDeps,
): AsyncGenerator<JobBatch, ScrapeSummary, undefined> {
    const start = Date.now();
    const source = adapter.platform;
    const policy = resolveRunPolicy(source, settings.initialRun, settings);
    const terms = adapter.searchTerms(settings);

    const summary: ScrapeSummary = {
        source,
        policy,
        pagesVisited: 0,
        listingFailures: 0,
        linksFound: 0,
        linksSkipped: 0,
        linksRepeated: 0,
        detailFailures: 0,
        notJobs: 0,
        postingsEmitted: 0,
        batchesEmitted: 0,
        aborted: true,
        durationMs: 0,
    };

    log.info(
        `[Orchestrator] ${source}: ${terms.length} terms, up to ${policy.maxPages} pages each, ` +
        `window ${policy.recencyWindowHours}h (${policy.initialRun ? 'initial' : 'regular'} run), ` +
        `${skipUrls.size} known URLs`,
    );

    const session = await openSession(adapter, deps);
    const fetchedThisRun = new Set<string>();

    try {
        for (const term of terms) {
            for (let pageIndex = 0; pageIndex < policy.maxPages; pageIndex++) {
                const url = adapter.buildListingUrl(term, pageIndex, policy);

                let page: ListingPage;
                try {
                    page = await fetchListingPage(session, adapter, url);
                } catch (err) {
                    summary.listingFailures++;
                    log.warning(`[Orchestrator] ${errorMessage(err)}. Moving on from "${term}".`);
                    break;
                } finally {
                    summary.pagesVisited++;
                    await randomDelay(settings.browser.listingDelayMs);
                }

                if (page.links.length === 0) {
                    log.info(`[Orchestrator] ${source} "${term}": no results on page ${pageIndex + 1}, next term.`);
                    break;
                }

                const unique = [...new Set(page.links)];
                const fresh: string[] = [];
                let skipped = 0;
                let repeated = 0;
                for (const link of unique) {
                    if (skipUrls.has(link)) {
                        skipped++;
                    } else if (fetchedThisRun.has(link)) {
                        repeated++;
                    } else {
                        fresh.push(link);
                    }
                }
                summary.linksFound += unique.length;
                summary.linksSkipped += skipped;
                summary.linksRepeated += repeated;

                if (skipped > 0 || repeated > 0) {
                    log.info(
                        `[Orchestrator] ${source} "${term}" p${pageIndex + 1}: ` +
                        `skipped ${skipped} known and ${repeated} repeated of ${unique.length} links`,
                    );
                }
                if (fresh.length === 0) continue;

                for (const link of fresh) fetchedThisRun.add(link);

                const details = await fetchDetails(fresh, {
                    session,
                    adapter,
                    concurrency: settings.concurrency,
                    delayMs: settings.browser.detailDelayMs,
                });
                summary.detailFailures += details.failures.length;
                summary.notJobs += details.notJobs;

                log.info(
                    `[Orchestrator] ${source} "${term}" p${pageIndex + 1}: ` +
                    `${details.postings.length}/${fresh.length} postings`,
                );

                if (details.postings.length > 0) {
                    summary.postingsEmitted += details.postings.length;
                    summary.batchesEmitted++;
                    yield details.postings;
                }
            }
        }

        summary.aborted = false;
        return summary;
    } finally {
        await session.close().catch((err: unknown) => {
            log.warning(`[Orchestrator] Closing the ${source} session failed: ${errorMessage(err)}`);
        });
        summary.durationMs = Date.now() - start;
        logSummary(summary);
    }
}
