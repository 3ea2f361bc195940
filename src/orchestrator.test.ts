import { describe, it, expect } from "vitest";
import { scrapeSource } from "./orchestrator.js";
import {
  collect,
  createFakeBrowser,
  createTestAdapter,
  jobUrl,
  listingHtml,
  listingUrl,
  testSettings,
} from "./testing/fakes.js";
import { ConfigurationError, SessionError } from "./utils/errors.js";

const DETAIL = "<html><body>detail</body></html>";

function board(listings: Array<[string, string]>, details: string[]): Map<string, string> {
  return new Map([...listings, ...details.map((url): [string, string] => [url, DETAIL])]);
}

const settings = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha","beta"]' });

describe("scrapeSource", () => {
  it("stops paginating a term at the first empty page", async () => {
    const single = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("1"), jobUrl("2"), jobUrl("3"))],
          [listingUrl("alpha", 1), listingHtml()],
        ],
        [jobUrl("1"), jobUrl("2"), jobUrl("3")],
      ),
    );

    const { items, result } = await collect(
      scrapeSource(createTestAdapter(), single, new Set(), { sessionFactory: browser.factory }),
    );

    expect(items).toHaveLength(1);
    expect(items[0].map((p) => p.sourceUrls[0])).toEqual([jobUrl("1"), jobUrl("2"), jobUrl("3")]);
    expect(browser.visited).not.toContain(listingUrl("alpha", 2));
    expect(result.pagesVisited).toBe(2);
    expect(result.postingsEmitted).toBe(3);
    expect(result.aborted).toBe(false);
  });

  it("never fetches a URL in the skip set", async () => {
    const single = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("1"), jobUrl("2"))],
          [listingUrl("alpha", 1), listingHtml()],
        ],
        [jobUrl("1"), jobUrl("2")],
      ),
    );

    const { items, result } = await collect(
      scrapeSource(createTestAdapter(), single, new Set([jobUrl("1")]), { sessionFactory: browser.factory }),
    );

    expect(items.flat().map((p) => p.sourceUrls[0])).toEqual([jobUrl("2")]);
    expect(browser.visited).not.toContain(jobUrl("1"));
    expect(result.linksSkipped).toBe(1);
  });

  it("moves to the next page when every link is already known", async () => {
    const single = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("1"))],
          [listingUrl("alpha", 1), listingHtml(jobUrl("2"))],
          [listingUrl("alpha", 2), listingHtml()],
        ],
        [jobUrl("2")],
      ),
    );

    const { items } = await collect(
      scrapeSource(createTestAdapter(), single, new Set([jobUrl("1")]), { sessionFactory: browser.factory }),
    );

    expect(items).toHaveLength(1);
    expect(items[0][0].sourceUrls).toEqual([jobUrl("2")]);
  });

  it("yields batches in term order and fetches a repeated link once", async () => {
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("a1"), jobUrl("shared"))],
          [listingUrl("alpha", 1), listingHtml()],
          [listingUrl("beta", 0), listingHtml(jobUrl("b1"), jobUrl("shared"))],
          [listingUrl("beta", 1), listingHtml()],
        ],
        [jobUrl("a1"), jobUrl("b1"), jobUrl("shared")],
      ),
    );

    const { items, result } = await collect(
      scrapeSource(createTestAdapter(), settings, new Set(), { sessionFactory: browser.factory }),
    );

    expect(items.map((batch) => batch.map((p) => p.sourceUrls[0]))).toEqual([
      [jobUrl("a1"), jobUrl("shared")],
      [jobUrl("b1")],
    ]);
    expect(browser.visited.filter((url) => url === jobUrl("shared"))).toHaveLength(1);
    expect(result.linksRepeated).toBe(1);
  });

  it("ends only the failing term when a listing page fails", async () => {
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("beta", 0), listingHtml(jobUrl("b1"))],
          [listingUrl("beta", 1), listingHtml()],
        ],
        [jobUrl("b1")],
      ),
    );

    const { items, result } = await collect(
      scrapeSource(createTestAdapter(), settings, new Set(), { sessionFactory: browser.factory }),
    );

    expect(browser.visited).toEqual([listingUrl("alpha", 0), listingUrl("beta", 0), jobUrl("b1"), listingUrl("beta", 1)]);
    expect(items.flat().map((p) => p.title)).toEqual(["Engineer b1"]);
    expect(result.listingFailures).toBe(1);
  });

  it("leaves out pages whose details all failed", async () => {
    const single = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("gone"))],
          [listingUrl("alpha", 1), listingHtml(jobUrl("2"))],
          [listingUrl("alpha", 2), listingHtml()],
        ],
        [jobUrl("2")],
      ),
    );

    const { items, result } = await collect(
      scrapeSource(createTestAdapter(), single, new Set(), { sessionFactory: browser.factory }),
    );

    expect(items).toHaveLength(1);
    expect(result.detailFailures).toBe(1);
    expect(result.batchesEmitted).toBe(1);
  });

  it("respects the page cap", async () => {
    const capped = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]', SCRAPER_MAX_PAGES: "1" });
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("1"))],
          [listingUrl("alpha", 1), listingHtml(jobUrl("2"))],
        ],
        [jobUrl("1"), jobUrl("2")],
      ),
    );

    const { items } = await collect(
      scrapeSource(createTestAdapter(), capped, new Set(), { sessionFactory: browser.factory }),
    );

    expect(items.flat().map((p) => p.sourceUrls[0])).toEqual([jobUrl("1")]);
    expect(browser.visited).not.toContain(listingUrl("alpha", 1));
  });

  it("closes the session when the caller stops early", async () => {
    const browser = createFakeBrowser(
      board(
        [
          [listingUrl("alpha", 0), listingHtml(jobUrl("1"))],
          [listingUrl("alpha", 1), listingHtml(jobUrl("2"))],
        ],
        [jobUrl("1"), jobUrl("2")],
      ),
    );

    const seen: string[] = [];
    for await (const batch of scrapeSource(createTestAdapter(), settings, new Set(), { sessionFactory: browser.factory })) {
      seen.push(...batch.map((p) => p.sourceUrls[0]));
      break;
    }

    expect(seen).toEqual([jobUrl("1")]);
    expect(browser.sessionsClosed).toBe(1);
    expect(browser.visited).not.toContain(listingUrl("alpha", 1));
  });

  it("closes the session after a normal finish", async () => {
    const browser = createFakeBrowser(board([], []));
    await collect(scrapeSource(createTestAdapter(), settings, new Set(), { sessionFactory: browser.factory }));

    expect(browser.sessionsOpened).toBe(1);
    expect(browser.sessionsClosed).toBe(1);
    expect(browser.openPages()).toBe(0);
  });

  it("raises SessionError when the browser cannot start", async () => {
    const browser = createFakeBrowser(new Map(), { failToStart: true });
    const gen = scrapeSource(createTestAdapter(), settings, new Set(), { sessionFactory: browser.factory });

    await expect(gen.next()).rejects.toBeInstanceOf(SessionError);
    expect(browser.visited).toEqual([]);
  });

  it("raises ConfigurationError before opening a session", async () => {
    const browser = createFakeBrowser(new Map());
    const gen = scrapeSource(createTestAdapter(), { ...settings, maxPages: 0 }, new Set(), {
      sessionFactory: browser.factory,
    });

    await expect(gen.next()).rejects.toBeInstanceOf(ConfigurationError);
    expect(browser.sessionsOpened).toBe(0);
  });
});
