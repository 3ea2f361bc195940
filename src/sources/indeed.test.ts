import { describe, it, expect } from "vitest";
import { aggregatedJob, collect, createFakeAggregationClient, testSettings, type FakeTermResult } from "../testing/fakes.js";
import { sleep } from "../utils/concurrency.js";
import { INDEED_PLATFORM, scrapeIndeed, toRawJobFields } from "./indeed.js";

const TERMS = { SCRAPER_SEARCH_KEYWORDS: '["alpha","beta","gamma"]', SCRAPER_INDEED_TERM_CONCURRENCY: "2" };

function url(id: string): string {
  return `https://au.indeed.test/viewjob?jk=${id}`;
}

function client(entries: Array<[string, FakeTermResult]>) {
  return createFakeAggregationClient(new Map(entries));
}

describe("toRawJobFields", () => {
  it("joins city and state and passes structured salary through", () => {
    const raw = toRawJobFields(aggregatedJob(url("1"), { minSalary: 40, maxSalary: 45, salaryPeriod: "HOUR" }));

    expect(raw.locations).toEqual(["Sydney, NSW"]);
    expect(raw.salary).toEqual({ min: 40, max: 45, interval: "HOUR" });
    expect(raw.postedAt).toBe("2025-03-01T08:00:00.000Z");
  });

  it("leaves remote and placeless jobs without a location", () => {
    expect(toRawJobFields(aggregatedJob(url("1"), { isRemote: true })).locations).toEqual([]);
    expect(toRawJobFields(aggregatedJob(url("1"), { city: null, state: null })).locations).toEqual([]);
    expect(toRawJobFields(aggregatedJob(url("1"), { city: "Perth", state: null })).locations).toEqual(["Perth"]);
  });
});

describe("scrapeIndeed", () => {
  it("yields batches in term order even when a later term answers first", async () => {
    const settings = testSettings({ ...TERMS, SCRAPER_INDEED_RESULTS_WANTED_TOTAL: "none" });
    const api = client([
      ["alpha", async () => {
        await sleep(20);
        return [aggregatedJob(url("a"))];
      }],
      ["beta", [aggregatedJob(url("b"))]],
      ["gamma", [aggregatedJob(url("c"))]],
    ]);

    const gen = scrapeIndeed(settings, new Set(), api);
    const first = await gen.next();

    expect(first.done).toBe(false);
    expect(first.value).toEqual([expect.objectContaining({ sourceUrls: [url("a")] })]);
    expect(api.started).toEqual(["alpha", "beta"]);

    const { items, result } = await collect(gen);
    expect(items.map((batch) => batch[0].sourceUrls[0])).toEqual([url("b"), url("c")]);
    expect(api.started).toEqual(["alpha", "beta", "gamma"]);
    expect(result.postingsEmitted).toBe(3);
  });

  it("builds normalised postings", async () => {
    const settings = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const api = client([["alpha", [aggregatedJob(url("1"), { minSalary: 40, maxSalary: 45, salaryPeriod: "HOUR" })]]]);

    const { items } = await collect(scrapeIndeed(settings, new Set(), api));

    expect(items).toHaveLength(1);
    expect(items[0][0]).toMatchObject({
      title: "Graduate Software Engineer",
      company: "Acme",
      locations: [{ city: "Sydney", state: "NSW" }],
      sourceUrls: [url("1")],
      platforms: [INDEED_PLATFORM],
      salary: { annualMin: 83200, annualMax: 93600 },
      postedAt: "2025-03-01",
    });
  });

  it("drops skipped and already emitted URLs", async () => {
    const settings = testSettings({ ...TERMS, SCRAPER_INDEED_RESULTS_WANTED_TOTAL: "none" });
    const api = client([
      ["alpha", [aggregatedJob(url("1")), aggregatedJob(url("2"))]],
      ["beta", [aggregatedJob(url("2")), aggregatedJob(url("3"))]],
    ]);

    const { items, result } = await collect(scrapeIndeed(settings, new Set([url("1")]), api));

    expect(items.map((batch) => batch.map((p) => p.sourceUrls[0]))).toEqual([[url("2")], [url("3")]]);
    expect(result.skipped).toBe(2);
  });

  it("stops at the result cap", async () => {
    const settings = testSettings({ ...TERMS, SCRAPER_INDEED_RESULTS_WANTED_TOTAL: "3" });
    const api = client([
      ["alpha", [aggregatedJob(url("1")), aggregatedJob(url("2"))]],
      ["beta", [aggregatedJob(url("3")), aggregatedJob(url("4"))]],
      ["gamma", [aggregatedJob(url("5"))]],
    ]);

    const { items, result } = await collect(scrapeIndeed(settings, new Set(), api));

    expect(items.map((batch) => batch.length)).toEqual([2, 1]);
    expect(result.capReached).toBe(true);
    expect(result.postingsEmitted).toBe(3);
  });

  it("skips a failing term", async () => {
    const settings = testSettings({ ...TERMS, SCRAPER_INDEED_RESULTS_WANTED_TOTAL: "none" });
    const api = client([
      ["alpha", [aggregatedJob(url("1"))]],
      ["beta", new Error("HTTP 500")],
      ["gamma", [aggregatedJob(url("3"))]],
    ]);

    const { items, result } = await collect(scrapeIndeed(settings, new Set(), api));

    expect(items.map((batch) => batch[0].sourceUrls[0])).toEqual([url("1"), url("3")]);
    expect(result.failedTerms).toBe(1);
  });

  it("drops records that fail validation", async () => {
    const settings = testSettings({ SCRAPER_SEARCH_KEYWORDS: '["alpha"]' });
    const api = client([["alpha", [aggregatedJob(url("1"), { description: "short" }), aggregatedJob(url("2"))]]]);

    const { items, result } = await collect(scrapeIndeed(settings, new Set(), api));

    expect(items.flat().map((p) => p.sourceUrls[0])).toEqual([url("2")]);
    expect(result.invalid).toBe(1);
  });
});
