import { describe, it, expect } from "vitest";
import { buildSeekSearchUrl } from "../config/seek.js";
import { extractSeekDetail, extractSeekLinks, seekAdapter } from "./seek.js";

const SEARCH_PAGE = "https://www.seek.com.au/software-engineer-jobs?page=1&daterange=2";

describe("buildSeekSearchUrl", () => {
  it("slugs the term into the path", () => {
    expect(buildSeekSearchUrl("software engineer", 1, 2)).toBe(SEARCH_PAGE);
    expect(buildSeekSearchUrl("c++ developer", 2, 31)).toBe(
      "https://www.seek.com.au/c%2B%2B-developer-jobs?page=2&daterange=31",
    );
  });

  it("is what the adapter builds for a zero-based page index", () => {
    expect(seekAdapter.buildListingUrl("software engineer", 0, { maxPages: 20, recencyWindowHours: 48, initialRun: false })).toBe(
      SEARCH_PAGE,
    );
  });
});

describe("extractSeekLinks", () => {
  it("returns absolute job URLs without tracking parameters", () => {
    const html = `
      <article><a data-automation="jobTitle" href="/job/81234567?type=standard&ref=search#sol=abc">Graduate Engineer</a></article>
      <article><a data-automation="jobTitle" href="https://www.seek.com.au/job/81234568?ref=x">Data Engineer</a></article>
      <article><a data-automation="jobTitle">No link</a></article>
      <a href="/job/99999999">Not a job card</a>`;

    expect(extractSeekLinks(html, SEARCH_PAGE)).toEqual([
      "https://www.seek.com.au/job/81234567",
      "https://www.seek.com.au/job/81234568",
    ]);
  });

  it("returns nothing on the no-results page", () => {
    const html = `<h3>No matching search results</h3><a data-automation="jobTitle" href="/job/1">Suggested</a>`;
    expect(extractSeekLinks(html, SEARCH_PAGE)).toEqual([]);
  });
});

describe("extractSeekDetail", () => {
  it("reads the detail fields", () => {
    const html = `
      <h1 data-automation="job-detail-title">Graduate Software Engineer</h1>
      <span data-automation="advertiser-name">Acme Pty Ltd</span>
      <span data-automation="job-detail-location">Sydney NSW</span>
      <span data-automation="job-detail-salary">$80,000 – $95,000 + super</span>
      <span>Posted 3d ago</span>
      <div data-automation="jobAdDetails"><p>Join our platform team.</p><ul><li>TypeScript</li></ul></div>`;

    expect(extractSeekDetail(html, "https://www.seek.com.au/job/1", new Date(2025, 5, 20, 12))).toEqual({
      title: "Graduate Software Engineer",
      company: "Acme Pty Ltd",
      description: "Join our platform team.\nTypeScript",
      locations: ["Sydney NSW"],
      salaryText: "$80,000 – $95,000 + super",
      postedAt: "2025-06-17",
    });
  });

  it("falls back to the page body and leaves missing fields empty", () => {
    const detail = extractSeekDetail("<p>Role details are here.</p>", "https://www.seek.com.au/job/2");

    expect(detail.description).toBe("Role details are here.");
    expect(detail.title).toBeUndefined();
    expect(detail.locations).toEqual([]);
    expect(detail.postedAt).toBeUndefined();
  });
});
