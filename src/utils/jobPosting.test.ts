import { describe, it, expect } from "vitest";
import { computeFingerprint } from "./fingerprint.js";
import {
  InvalidJobPostingError,
  UNKNOWN_COMPANY,
  UNKNOWN_TITLE,
  buildJobPosting,
  refingerprint,
} from "./jobPosting.js";

const URL_1 = "https://jobs.test/job/1";
const DESCRIPTION = "A role building things for customers.";

describe("buildJobPosting", () => {
  it("fills placeholders and the country fallback", () => {
    const posting = buildJobPosting({ description: DESCRIPTION, locations: [] }, URL_1, "seek");

    expect(posting).toEqual({
      title: UNKNOWN_TITLE,
      company: UNKNOWN_COMPANY,
      description: DESCRIPTION,
      locations: [{ city: "Australia" }],
      sourceUrls: [URL_1],
      platforms: ["seek"],
      fingerprint: computeFingerprint(UNKNOWN_COMPANY, UNKNOWN_TITLE),
    });
    expect("salary" in posting).toBe(false);
  });

  it("normalises whitespace, locations and dates", () => {
    const posting = buildJobPosting(
      {
        title: "  Graduate   Engineer ",
        company: "Acme\nPty Ltd",
        description: `  ${DESCRIPTION}  `,
        locations: ["Sydney NSW", "Melbourne"],
        postedAt: "2025-03-10T00:00:00Z",
        closingDate: "whenever",
      },
      URL_1,
      "prosple",
    );

    expect(posting.title).toBe("Graduate Engineer");
    expect(posting.company).toBe("Acme Pty Ltd");
    expect(posting.description).toBe(DESCRIPTION);
    expect(posting.locations).toEqual([
      { city: "Sydney", state: "NSW" },
      { city: "Melbourne", state: "VIC" },
    ]);
    expect(posting.postedAt).toBe("2025-03-10");
    expect(posting.closingDate).toBeUndefined();
    expect(posting.fingerprint).toBe(computeFingerprint("acme", "graduate engineer"));
  });

  it("prefers the salary label over the description", () => {
    const posting = buildJobPosting(
      { description: "Pay is $50,000 per year.", salaryText: "$80k - $95k + super", locations: [] },
      URL_1,
      "seek",
    );
    expect(posting.salary).toEqual({ annualMin: 80000, annualMax: 95000 });
  });

  it("prefers structured figures over the salary label", () => {
    const posting = buildJobPosting(
      {
        description: DESCRIPTION,
        salary: { min: 70000, max: 90000, interval: "YEAR" },
        salaryText: "$80k",
        locations: [],
      },
      URL_1,
      "prosple",
    );
    expect(posting.salary).toEqual({ annualMin: 70000, annualMax: 90000 });
  });

  it("falls back to the description", () => {
    const posting = buildJobPosting(
      { description: "Salary $60,000 - $70,000 per annum plus super.", locations: [] },
      URL_1,
      "gradconnection",
    );
    expect(posting.salary).toEqual({ annualMin: 60000, annualMax: 70000 });
  });

  it("rejects a description that is too short", () => {
    expect(() => buildJobPosting({ description: "short", locations: [] }, URL_1, "seek")).toThrow(InvalidJobPostingError);
    expect(() => buildJobPosting({ description: "short", locations: [] }, URL_1, "seek")).toThrow(
      "Invalid job posting: description: description must have at least 10 non-blank characters",
    );
  });

  it("rejects a source URL that is not a URL", () => {
    expect(() => buildJobPosting({ description: DESCRIPTION, locations: [] }, "not a url", "seek")).toThrow(
      InvalidJobPostingError,
    );
  });
});

describe("refingerprint", () => {
  it("returns the same object when the fingerprint is current", () => {
    const posting = buildJobPosting({ title: "Engineer", company: "Acme", description: DESCRIPTION, locations: [] }, URL_1, "seek");
    expect(refingerprint(posting)).toBe(posting);
  });

  it("recomputes a stale fingerprint once", () => {
    const posting = buildJobPosting({ title: "Engineer", company: "Acme", description: DESCRIPTION, locations: [] }, URL_1, "seek");
    const renamed = refingerprint({ ...posting, title: "Analyst" });

    expect(renamed.fingerprint).toBe(computeFingerprint("Acme", "Analyst"));
    expect(refingerprint(renamed)).toBe(renamed);
  });
});
