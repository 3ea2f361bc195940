/**
 * src/utils/jobPosting.ts
 *
 * Raw extracted fields → normalised, validated JobPosting.
 *
 *   locations    → resolveLocations() (never empty)
 *   dates        → toIsoDate(); unreadable dates are dropped
 *   salary       → reconcileSalary(): structured fields first, then salaryText,
 *                  then the description
 *   fingerprint  → computeFingerprint(company, title)
 *
 * A record that fails validation is not repaired; the caller logs and drops it.
 */

import { z } from 'zod';
import type { AnnualSalary, JobPosting, RawJobFields } from '../sources/types.js';
import { resolveLocations } from './location.js';
import { toIsoDate } from './dates.js';
import { extractSalaryFromText, reconcileStructuredSalary, toAmount } from './salary.js';
import { computeFingerprint } from './fingerprint.js';
import { normalizeWhitespace } from './html.js';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_COMPANY = 'Unknown Company';

// ─── Zod Schema ───────────────────────────────────────────────────────────────

const JobPostingSchema = z.object({
    title: z.string().min(1),
    company: z.string().min(1),
    description: z.string().refine((d) => d.replace(/\s/g, '').length >= 10, {
        message: 'description must have at least 10 non-blank characters',
    }),
    locations: z.array(z.object({ city: z.string().min(1), state: z.string().optional() })).min(1),
    sourceUrls: z.array(z.string().url()).min(1),
    platforms: z.array(z.string().min(1)).min(1),
    salary: z
        .object({ annualMin: z.number(), annualMax: z.number() })
        .refine((s) => s.annualMin <= s.annualMax, { message: 'annualMin must not exceed annualMax' })
        .optional(),
    postedAt: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    closingDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    fingerprint: z.string().min(1),
});

export class InvalidJobPostingError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid job posting: ${issues.join('; ')}`);
        this.name = 'InvalidJobPostingError';
        this.issues = issues;
    }
}

// ─── Builder ──────────────────────────────────────────────────────────────────

function textOr(value: string | undefined, fallback: string): string {
    const clean = value ? normalizeWhitespace(value) : '';
    return clean || fallback;
}

function resolveSalary(raw: RawJobFields): AnnualSalary | undefined {
    const structured = raw.salary;
    const hasStructured = toAmount(structured?.min) !== undefined || toAmount(structured?.max) !== undefined;
    if (!hasStructured) {
        // The salary label shown on the page beats a figure buried in the body.
        const fromLabel = extractSalaryFromText(raw.salaryText);
        if (fromLabel) return fromLabel;
    }
    return reconcileStructuredSalary(structured, raw.description);
}

/**
 * Builds a JobPosting for one detail page.
 *
 * @throws InvalidJobPostingError when the result breaks a record invariant.
 */
export function buildJobPosting(raw: RawJobFields, url: string, platform: string): JobPosting {
    const title = textOr(raw.title, UNKNOWN_TITLE);
    const company = textOr(raw.company, UNKNOWN_COMPANY);
    const description = raw.description.trim();

    const posting: JobPosting = {
        title,
        company,
        description,
        locations: resolveLocations(raw.locations),
        sourceUrls: [url],
        platforms: [platform],
        fingerprint: computeFingerprint(company, title),
    };

    const salary = resolveSalary(raw);
    if (salary) posting.salary = salary;

    const postedAt = toIsoDate(raw.postedAt);
    if (postedAt) posting.postedAt = postedAt;

    const closingDate = toIsoDate(raw.closingDate);
    if (closingDate) posting.closingDate = closingDate;

    return validateJobPosting(posting);
}

/** Checks record invariants; returns the posting unchanged when they hold. */
export function validateJobPosting(posting: JobPosting): JobPosting {
    const result = JobPostingSchema.safeParse(posting);
    if (!result.success) {
        throw new InvalidJobPostingError(
            result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        );
    }
    return posting;
}

/**
 * Recomputes the fingerprint of an existing posting. Idempotent: a posting
 * that already carries the right fingerprint comes back unchanged.
 */
export function refingerprint(posting: JobPosting): JobPosting {
    const fingerprint = computeFingerprint(posting.company, posting.title);
    return fingerprint === posting.fingerprint ? posting : { ...posting, fingerprint };
}
