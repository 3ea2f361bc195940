/**
 * src/config/seek.ts
 *
 * Selector map and URL builder for seek.com.au.
 *
 * ABOUT SEEK'S HTML STRUCTURE
 * ───────────────────────────
 * Seek ships hashed class names that change with every deploy, but the
 * `data-automation` attributes have been stable for years. Every selector
 * below keys off those attributes only.
 *
 * The posted date has no automation attribute; it is the short
 * "Posted 3d ago" span in the detail header, found by text instead.
 */

export const SEEK_BASE_URL = 'https://www.seek.com.au';

export const SeekSelectors = {

    // ── Search Results ──────────────────────────────────────────────────────

    hub: {
        /** Title link on each job card; href is /job/<id>?<tracking>. */
        jobLink: 'a[data-automation="jobTitle"]',

        /** Text Seek renders in place of the card list when nothing matches. */
        noResultsText: 'No matching search results',
    },

    // ── Detail Page ─────────────────────────────────────────────────────────

    detail: {
        title: 'h1[data-automation="job-detail-title"]',
        company: '[data-automation="advertiser-name"]',
        location: '[data-automation="job-detail-location"]',
        salary: '[data-automation="job-detail-salary"]',
        description: '[data-automation="jobAdDetails"]',
        /** Candidate spans for the "Posted 3d ago" label. */
        postedDate: 'span',
    },
};

/**
 * Builds a Seek search URL.
 *
 * @param term       e.g. "graduate software engineer" → /graduate-software-engineer-jobs
 * @param page       one-based page number
 * @param daysRange  Seek's `daterange` filter, in days
 */
export function buildSeekSearchUrl(term: string, page: number, daysRange: number): string {
    const slug = term.trim().split(/\s+/).join('-');
    const params = new URLSearchParams({
        page: String(page),
        daterange: String(daysRange),
    });
    return `${SEEK_BASE_URL}/${encodeURIComponent(slug)}-jobs?${params.toString()}`;
}
