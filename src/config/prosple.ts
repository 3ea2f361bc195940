/**
 * src/config/prosple.ts
 *
 * Selector map and URL builder for au.prosple.com.
 *
 * Prosple paginates with a `start` offset rather than a page number, so the
 * builder needs the configured page size. Detail pages embed a schema.org
 * JobPosting as JSON-LD, which is read in preference to the markup.
 */

export const PROSPLE_BASE_URL = 'https://au.prosple.com';

/** Prosple's internal id for "Australia" in the locations filter. */
const AUSTRALIA_LOCATION_ID = '9692';

export const ProspleSelectors = {
    hub: {
        /** Opportunity cards open employer-hosted job pages in a new tab. */
        jobLink: 'a[target="_blank"][href^="/graduate-employers/"]',
    },

    detail: {
        jsonLd: 'script[type="application/ld+json"]',
        title: 'h1',
    },
};

/**
 * @param term          free-text keywords, joined with "+"
 * @param pageIndex     zero-based page index
 * @param itemsPerPage  offset step between pages
 * @param newestFirst   sort by newest opportunities (regular runs)
 */
export function buildProspleSearchUrl(
    term: string,
    pageIndex: number,
    itemsPerPage: number,
    newestFirst: boolean,
): string {
    const keywords = term.trim().split(/\s+/).map(encodeURIComponent).join('+');
    const start = pageIndex * itemsPerPage;
    const sort = newestFirst ? '&sort=newest_opportunities%7Cdesc' : '';
    return (
        `${PROSPLE_BASE_URL}/search-jobs?locations=${AUSTRALIA_LOCATION_ID}&defaults_applied=1` +
        `&keywords=${keywords}&start=${start}${sort}`
    );
}
