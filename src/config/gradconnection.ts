/**
 * src/config/gradconnection.ts
 *
 * Selector map and URL builder for au.gradconnection.com.
 *
 * ABOUT GRADCONNECTION
 * ────────────────────
 * Search results past the last real card end with a "notify me" card whose
 * title link points at the alert sign-up page. Seeing it means there are no
 * more results for the term.
 *
 * Detail pages carry the campaign as `window.__initialState__` in an inline
 * script; locations, salary and closing date are read from there first.
 * Events (info sessions, webinars) share the job layout and are skipped.
 */

export const GRADCONNECTION_BASE_URL = 'https://au.gradconnection.com';

export const GradConnectionSelectors = {
    hub: {
        jobLink: 'a.box-header-title',
        /** href fragments of the end-of-results alert card. */
        notifyMeMarkers: ['notifyme', 'notify-me'],
    },

    detail: {
        title: 'h1.employers-profile-h1',
        company: 'h1.employers-panel-title',
        description: ['div.campaign-content-container', 'div.job-description-container'],
        overview: 'div.job-overview-container',
        boxContent: 'ul.box-content',
        eventButton: 'button',
        stateMarker: '__initialState__',
    },
};

/**
 * @param term  free-text title filter, joined with "+"
 * @param page  one-based page number
 */
export function buildGradConnectionSearchUrl(term: string, page: number): string {
    const title = term.trim().split(/\s+/).map(encodeURIComponent).join('+');
    return `${GRADCONNECTION_BASE_URL}/jobs/australia/?title=${title}&page=${page}`;
}
