/**
 * src/utils/errors.ts
 *
 * Error taxonomy for a scrape run.
 *
 *   ConfigurationError → bad/missing setting. Fatal, raised before any page is opened.
 *   SessionError       → the browser (or API client) for a source could not start.
 *                        Fatal for that source, surfaced to the caller.
 *   ListingPageError   → one listing page failed. Caught by the orchestrator,
 *                        ends pagination for the current term only.
 *   DetailPageError    → one detail page failed. Caught by the fetcher,
 *                        the item is dropped from its batch.
 *
 * Salary extraction never throws: an unparsable figure is simply absent.
 */

export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

export class SessionError extends Error {
    readonly source: string;

    constructor(source: string, cause: unknown) {
        super(`Could not start browsing session for "${source}": ${errorMessage(cause)}`, { cause });
        this.name = 'SessionError';
        this.source = source;
    }
}

export class ListingPageError extends Error {
    readonly url: string;

    constructor(url: string, cause: unknown) {
        super(`Listing page failed (${url}): ${errorMessage(cause)}`, { cause });
        this.name = 'ListingPageError';
        this.url = url;
    }
}

export class DetailPageError extends Error {
    readonly url: string;

    constructor(url: string, reason: string, cause?: unknown) {
        super(`Detail page failed (${url}): ${reason}`, { cause });
        this.name = 'DetailPageError';
        this.url = url;
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
