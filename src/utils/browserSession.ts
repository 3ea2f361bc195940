/**
 * src/utils/browserSession.ts
 *
 * The browsing collaborator used by the orchestrator.
 *
 * One BrowserSession = one browser + one isolated context for a single source
 * run. Pages are opened per navigation and closed again straight away, so a
 * session never holds more pages than there are fetches in flight.
 *
 * The orchestrator only sees the two small interfaces below; tests swap in an
 * in-memory session keyed by URL.
 */

import { launchPlaywright, log } from 'crawlee';
import type { Browser, BrowserContext, Page } from 'playwright';
import type { BrowserSettings } from '../config/settings.js';

// ─── Interfaces ───────────────────────────────────────────────────────────────

export interface SessionPage {
    goto(url: string): Promise<void>;
    content(): Promise<string>;
    close(): Promise<void>;
}

export interface BrowserSession {
    newPage(): Promise<SessionPage>;
    close(): Promise<void>;
}

/** Opens a session for the named source. Rejects when the browser cannot start. */
export type SessionFactory = (source: string) => Promise<BrowserSession>;

// ─── Block Detection ──────────────────────────────────────────────────────────

/**
 * Title fragments of challenge / block pages. A blocked page still loads
 * with HTTP 200 on some boards, so the title is the only reliable signal.
 */
const BLOCK_PAGE_PATTERNS: string[] = [
    'access denied',
    'just a moment',
    'attention required',
    'captcha',
    'are you a robot',
    'too many requests',
    'unusual traffic',
];

export function isBlockedTitle(title: string): boolean {
    const lower = title.toLowerCase();
    return BLOCK_PAGE_PATTERNS.some((p) => lower.includes(p));
}

// ─── Page Helper ──────────────────────────────────────────────────────────────

/**
 * Opens a page, navigates, returns the rendered HTML and closes the page on
 * every exit path.
 */
export async function fetchPageContent(session: BrowserSession, url: string): Promise<string> {
    const page = await session.newPage();
    try {
        await page.goto(url);
        return await page.content();
    } finally {
        await page.close().catch((err: unknown) => {
            log.debug(`[BrowserSession] Page close failed for ${url}: ${err instanceof Error ? err.message : String(err)}`);
        });
    }
}

// ─── Playwright Implementation ────────────────────────────────────────────────

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
    '(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

class PlaywrightSessionPage implements SessionPage {
    constructor(
        private readonly page: Page,
        private readonly timeoutMs: number,
    ) {}

    async goto(url: string): Promise<void> {
        const response = await this.page.goto(url, {
            waitUntil: 'domcontentloaded',
            timeout: this.timeoutMs,
        });

        const status = response?.status() ?? null;
        if (status !== null && status >= 400) {
            throw new Error(`HTTP ${status}`);
        }

        const title = await this.page.title();
        if (isBlockedTitle(title)) {
            throw new Error(`Blocked page detected (title: "${title}")`);
        }
    }

    content(): Promise<string> {
        return this.page.content();
    }

    close(): Promise<void> {
        return this.page.close();
    }
}

class PlaywrightSession implements BrowserSession {
    constructor(
        private readonly browser: Browser,
        private readonly context: BrowserContext,
        private readonly timeoutMs: number,
    ) {}

    async newPage(): Promise<SessionPage> {
        return new PlaywrightSessionPage(await this.context.newPage(), this.timeoutMs);
    }

    async close(): Promise<void> {
        try {
            await this.context.close();
        } finally {
            await this.browser.close();
        }
    }
}

/**
 * Launches Chromium through Crawlee's Playwright launcher, with one isolated
 * context per source run.
 */
export function createPlaywrightSessionFactory(settings: BrowserSettings): SessionFactory {
    return async (source: string): Promise<BrowserSession> => {
        log.info(`[BrowserSession] Launching browser for ${source} (headless: ${settings.headless})`);

        const browser = await launchPlaywright({
            launchOptions: { headless: settings.headless },
        });

        try {
            const context = await browser.newContext({
                userAgent: DEFAULT_USER_AGENT,
                viewport: { width: 1366, height: 900 },
                locale: 'en-AU',
            });
            return new PlaywrightSession(browser, context, settings.navigationTimeoutMs);
        } catch (err) {
            await browser.close();
            throw err;
        }
    };
}
