import * as cheerio from 'cheerio';

const BLOCK_ELEMENTS = 'p, div, li, ul, ol, tr, section, article, header, footer, h1, h2, h3, h4, h5, h6, blockquote, pre, dt, dd';

/**
 * Converts an HTML fragment to plain text, one text block per line.
 * Entities are decoded by the parser; empty lines are dropped.
 */
export function htmlToText(html: string): string {
    if (!html) return '';

    const $ = cheerio.load(html);
    $('script, style, noscript, template, head').remove();
    $('br').replaceWith('\n');
    $(BLOCK_ELEMENTS).append('\n');

    return $.root()
        .text()
        .split('\n')
        .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
        .filter(Boolean)
        .join('\n');
}

/** Trims whitespace and collapses runs of spaces. */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/** Resolves an href against the page it was found on. Returns null for junk. */
export function toAbsoluteUrl(href: string | undefined, baseUrl: string): string | null {
    if (!href) return null;
    try {
        return new URL(href, baseUrl).toString();
    } catch {
        return null;
    }
}
