/**
 * src/utils/salary.ts
 *
 * Salary extraction and annualisation.
 *
 * RECONCILIATION
 * ──────────────
 *  1. Structured figures (from JSON-LD, an embedded state blob, or an API)
 *     always win. A single figure is used as both bounds. The free-text
 *     parser is never consulted when either structured bound is present.
 *  2. Otherwise the description goes through extractSalaryFromText().
 *
 * TEXT PARSER
 * ───────────
 *  • Un-escapes "\$", "\-" and a few HTML entities first.
 *  • Only looks at the first 5 sentences / 1000 characters.
 *  • Tries a range ("$76,000 - $85,000", "80-100k", "$30 to $35") and then a
 *    single figure ("$50 per hour", "$95k").
 *  • The pay interval comes from keywords next to the figure and defaults to
 *    yearly, so an unlabelled hourly rate is under-annualised. Callers rely
 *    on that default; keep it.
 *
 * Every result satisfies 10 <= annualMin <= annualMax <= 1,000,000.
 * Anything outside that window is treated as "no salary", which is also how
 * negative or zero figures are rejected.
 */

import type { AnnualSalary, PayInterval, StructuredSalary } from '../sources/types.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const SALARY_FLOOR = 10;
export const SALARY_CEILING = 1_000_000;

export const INTERVAL_MULTIPLIERS: Readonly<Record<PayInterval, number>> = {
    hourly: 2080,
    daily: 260,
    weekly: 52,
    monthly: 12,
    yearly: 1,
};

const SEARCH_SENTENCES = 5;
const SEARCH_CHARS = 1000;
const INTERVAL_WINDOW_CHARS = 50;

// Checked in this order when several keywords share the same position.
const INTERVAL_KEYWORDS: ReadonlyArray<[PayInterval, RegExp]> = [
    ['hourly', /\b(?:hours?|hourly|hrs?)\b/gi],
    ['daily', /\b(?:days?|daily)\b/gi],
    ['weekly', /\b(?:weeks?|weekly|wks?)\b/gi],
    ['monthly', /\b(?:months?|monthly|mo|mths?)\b/gi],
    ['yearly', /\b(?:years?|yearly|yrs?|annual|annually|annum|p\.?a)\b/gi],
];

const NUMBER = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?`;
// A minus sign only counts when it is glued to the figure ("-$50,000"), not "Salary - $50k".
const SIGN = String.raw`(?:(-)(?=[$\d]))?`;
const AMOUNT = String.raw`${SIGN}(\$)?\s*(${NUMBER})(?:\s*(k)(?![a-z]))?`;
const SEPARATOR = String.raw`\s*[-–—]\s*|\s+to\s+`;
const TRAILING_INTERVAL = String.raw`(?:\s*(?:per|an|a|\/)\s*(hour|hr|day|week|wk|month|mth|mo|year|yr|annum))?`;

const RANGE_RE = new RegExp(`${AMOUNT}(?:${SEPARATOR})${AMOUNT}`, 'gi');
const SINGLE_RE = new RegExp(`${AMOUNT}${TRAILING_INTERVAL}`, 'gi');

// ─── Helpers ──────────────────────────────────────────────────────────────────

interface ParsedAmount {
    value: number;
    hasCurrency: boolean;
    hasK: boolean;
}

function parseAmount(sign: string | undefined, currency: string | undefined, digits: string, k: string | undefined): ParsedAmount {
    let value = Number(digits.replace(/,/g, ''));
    if (k) value *= 1000;
    if (sign) value = -value;
    return { value, hasCurrency: Boolean(currency), hasK: Boolean(k) };
}

/**
 * Reverses the escaping some sources apply to descriptions
 * (markdown-escaped "\$76,000 \- \$85,000", HTML entities).
 */
export function unescapeSalaryText(text: string): string {
    return text
        .replace(/\\([$\-.,+%])/g, '$1')
        .replace(/&#36;|&dollar;/gi, '$')
        .replace(/&#45;|&minus;/gi, '-')
        .replace(/&ndash;|&#8211;/gi, '–')
        .replace(/&mdash;|&#8212;/gi, '—')
        .replace(/&nbsp;|&#160;/gi, ' ')
        .replace(/&amp;/gi, '&');
}

/** The leading part of a description where a salary is conventionally stated. */
export function salarySearchWindow(text: string): string {
    const sentences = text
        .split(/(?<=[.!?])\s+|\n+/)
        .map((s) => s.trim())
        .filter(Boolean)
        .slice(0, SEARCH_SENTENCES)
        .join(' ');
    return sentences.length > SEARCH_CHARS ? sentences.slice(0, SEARCH_CHARS) : sentences;
}

function firstKeyword(text: string): { interval: PayInterval; index: number } | undefined {
    let best: { interval: PayInterval; index: number } | undefined;
    for (const [interval, re] of INTERVAL_KEYWORDS) {
        re.lastIndex = 0;
        const match = re.exec(text);
        if (match && (!best || match.index < best.index)) {
            best = { interval, index: match.index };
        }
    }
    return best;
}

function lastKeyword(text: string): PayInterval | undefined {
    let best: { interval: PayInterval; index: number } | undefined;
    for (const [interval, re] of INTERVAL_KEYWORDS) {
        re.lastIndex = 0;
        for (let match = re.exec(text); match; match = re.exec(text)) {
            if (!best || match.index > best.index) best = { interval, index: match.index };
        }
    }
    return best?.interval;
}

/**
 * Finds the interval keyword nearest to a match: the first one within 50
 * characters after it, else the last one within 50 characters before it.
 * Defaults to yearly.
 */
export function detectPayInterval(text: string, start = 0, end = text.length): PayInterval {
    const after = text.slice(end, end + INTERVAL_WINDOW_CHARS);
    const inside = text.slice(start, end);
    const before = text.slice(Math.max(0, start - INTERVAL_WINDOW_CHARS), start);
    return firstKeyword(inside)?.interval
        ?? firstKeyword(after)?.interval
        ?? lastKeyword(before)
        ?? 'yearly';
}

/** Maps a structured interval hint ("hourly", "HOUR", "per month" …) to a PayInterval. */
export function parsePayInterval(hint: unknown): PayInterval {
    if (typeof hint !== 'string' || !hint.trim()) return 'yearly';
    return firstKeyword(hint.toLowerCase())?.interval ?? 'yearly';
}

export function isPlausibleSalary(salary: AnnualSalary): boolean {
    const { annualMin, annualMax } = salary;
    return (
        Number.isFinite(annualMin) &&
        Number.isFinite(annualMax) &&
        annualMin >= SALARY_FLOOR &&
        annualMax <= SALARY_CEILING &&
        annualMin <= annualMax
    );
}

function ordered(a: number, b: number): AnnualSalary {
    return { annualMin: Math.min(a, b), annualMax: Math.max(a, b) };
}

function startsInside(single: SingleCandidate, range: RangeCandidate): boolean {
    return single.start >= range.start && single.start < range.end;
}

// ─── Text Parser ──────────────────────────────────────────────────────────────

interface RangeCandidate {
    low: ParsedAmount;
    high: ParsedAmount;
    start: number;
    end: number;
    cued: boolean;
}

interface SingleCandidate {
    amount: ParsedAmount;
    trailingInterval?: string;
    start: number;
    end: number;
    cued: boolean;
}

function findRanges(text: string): RangeCandidate[] {
    const found: RangeCandidate[] = [];
    RANGE_RE.lastIndex = 0;
    for (let m = RANGE_RE.exec(text); m; m = RANGE_RE.exec(text)) {
        const low = parseAmount(m[1], m[2], m[3], m[4]);
        const high = parseAmount(m[5], m[6], m[7], m[8]);
        found.push({
            low,
            high,
            start: m.index,
            end: m.index + m[0].length,
            cued: low.hasCurrency || high.hasCurrency || low.hasK || high.hasK,
        });
    }
    return found;
}

function findSingles(text: string): SingleCandidate[] {
    const found: SingleCandidate[] = [];
    SINGLE_RE.lastIndex = 0;
    for (let m = SINGLE_RE.exec(text); m; m = SINGLE_RE.exec(text)) {
        const amount = parseAmount(m[1], m[2], m[3], m[4]);
        found.push({
            amount,
            trailingInterval: m[5],
            start: m.index,
            end: m.index + m[0].length,
            cued: amount.hasCurrency || amount.hasK || Boolean(m[5]),
        });
    }
    return found;
}

function annualiseRange(text: string, range: RangeCandidate): AnnualSalary | undefined {
    let low = range.low.value;
    let high = range.high.value;

    // "80-100k": the bare first figure shares the second one's "k"
    if (range.high.hasK && !range.low.hasK && Math.abs(low) < 1000) low *= 1000;
    if (range.low.hasK && !range.high.hasK && Math.abs(high) < 1000) high *= 1000;

    const multiplier = INTERVAL_MULTIPLIERS[detectPayInterval(text, range.start, range.end)];
    const salary = ordered(low * multiplier, high * multiplier);
    return isPlausibleSalary(salary) ? salary : undefined;
}

function annualiseSingle(text: string, single: SingleCandidate): AnnualSalary | undefined {
    const interval = single.trailingInterval
        ? parsePayInterval(single.trailingInterval)
        : detectPayInterval(text, single.start, single.end);
    const annual = single.amount.value * INTERVAL_MULTIPLIERS[interval];
    const salary = { annualMin: annual, annualMax: annual };
    return isPlausibleSalary(salary) ? salary : undefined;
}

/**
 * Pulls an annual salary out of free text. Deterministic; returns undefined
 * when nothing plausible is found.
 */
export function extractSalaryFromText(input: unknown): AnnualSalary | undefined {
    if (typeof input !== 'string' || !input.trim()) return undefined;

    const text = salarySearchWindow(unescapeSalaryText(input));

    const ranges = findRanges(text);
    const singles = findSingles(text);

    // Cued figures first, so "18-24 month program ... $70,000" reads the salary.
    // A single figure that is one bound of a range only counts as part of it.
    const cuedRange = ranges.find((r) => r.cued);
    const cuedSingle = singles.find((s) => s.cued && !ranges.some((r) => startsInside(s, r)));
    const attempts: Array<() => AnnualSalary | undefined> = [
        () => (cuedRange ? annualiseRange(text, cuedRange) : undefined),
        () => (cuedSingle ? annualiseSingle(text, cuedSingle) : undefined),
        () => (ranges[0] ? annualiseRange(text, ranges[0]) : undefined),
        () => (singles[0] ? annualiseSingle(text, singles[0]) : undefined),
    ];

    for (const attempt of attempts) {
        const salary = attempt();
        if (salary) return salary;
    }
    return undefined;
}

// ─── Reconciliation ───────────────────────────────────────────────────────────

/** Reads a structured figure: numbers as-is, strings with "$" and grouping commas stripped. */
export function toAmount(value: unknown): number | undefined {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value !== 'string') return undefined;
    const cleaned = value.replace(/[$,\s]/g, '');
    if (!cleaned) return undefined;
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Chooses between structured salary fields and the description text.
 */
export function reconcileSalary(
    structuredMin: unknown,
    structuredMax: unknown,
    intervalHint: unknown,
    description: string | undefined,
): AnnualSalary | undefined {
    const min = toAmount(structuredMin);
    const max = toAmount(structuredMax);

    if (min !== undefined || max !== undefined) {
        const low = min ?? max ?? 0;
        const high = max ?? min ?? 0;
        const multiplier = INTERVAL_MULTIPLIERS[parsePayInterval(intervalHint)];
        const salary = ordered(low * multiplier, high * multiplier);
        return isPlausibleSalary(salary) ? salary : undefined;
    }

    if (description) {
        return extractSalaryFromText(description);
    }
    return undefined;
}

/** reconcileSalary() over a StructuredSalary value. */
export function reconcileStructuredSalary(
    structured: StructuredSalary | undefined,
    description: string | undefined,
): AnnualSalary | undefined {
    return reconcileSalary(structured?.min, structured?.max, structured?.interval, description);
}
