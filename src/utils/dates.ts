/**
 * src/utils/dates.ts
 *
 * Date normalisation. Every output is a calendar date string (YYYY-MM-DD);
 * anything that cannot be read becomes undefined.
 */

const MONTHS: Record<string, number> = {
    jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
    jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/** Local calendar date of `date`. */
export function formatIsoDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function isoIfValid(year: number, month: number, day: number): string | undefined {
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (
        probe.getUTCFullYear() !== year ||
        probe.getUTCMonth() !== month - 1 ||
        probe.getUTCDate() !== day
    ) {
        return undefined;
    }
    return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * "Posted 2d ago" → today minus two days. Hours or minutes ("Posted 5h ago")
 * count as today, and so does anything without a day count.
 */
export function parseRelativePostedDate(text: string, now: Date = new Date()): string {
    const clean = text.replace(/posted/i, '').replace(/ago/i, '').trim().toLowerCase();
    const dayMatch = /(\d+)\+?\s*d/.exec(clean);
    const daysAgo = dayMatch ? Number(dayMatch[1]) : 0;
    return formatIsoDate(new Date(now.getTime() - daysAgo * DAY_MS));
}

/**
 * Accepts ISO dates and date-times ("2025-03-10", "2025-03-10T09:00:00Z"),
 * Date objects, and long-form dates such as "21st March 2025, 5:00 PM".
 */
export function toIsoDate(value: unknown): string | undefined {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10);
    }
    if (typeof value !== 'string') return undefined;

    const text = value.trim();
    if (!text) return undefined;

    const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(text);
    if (iso) {
        return isoIfValid(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    }

    const long = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})/i.exec(text);
    if (long) {
        const month = MONTHS[long[2].toLowerCase().slice(0, 3)];
        if (!month) return undefined;
        return isoIfValid(Number(long[3]), month, Number(long[1]));
    }

    return undefined;
}
