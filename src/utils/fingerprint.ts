/**
 * src/utils/fingerprint.ts
 *
 * Stable de-duplication key for job postings.
 *
 * The same job shows up on several boards with slightly different text:
 *   • "Graduate Software Engineer"  vs  "graduate  software engineer "
 *   • "Atlassian Pty Ltd"           vs  "ATLASSIAN"
 *
 * Both sides are reduced to a canonical string before hashing so the same
 * logical job produces the same fingerprint wherever it was scraped from.
 *
 * KEY
 * ───
 *   md5(normalizedCompany + "|" + normalizedTitle), hex encoded.
 *
 * Location is accepted for call-site symmetry but is not mixed into the key:
 * multi-city postings list their cities in a different order on each board.
 */

import { createHash } from 'crypto';

// ─── Normalisation ────────────────────────────────────────────────────────────

/**
 * Legal suffixes stripped from company names. Longer phrases first so
 * "pty ltd" goes before "ltd" gets a chance to leave "pty" behind.
 */
const COMPANY_SUFFIXES: string[] = [
    'proprietary limited', 'pty. ltd.', 'pty ltd', 'pty. ltd', 'pty',
    'limited', 'ltd.', 'ltd',
    'incorporated', 'inc.', 'inc',
    'corporation', 'corp.', 'corp',
    'llc', 'co.', 'co',
];

function base(s: string): string {
    return s
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

function stripPunctuation(s: string): string {
    return s
        .replace(/[^\p{L}\p{N}_\s]/gu, '')
        .replace(/\s+/g, ' ')
        .trim();
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Example:
 *   "Graduate  Software Engineer (Sydney)" → "graduate software engineer sydney"
 */
export function normalizeTitle(raw: string): string {
    return stripPunctuation(base(raw));
}

/**
 * Example:
 *   "Atlassian Pty Ltd" → "atlassian"
 *   "Acme Co."          → "acme"
 */
export function normalizeCompany(raw: string): string {
    let s = base(raw);
    for (const suffix of COMPANY_SUFFIXES) {
        s = s.replace(new RegExp(`(^|\\s)${escapeRegExp(suffix)}(?=\\s|$)`, 'g'), ' ');
    }
    return stripPunctuation(s);
}

// ─── Public Entry Point ───────────────────────────────────────────────────────

/**
 * Case- and whitespace-insensitive fingerprint of a posting.
 * `computeFingerprint("ACME", "Engineer  ")` equals `computeFingerprint("acme", "engineer")`.
 */
export function computeFingerprint(company: string, title: string, _location?: string): string {
    const key = `${normalizeCompany(company)}|${normalizeTitle(title)}`;
    return createHash('md5').update(key, 'utf8').digest('hex');
}
