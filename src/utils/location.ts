/**
 * src/utils/location.ts
 *
 * Turns free-form location strings into { city, state } pairs for Australian
 * postings.
 *
 *   "Fortitude Valley, Brisbane QLD"  → { city: "Brisbane", state: "QLD" }
 *   "Sydney"                          → { city: "Sydney", state: "NSW" }
 *   "Australia"                       → { city: "Australia" }
 *   "New South Wales"                 → dropped (a state, not a city)
 *   "Melbourne CBD and Inner Suburbs" → dropped (a region descriptor)
 *
 * The lookup tables live in src/data/au-locations.json.
 */

import { z } from 'zod';
import auLocations from '../data/au-locations.json' with { type: 'json' };
import type { Location } from '../sources/types.js';

const locationTableSchema = z.object({
    states: z.array(z.string()),
    stateNames: z.array(z.string()),
    nonCityPatterns: z.array(z.string()),
    cityToState: z.record(z.string(), z.string()),
});

const table = locationTableSchema.parse(auLocations);

const CITY_TO_STATE = new Map(Object.entries(table.cityToState));
const STATE_NAMES = new Set(table.stateNames);
const NON_CITY_PATTERNS = table.nonCityPatterns.map((p) => new RegExp(p));
const STATE_PATTERN = new RegExp(`\\b(${table.states.join('|')})\\b`, 'i');

/** City used when nothing more specific can be resolved. */
export const COUNTRY_FALLBACK = 'Australia';

function titleCase(text: string): string {
    return text
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

function normalizeOne(raw: string): Location | null {
    const location = raw.trim();
    const lower = location.toLowerCase();
    if (!location) return null;

    if (lower === 'australia' || lower === 'au') {
        return { city: COUNTRY_FALLBACK };
    }
    if (STATE_NAMES.has(lower)) return null;
    if (NON_CITY_PATTERNS.some((re) => re.test(lower))) return null;

    const stateMatch = STATE_PATTERN.exec(location);
    if (stateMatch) {
        // "Suburb, City STATE" or "City STATE": the city is the last comma part before the state
        const beforeState = location.slice(0, stateMatch.index).trim().replace(/,+$/, '').trim();
        const parts = beforeState.split(',').map((p) => p.trim());
        const candidate = parts[parts.length - 1] ?? '';
        if (!CITY_TO_STATE.has(candidate.toLowerCase())) return null;
        return { city: titleCase(candidate), state: stateMatch[1].toUpperCase() };
    }

    if (location.includes(',')) {
        const parts = location.split(',').map((p) => p.trim());
        for (const part of parts.reverse()) {
            const state = CITY_TO_STATE.get(part.toLowerCase());
            if (state) return { city: titleCase(part), state };
        }
        return null;
    }

    const state = CITY_TO_STATE.get(lower);
    return state ? { city: titleCase(location), state } : null;
}

/**
 * Normalises location strings, dropping anything that is not a city and
 * removing duplicates while keeping first-seen order.
 */
export function normalizeLocations(locations: readonly string[]): Location[] {
    const seen = new Set<string>();
    const result: Location[] = [];

    for (const raw of locations) {
        if (typeof raw !== 'string') continue;
        const loc = normalizeOne(raw);
        if (!loc) continue;

        const key = `${loc.city}|${loc.state ?? ''}`;
        if (seen.has(key)) continue;
        seen.add(key);
        result.push(loc);
    }

    return result;
}

/** Like normalizeLocations, but never empty: falls back to the country. */
export function resolveLocations(locations: readonly string[]): Location[] {
    const normalized = normalizeLocations(locations);
    return normalized.length > 0 ? normalized : [{ city: COUNTRY_FALLBACK }];
}
