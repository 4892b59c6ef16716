/**
 * Helpers that turn loosely typed upstream points into a Series
 */

import { Observation, Series } from '../types';

const DATE_PATTERN = /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?)?)?$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Normalize a period label to YYYY-MM-DD
 *
 * Accepts full dates, months (first of month), years (1 January) and ISO
 * timestamps (date part). Returns null for anything else, including trailing
 * text after the date and impossible calendar dates such as 2024-02-30.
 */
export function normalizeDate(raw: unknown): string | null {
    if (typeof raw !== 'string') {
        return null;
    }

    const match = DATE_PATTERN.exec(raw.trim());
    if (!match) {
        return null;
    }

    const year = Number(match[1]);
    const month = match[2] === undefined ? 1 : Number(match[2]);
    const day = match[3] === undefined ? 1 : Number(match[3]);

    const parsed = new Date(Date.UTC(year, month - 1, day));
    if (
        parsed.getUTCFullYear() !== year ||
        parsed.getUTCMonth() !== month - 1 ||
        parsed.getUTCDate() !== day
    ) {
        return null;
    }

    return parsed.toISOString().slice(0, 10);
}

/**
 * Coerce an upstream value to a finite number, or null
 */
export function toFiniteNumber(raw: unknown): number | null {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : null;
    }

    if (typeof raw !== 'string') {
        return null;
    }

    const trimmed = raw.trim();
    // Rejects '', the '.' missing-value marker, and hex/binary/octal literals
    if (!DECIMAL_PATTERN.test(trimmed)) {
        return null;
    }

    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

/**
 * Build a Series from raw (date, value) pairs.
 * Unparseable entries are dropped, the result is sorted ascending and the
 * last value wins for a repeated date.
 */
export function toSeries(points: Iterable<[unknown, unknown]>): Series {
    const byDate = new Map<string, number>();

    for (const [rawDate, rawValue] of points) {
        const date = normalizeDate(rawDate);
        const value = toFiniteNumber(rawValue);
        if (date === null || value === null) {
            continue;
        }
        byDate.set(date, value);
    }

    const series: Observation[] = [];
    for (const [date, value] of byDate) {
        series.push({ date, value });
    }

    return series.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
