/**
 * Data quality checks for acquired yield series
 *
 * These produce diagnostics only: a warning never drops an observation or
 * fails the run.
 */

import { Series, SeriesKey, ValidationRule } from '../types';

export const YIELD_VALIDATION_RULE: ValidationRule = {
    min: -5,           // %
    max: 25,           // %
    maxDailyMove: 1.0  // percentage points between consecutive observations
};

/**
 * Validates date format (YYYY-MM-DD)
 * @param date Date string to validate
 * @returns Error message if invalid, null if valid
 */
export function validateDateFormat(date: string): string | null {
    const dateRegex = /^\d{4}-\d{2}-\d{2}$/;

    if (!dateRegex.test(date)) {
        return `Date ${date} is not in YYYY-MM-DD format`;
    }

    // Round-trip rejects dates such as 2024-02-30
    const parsedDate = new Date(`${date}T00:00:00Z`);
    if (isNaN(parsedDate.getTime()) || parsedDate.toISOString().slice(0, 10) !== date) {
        return `Date ${date} is not a valid date`;
    }

    return null;
}

/**
 * Flags values outside the rule's range
 */
export function validateRanges(key: SeriesKey, series: Series, rule: ValidationRule = YIELD_VALIDATION_RULE): string[] {
    const warnings: string[] = [];

    for (const { date, value } of series) {
        if (value < rule.min || value > rule.max) {
            warnings.push(`${key} value ${value} on ${date} is out of range [${rule.min}, ${rule.max}]`);
        }
    }

    return warnings;
}

/**
 * Flags moves between consecutive observations larger than rule.maxDailyMove
 */
export function detectLargeChanges(key: SeriesKey, series: Series, rule: ValidationRule = YIELD_VALIDATION_RULE): string[] {
    const warnings: string[] = [];

    for (let i = 1; i < series.length; i++) {
        const previous = series[i - 1];
        const current = series[i];
        const move = Math.abs(current.value - previous.value);

        if (move > rule.maxDailyMove) {
            warnings.push(
                `${key} moved by ${move.toFixed(2)} pp from ${previous.value} (${previous.date}) to ${current.value} (${current.date})`
            );
        }
    }

    return warnings;
}

export function validateSeries(key: SeriesKey, series: Series, rule: ValidationRule = YIELD_VALIDATION_RULE): string[] {
    return [...validateRanges(key, series, rule), ...detectLargeChanges(key, series, rule)];
}
