/**
 * CSV serialization of an assembled curve
 *
 * Layout: a `Date` column (YYYY-MM-DD) followed by one column per series key,
 * values at fixed decimal precision, absent cells left empty.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { Curve, Series, SeriesKey } from '../types';
import { toSeries } from '../utils/series';

export const DATE_COLUMN = 'Date';
export const DEFAULT_PRECISION = 6;

export function formatCurveCsv(curve: Curve, precision: number = DEFAULT_PRECISION): string {
    const records = curve.rows.map(row => [
        row.date,
        ...row.values.map(v => (v === null ? '' : v.toFixed(precision)))
    ]);

    return stringify([[DATE_COLUMN, ...curve.columns], ...records], { record_delimiter: 'unix' });
}

/**
 * Read a curve file back into one Series per column
 */
export function parseCurveCsv(text: string): Map<SeriesKey, Series> {
    const records: string[][] = parse(text, { bom: true, skip_empty_lines: true, trim: true });
    const [header, ...rows] = records;
    const result = new Map<SeriesKey, Series>();
    if (!header) {
        return result;
    }

    header.forEach((key, column) => {
        if (column === 0) {
            return;
        }
        result.set(key, toSeries(rows.map((row): [unknown, unknown] => [row[0], row[column]])));
    });

    return result;
}

/**
 * Write the curve to disk, creating the parent directory if needed
 */
export function writeCurveFile(path: string, curve: Curve, precision: number = DEFAULT_PRECISION): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, formatCurveCsv(curve, precision), 'utf-8');
}
