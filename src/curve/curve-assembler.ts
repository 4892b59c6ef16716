/**
 * Outer join of acquired series into one date-indexed curve
 */

import { Curve, CurveRow, Series, SeriesKey } from '../types';
import { EmptyResultSetError } from '../errors';

/**
 * Join series on date
 *
 * One row per date present in at least one series, ascending. Absent cells are
 * null (never zero-filled or interpolated) and rows with no value at all are
 * dropped. Columns keep the mapping's insertion order.
 *
 * @throws EmptyResultSetError when the mapping holds no series
 */
export function assembleCurve(mapping: ReadonlyMap<SeriesKey, Series>): Curve {
    if (mapping.size === 0) {
        throw new EmptyResultSetError();
    }

    const columns = [...mapping.keys()];
    const cells = new Map<string, (number | null)[]>();

    columns.forEach((key, column) => {
        for (const { date, value } of mapping.get(key) ?? []) {
            let row = cells.get(date);
            if (!row) {
                row = new Array<number | null>(columns.length).fill(null);
                cells.set(date, row);
            }
            row[column] = value;
        }
    });

    const rows: CurveRow[] = [...cells.entries()]
        .filter(([, values]) => values.some(v => v !== null))
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, values]) => ({ date, values }));

    return { columns, rows };
}
