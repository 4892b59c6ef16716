import { Series, SeriesKey } from '../types';
import { NoAnchorDataError } from '../errors';

/**
 * Fail the run when the anchor maturity came back empty.
 * Non-anchor series never pass through here.
 */
export function requireAnchor(key: SeriesKey, series: Series): void {
    if (series.length === 0) {
        throw new NoAnchorDataError(key);
    }
}
