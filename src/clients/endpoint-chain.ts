/**
 * Ordered fallback over endpoint/format combinations
 *
 * Each endpoint is tried in priority order; the first one whose response
 * parses into a non-empty Series wins and later endpoints are not contacted.
 * Fetch failures and empty parses fall through to the next endpoint. When
 * every endpoint is exhausted the chain returns an empty Series.
 */

import { EndpointSpec, Series } from '../types';
import { getErrorMessage } from '../errors';
import { parseResponse } from '../parsers/response-parser';
import { ResponseFetcher } from './http-retrier';

/**
 * Fill the {series} and {start} placeholders of a URL template
 */
export function expandUrl(template: string, seriesCode: string, startDate: string): string {
    return template
        .replace(/\{series\}/g, encodeURIComponent(seriesCode))
        .replace(/\{start\}/g, encodeURIComponent(startDate));
}

export class EndpointChain {
    constructor(
        private readonly endpoints: readonly EndpointSpec[],
        private readonly fetcher: ResponseFetcher,
        private readonly startDate: string
    ) {}

    /**
     * Fetch one upstream series code
     * @param seriesCode Upstream code (e.g. 'D.REN.EUR.A630.000000WT1010.A')
     * @returns The first non-empty Series, or an empty Series if no endpoint delivered data
     */
    async resolve(seriesCode: string): Promise<Series> {
        for (const endpoint of this.endpoints) {
            const url = expandUrl(endpoint.urlTemplate, seriesCode, this.startDate);

            let body: string;
            try {
                body = await this.fetcher.fetch(url, endpoint.headers);
            } catch (error) {
                console.warn(`[${endpoint.name} fail] ${seriesCode}: ${getErrorMessage(error)}`);
                continue;
            }

            const series = parseResponse(endpoint.format, body);
            if (series.length > 0) {
                console.log(`[OK ${endpoint.name}] ${seriesCode} (${series.length} pts)`);
                return series;
            }

            console.warn(`[${endpoint.name} empty] ${seriesCode}`);
        }

        console.warn(`No endpoint delivered data for ${seriesCode}`);
        return [];
    }
}
