/**
 * In-process stand-ins for the statistics API used across test suites
 */

import { ResponseFetcher } from '../../src/clients/http-retrier';
import { FetchExhaustedError } from '../../src/errors';
import { EndpointSpec, Series } from '../../src/types';

export const TEST_START = '2020-01-01';

export const TEST_ENDPOINTS: EndpointSpec[] = [
    {
        name: 'JSON',
        urlTemplate: 'https://stats.test/data/{series}?startPeriod={start}',
        headers: { Accept: 'application/json' },
        format: 'sdmx-json'
    },
    {
        name: 'CSV',
        urlTemplate: 'https://stats.test/download/{series}?format=csv&startPeriod={start}',
        headers: { Accept: 'text/csv' },
        format: 'sdmx-csv'
    }
];

export function jsonUrl(code: string, start: string = TEST_START): string {
    return `https://stats.test/data/${code}?startPeriod=${start}`;
}

export function csvUrl(code: string, start: string = TEST_START): string {
    return `https://stats.test/download/${code}?format=csv&startPeriod=${start}`;
}

/**
 * Serves canned bodies by URL and records every request.
 * Unknown URLs fail the way an exhausted retrier does.
 */
export class FakeFetcher implements ResponseFetcher {
    readonly calls: string[] = [];

    constructor(private readonly routes: Record<string, string | Error> = {}) {}

    async fetch(url: string): Promise<string> {
        this.calls.push(url);
        const route = this.routes[url];
        if (route === undefined) {
            throw new FetchExhaustedError(url, 3, 'HTTP 404: Not Found');
        }
        if (route instanceof Error) {
            throw route;
        }
        return route;
    }
}

export function csvBody(points: Array<[string, number]>): string {
    return ['TIME_PERIOD,OBS_VALUE', ...points.map(([date, value]) => `${date},${value}`)].join('\n') + '\n';
}

export function sdmxJsonBody(points: Array<[string, number]>): string {
    const observations: Record<string, number[]> = {};
    points.forEach(([, value], index) => {
        observations[String(index)] = [value, 0];
    });

    return JSON.stringify({
        dataSets: [{ series: { '0:0:0:0:0': { observations } } }],
        structure: {
            dimensions: {
                observation: [{ id: 'TIME_PERIOD', values: points.map(([date]) => ({ id: date })) }]
            }
        }
    });
}

/**
 * n consecutive daily observations starting 2024-01-01
 */
export function makeSeries(n: number, base: number = 2.0): Series {
    return Array.from({ length: n }, (_, i) => ({
        date: new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10),
        value: base + i / 1000
    }));
}

export function toPoints(series: Series): Array<[string, number]> {
    return series.map(o => [o.date, o.value]);
}

export function silenceConsole(): void {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
