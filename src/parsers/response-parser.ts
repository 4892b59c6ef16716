/**
 * Response parsers for the statistics API
 *
 * Supports:
 * - SDMX-JSON (dataSets / structure envelope)
 * - SDMX-CSV (TIME_PERIOD / OBS_VALUE columns, or DATE / VALUE / CLOSE)
 * - Flat JSON (series list whose `values` are [date, value] pairs or {period, value} objects)
 * - Nested JSON (same points, single series object instead of a list)
 *
 * A parser never throws: malformed or unrecognized payloads yield an empty
 * Series, which the endpoint chain treats as "try the next endpoint".
 */

import { parse } from 'csv-parse/sync';
import { ResponseFormat, Series } from '../types';
import { getErrorMessage } from '../errors';
import { toSeries } from '../utils/series';

type JsonRecord = Record<string, unknown>;
type SeriesParser = (text: string) => Series;

const CSV_DATE_COLUMNS = ['time_period', 'date'];
const CSV_VALUE_COLUMNS = ['obs_value', 'value', 'close'];
const SERIES_ENVELOPE_KEYS = ['series', 'data'];

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
    return JSON.parse(text);
}

// ---------- SDMX-JSON ----------

function timeLabels(payload: JsonRecord): unknown[] {
    const structure = payload.structure;
    const dimensions = isRecord(structure) ? structure.dimensions : undefined;
    const observationDims = isRecord(dimensions) ? dimensions.observation : undefined;
    if (!Array.isArray(observationDims) || observationDims.length === 0) {
        return [];
    }

    const timeDim = observationDims.find(d => isRecord(d) && d.id === 'TIME_PERIOD') ?? observationDims[0];
    const values = isRecord(timeDim) ? timeDim.values : undefined;
    if (!Array.isArray(values)) {
        return [];
    }

    return values.map(v => (isRecord(v) ? v.id ?? v.name : undefined));
}

function parseSdmxJson(text: string): Series {
    const payload = parseJson(text);
    if (!isRecord(payload) || !Array.isArray(payload.dataSets)) {
        return [];
    }

    const dataSet: unknown = payload.dataSets[0];
    const seriesMap = isRecord(dataSet) ? dataSet.series : undefined;
    if (!isRecord(seriesMap)) {
        return [];
    }

    // First series block only; one request targets one series key
    const firstKey = Object.keys(seriesMap)[0];
    const block = firstKey === undefined ? undefined : seriesMap[firstKey];
    const observations = isRecord(block) ? block.observations : undefined;
    if (!isRecord(observations)) {
        return [];
    }

    const labels = timeLabels(payload);
    const points: [unknown, unknown][] = [];

    for (const [index, entry] of Object.entries(observations)) {
        if (!/^\d+$/.test(index)) {
            continue;
        }
        const position = Number(index);
        const value = Array.isArray(entry) ? entry[0] : entry;
        points.push([labels[position], value]);
    }

    return toSeries(points);
}

// ---------- SDMX-CSV ----------

function detectDelimiter(text: string): string {
    const header = text.split(/\r?\n/, 1)[0] ?? '';
    return header.includes(';') && !header.includes(',') ? ';' : ',';
}

function resolveColumn(header: string[], candidates: string[]): number {
    const lowered = header.map(h => h.trim().toLowerCase());
    for (const candidate of candidates) {
        const index = lowered.indexOf(candidate);
        if (index !== -1) {
            return index;
        }
    }
    return -1;
}

function parseSdmxCsv(text: string): Series {
    const records: string[][] = parse(text, {
        bom: true,
        delimiter: detectDelimiter(text),
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true
    });

    const [header, ...rows] = records;
    if (!header) {
        return [];
    }

    const dateColumn = resolveColumn(header, CSV_DATE_COLUMNS);
    const valueColumn = resolveColumn(header, CSV_VALUE_COLUMNS);
    if (dateColumn === -1 || valueColumn === -1) {
        return [];
    }

    return toSeries(rows.map((row): [unknown, unknown] => [row[dateColumn], row[valueColumn]]));
}

// ---------- Flat / nested JSON ----------

function pointOf(entry: unknown): [unknown, unknown] {
    if (Array.isArray(entry)) {
        return entry.length === 2 ? [entry[0], entry[1]] : [undefined, undefined];
    }
    if (isRecord(entry)) {
        return [entry.period ?? entry.date, entry.value];
    }
    return [undefined, undefined];
}

function pointsOf(container: JsonRecord): Series {
    const values = container.values;
    if (!Array.isArray(values)) {
        return [];
    }
    return toSeries(values.map(pointOf));
}

function seriesContainer(payload: unknown): unknown {
    if (Array.isArray(payload) || (isRecord(payload) && 'values' in payload)) {
        return payload;
    }
    if (!isRecord(payload)) {
        return undefined;
    }
    for (const key of SERIES_ENVELOPE_KEYS) {
        if (key in payload) {
            return payload[key];
        }
    }
    return undefined;
}

function parseFlatJson(text: string): Series {
    const container = seriesContainer(parseJson(text));

    if (Array.isArray(container)) {
        const first = container.find(item => isRecord(item) && Array.isArray(item.values));
        return isRecord(first) ? pointsOf(first) : [];
    }

    return isRecord(container) ? pointsOf(container) : [];
}

function parseNestedJson(text: string): Series {
    const container = seriesContainer(parseJson(text));
    return isRecord(container) ? pointsOf(container) : [];
}

const PARSERS: Record<ResponseFormat, SeriesParser> = {
    'sdmx-json': parseSdmxJson,
    'sdmx-csv': parseSdmxCsv,
    'flat-json': parseFlatJson,
    'nested-json': parseNestedJson
};

/**
 * Parse a raw response body into a Series
 * @param format Response format the endpoint was asked for
 * @param rawText Response body
 * @returns Series sorted ascending by date; empty when the payload holds no usable data
 */
export function parseResponse(format: ResponseFormat, rawText: string): Series {
    try {
        return PARSERS[format](rawText);
    } catch (error) {
        console.warn(`[${format}] unparseable response: ${getErrorMessage(error)}`);
        return [];
    }
}
