/**
 * Run configuration
 *
 * Endpoint templates, headers and the series table live in one immutable
 * object handed to the service at construction. loadConfigFromEnv() layers
 * environment overrides on top of the defaults.
 */

import { CurveConfig, EndpointSpec, SeriesDefinition } from './types';
import { ConfigurationError } from './errors';
import { mostObservations } from './curve/variant-reconciler';
import { validateDateFormat } from './utils/validation';

const BBK_BASE = 'https://api.statistiken.bundesbank.de/rest';
const USER_AGENT = 'Mozilla/5.0';

export const DEFAULT_START_DATE = '2020-01-01';
export const DEFAULT_OUTPUT_PATH = 'data/de_bbk_curve.csv';
export const DEFAULT_ANCHOR_KEY = '10Y';

// Priority order: structured JSON first, CSV download as fallback
export const BBK_ENDPOINTS: readonly EndpointSpec[] = [
    {
        name: 'JSON',
        urlTemplate: `${BBK_BASE}/data/BBSSY/{series}?startPeriod={start}`,
        headers: { 'Accept': 'application/vnd.sdmx.data+json;version=1.0.0', 'User-Agent': USER_AGENT },
        format: 'sdmx-json'
    },
    {
        name: 'CSV',
        urlTemplate: `${BBK_BASE}/download/BBSSY/{series}?format=sdmx-csv&startPeriod={start}`,
        headers: { 'Accept': 'application/vnd.sdmx.data+csv;version=1.0.0', 'User-Agent': USER_AGENT },
        format: 'sdmx-csv'
    }
];

// Daily yields on listed Federal securities, residual maturity in years
export const BBK_SERIES: readonly SeriesDefinition[] = [
    { key: '10Y', codes: ['D.REN.EUR.A630.000000WT1010.A'] },
    { key: '2Y', codes: ['D.REN.EUR.A610.000000WT0202.A'] },
    { key: '5Y', codes: ['D.REN.EUR.A620.000000WT0505.A'] },
    { key: '7Y', codes: ['D.REN.EUR.A607.000000WT7070.A'] },
    { key: '15Y', codes: ['D.REN.EUR.A615.000000WT1515.A'] },
    { key: '30Y', codes: ['D.REN.EUR.A640.000000WT3030.A'] }
];

export const DEFAULT_CURVE_CONFIG: CurveConfig = {
    startDate: DEFAULT_START_DATE,
    anchorKey: DEFAULT_ANCHOR_KEY,
    series: BBK_SERIES,
    endpoints: BBK_ENDPOINTS,
    retry: { maxTries: 3, pauseSeconds: 1.0, timeoutMs: 45000 },
    outputPath: DEFAULT_OUTPUT_PATH,
    precision: 6,
    selectVariant: mostObservations
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
        throw new ConfigurationError(`Invalid value for ${name}: ${raw}`);
    }
    return value;
}

/**
 * Check a configuration before a run
 * @throws ConfigurationError naming the offending setting
 */
export function validateConfig(config: CurveConfig): CurveConfig {
    const dateError = validateDateFormat(config.startDate);
    if (dateError) {
        throw new ConfigurationError(`Invalid start date: ${dateError}`);
    }

    const seen = new Set<string>();
    for (const { key } of config.series) {
        if (seen.has(key)) {
            throw new ConfigurationError(`Duplicate series key ${key}; list alternate codes in one definition`);
        }
        seen.add(key);
    }

    if (!config.series.some(s => s.key === config.anchorKey)) {
        throw new ConfigurationError(`Anchor ${config.anchorKey} is not a configured series`);
    }

    if (config.endpoints.length === 0) {
        throw new ConfigurationError('No endpoints configured');
    }

    if (!Number.isInteger(config.retry.maxTries) || config.retry.maxTries < 1) {
        throw new ConfigurationError(`Invalid maxTries: ${config.retry.maxTries}`);
    }

    if (!Number.isFinite(config.retry.pauseSeconds) || config.retry.pauseSeconds < 0) {
        throw new ConfigurationError(`Invalid pauseSeconds: ${config.retry.pauseSeconds}`);
    }

    if (!Number.isFinite(config.retry.timeoutMs) || config.retry.timeoutMs <= 0) {
        throw new ConfigurationError(`Invalid timeoutMs: ${config.retry.timeoutMs}`);
    }

    // Number.prototype.toFixed accepts 0..100
    if (!Number.isInteger(config.precision) || config.precision < 0 || config.precision > 100) {
        throw new ConfigurationError(`Invalid precision: ${config.precision}`);
    }

    return config;
}

/**
 * Layer environment overrides on a base configuration without validating the result
 *
 * START_DATE, CURVE_OUTPUT_PATH, CURVE_ANCHOR, HTTP_MAX_TRIES,
 * HTTP_RETRY_PAUSE_SECONDS and HTTP_TIMEOUT_MS override the defaults.
 * Only unparseable numbers throw here; callers that add further layers
 * (command-line flags) validate once at the end.
 */
export function readEnvConfig(
    env: NodeJS.ProcessEnv = process.env,
    base: CurveConfig = DEFAULT_CURVE_CONFIG
): CurveConfig {
    return {
        ...base,
        startDate: env.START_DATE || base.startDate,
        outputPath: env.CURVE_OUTPUT_PATH || base.outputPath,
        anchorKey: env.CURVE_ANCHOR || base.anchorKey,
        retry: {
            maxTries: readNumber(env, 'HTTP_MAX_TRIES', base.retry.maxTries, 1),
            pauseSeconds: readNumber(env, 'HTTP_RETRY_PAUSE_SECONDS', base.retry.pauseSeconds, 0),
            timeoutMs: readNumber(env, 'HTTP_TIMEOUT_MS', base.retry.timeoutMs, 1)
        }
    };
}

/**
 * Load configuration from environment variables and validate it
 */
export function loadConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    base: CurveConfig = DEFAULT_CURVE_CONFIG
): CurveConfig {
    return validateConfig(readEnvConfig(env, base));
}
