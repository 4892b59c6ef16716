/**
 * TypeScript interfaces and types for yield curve ingestion
 */

export interface Observation {
    date: string;  // YYYY-MM-DD
    value: number;
}

/**
 * Observations sorted strictly ascending by date, no duplicate dates, finite values.
 * An empty array means "no data" and is not an error.
 */
export type Series = Observation[];

export type SeriesKey = string;

export type ResponseFormat = 'sdmx-json' | 'sdmx-csv' | 'flat-json' | 'nested-json';

export interface EndpointSpec {
    readonly name: string;
    readonly urlTemplate: string;  // {series} and {start} placeholders
    readonly headers: Readonly<Record<string, string>>;
    readonly format: ResponseFormat;
}

/**
 * One logical maturity. More than one code makes it a variant group.
 */
export interface SeriesDefinition {
    readonly key: SeriesKey;
    readonly codes: readonly string[];
}

export interface VariantCandidate {
    code: string;
    series: Series;
}

export type VariantSelectionPolicy = (candidates: readonly VariantCandidate[]) => VariantCandidate | undefined;

export interface RetryConfig {
    maxTries: number;
    pauseSeconds: number;
    timeoutMs: number;
}

export interface CurveConfig {
    readonly startDate: string;
    readonly anchorKey: SeriesKey;
    readonly series: readonly SeriesDefinition[];
    readonly endpoints: readonly EndpointSpec[];
    readonly retry: Readonly<RetryConfig>;
    readonly outputPath: string;
    readonly precision: number;
    readonly selectVariant: VariantSelectionPolicy;
}

export interface CurveRow {
    date: string;
    values: (number | null)[];  // one cell per column, null when absent
}

export interface Curve {
    columns: SeriesKey[];
    rows: CurveRow[];
}

export interface BuildResult {
    curve: Curve;
    acquired: SeriesKey[];
    missing: SeriesKey[];
}

export interface ValidationRule {
    min: number;
    max: number;
    maxDailyMove: number;
}
