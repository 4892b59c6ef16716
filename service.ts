/**
 * Main service class for yield curve ingestion
 */

import { HttpRetrier, ResponseFetcher } from './src/clients/http-retrier';
import { EndpointChain } from './src/clients/endpoint-chain';
import { VariantReconciler } from './src/curve/variant-reconciler';
import { requireAnchor } from './src/curve/anchor-gate';
import { assembleCurve } from './src/curve/curve-assembler';
import { writeCurveFile } from './src/curve/curve-file';
import { validateSeries } from './src/utils/validation';
import { BuildResult, CurveConfig, Series, SeriesDefinition, SeriesKey } from './src/types';

/**
 * Orchestrates one sequential acquisition run: anchor first, then every other
 * maturity best-effort, then the outer join and the CSV write.
 */
export class CurveIngestionService {
    private readonly chain: EndpointChain;
    private readonly reconciler: VariantReconciler;

    /**
     * @param config Validated run configuration
     * @param fetcher Response source; an HttpRetrier built from config.retry when omitted
     */
    constructor(
        private readonly config: CurveConfig,
        fetcher?: ResponseFetcher
    ) {
        const source = fetcher ?? new HttpRetrier(
            config.retry.maxTries,
            config.retry.pauseSeconds,
            config.retry.timeoutMs
        );
        this.chain = new EndpointChain(config.endpoints, source, config.startDate);
        this.reconciler = new VariantReconciler(this.chain, config.selectVariant);
    }

    /**
     * Resolve one logical maturity: a single code goes straight through the
     * endpoint chain, a variant group through the reconciler.
     */
    async resolveDefinition(definition: SeriesDefinition): Promise<Series> {
        if (definition.codes.length === 1) {
            return this.chain.resolve(definition.codes[0]);
        }
        return this.reconciler.reconcile(definition);
    }

    /**
     * Acquire every configured series and assemble the curve
     * @throws NoAnchorDataError when the anchor series is empty
     * @throws EmptyResultSetError when nothing was acquired
     */
    async buildCurve(): Promise<BuildResult> {
        const { anchorKey } = this.config;
        const anchor = this.config.series.find(s => s.key === anchorKey);
        const acquired = new Map<SeriesKey, Series>();
        const missing: SeriesKey[] = [];

        const anchorSeries = anchor ? await this.resolveDefinition(anchor) : [];
        requireAnchor(anchorKey, anchorSeries);
        acquired.set(anchorKey, anchorSeries);

        for (const definition of this.config.series) {
            if (definition.key === anchorKey) {
                continue;
            }

            const series = await this.resolveDefinition(definition);
            if (series.length === 0) {
                console.warn(`[${definition.key}] unavailable, column omitted`);
                missing.push(definition.key);
                continue;
            }
            acquired.set(definition.key, series);
        }

        for (const [key, series] of acquired) {
            for (const warning of validateSeries(key, series)) {
                console.warn(`WARNING: ${warning}`);
            }
        }

        const curve = assembleCurve(acquired);
        return { curve, acquired: [...acquired.keys()], missing };
    }

    /**
     * Build the curve and write it to config.outputPath
     */
    async run(): Promise<BuildResult> {
        const result = await this.buildCurve();
        const { curve } = result;

        writeCurveFile(this.config.outputPath, curve, this.config.precision);

        const last = curve.rows.length > 0 ? curve.rows[curve.rows.length - 1].date : null;
        console.log(`Wrote ${this.config.outputPath} | cols: ${curve.columns.join(', ')} | last: ${last}`);

        if (result.missing.length > 0) {
            console.warn(`Run degraded: missing ${result.missing.join(', ')}`);
        }

        return result;
    }
}
