/**
 * Reconciliation of maturities that upstream has encoded under more than one code
 */

import { Series, SeriesDefinition, VariantCandidate, VariantSelectionPolicy } from '../types';
import { EndpointChain } from '../clients/endpoint-chain';

/**
 * Pick the candidate with the most observations; the first-listed wins a tie.
 * Returns undefined when every candidate is empty.
 */
export const mostObservations: VariantSelectionPolicy = candidates => {
    let best: VariantCandidate | undefined;
    for (const candidate of candidates) {
        if (candidate.series.length === 0) {
            continue;
        }
        if (!best || candidate.series.length > best.series.length) {
            best = candidate;
        }
    }
    return best;
};

export class VariantReconciler {
    constructor(
        private readonly chain: EndpointChain,
        private readonly selectVariant: VariantSelectionPolicy = mostObservations
    ) {}

    /**
     * Resolve every code of the group in order and keep the selected variant
     * @returns The selected Series, or an empty Series when no variant has data
     */
    async reconcile(group: SeriesDefinition): Promise<Series> {
        const candidates: VariantCandidate[] = [];
        for (const code of group.codes) {
            candidates.push({ code, series: await this.chain.resolve(code) });
        }

        const chosen = this.selectVariant(candidates);
        if (!chosen || chosen.series.length === 0) {
            console.warn(`[${group.key}] no variant delivered data (${group.codes.join(', ')})`);
            return [];
        }

        const counts = candidates.map(c => `${c.code}=${c.series.length}`).join(', ');
        console.log(`[${group.key}] using variant ${chosen.code} (${counts})`);
        return chosen.series;
    }
}
