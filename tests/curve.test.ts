/**
 * Unit tests for variant reconciliation, the anchor gate, curve assembly and
 * the curve file format
 */

import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { EndpointChain } from '../src/clients/endpoint-chain';
import { VariantReconciler, mostObservations } from '../src/curve/variant-reconciler';
import { requireAnchor } from '../src/curve/anchor-gate';
import { assembleCurve } from '../src/curve/curve-assembler';
import { formatCurveCsv, parseCurveCsv, writeCurveFile } from '../src/curve/curve-file';
import { EmptyResultSetError, NoAnchorDataError } from '../src/errors';
import { Curve, Series, VariantCandidate, VariantSelectionPolicy } from '../src/types';
import {
    FakeFetcher,
    TEST_ENDPOINTS,
    TEST_START,
    csvBody,
    csvUrl,
    makeSeries,
    toPoints,
    silenceConsole
} from './helpers/fixtures';

beforeEach(() => {
    jest.restoreAllMocks();
    silenceConsole();
});

describe('mostObservations', () => {
    it('should pick the variant with the most observations', () => {
        const a: VariantCandidate = { code: 'A', series: makeSeries(100) };
        const b: VariantCandidate = { code: 'B', series: makeSeries(80) };

        expect(mostObservations([a, b])).toBe(a);
        expect(mostObservations([b, a])).toBe(a);
    });

    it('should pick the first-listed variant on a tie', () => {
        const a: VariantCandidate = { code: 'A', series: makeSeries(5, 2.0) };
        const b: VariantCandidate = { code: 'B', series: makeSeries(5, 3.0) };

        expect(mostObservations([a, b])).toBe(a);
        expect(mostObservations([b, a])).toBe(b);
    });

    it('should return undefined when every variant is empty', () => {
        expect(mostObservations([{ code: 'A', series: [] }, { code: 'B', series: [] }])).toBeUndefined();
    });
});

describe('VariantReconciler', () => {
    const group = { key: '5Y', codes: ['CODE.A', 'CODE.B'] };

    function reconcilerFor(routes: Record<string, string>, policy?: VariantSelectionPolicy) {
        const fetcher = new FakeFetcher(routes);
        const chain = new EndpointChain(TEST_ENDPOINTS, fetcher, TEST_START);
        return { fetcher, reconciler: new VariantReconciler(chain, policy) };
    }

    it('should return the variant with more observations', async () => {
        const seriesA = makeSeries(100, 2.0);
        const seriesB = makeSeries(80, 3.0);
        const { fetcher, reconciler } = reconcilerFor({
            [csvUrl('CODE.A')]: csvBody(toPoints(seriesA)),
            [csvUrl('CODE.B')]: csvBody(toPoints(seriesB))
        });

        const series = await reconciler.reconcile(group);

        expect(series).toEqual(seriesA);
        expect(fetcher.calls.filter(url => url.includes('/download/'))).toEqual([csvUrl('CODE.A'), csvUrl('CODE.B')]);
        expect(console.log).toHaveBeenCalledWith('[5Y] using variant CODE.A (CODE.A=100, CODE.B=80)');
    });

    it('should return the first-listed variant when counts are equal', async () => {
        const seriesA = makeSeries(3, 2.0);
        const { reconciler } = reconcilerFor({
            [csvUrl('CODE.A')]: csvBody(toPoints(seriesA)),
            [csvUrl('CODE.B')]: csvBody(toPoints(makeSeries(3, 3.0)))
        });

        await expect(reconciler.reconcile(group)).resolves.toEqual(seriesA);
    });

    it('should apply an injected selection policy', async () => {
        const seriesB = makeSeries(2, 3.0);
        const { reconciler } = reconcilerFor(
            {
                [csvUrl('CODE.A')]: csvBody(toPoints(makeSeries(4, 2.0))),
                [csvUrl('CODE.B')]: csvBody(toPoints(seriesB))
            },
            candidates => candidates[candidates.length - 1]
        );

        await expect(reconciler.reconcile(group)).resolves.toEqual(seriesB);
    });

    it('should return an empty series when no variant has data', async () => {
        const { fetcher, reconciler } = reconcilerFor({});

        await expect(reconciler.reconcile(group)).resolves.toEqual([]);
        expect(fetcher.calls).toHaveLength(4);
    });
});

describe('requireAnchor', () => {
    it('should throw NoAnchorDataError for an empty anchor', () => {
        expect(() => requireAnchor('10Y', [])).toThrow(NoAnchorDataError);
        expect(() => requireAnchor('10Y', [])).toThrow('10Y empty via all configured endpoints');
    });

    it('should pass a non-empty anchor', () => {
        expect(() => requireAnchor('10Y', makeSeries(1))).not.toThrow();
    });
});

describe('assembleCurve', () => {
    const tenYear: Series = [
        { date: '2024-01-01', value: 2.0 },
        { date: '2024-01-02', value: 2.1 }
    ];
    const twoYear: Series = [{ date: '2024-01-02', value: 1.5 }];

    it('should outer-join series on date with explicit absent cells', () => {
        const curve = assembleCurve(new Map([['10Y', tenYear], ['2Y', twoYear]]));

        expect(curve).toEqual({
            columns: ['10Y', '2Y'],
            rows: [
                { date: '2024-01-01', values: [2.0, null] },
                { date: '2024-01-02', values: [2.1, 1.5] }
            ]
        });
    });

    it('should sort rows ascending across series', () => {
        const earlier: Series = [{ date: '2023-12-29', value: 1.4 }, { date: '2024-01-03', value: 1.6 }];

        const curve = assembleCurve(new Map([['10Y', tenYear], ['2Y', earlier]]));

        expect(curve.rows.map(r => r.date)).toEqual(['2023-12-29', '2024-01-01', '2024-01-02', '2024-01-03']);
        expect(curve.rows[0].values).toEqual([null, 1.4]);
        expect(curve.rows[3].values).toEqual([null, 1.6]);
    });

    it('should keep an empty column without adding rows for it', () => {
        const curve = assembleCurve(new Map([['10Y', tenYear], ['30Y', []]]));

        expect(curve.columns).toEqual(['10Y', '30Y']);
        expect(curve.rows).toEqual([
            { date: '2024-01-01', values: [2.0, null] },
            { date: '2024-01-02', values: [2.1, null] }
        ]);
    });

    it('should throw EmptyResultSetError for an empty mapping', () => {
        expect(() => assembleCurve(new Map())).toThrow(EmptyResultSetError);
    });
});

describe('curve file', () => {
    const curve: Curve = {
        columns: ['10Y', '2Y'],
        rows: [
            { date: '2024-01-01', values: [2.0, null] },
            { date: '2024-01-02', values: [2.1, 1.23456789] }
        ]
    };

    it('should format a Date column and fixed-precision values', () => {
        expect(formatCurveCsv(curve).trimEnd().split('\n')).toEqual([
            'Date,10Y,2Y',
            '2024-01-01,2.000000,',
            '2024-01-02,2.100000,1.234568'
        ]);
    });

    it('should honor a custom precision', () => {
        expect(formatCurveCsv(curve, 2).trimEnd().split('\n')[2]).toBe('2024-01-02,2.10,1.23');
    });

    it('should round-trip each column within 1e-6', () => {
        const parsed = parseCurveCsv(formatCurveCsv(curve));

        expect([...parsed.keys()]).toEqual(['10Y', '2Y']);
        expect(parsed.get('10Y')).toEqual([
            { date: '2024-01-01', value: 2.0 },
            { date: '2024-01-02', value: 2.1 }
        ]);

        const twoYear = parsed.get('2Y') ?? [];
        expect(twoYear).toHaveLength(1);
        expect(twoYear[0].date).toBe('2024-01-02');
        expect(Math.abs(twoYear[0].value - 1.23456789)).toBeLessThan(1e-6);
    });

    it('should create the output directory and write the file', () => {
        const dir = mkdtempSync(join(tmpdir(), 'curve-'));
        try {
            const path = join(dir, 'data', 'curve.csv');

            writeCurveFile(path, curve);

            expect(readFileSync(path, 'utf-8')).toBe(formatCurveCsv(curve));
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });
});
