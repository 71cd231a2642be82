import { describe, it, expect } from 'vitest';
import { DEFAULT_HEX_THRESHOLD, DEFAULT_SOURCE_THRESHOLD, metricValue, selectCandidates } from './filter';
import type { ComparisonRecord, FilterPolicy } from './types';

function record(a: string, b: string, aggregate: number, hexLev = 0, lcs = aggregate, lev = aggregate): ComparisonRecord {
    return {
        pair: [a, b],
        scores: { source: { lcs, levenshtein: lev }, hex: { lcs: hexLev, levenshtein: hexLev } },
        aggregateSource: aggregate,
    };
}

const THRESHOLD: FilterPolicy = {
    mode: 'threshold',
    sourceThreshold: DEFAULT_SOURCE_THRESHOLD,
    hexThreshold: DEFAULT_HEX_THRESHOLD,
};

describe('Filter — threshold mode', () => {
    it('should keep pairs strictly above either threshold', () => {
        const records = [
            record('a', 'b', 0.81),
            record('a', 'c', 0.8),
            record('b', 'c', 0.1, 0.71),
            record('b', 'd', 0.1, 0.7),
        ];
        expect(selectCandidates(records, THRESHOLD).map((r) => r.pair)).toEqual([['a', 'b'], ['b', 'c']]);
    });

    it('should keep a pair whose source is dissimilar but hex is close', () => {
        const candidates = selectCandidates([record('a', 'b', 0.05, 0.95)], THRESHOLD);
        expect(candidates).toHaveLength(1);
    });

    it('should return nothing for no records', () => {
        expect(selectCandidates([], THRESHOLD)).toEqual([]);
    });

    it('should select the same pairs whatever the input order', () => {
        const records = [
            record('a', 'b', 0.81),
            record('a', 'c', 0.8),
            record('b', 'c', 0.1, 0.71),
            record('c', 'd', 0.95),
        ];
        const permuted = [records[2], records[3], records[1], records[0]];
        const keys = (list: ComparisonRecord[]) => selectCandidates(list, THRESHOLD).map((r) => r.pair.join('-')).sort();

        expect(keys(permuted)).toEqual(['a-b', 'b-c', 'c-d']);
        expect(keys(permuted)).toEqual(keys(records));
    });
});

describe('Filter — top-percent mode', () => {
    const top = (percent: number, metric: 'aggregate' | 'token-sequence' | 'edit-distance' = 'aggregate'): FilterPolicy =>
        ({ mode: 'top-percent', percent, metric });

    it('should keep ceil(P × N) records', () => {
        const records = Array.from({ length: 30 }, (_, i) => record(`s${String(i).padStart(2, '0')}`, 'zz', i / 30));
        const candidates = selectCandidates(records, top(0.1));
        expect(candidates.map((r) => r.aggregateSource)).toEqual([29 / 30, 28 / 30, 27 / 30]);
    });

    it('should round a fractional count up', () => {
        const records = [record('a', 'b', 0.1), record('a', 'c', 0.2), record('b', 'c', 0.3)];
        // 0.5 × 3 = 1.5 → 2
        expect(selectCandidates(records, top(0.5)).map((r) => r.pair)).toEqual([['b', 'c'], ['a', 'c']]);
    });

    it('should break ties by ascending pair key', () => {
        const records = [record('c', 'd', 0.5), record('a', 'b', 0.5), record('b', 'c', 0.5)];
        expect(selectCandidates(records, top(0.5)).map((r) => r.pair)).toEqual([['a', 'b'], ['b', 'c']]);
    });

    it('should rank by the chosen metric', () => {
        const records = [
            record('a', 'b', 0.5, 0, 0.9, 0.1),
            record('a', 'c', 0.6, 0, 0.2, 0.95),
        ];
        expect(selectCandidates(records, top(0.5, 'token-sequence'))[0].pair).toEqual(['a', 'b']);
        expect(selectCandidates(records, top(0.5, 'edit-distance'))[0].pair).toEqual(['a', 'c']);
        expect(selectCandidates(records, top(0.5, 'aggregate'))[0].pair).toEqual(['a', 'c']);
    });

    it('should select nothing when the share rounds to zero records', () => {
        const records = [record('a', 'b', 0.9), record('a', 'c', 0.5), record('b', 'c', 0.1)];
        expect(selectCandidates(records, top(1e-12))).toEqual([]);
    });

    it('should keep everything at 100%', () => {
        const records = [record('a', 'b', 0.1), record('a', 'c', 0.2)];
        expect(selectCandidates(records, top(1))).toHaveLength(2);
    });

    it('should not reorder the input array', () => {
        const records = [record('a', 'b', 0.1), record('a', 'c', 0.2)];
        selectCandidates(records, top(1));
        expect(records[0].pair).toEqual(['a', 'b']);
    });
});

describe('Filter — metricValue', () => {
    it('should read the matching score', () => {
        const r = record('a', 'b', 0.5, 0, 0.4, 0.6);
        expect(metricValue(r, 'aggregate')).toBe(0.5);
        expect(metricValue(r, 'token-sequence')).toBe(0.4);
        expect(metricValue(r, 'edit-distance')).toBe(0.6);
    });
});
