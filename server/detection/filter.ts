import type { ComparisonRecord, FilterMetric, FilterPolicy } from "./types";
import { byPairKey } from "./types";

export const DEFAULT_SOURCE_THRESHOLD = 0.8;
export const DEFAULT_HEX_THRESHOLD = 0.7;

export function metricValue(record: ComparisonRecord, metric: FilterMetric): number {
    switch (metric) {
        case "aggregate":
            return record.aggregateSource;
        case "token-sequence":
            return record.scores.source.lcs;
        case "edit-distance":
            return record.scores.source.levenshtein;
    }
}

function selectByThreshold(records: ComparisonRecord[], sourceThreshold: number, hexThreshold: number): ComparisonRecord[] {
    return records.filter(
        (r) => r.aggregateSource > sourceThreshold || r.scores.hex.levenshtein > hexThreshold
    );
}

/**
 * Highest `ceil(percent × total)` records by metric.  Equal scores fall back
 * to ascending pair key so the cut is stable across runs.
 */
function selectTopPercent(records: ComparisonRecord[], percent: number, metric: FilterMetric): ComparisonRecord[] {
    // 0.1 * 30 is 3.0000000000000004 in floating point
    const count = Math.ceil(percent * records.length - 1e-9);
    if (count <= 0) return [];

    return [...records]
        .sort((x, y) => metricValue(y, metric) - metricValue(x, metric) || byPairKey(x, y))
        .slice(0, count);
}

/**
 * Pick the suspicious records.  Everything else stays in the report totals
 * but never reaches verdict resolution.
 */
export function selectCandidates(records: ComparisonRecord[], policy: FilterPolicy): ComparisonRecord[] {
    switch (policy.mode) {
        case "threshold":
            return selectByThreshold(records, policy.sourceThreshold, policy.hexThreshold);
        case "top-percent":
            return selectTopPercent(records, policy.percent, policy.metric);
    }
}
