import { logInfo } from "../logger";
import type { VerdictKind } from "./types";

function emptyVerdictCounts(): Record<VerdictKind, number> {
    return { "plagiarized": 0, "not-plagiarized": 0, "invalid-submission": 0 };
}

// In-process metrics for detection runs
// These counters reset on process restart — they are for operational monitoring only

export const metrics = {
    judgeCalls: 0,
    judgeFails: 0,
    totalLatencyMs: 0,
    pairsCompared: 0,
    cacheHits: 0,
    runsCompleted: 0,
    verdicts: emptyVerdictCounts(),

    get avgLatency(): number {
        return this.judgeCalls ? Math.round(this.totalLatencyMs / this.judgeCalls) : 0;
    },
    get failureRate(): number {
        return this.judgeCalls ? +(this.judgeFails / this.judgeCalls).toFixed(3) : 0;
    },

    recordJudgeCall(latencyMs: number, failed: boolean): void {
        this.judgeCalls++;
        this.totalLatencyMs += latencyMs;
        if (failed) this.judgeFails++;
    },

    recordVerdict(kind: VerdictKind): void {
        this.verdicts[kind]++;
    },

    recordRun(pairsCompared: number, cacheHits = 0): void {
        this.runsCompleted++;
        this.pairsCompared += pairsCompared;
        this.cacheHits += cacheHits;
    },

    reset(): void {
        this.judgeCalls = 0;
        this.judgeFails = 0;
        this.totalLatencyMs = 0;
        this.pairsCompared = 0;
        this.cacheHits = 0;
        this.runsCompleted = 0;
        this.verdicts = emptyVerdictCounts();
    },
};

// Log a summary every 5 minutes (only if something ran)
let _metricsInterval: ReturnType<typeof setInterval> | null = null;

export function startMetricsLogging(): void {
    if (_metricsInterval) return;
    _metricsInterval = setInterval(() => {
        if (metrics.runsCompleted === 0 && metrics.judgeCalls === 0) return;
        logInfo(
            `[Detection Metrics] Runs: ${metrics.runsCompleted} | Pairs: ${metrics.pairsCompared} | ` +
            `Cache Hits: ${metrics.cacheHits} | ` +
            `Judge Calls: ${metrics.judgeCalls} | Avg Latency: ${metrics.avgLatency}ms | ` +
            `Failure Rate: ${(metrics.failureRate * 100).toFixed(1)}% | ` +
            `Plagiarized: ${metrics.verdicts["plagiarized"]} | Invalid: ${metrics.verdicts["invalid-submission"]}`
        );
    }, 5 * 60 * 1000);
    _metricsInterval.unref();
}

export function stopMetricsLogging(): void {
    if (_metricsInterval) {
        clearInterval(_metricsInterval);
        _metricsInterval = null;
    }
}
