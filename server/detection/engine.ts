import { logInfo } from "../logger";
import { parseDetectionConfig, type DetectionConfig } from "../config";
import { annotateSubmissions } from "./anomaly";
import type { ScoreCache } from "./cache";
import { compareSubmissions } from "./comparator";
import { selectCandidates } from "./filter";
import { createJudge, type PlagiarismJudge } from "./judge";
import { metrics } from "./metrics";
import { resolveVerdicts } from "./verdict";
import type {
    AnomalyTag,
    DetectionReport,
    InvalidSubmission,
    Submission,
    VerdictKind,
    VerdictRecord,
} from "./types";
import { pairKey } from "./types";

export interface DetectionDeps {
    config: DetectionConfig;
    /** Defaults to createJudge(config). */
    judge?: PlagiarismJudge;
    cache?: ScoreCache;
    signal?: AbortSignal;
}

const VERDICT_ORDER: Record<VerdictKind, number> = {
    "plagiarized": 0,
    "invalid-submission": 1,
    "not-plagiarized": 2,
};

function maxScore(v: VerdictRecord): number {
    return Math.max(v.aggregateSourceScore, v.scores.hex.levenshtein);
}

/** Plagiarized first, then invalid, then clean; highest score first within a group. */
export function orderVerdicts(verdicts: VerdictRecord[]): VerdictRecord[] {
    return [...verdicts].sort((x, y) =>
        VERDICT_ORDER[x.verdict] - VERDICT_ORDER[y.verdict]
        || maxScore(y) - maxScore(x)
        || (pairKey(x.submissionIds) < pairKey(y.submissionIds) ? -1 : 1)
    );
}

/**
 * Full pass: anomaly tagging, pairwise scoring, candidate filtering and
 * verdict resolution.  Only an invalid configuration can make this throw.
 */
export async function runDetection(submissions: Submission[], deps: DetectionDeps): Promise<DetectionReport> {
    const config = parseDetectionConfig(deps.config);
    const judge = deps.judge ?? createJudge(config);

    const annotated = annotateSubmissions(submissions, config.anomaly);
    const byId = new Map(annotated.map((s) => [s.studentId, s]));

    const hitsBefore = deps.cache?.hits ?? 0;
    const records = compareSubmissions(annotated, { cache: deps.cache });
    const cacheHits = (deps.cache?.hits ?? 0) - hitsBefore;
    const candidates = selectCandidates(records, config.filter);
    logInfo(
        `[Detection] ${annotated.length} submissions, ${records.length} pairs compared, ` +
        `${candidates.length} candidates (${config.filter.mode})`
    );

    const resolved = await resolveVerdicts(candidates, byId, {
        judge,
        fallbackThreshold: config.fallbackThreshold,
        judgeTimeoutMs: config.judgeTimeoutMs,
        concurrency: config.judgeConcurrency,
        signal: deps.signal,
    });
    const verdicts = orderVerdicts(resolved);

    const invalidSubmissions: InvalidSubmission[] = annotated
        .filter((s) => !s.valid)
        .map((s) => ({ studentId: s.studentId, reason: s.invalidReason ?? "invalid submission" }));

    const anomalies: Record<string, AnomalyTag[]> = {};
    for (const s of annotated) {
        if (s.anomalies.length > 0) anomalies[s.studentId] = s.anomalies;
    }

    metrics.recordRun(records.length, cacheHits);
    for (const v of verdicts) metrics.recordVerdict(v.verdict);

    const count = (kind: VerdictKind) => verdicts.filter((v) => v.verdict === kind).length;

    return {
        filter: config.filter,
        records,
        verdicts,
        invalidSubmissions,
        anomalies,
        summary: {
            submissions: annotated.length,
            invalidSubmissions: invalidSubmissions.length,
            pairsCompared: records.length,
            candidates: candidates.length,
            plagiarized: count("plagiarized"),
            notPlagiarized: count("not-plagiarized"),
            invalidVerdicts: count("invalid-submission"),
            judgmentCalls: verdicts.filter((v) => v.judgmentConsulted).length,
        },
    };
}
