import { logWarn } from "../logger";
import { createLimiter, type Limiter } from "./limiter";
import { metrics } from "./metrics";
import type { JudgmentOutcome, PlagiarismJudge } from "./judge";
import type { ComparisonRecord, Submission, VerdictKind, VerdictRecord, VerdictRule } from "./types";

export const DEFAULT_FALLBACK_THRESHOLD = 0.85;
export const DEFAULT_JUDGE_TIMEOUT_MS = 30_000;

export interface VerdictDeps {
    judge: PlagiarismJudge;
    fallbackThreshold: number;
    judgeTimeoutMs: number;
    /** Run-level stop; aborts judgment calls that are still pending. */
    signal?: AbortSignal;
    limiter?: Limiter;
}

interface CascadeResult {
    verdict: Exclude<VerdictKind, "invalid-submission">;
    rule: VerdictRule;
    reasoning: string;
    judgmentConsulted: boolean;
}

/** Text sent to the judgment service: every raw source file with a name header. */
export function submissionText(submission: Submission): string {
    return submission.sourceFiles.map((f) => `--- ${f.name} ---\n${f.text}`).join("\n\n");
}

/**
 * Call the judge with a hard deadline.  Timeouts and run-level aborts come
 * back as "unavailable" so the caller can fall through to the fallback rule.
 */
export async function judgeWithTimeout(
    judge: PlagiarismJudge,
    sourceA: string,
    sourceB: string,
    timeoutMs: number,
    runSignal?: AbortSignal
): Promise<JudgmentOutcome> {
    if (runSignal?.aborted) return { status: "unavailable", reason: "run stopped" };

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onRunAbort = () => controller.abort();
    runSignal?.addEventListener("abort", onRunAbort, { once: true });

    const deadline = new Promise<JudgmentOutcome>((resolve) => {
        timer = setTimeout(() => {
            // resolve first so the race reports the timeout, not the abort
            resolve({ status: "unavailable", reason: `judgment timed out after ${timeoutMs}ms` });
            controller.abort();
        }, timeoutMs);
    });
    const stopped = new Promise<JudgmentOutcome>((resolve) => {
        controller.signal.addEventListener("abort", () => {
            resolve({ status: "unavailable", reason: runSignal?.aborted ? "run stopped" : "judgment aborted" });
        }, { once: true });
    });

    try {
        return await Promise.race([
            judge.judge(sourceA, sourceB, controller.signal).catch((err: unknown): JudgmentOutcome => ({
                status: "unavailable",
                reason: err instanceof Error ? err.message : String(err),
            })),
            deadline,
            stopped,
        ]);
    } finally {
        clearTimeout(timer);
        runSignal?.removeEventListener("abort", onRunAbort);
    }
}

function fallbackRule(record: ComparisonRecord, threshold: number, note?: string): CascadeResult {
    const aggregate = record.aggregateSource;
    const hex = record.scores.hex.levenshtein;
    const top = Math.max(aggregate, hex);
    const trigger = hex > aggregate ? `hex edit-distance score ${hex.toFixed(2)}` : `aggregate source score ${aggregate.toFixed(2)}`;
    const plagiarized = top > threshold;

    const decision = plagiarized
        ? `${trigger} exceeds ${threshold.toFixed(2)}`
        : `highest score (${trigger}) does not exceed ${threshold.toFixed(2)}`;

    return {
        verdict: plagiarized ? "plagiarized" : "not-plagiarized",
        rule: "algorithmic-fallback",
        reasoning: note ? `${note}; algorithmic analysis: ${decision}` : `algorithmic analysis: ${decision}`,
        judgmentConsulted: false,
    };
}

async function runCascade(
    record: ComparisonRecord,
    a: Submission,
    b: Submission,
    deps: VerdictDeps
): Promise<CascadeResult> {
    // Rule 1: byte-identical compiled output is conclusive.
    if (record.scores.hex.levenshtein === 1) {
        return { verdict: "plagiarized", rule: "exact-hex", reasoning: "hex output identical", judgmentConsulted: false };
    }

    // Rule 2: external judgment, when a service is present.
    if (deps.judge.available) {
        const call = async () => {
            const started = Date.now();
            const result = await judgeWithTimeout(deps.judge, submissionText(a), submissionText(b), deps.judgeTimeoutMs, deps.signal);
            metrics.recordJudgeCall(Date.now() - started, result.status !== "ok");
            return result;
        };
        const outcome = await (deps.limiter ? deps.limiter.run(call) : call());

        if (outcome.status === "ok") {
            return {
                verdict: outcome.isPlagiarized ? "plagiarized" : "not-plagiarized",
                rule: "external-judgment",
                reasoning: outcome.reasoning,
                judgmentConsulted: true,
            };
        }

        void logWarn(`[Verdict] Judgment unavailable for ${record.pair[0]} vs ${record.pair[1]}: ${outcome.reason}`);
        return { ...fallbackRule(record, deps.fallbackThreshold, "judgment unavailable"), judgmentConsulted: true };
    }

    // Rule 3: algorithmic fallback.
    return fallbackRule(record, deps.fallbackThreshold);
}

/**
 * Resolve one candidate.  The invalid-submission override is applied after
 * the cascade and only when the cascade did not find plagiarism.
 */
export async function resolveVerdict(
    record: ComparisonRecord,
    a: Submission,
    b: Submission,
    deps: VerdictDeps
): Promise<VerdictRecord> {
    const cascade = await runCascade(record, a, b, deps);
    const invalidSubmissions = [a, b].filter((s) => !s.valid).map((s) => s.studentId);

    const verdict: VerdictKind =
        cascade.verdict !== "plagiarized" && invalidSubmissions.length > 0 ? "invalid-submission" : cascade.verdict;

    return {
        submissionIds: record.pair,
        scores: record.scores,
        aggregateSourceScore: record.aggregateSource,
        verdict,
        cascadeVerdict: cascade.verdict,
        rule: cascade.rule,
        reasoning: cascade.reasoning,
        judgmentConsulted: cascade.judgmentConsulted,
        invalidSubmissions,
        anomalyTagsA: a.anomalies,
        anomalyTagsB: b.anomalies,
    };
}

/**
 * Resolve every candidate.  Pairs are independent; only the judgment calls
 * are throttled, by `concurrency`.
 */
export async function resolveVerdicts(
    candidates: ComparisonRecord[],
    submissions: Map<string, Submission>,
    deps: Omit<VerdictDeps, "limiter"> & { concurrency: number }
): Promise<VerdictRecord[]> {
    const limiter = createLimiter(deps.concurrency);

    return Promise.all(candidates.map((record) => {
        const a = submissions.get(record.pair[0]);
        const b = submissions.get(record.pair[1]);
        if (!a || !b) {
            throw new Error(`Comparison record references unknown submission: ${record.pair.join(" vs ")}`);
        }
        return resolveVerdict(record, a, b, { ...deps, limiter });
    }));
}
