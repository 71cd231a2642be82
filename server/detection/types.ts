// Data contracts shared by the detection pipeline, the acquisition layer,
// the reporter and the HTTP API.

export type SourceLanguage = "asm" | "c";

export type Channel = "source" | "hex";

export interface SourceFile {
    name: string;
    language: SourceLanguage;
    text: string;
}

/** One parsed Intel HEX line. `valid` is false when length, digits or checksum are wrong. */
export interface HexRecord {
    line: number;
    address: number;
    type: number;
    data: number[];
    valid: boolean;
    error?: string;
}

export type AnomalyKind =
    | "missing-eof-marker"
    | "malformed-hex-record"
    | "length-outlier"
    | "insufficient-data"
    | "too-few-instructions"
    | "missing-key-instruction"
    | "excessive-comment-ratio"
    | "missing-org-directive"
    | "missing-end-directive";

export interface AnomalyTag {
    kind: AnomalyKind;
    detail: string;
}

export interface Submission {
    studentId: string;
    /** Raw source files, used for anomaly checks and sent to the judgment service. */
    sourceFiles: SourceFile[];
    /** Cleaned, lowercased source tokens (the source channel). */
    sourceTokens: string[];
    hexRecords: HexRecord[];
    /** Data bytes of all valid data records (the hex channel). */
    hexBytes: number[];
    valid: boolean;
    invalidReason?: string;
    anomalies: AnomalyTag[];
}

export interface AlgorithmScores {
    lcs: number;
    levenshtein: number;
}

export interface ChannelScores {
    source: AlgorithmScores;
    hex: AlgorithmScores;
}

export interface ComparisonRecord {
    /** Canonical order: `a < b`. */
    pair: readonly [string, string];
    scores: ChannelScores;
    aggregateSource: number;
}

export type VerdictKind = "plagiarized" | "not-plagiarized" | "invalid-submission";

export type VerdictRule = "exact-hex" | "external-judgment" | "algorithmic-fallback";

export interface VerdictRecord {
    submissionIds: readonly [string, string];
    scores: ChannelScores;
    aggregateSourceScore: number;
    verdict: VerdictKind;
    /** Verdict reached by the rule cascade before the invalid-submission override. */
    cascadeVerdict: Exclude<VerdictKind, "invalid-submission">;
    rule: VerdictRule;
    reasoning: string;
    judgmentConsulted: boolean;
    invalidSubmissions: string[];
    anomalyTagsA: AnomalyTag[];
    anomalyTagsB: AnomalyTag[];
}

export type FilterMetric = "aggregate" | "token-sequence" | "edit-distance";

export type FilterPolicy =
    | { mode: "threshold"; sourceThreshold: number; hexThreshold: number }
    | { mode: "top-percent"; percent: number; metric: FilterMetric };

export interface AnomalyOptions {
    minHexBytes: number;
    maxHexBytes: number;
    insufficientHexBytes: number;
    minInstructions: number;
    requiredInstructions: string[];
    maxCommentRatio: number;
}

export interface InvalidSubmission {
    studentId: string;
    reason: string;
}

export interface DetectionSummary {
    submissions: number;
    invalidSubmissions: number;
    pairsCompared: number;
    candidates: number;
    plagiarized: number;
    notPlagiarized: number;
    invalidVerdicts: number;
    judgmentCalls: number;
}

export interface DetectionReport {
    filter: FilterPolicy;
    records: ComparisonRecord[];
    verdicts: VerdictRecord[];
    invalidSubmissions: InvalidSubmission[];
    anomalies: Record<string, AnomalyTag[]>;
    summary: DetectionSummary;
}

/** Builds the identity key of an unordered pair. */
export function pairKey(pair: readonly [string, string]): string {
    return `${pair[0]}\u0000${pair[1]}`;
}

export function byPairKey(x: { pair: readonly [string, string] }, y: { pair: readonly [string, string] }): number {
    const kx = pairKey(x.pair);
    const ky = pairKey(y.pair);
    return kx < ky ? -1 : kx > ky ? 1 : 0;
}
