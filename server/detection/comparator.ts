import { ScoreCache } from "./cache";
import { levenshteinSimilarity, tokenSequenceSimilarity } from "./similarity";
import type { AlgorithmScores, Channel, ComparisonRecord, Submission } from "./types";
import { byPairKey } from "./types";

export interface CompareOptions {
    cache?: ScoreCache;
}

const ZERO: AlgorithmScores = { lcs: 0, levenshtein: 0 };

export function hasChannelData(submission: Submission, channel: Channel): boolean {
    return channel === "source" ? submission.sourceTokens.length > 0 : submission.hexBytes.length > 0;
}

function scoreSource(a: Submission, b: Submission, cache?: ScoreCache): AlgorithmScores {
    if (!hasChannelData(a, "source") || !hasChannelData(b, "source")) return { ...ZERO };

    const key = cache ? `source:${ScoreCache.key(a.sourceTokens, b.sourceTokens)}` : "";
    const cached = cache?.get(key);
    if (cached) return cached;

    // Edit distance works on the cleaned text, LCS on whole tokens.
    const scores = {
        lcs: tokenSequenceSimilarity(a.sourceTokens, b.sourceTokens),
        levenshtein: levenshteinSimilarity(a.sourceTokens.join(" "), b.sourceTokens.join(" ")),
    };
    cache?.set(key, scores);
    return scores;
}

function scoreHex(a: Submission, b: Submission, cache?: ScoreCache): AlgorithmScores {
    if (!hasChannelData(a, "hex") || !hasChannelData(b, "hex")) return { ...ZERO };

    const key = cache ? `hex:${ScoreCache.key(a.hexBytes, b.hexBytes)}` : "";
    const cached = cache?.get(key);
    if (cached) return cached;

    const scores = {
        lcs: tokenSequenceSimilarity(a.hexBytes, b.hexBytes),
        levenshtein: levenshteinSimilarity(a.hexBytes, b.hexBytes),
    };
    cache?.set(key, scores);
    return scores;
}

/**
 * Score one pair.  Arguments are put in canonical id order first, so the
 * record is the same whichever way round the pair is passed.
 */
export function comparePair(x: Submission, y: Submission, options: CompareOptions = {}): ComparisonRecord {
    const [a, b] = x.studentId <= y.studentId ? [x, y] : [y, x];
    const source = scoreSource(a, b, options.cache);
    const hex = scoreHex(a, b, options.cache);

    return {
        pair: [a.studentId, b.studentId],
        scores: { source, hex },
        aggregateSource: (source.lcs + source.levenshtein) / 2,
    };
}

/** True when at least one channel has data on both sides. */
export function isComparable(a: Submission, b: Submission): boolean {
    return (hasChannelData(a, "source") && hasChannelData(b, "source"))
        || (hasChannelData(a, "hex") && hasChannelData(b, "hex"));
}

/**
 * Compare every unordered pair that has something to compare.  One record
 * per pair, sorted by pair key.
 */
export function compareSubmissions(submissions: Submission[], options: CompareOptions = {}): ComparisonRecord[] {
    const records: ComparisonRecord[] = [];

    for (let i = 0; i < submissions.length; i++) {
        for (let j = i + 1; j < submissions.length; j++) {
            const a = submissions[i];
            const b = submissions[j];
            if (a.studentId === b.studentId) continue;
            if (!isComparable(a, b)) continue;
            records.push(comparePair(a, b, options));
        }
    }

    return records.sort(byPairKey);
}
