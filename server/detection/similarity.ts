// Similarity scoring
// Two order-sensitive measures over arbitrary token sequences.  Strings are
// compared character by character, arrays element by element (===).
// Both keep a single rolling row so memory stays O(min(n, m)) even for
// submissions with several thousand tokens.

type Sequence<T> = ArrayLike<T>;

/**
 * Return the pair with the shorter sequence second, so the rolling row is
 * sized by the shorter one.
 */
function orderByLength<T>(a: Sequence<T>, b: Sequence<T>): [Sequence<T>, Sequence<T>] {
    return a.length >= b.length ? [a, b] : [b, a];
}

/**
 * Length of the longest common subsequence (order preserved, gaps allowed).
 */
export function lcsLength<T>(a: Sequence<T>, b: Sequence<T>): number {
    if (a.length === 0 || b.length === 0) return 0;

    const [outer, inner] = orderByLength(a, b);
    const row = new Uint32Array(inner.length + 1);

    for (let i = 1; i <= outer.length; i++) {
        let diagonal = 0; // row[j - 1] from the previous iteration of i
        const item = outer[i - 1];
        for (let j = 1; j <= inner.length; j++) {
            const above = row[j];
            if (item === inner[j - 1]) {
                row[j] = diagonal + 1;
            } else if (row[j - 1] > above) {
                row[j] = row[j - 1];
            }
            diagonal = above;
        }
    }

    return row[inner.length];
}

/**
 * Unit-cost edit distance (insert, delete, substitute).
 */
export function levenshteinDistance<T>(a: Sequence<T>, b: Sequence<T>): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    const [outer, inner] = orderByLength(a, b);
    const row = new Uint32Array(inner.length + 1);
    for (let j = 0; j <= inner.length; j++) row[j] = j;

    for (let i = 1; i <= outer.length; i++) {
        let diagonal = row[0];
        row[0] = i;
        const item = outer[i - 1];
        for (let j = 1; j <= inner.length; j++) {
            const above = row[j];
            const cost = item === inner[j - 1] ? 0 : 1;
            row[j] = Math.min(above + 1, row[j - 1] + 1, diagonal + cost);
            diagonal = above;
        }
    }

    return row[inner.length];
}

/**
 * `2·LCS / (n + m)`. 1.0 when both sides are empty, 0.0 when only one is.
 */
export function tokenSequenceSimilarity<T>(a: Sequence<T>, b: Sequence<T>): number {
    if (a.length === 0 && b.length === 0) return 1;
    if (a.length === 0 || b.length === 0) return 0;

    return (2 * lcsLength(a, b)) / (a.length + b.length);
}

/**
 * `(n + m - D) / (n + m)` where D is the edit distance.  Same empty-input
 * rules as {@link tokenSequenceSimilarity}.
 */
export function levenshteinSimilarity<T>(a: Sequence<T>, b: Sequence<T>): number {
    if (a.length === 0 && b.length === 0) return 1;
    if (a.length === 0 || b.length === 0) return 0;

    const total = a.length + b.length;
    return (total - levenshteinDistance(a, b)) / total;
}
