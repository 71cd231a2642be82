import { createHash } from "crypto";
import type { AlgorithmScores } from "./types";

// Memoised channel scores, keyed on content rather than student ids:
// ids get reused between labs, content is what is actually being compared.

function digest(sequence: ArrayLike<string | number>): string {
    const hash = createHash("sha256");
    if (typeof sequence === "string") {
        hash.update(`s:${sequence}`);
    } else {
        hash.update(`a:${Array.from(sequence).join("\u0001")}`);
    }
    return hash.digest("hex");
}

export class ScoreCache {
    private readonly entries = new Map<string, AlgorithmScores>();
    hits = 0;

    /** Symmetric key: the two digests are sorted. */
    static key(a: ArrayLike<string | number>, b: ArrayLike<string | number>): string {
        const [x, y] = [digest(a), digest(b)].sort();
        return `${x}:${y}`;
    }

    get(key: string): AlgorithmScores | undefined {
        const found = this.entries.get(key);
        if (found) this.hits++;
        return found;
    }

    set(key: string, scores: AlgorithmScores): void {
        this.entries.set(key, scores);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
        this.hits = 0;
    }
}
