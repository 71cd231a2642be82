import { HEX_RECORD_EOF } from "../acquisition/preprocessor";
import type { AnomalyOptions, AnomalyTag, SourceFile, Submission } from "./types";

// Structural sanity checks on a single submission.  Findings are surfaced as
// warnings only; they never change a plagiarism verdict.

export const DEFAULT_ANOMALY_OPTIONS: AnomalyOptions = {
    minHexBytes: 16,
    maxHexBytes: 65536, // full 8051 code space
    insufficientHexBytes: 5,
    minInstructions: 3,
    requiredInstructions: ["mov", "setb", "clr", "cpl", "acall", "lcall", "sjmp", "ljmp", "ajmp", "djnz"],
    maxCommentRatio: 0.6,
};

// Directives that follow a symbol name, as in `LED EQU P1.0`.
const NAMED_DIRECTIVES = new Set(["equ", "set", "data", "idata", "xdata", "bit", "code", "segment"]);

const ASM_DIRECTIVES = new Set([
    "org", "end", "equ", "set", "db", "dw", "ds", "dbit", "bit", "data", "idata", "xdata", "code",
    "segment", "rseg", "cseg", "dseg", "bseg", "iseg", "xseg", "using", "public", "extrn", "name",
    "$include", "$nomod51", "$mod51",
]);

interface LineStats {
    total: number;
    commentOrBlank: number;
}

interface AssemblyStats extends LineStats {
    mnemonics: string[];
    hasOrg: boolean;
    hasEnd: boolean;
}

function splitLines(text: string): string[] {
    return text.length === 0 ? [] : text.split(/\r?\n/);
}

/**
 * Returns the mnemonic or directive of an assembly line, or null for a
 * comment-only / blank line.  Labels (`loop:`) are skipped, and the
 * `NAME EQU value` form is reported as its directive.
 */
export function assemblyKeyword(line: string): string | null {
    const code = line.replace(/;.*$/, "").replace(/^\s*[A-Za-z_?][\w?]*:/, "").trim();
    if (code.length === 0) return null;

    const words = code.toLowerCase().split(/[\s,]+/);
    if (words.length > 1 && NAMED_DIRECTIVES.has(words[1])) return words[1];
    return words[0];
}

function assemblyStats(files: SourceFile[]): AssemblyStats {
    const stats: AssemblyStats = { total: 0, commentOrBlank: 0, mnemonics: [], hasOrg: false, hasEnd: false };

    for (const file of files) {
        for (const line of splitLines(file.text)) {
            stats.total++;
            const keyword = assemblyKeyword(line);
            if (keyword === null) {
                stats.commentOrBlank++;
                continue;
            }
            if (keyword === "org") stats.hasOrg = true;
            if (keyword === "end") stats.hasEnd = true;
            if (!ASM_DIRECTIVES.has(keyword)) stats.mnemonics.push(keyword);
        }
    }

    return stats;
}

function cStats(files: SourceFile[]): LineStats & { statements: number } {
    const stats = { total: 0, commentOrBlank: 0, statements: 0 };

    for (const file of files) {
        const withoutComments = file.text.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/.*$/gm, "");
        stats.statements += (withoutComments.match(/;/g) ?? []).length;

        let inBlock = false;
        for (const line of splitLines(file.text)) {
            stats.total++;
            const trimmed = line.trim();
            if (inBlock) {
                stats.commentOrBlank++;
                if (trimmed.includes("*/")) inBlock = false;
                continue;
            }
            if (trimmed.length === 0 || trimmed.startsWith("//")) {
                stats.commentOrBlank++;
            } else if (trimmed.startsWith("/*")) {
                stats.commentOrBlank++;
                inBlock = !trimmed.includes("*/");
            }
        }
    }

    return stats;
}

function hexAnomalies(submission: Submission, options: AnomalyOptions): AnomalyTag[] {
    const tags: AnomalyTag[] = [];
    const { hexRecords } = submission;

    if (!hexRecords.some((r) => r.valid && r.type === HEX_RECORD_EOF)) {
        tags.push({ kind: "missing-eof-marker", detail: "no end-of-file record (:00000001FF)" });
    }

    const malformed = hexRecords.filter((r) => !r.valid);
    if (malformed.length > 0) {
        const first = malformed[0].error ?? `line ${malformed[0].line}`;
        tags.push({
            kind: "malformed-hex-record",
            detail: `${malformed.length} malformed record${malformed.length === 1 ? "" : "s"}, first at ${first}`,
        });
    }

    const size = submission.hexBytes.length;
    if (size < options.minHexBytes || size > options.maxHexBytes) {
        tags.push({
            kind: "length-outlier",
            detail: `${size} data bytes, expected ${options.minHexBytes}-${options.maxHexBytes}`,
        });
    }

    if (size < options.insufficientHexBytes) {
        tags.push({
            kind: "insufficient-data",
            detail: `only ${size} data bytes (minimum ${options.insufficientHexBytes})`,
        });
    }

    return tags;
}

function sourceAnomalies(submission: Submission, options: AnomalyOptions): AnomalyTag[] {
    const tags: AnomalyTag[] = [];
    const asmFiles = submission.sourceFiles.filter((f) => f.language === "asm");
    const cFiles = submission.sourceFiles.filter((f) => f.language === "c");

    const asm = assemblyStats(asmFiles);
    const c = cStats(cFiles);

    const instructions = asm.mnemonics.length + c.statements;
    if (instructions < options.minInstructions) {
        tags.push({
            kind: "too-few-instructions",
            detail: `${instructions} instructions/statements (minimum ${options.minInstructions})`,
        });
    }

    if (asmFiles.length > 0) {
        const required = new Set(options.requiredInstructions.map((m) => m.toLowerCase()));
        if (required.size > 0 && !asm.mnemonics.some((m) => required.has(m))) {
            tags.push({
                kind: "missing-key-instruction",
                detail: `none of ${[...required].join(", ")} used`,
            });
        }
        if (!asm.hasOrg) tags.push({ kind: "missing-org-directive", detail: "no ORG directive" });
        if (!asm.hasEnd) tags.push({ kind: "missing-end-directive", detail: "no END directive" });
    }

    const total = asm.total + c.total;
    if (total > 0) {
        const ratio = (asm.commentOrBlank + c.commentOrBlank) / total;
        if (ratio > options.maxCommentRatio) {
            tags.push({
                kind: "excessive-comment-ratio",
                detail: `${Math.round(ratio * 100)}% of lines are comments or blank (limit ${Math.round(options.maxCommentRatio * 100)}%)`,
            });
        }
    }

    return tags;
}

/**
 * Run every check on one submission and collect all failures.
 */
export function detectAnomalies(
    submission: Submission,
    options: AnomalyOptions = DEFAULT_ANOMALY_OPTIONS
): AnomalyTag[] {
    return [...hexAnomalies(submission, options), ...sourceAnomalies(submission, options)];
}

/** Attach anomaly tags, returning new submission objects. */
export function annotateSubmissions(
    submissions: Submission[],
    options: AnomalyOptions = DEFAULT_ANOMALY_OPTIONS
): Submission[] {
    return submissions.map((s) => ({ ...s, anomalies: detectAnomalies(s, options) }));
}
