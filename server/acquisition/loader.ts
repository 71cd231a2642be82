import { extname, basename } from "path";
import { logInfo, logWarn } from "../logger";
import type { SourceFile, Submission } from "../detection/types";
import type { SourceCompiler } from "./compiler";
import { crawlSubmissions, readTextFile } from "./files";
import { cleanAssembly, cleanSource, hexDataBytes, parseIntelHex, tokenize } from "./preprocessor";

export interface SubmissionInput {
    studentId: string;
    sourceFiles: SourceFile[];
    /** Contents of each .hex file. */
    hex: string[];
    /** Every file name found, used only to explain an invalid submission. */
    allFiles?: string[];
    /** Files that were found but could not be read. */
    unreadableFiles?: string[];
}

export interface BuildOptions {
    /** When set, C files are compiled and compared as assembly. */
    compiler?: SourceCompiler;
}

async function sourceTokens(input: SubmissionInput, compiler?: SourceCompiler): Promise<string[]> {
    const tokens: string[] = [];

    for (const file of input.sourceFiles) {
        if (file.language === "c" && compiler) {
            const result = await compiler.compile(file.text);
            if (!result.ok) {
                void logWarn(`[Loader] ${input.studentId}/${file.name}: ${result.error}`);
                continue;
            }
            tokens.push(...tokenize(cleanAssembly(result.assembly)));
        } else {
            tokens.push(...tokenize(cleanSource(file.text, file.language)));
        }
    }

    return tokens;
}

function missingSourceReason(allFiles: string[]): string {
    if (allFiles.length === 0) return "no files found";
    const exts = [...new Set(allFiles.map((f) => extname(f).toLowerCase() || "(no extension)"))].sort();
    return `found ${exts.join(", ")} files but need .a51, .asm or .c source`;
}

/**
 * Build a Submission from raw file contents.  Invalid means there is no
 * usable source or no usable hex data; it is recorded, never thrown.
 */
export async function buildSubmission(input: SubmissionInput, options: BuildOptions = {}): Promise<Submission> {
    const tokens = await sourceTokens(input, options.compiler);
    const hexRecords = input.hex.flatMap((text) => parseIntelHex(text));
    const hexBytes = hexDataBytes(hexRecords);

    const unreadable = input.unreadableFiles ?? [];
    const reasons: string[] = [];
    if (input.sourceFiles.length === 0) {
        if (unreadable.length === 0) reasons.push(missingSourceReason(input.allFiles ?? []));
    } else if (tokens.length === 0) {
        reasons.push("source files are empty after removing comments");
    }
    if (hexBytes.length === 0) {
        reasons.push("no valid hex data found");
    }
    if ((tokens.length === 0 || hexBytes.length === 0) && unreadable.length > 0) {
        reasons.push(`could not read ${unreadable.join(", ")}`);
    }

    return {
        studentId: input.studentId,
        sourceFiles: input.sourceFiles,
        sourceTokens: tokens,
        hexRecords,
        hexBytes,
        valid: reasons.length === 0,
        invalidReason: reasons.length > 0 ? reasons.join(" | ") : undefined,
        anomalies: [],
    };
}

/**
 * Read every student directory under `root` into a Submission.
 */
export async function loadSubmissions(root: string, options: BuildOptions = {}): Promise<Submission[]> {
    const students = await crawlSubmissions(root);
    logInfo(`[Loader] Found ${students.length} student directories in ${root}`);

    const submissions: Submission[] = [];
    for (const student of students) {
        const unreadableFiles: string[] = [];
        // A file that cannot be read is left out, never fatal to the run
        const read = async (path: string): Promise<string | undefined> => {
            try {
                return await readTextFile(path);
            } catch (err) {
                unreadableFiles.push(basename(path));
                void logWarn(`[Loader] ${student.studentId}/${basename(path)}: ${err instanceof Error ? err.message : String(err)}`);
                return undefined;
            }
        };

        const sourceFiles: SourceFile[] = [];
        for (const file of student.source) {
            const text = await read(file.path);
            if (text !== undefined) sourceFiles.push({ name: basename(file.path), language: file.language, text });
        }
        const hex: string[] = [];
        for (const file of student.hex) {
            const text = await read(file);
            if (text !== undefined) hex.push(text);
        }

        submissions.push(await buildSubmission(
            { studentId: student.studentId, sourceFiles, hex, allFiles: student.all, unreadableFiles },
            options
        ));
    }

    return submissions;
}
