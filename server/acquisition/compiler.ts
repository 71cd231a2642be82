import { execFile } from "child_process";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { promisify } from "util";

const exec = promisify(execFile);

// Optional C → assembly step using the Keil C51 toolchain.  Comparing the
// generated assembly catches copies hidden behind renamed C identifiers.

export type CompileResult = { ok: true; assembly: string } | { ok: false; error: string };

export interface SourceCompiler {
    compile(cSource: string): Promise<CompileResult>;
}

const COMPILE_TIMEOUT_MS = 30_000;

const COMMON_KEIL_PATHS = [
    "C:\\Keil_v5\\C51",
    "C:\\Keil\\C51",
    "C:\\Program Files\\Keil_v5\\C51",
    "C:\\Program Files (x86)\\Keil_v5\\C51",
    "C:\\Program Files\\Keil\\C51",
    "C:\\Program Files (x86)\\Keil\\C51",
];

function compilerBinary(keilPath: string): string {
    return join(keilPath, "BIN", "C51.exe");
}

/**
 * Locate a Keil C51 installation: C51ROOT / KEIL_C51 first, then the usual
 * install directories.  Returns null when none has a compiler binary.
 */
export function findKeilInstallation(
    env: NodeJS.ProcessEnv = process.env,
    exists: (path: string) => boolean = existsSync
): string | null {
    const candidates = [env.C51ROOT, env.KEIL_C51, ...COMMON_KEIL_PATHS].filter(
        (p): p is string => typeof p === "string" && p.length > 0
    );
    return candidates.find((p) => exists(compilerBinary(p))) ?? null;
}

const LISTING_INSTRUCTION = /^\s*\d+\s+[0-9A-F]+\s+([A-Z]+.*)$/i;
const LISTING_HEADER = /^(;|MODULE|COMPILER|SUMMARY|FUNCTION|NAME)/;
const COMMON_MNEMONICS = ["MOV", "ADD", "SUB", "MUL", "DIV", "JMP", "CALL", "RET", "PUSH", "POP"];

/**
 * Keep only instruction text from a C51 listing (.lst), dropping headers,
 * line numbers and addresses.
 */
export function extractCodeFromListing(listing: string): string {
    const lines: string[] = [];

    for (const raw of listing.split(/\r?\n/)) {
        const line = raw.trim();
        if (line.length === 0 || LISTING_HEADER.test(line)) continue;

        const match = line.match(LISTING_INSTRUCTION);
        if (match) {
            const instruction = match[1].trim();
            if (instruction && !instruction.startsWith(".")) lines.push(instruction);
        } else if (COMMON_MNEMONICS.some((op) => line.toUpperCase().includes(op))) {
            const stripped = line.replace(/^\d+\s+/, "").trim();
            if (stripped) lines.push(stripped);
        }
    }

    return lines.join("\n");
}

export function createKeilCompiler(keilPath: string): SourceCompiler {
    const binary = compilerBinary(keilPath);

    return {
        async compile(cSource: string): Promise<CompileResult> {
            if (!existsSync(binary)) {
                return { ok: false, error: `C51 compiler not found at ${binary}` };
            }

            const workDir = await mkdtemp(join(tmpdir(), "hexcheck-c51-"));
            try {
                await writeFile(join(workDir, "main.c"), cSource, "utf-8");
                await exec(
                    binary,
                    ["main.c", "CODE", "SYMBOLS", `INCDIR(${join(keilPath, "INC")})`, "OPTIMIZE(9)"],
                    { cwd: workDir, timeout: COMPILE_TIMEOUT_MS, windowsHide: true }
                );

                const listingPath = join(workDir, "main.lst");
                if (!existsSync(listingPath)) {
                    return { ok: false, error: "listing file not produced" };
                }
                const listing = await readFile(listingPath, "latin1");
                return { ok: true, assembly: extractCodeFromListing(listing) };
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                return { ok: false, error: `compilation failed: ${message}` };
            } finally {
                await rm(workDir, { recursive: true, force: true });
            }
        },
    };
}
