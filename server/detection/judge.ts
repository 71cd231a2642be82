import fetch from "node-fetch";
import { z } from "zod";

// External semantic judgment.  The verdict resolver only sees the
// PlagiarismJudge capability; whether a real service sits behind it is
// decided once, in createJudge().

export type JudgmentOutcome =
    | { status: "ok"; isPlagiarized: boolean; reasoning: string }
    | { status: "unavailable"; reason: string };

export interface PlagiarismJudge {
    readonly available: boolean;
    judge(sourceA: string, sourceB: string, signal?: AbortSignal): Promise<JudgmentOutcome>;
}

/** Used when no judgment service is configured. */
export class UnavailableJudge implements PlagiarismJudge {
    readonly available = false;

    async judge(): Promise<JudgmentOutcome> {
        return { status: "unavailable", reason: "no judgment service configured" };
    }
}

export function buildJudgePrompt(codeA: string, codeB: string): string {
    return `You are an expert code plagiarism detector for 8051 assembly and C.
Compare the following two code snippets and determine if they are plagiarized.
Both were written for the same lab assignment, so very similar algorithms are acceptable as long as part of the logic differs.
Ignore variable renaming, comment changes and whitespace differences.
Focus on logic, register usage, control flow and algorithm structure.

Submission A:
\`\`\`
${codeA}
\`\`\`

Submission B:
\`\`\`
${codeB}
\`\`\`

Analyze the similarities and differences.
Conclude with a JSON object in the following format:
{
    "reasoning": "Brief explanation of why...",
    "is_plagiarized": true/false
}`;
}

const judgmentSchema = z.object({
    is_plagiarized: z.boolean(),
    reasoning: z.string(),
});

const geminiResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })),
        }),
    })).min(1),
});

/**
 * Pull the judgment object out of model text.  Tolerates Markdown fences and
 * prose around the JSON.  Returns null if nothing valid is found.
 */
export function parseJudgmentText(text: string): { isPlagiarized: boolean; reasoning: string } | null {
    const stripped = text.replace(/```json/gi, "").replace(/```/g, "").trim();
    const candidates = [stripped];
    const match = stripped.match(/\{[\s\S]*\}/);
    if (match) candidates.push(match[0]);

    for (const candidate of candidates) {
        let raw: unknown;
        try {
            raw = JSON.parse(candidate);
        } catch {
            continue;
        }
        const parsed = judgmentSchema.safeParse(raw);
        if (parsed.success) {
            return { isPlagiarized: parsed.data.is_plagiarized, reasoning: parsed.data.reasoning };
        }
    }
    return null;
}

export interface GeminiJudgeOptions {
    apiKey: string;
    model: string;
    endpoint?: string;
}

export const GEMINI_ENDPOINT = "https://generativelanguage.googleapis.com/v1beta";

export class GeminiJudge implements PlagiarismJudge {
    readonly available = true;

    constructor(private readonly options: GeminiJudgeOptions) {}

    async judge(sourceA: string, sourceB: string, signal?: AbortSignal): Promise<JudgmentOutcome> {
        const endpoint = this.options.endpoint ?? GEMINI_ENDPOINT;
        const url = `${endpoint}/models/${encodeURIComponent(this.options.model)}:generateContent`;

        try {
            const res = await fetch(url, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "x-goog-api-key": this.options.apiKey,
                },
                body: JSON.stringify({
                    contents: [{ role: "user", parts: [{ text: buildJudgePrompt(sourceA, sourceB) }] }],
                    generationConfig: { temperature: 0 },
                }),
                signal,
            });

            if (!res.ok) {
                return { status: "unavailable", reason: `judgment service HTTP ${res.status}` };
            }

            const body = geminiResponseSchema.safeParse(await res.json());
            if (!body.success) {
                return { status: "unavailable", reason: "unexpected judgment service response shape" };
            }

            const text = body.data.candidates[0].content.parts.map((p) => p.text ?? "").join("");
            const judgment = parseJudgmentText(text);
            if (!judgment) {
                return { status: "unavailable", reason: `unparseable judgment: ${text.slice(0, 100)}` };
            }

            return { status: "ok", ...judgment };
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            return { status: "unavailable", reason: `judgment service error: ${reason}` };
        }
    }
}

export function createJudge(config: { geminiApiKey?: string; geminiModel: string }): PlagiarismJudge {
    if (!config.geminiApiKey) return new UnavailableJudge();
    return new GeminiJudge({ apiKey: config.geminiApiKey, model: config.geminiModel });
}
