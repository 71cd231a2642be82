import { z } from "zod";
import { DEFAULT_ANOMALY_OPTIONS } from "./detection/anomaly";
import { DEFAULT_HEX_THRESHOLD, DEFAULT_SOURCE_THRESHOLD } from "./detection/filter";
import { DEFAULT_FALLBACK_THRESHOLD, DEFAULT_JUDGE_TIMEOUT_MS } from "./detection/verdict";

// Configuration is validated once, before any comparison work starts.
// Anything out of range is fatal.

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

const unitInterval = z.coerce.number().min(0).max(1);

const filterSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("threshold"),
    sourceThreshold: unitInterval.default(DEFAULT_SOURCE_THRESHOLD),
    hexThreshold: unitInterval.default(DEFAULT_HEX_THRESHOLD),
  }),
  z.object({
    mode: z.literal("top-percent"),
    percent: z.coerce.number().gt(0).max(1).default(0.1),
    metric: z.enum(["aggregate", "token-sequence", "edit-distance"]).default("aggregate"),
  }),
]);

const anomalySchema = z.object({
  minHexBytes: z.coerce.number().int().min(0).default(DEFAULT_ANOMALY_OPTIONS.minHexBytes),
  maxHexBytes: z.coerce.number().int().positive().default(DEFAULT_ANOMALY_OPTIONS.maxHexBytes),
  insufficientHexBytes: z.coerce.number().int().min(0).default(DEFAULT_ANOMALY_OPTIONS.insufficientHexBytes),
  minInstructions: z.coerce.number().int().min(0).default(DEFAULT_ANOMALY_OPTIONS.minInstructions),
  requiredInstructions: z.array(z.string().min(1)).default(DEFAULT_ANOMALY_OPTIONS.requiredInstructions),
  maxCommentRatio: unitInterval.default(DEFAULT_ANOMALY_OPTIONS.maxCommentRatio),
}).refine((a) => a.minHexBytes <= a.maxHexBytes, {
  message: "minHexBytes must not exceed maxHexBytes",
  path: ["minHexBytes"],
});

export const detectionConfigSchema = z.object({
  filter: filterSchema.default({ mode: "threshold" }),
  fallbackThreshold: unitInterval.default(DEFAULT_FALLBACK_THRESHOLD),
  judgeTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_JUDGE_TIMEOUT_MS),
  judgeConcurrency: z.coerce.number().int().min(1).max(32).default(5),
  geminiApiKey: z.string().min(1).optional(),
  geminiModel: z.string().min(1).default("gemini-2.5-flash-lite"),
  anomaly: anomalySchema.default({}),
});

export type DetectionConfig = z.output<typeof detectionConfigSchema>;

/** Validate a config object.  Throws ConfigError listing every problem. */
export function parseDetectionConfig(input: unknown): DetectionConfig {
  const result = detectionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return result.data;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the detection config from environment variables:
 * FILTER_MODE, SRC_THRESHOLD, HEX_THRESHOLD, TOP_PERCENT, TOP_METRIC,
 * FALLBACK_THRESHOLD, GEMINI_API_KEY, GEMINI_MODEL, JUDGE_TIMEOUT_MS,
 * JUDGE_CONCURRENCY, MIN_HEX_BYTES, MAX_HEX_BYTES, INSUFFICIENT_HEX_BYTES,
 * MIN_INSTRUCTIONS, REQUIRED_INSTRUCTIONS (comma separated), MAX_COMMENT_RATIO.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DetectionConfig {
  const required = envValue(env, "REQUIRED_INSTRUCTIONS");

  return parseDetectionConfig({
    filter: {
      mode: envValue(env, "FILTER_MODE") ?? "threshold",
      sourceThreshold: envValue(env, "SRC_THRESHOLD"),
      hexThreshold: envValue(env, "HEX_THRESHOLD"),
      percent: envValue(env, "TOP_PERCENT"),
      metric: envValue(env, "TOP_METRIC"),
    },
    fallbackThreshold: envValue(env, "FALLBACK_THRESHOLD"),
    judgeTimeoutMs: envValue(env, "JUDGE_TIMEOUT_MS"),
    judgeConcurrency: envValue(env, "JUDGE_CONCURRENCY"),
    geminiApiKey: envValue(env, "GEMINI_API_KEY"),
    geminiModel: envValue(env, "GEMINI_MODEL"),
    anomaly: {
      minHexBytes: envValue(env, "MIN_HEX_BYTES"),
      maxHexBytes: envValue(env, "MAX_HEX_BYTES"),
      insufficientHexBytes: envValue(env, "INSUFFICIENT_HEX_BYTES"),
      minInstructions: envValue(env, "MIN_INSTRUCTIONS"),
      requiredInstructions: required?.split(",").map((m) => m.trim()).filter(Boolean),
      maxCommentRatio: envValue(env, "MAX_COMMENT_RATIO"),
    },
  });
}
