import { z } from "zod";

export const sourceFileSchema = z.object({
  name: z.string().min(1),
  language: z.enum(["asm", "c"]),
  text: z.string(),
});

export const submissionInputSchema = z.object({
  studentId: z.string().min(1),
  sourceFiles: z.array(sourceFileSchema).default([]),
  hex: z.array(z.string()).default([]),
});

export const detectRequestSchema = z.object({
  labName: z.string().min(1).default("Lab"),
  submissions: z.array(submissionInputSchema).min(1).refine(
    (list) => new Set(list.map((s) => s.studentId)).size === list.length,
    { message: "studentId values must be unique" }
  ),
  // Per-run overrides, validated against the server's config schema
  config: z.object({
    filter: z.unknown().optional(),
    fallbackThreshold: z.unknown().optional(),
    anomaly: z.unknown().optional(),
  }).strict().optional(),
});

export const api = {
  status: {
    get: {
      method: "GET" as const,
      path: "/api/status",
      responses: {
        200: z.object({
          online: z.boolean(),
          uptime: z.number(),
          judgeConfigured: z.boolean(),
        }),
      },
    },
  },
  detect: {
    create: {
      method: "POST" as const,
      path: "/api/detect",
      input: detectRequestSchema,
      responses: {
        200: z.object({ runId: z.number() }).passthrough(),
      },
    },
  },
  runs: {
    get: {
      method: "GET" as const,
      path: "/api/runs/:id",
    },
  },
};
