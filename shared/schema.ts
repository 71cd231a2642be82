import { pgTable, text, timestamp, boolean, integer, serial, pgEnum, real, index, jsonb } from "drizzle-orm/pg-core";


// DETECTION RUNS - One row per detection pass

export const detectionRuns = pgTable("detection_runs", {
  id: serial("id").primaryKey(),
  labName: text("lab_name").notNull(),
  filterMode: text("filter_mode").notNull(),

  // Totals
  submissionCount: integer("submission_count").notNull(),
  invalidCount: integer("invalid_count").notNull(),
  pairsCompared: integer("pairs_compared").notNull(),
  candidateCount: integer("candidate_count").notNull(),
  plagiarizedCount: integer("plagiarized_count").notNull(),

  // Effective configuration (without secrets)
  config: jsonb("config").$type<Record<string, unknown>>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});


// PAIR VERDICTS - Resolved candidates of a run

export const verdictEnum = pgEnum("verdict", ["plagiarized", "not-plagiarized", "invalid-submission"]);
export const verdictRuleEnum = pgEnum("verdict_rule", ["exact-hex", "external-judgment", "algorithmic-fallback"]);

export const pairVerdicts = pgTable("pair_verdicts", {
  id: serial("id").primaryKey(),
  runId: integer("run_id").notNull().references(() => detectionRuns.id, { onDelete: "cascade" }),
  studentA: text("student_a").notNull(),
  studentB: text("student_b").notNull(),

  // Scores
  sourceLcs: real("source_lcs").notNull(),
  sourceLevenshtein: real("source_levenshtein").notNull(),
  hexLcs: real("hex_lcs").notNull(),
  hexLevenshtein: real("hex_levenshtein").notNull(),
  aggregateSource: real("aggregate_source").notNull(),

  // Decision
  verdict: verdictEnum("verdict").notNull(),
  cascadeVerdict: verdictEnum("cascade_verdict").notNull(),
  rule: verdictRuleEnum("rule").notNull(),
  reasoning: text("reasoning").notNull(),
  judgmentConsulted: boolean("judgment_consulted").default(false).notNull(),
  invalidSubmissions: jsonb("invalid_submissions").$type<string[]>().notNull(),
  anomalyTagsA: jsonb("anomaly_tags_a").$type<Array<{ kind: string; detail: string }>>().notNull(),
  anomalyTagsB: jsonb("anomaly_tags_b").$type<Array<{ kind: string; detail: string }>>().notNull(),
}, (table) => ({
  runIdIdx: index("idx_pair_verdicts_run_id").on(table.runId),
}));


// TYPES

export type DetectionRun = typeof detectionRuns.$inferSelect;
export type InsertDetectionRun = typeof detectionRuns.$inferInsert;
export type PairVerdict = typeof pairVerdicts.$inferSelect;
export type InsertPairVerdict = typeof pairVerdicts.$inferInsert;

export interface ServiceStatus {
  online: boolean;
  uptime: number;
  judgeConfigured: boolean;
}
