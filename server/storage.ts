import {
  detectionRuns,
  pairVerdicts,
  type DetectionRun,
  type InsertDetectionRun,
  type PairVerdict,
  type InsertPairVerdict,
} from "@shared/schema";
import { db } from "./db";
import { asc, eq } from "drizzle-orm";
import type { DetectionReport, VerdictRecord } from "./detection/types";
import type { DetectionConfig } from "./config";

export type NewPairVerdict = Omit<InsertPairVerdict, "id" | "runId">;

// STORAGE INTERFACE
export interface IStorage {
  // Runs
  createRun(run: InsertDetectionRun, verdicts: NewPairVerdict[]): Promise<DetectionRun>;
  getRun(id: number): Promise<DetectionRun | undefined>;

  // Verdicts
  getRunVerdicts(runId: number): Promise<PairVerdict[]>;
}

// ROW MAPPING

export function toPairVerdictRow(v: VerdictRecord): NewPairVerdict {
  const [studentA, studentB] = v.submissionIds;
  return {
    studentA,
    studentB,
    sourceLcs: v.scores.source.lcs,
    sourceLevenshtein: v.scores.source.levenshtein,
    hexLcs: v.scores.hex.lcs,
    hexLevenshtein: v.scores.hex.levenshtein,
    aggregateSource: v.aggregateSourceScore,
    verdict: v.verdict,
    cascadeVerdict: v.cascadeVerdict,
    rule: v.rule,
    reasoning: v.reasoning,
    judgmentConsulted: v.judgmentConsulted,
    invalidSubmissions: v.invalidSubmissions,
    anomalyTagsA: v.anomalyTagsA,
    anomalyTagsB: v.anomalyTagsB,
  };
}

/** The run row for a finished report. The judgment API key never reaches the database. */
export function toDetectionRunRow(labName: string, config: DetectionConfig, report: DetectionReport): InsertDetectionRun {
  const { geminiApiKey: _secret, ...publicConfig } = config;
  const { summary } = report;
  return {
    labName,
    filterMode: report.filter.mode,
    submissionCount: summary.submissions,
    invalidCount: summary.invalidSubmissions,
    pairsCompared: summary.pairsCompared,
    candidateCount: summary.candidates,
    plagiarizedCount: summary.plagiarized,
    config: { ...publicConfig },
  };
}

// DATABASE STORAGE IMPLEMENTATION
export class DatabaseStorage implements IStorage {

  // RUNS
  async createRun(run: InsertDetectionRun, verdicts: NewPairVerdict[]): Promise<DetectionRun> {
    // Run and verdicts land together or not at all
    return await db.transaction(async (tx) => {
      const [created] = await tx.insert(detectionRuns).values(run).returning();
      if (verdicts.length > 0) {
        await tx.insert(pairVerdicts).values(verdicts.map((v) => ({ ...v, runId: created.id })));
      }
      return created;
    });
  }

  async getRun(id: number): Promise<DetectionRun | undefined> {
    const [run] = await db
      .select()
      .from(detectionRuns)
      .where(eq(detectionRuns.id, id));
    return run;
  }

  // VERDICTS
  async getRunVerdicts(runId: number): Promise<PairVerdict[]> {
    return await db
      .select()
      .from(pairVerdicts)
      .where(eq(pairVerdicts.runId, runId))
      .orderBy(asc(pairVerdicts.id));
  }
}

export const storage = new DatabaseStorage();
