import type { Express, Request, Response, NextFunction } from "express";
import { type Server } from "http";
import { storage, toDetectionRunRow, toPairVerdictRow } from "./storage";
import { api } from "@shared/routes";
import type { ServiceStatus } from "@shared/schema";
import { ConfigError, parseDetectionConfig, type DetectionConfig } from "./config";
import { buildSubmission } from "./acquisition/loader";
import { runDetection } from "./detection/engine";
import type { PlagiarismJudge } from "./detection/judge";
import { logError } from "./logger";

export interface RouteOptions {
  config: DetectionConfig;
  /** Defaults to the judge built from `config`. */
  judge?: PlagiarismJudge;
}

const startTime = Date.now();

// API auth middleware - every request must carry the configured API key
function apiAuth(req: Request, res: Response, next: NextFunction) {
  const secret = process.env.API_SECRET;
  if (secret && req.headers["x-api-key"] === secret) {
    return next();
  }

  return res.status(401).json({ message: "Unauthorized" });
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  options: RouteOptions
): Promise<Server> {

  // Service status
  app.get(api.status.get.path, apiAuth, (_req, res) => {
    const status: ServiceStatus = {
      online: true,
      uptime: Date.now() - startTime,
      judgeConfigured: options.judge?.available ?? Boolean(options.config.geminiApiKey),
    };
    res.json(status);
  });

  // Run detection over uploaded submissions and store the verdicts
  app.post(api.detect.create.path, apiAuth, async (req, res) => {
    const parsed = api.detect.create.input.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        message: "Invalid request",
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    const { labName, submissions: inputs, config: overrides } = parsed.data;

    try {
      const config = parseDetectionConfig({ ...options.config, ...overrides });
      const submissions = await Promise.all(inputs.map((input) => buildSubmission(input)));
      const report = await runDetection(submissions, { config, judge: options.judge });
      const run = await storage.createRun(
        toDetectionRunRow(labName, config, report),
        report.verdicts.map(toPairVerdictRow)
      );
      res.json({ runId: run.id, ...report });
    } catch (e) {
      if (e instanceof ConfigError) {
        return res.status(400).json({ message: "Invalid configuration", issues: e.issues });
      }
      await logError("[API] Detection run failed", e);
      res.status(500).json({ message: "Internal error" });
    }
  });

  // Stored run with its verdicts
  app.get(api.runs.get.path, apiAuth, async (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id <= 0) {
      return res.status(400).json({ message: "Invalid run id" });
    }

    try {
      const run = await storage.getRun(id);
      if (!run) {
        return res.status(404).json({ message: "Run not found" });
      }
      const verdicts = await storage.getRunVerdicts(id);
      res.json({ ...run, verdicts });
    } catch (e) {
      await logError("[API] Failed to load run", e);
      res.status(500).json({ message: "Internal error" });
    }
  });

  return httpServer;
}
