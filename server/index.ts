import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { standardRateLimiter } from "./rate-limit";
import { loadConfig } from "./config";
import { createJudge } from "./detection/judge";
import { startMetricsLogging } from "./detection/metrics";
import { logError, logInfo } from "./logger";

// Whole lab uploads arrive as JSON
const BODY_LIMIT = "20mb";

async function start() {
  // Invalid configuration stops the server before it listens
  const config = loadConfig();

  const app = express();
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use("/api", standardRateLimiter);

  const httpServer = createServer(app);
  await registerRoutes(httpServer, app, { config, judge: createJudge(config) });

  startMetricsLogging();

  const port = Number(process.env.PORT) || 5000;
  httpServer.listen(port, "0.0.0.0", () => {
    logInfo(`[Server] Listening on port ${port}`);
  });
}

start().catch(async (err: unknown) => {
  await logError("[Server] Failed to start", err);
  process.exit(1);
});
