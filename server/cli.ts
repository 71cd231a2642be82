#!/usr/bin/env tsx
import { realpathSync } from "fs";
import { writeFile } from "fs/promises";
import { resolve } from "path";
import { fileURLToPath } from "url";
import { parseArgs } from "util";
import { ConfigError, loadConfig } from "./config";
import { createKeilCompiler, findKeilInstallation, type SourceCompiler } from "./acquisition/compiler";
import { loadSubmissions } from "./acquisition/loader";
import { ScoreCache } from "./detection/cache";
import { runDetection } from "./detection/engine";
import { renderHtmlReport } from "./report/html";
import { logError, logInfo } from "./logger";

const USAGE = `Usage: hexcheck <submissions-dir> [--lab <name>] [--out <report.html>] [--json <report.json>] [--compile] [--keil <path>]`;

export interface CliOptions {
  root: string;
  labName: string;
  out: string;
  json?: string;
  compile: boolean;
  keilPath?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      lab: { type: "string" },
      out: { type: "string" },
      json: { type: "string" },
      compile: { type: "boolean", default: false },
      keil: { type: "string" },
    },
  });

  if (positionals.length !== 1) {
    throw new Error(USAGE);
  }

  return {
    root: resolve(positionals[0]),
    labName: values.lab ?? "Lab",
    out: resolve(values.out ?? "plagiarism_report.html"),
    json: values.json ? resolve(values.json) : undefined,
    compile: values.compile ?? false,
    keilPath: values.keil,
  };
}

function resolveCompiler(options: CliOptions): SourceCompiler | undefined {
  if (!options.compile) return undefined;
  const keilPath = options.keilPath ?? findKeilInstallation();
  if (!keilPath) {
    throw new ConfigError(["--compile requires a Keil C51 installation (set --keil, C51ROOT or KEIL_C51)"]);
  }
  return createKeilCompiler(keilPath);
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 2;
  }

  try {
    // Fatal configuration problems surface before any file is read.
    const config = loadConfig();
    const compiler = resolveCompiler(options);

    const submissions = await loadSubmissions(options.root, { compiler });
    const report = await runDetection(submissions, { config, cache: new ScoreCache() });

    await writeFile(options.out, renderHtmlReport(report, { labName: options.labName, compiledSources: options.compile, submissions }), "utf-8");
    if (options.json) {
      await writeFile(options.json, JSON.stringify(report, null, 2), "utf-8");
    }

    const { summary } = report;
    logInfo(
      `[CLI] ${summary.candidates} suspicious pairs, ${summary.plagiarized} plagiarized, ` +
      `${summary.invalidSubmissions} invalid submissions. Report: ${options.out}`
    );
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    await logError("[CLI] Detection run failed", err);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
