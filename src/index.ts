#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import cron from "node-cron";
import { AppConfig, loadConfig } from "./config.js";
import { EventLog } from "./event-log.js";
import { CYCLE_IN_PROGRESS, Monitor, createMonitor } from "./monitor.js";
import { TargetRegistry } from "./registry.js";
import { CycleReport } from "./types.js";

const USAGE = `Usage: pagewatch <command>

Commands:
  check                     run one check cycle and print the results (default)
  watch                     run a cycle now, then on CRON_SCHEDULE
  list                      print the registered targets
  add <url> [keyword ...]   register a target (keywords may be comma-separated)
  log [n]                   print the last n event-log lines (default 20)`;

function printDiagnostics(report: CycleReport, tag: string): void {
  for (const w of report.warnings) console.warn(`[${tag}] warning: ${w}`);
  if (report.diagnostic) console.error(`[${tag}] ${report.diagnostic}`);
}

async function check(config: AppConfig): Promise<void> {
  const report = await createMonitor(config).runCycle();
  printDiagnostics(report, "CLI");
  console.log(JSON.stringify(report.results, null, 2));
}

async function runScheduled(monitor: Monitor): Promise<void> {
  console.log(`[WATCH] Cycle started at ${new Date().toISOString()}`);
  const report = await monitor.runCycle();
  if (report.diagnostic === CYCLE_IN_PROGRESS) {
    console.warn("[WATCH] Previous cycle still running, tick skipped.");
    return;
  }
  printDiagnostics(report, "WATCH");
  const changed = report.results.filter((r) => r.status === "keyword-change" || r.status === "changed-but-no-keywords");
  const errors = report.results.filter((r) => r.status === "error");
  console.log(
    `[WATCH] Cycle completed: ${report.results.length} targets, ${changed.length} changed, ${errors.length} errors.`
  );
  for (const r of report.results) {
    if (r.status === "keyword-change") console.log(`[WATCH] ${r.url}: keywords ${r.matched_keywords.join(", ")}`);
  }
}

async function watch(config: AppConfig): Promise<void> {
  const monitor = createMonitor(config);
  console.log(`[WATCH] Page monitor starting. Schedule: ${config.cronSchedule}`);

  // Run immediately at startup
  await runScheduled(monitor);

  cron.schedule(config.cronSchedule, () => {
    runScheduled(monitor).catch((err) => {
      console.error("[WATCH] Scheduled run error:", err instanceof Error ? err.message : err);
    });
  });
}

async function main(argv: string[]): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  const [command = "check", ...args] = argv;

  switch (command) {
    case "check":
      await check(config);
      return 0;
    case "watch":
      await watch(config);
      return 0;
    case "list": {
      const { targets, warnings } = await new TargetRegistry(config.targetsFile).load();
      for (const w of warnings) console.warn(`[CLI] warning: ${w}`);
      console.log(JSON.stringify(targets, null, 2));
      return 0;
    }
    case "add": {
      const [url, ...rest] = args;
      if (!url) {
        console.error(USAGE);
        return 1;
      }
      const keywords = rest.flatMap((k) => k.split(","));
      const target = await new TargetRegistry(config.targetsFile).add({ url, keywords });
      console.log(`[CLI] Added ${target.url}${target.keywords.length ? ` (keywords: ${target.keywords.join(", ")})` : ""}`);
      return 0;
    }
    case "log": {
      const limit = args[0] ? parseInt(args[0], 10) || 20 : 20;
      const lines = await new EventLog(config.logFile).tail(limit);
      for (const line of lines) console.log(line);
      return 0;
    }
    case "help":
    case "--help":
    case "-h":
      console.log(USAGE);
      return 0;
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((e) => {
    console.error("[CLI] Fatal:", e instanceof Error ? e.message : e);
    process.exit(1);
  });
