import pLimit from "p-limit";
import { AppConfig } from "./config.js";
import { classify } from "./classifier.js";
import { EventLog } from "./event-log.js";
import { extractText } from "./extractor.js";
import { Fetcher, HttpFetcher } from "./fetcher.js";
import { createFirestore } from "./firebase.js";
import { TargetRegistry } from "./registry.js";
import { FileSnapshotStore, FirestoreSnapshotStore, SnapshotStore } from "./store.js";
import { CheckResult, CycleReport, Target, WarningHandler } from "./types.js";
import { errorMessage, identityKey } from "./utils.js";

export interface TargetSource {
  load(): Promise<{ targets: Target[]; warnings: string[] }>;
}

export interface MonitorDeps {
  registry: TargetSource;
  fetcher: Fetcher;
  store: SnapshotStore;
  eventLog: EventLog;
  /** Targets processed at once. 1 means strictly sequential. */
  concurrency?: number;
  onWarning?: WarningHandler;
}

export const CYCLE_IN_PROGRESS = "cycle already in progress";

function logLine(result: CheckResult): string {
  switch (result.status) {
    case "error":
      return `ERROR | ${result.url} | ${result.details}`;
    case "initialized":
      return `INIT | ${result.url}`;
    case "no-change":
      return `NO CHANGE | ${result.url}`;
    case "keyword-change":
      return `KEYWORD CHANGE | ${result.url} | keywords: ${JSON.stringify(result.matched_keywords)}`;
    case "changed-but-no-keywords":
      return `CHANGE BUT NO KEYWORDS | ${result.url}`;
  }
}

/**
 * Drives one check cycle over every registered target.
 *
 * Precondition: cycles against the same snapshot store must not overlap. A
 * `runCycle` issued while this instance is already running one is refused
 * with a diagnostic instead of being run.
 */
export class Monitor {
  private running = false;

  constructor(private readonly deps: MonitorDeps) {}

  async runCheck(): Promise<CheckResult[]> {
    return (await this.runCycle()).results;
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = new Date().toISOString();
    const warnings: string[] = [];
    const warn = (message: string) => {
      warnings.push(message);
      this.deps.onWarning?.(message);
    };
    const report = (results: CheckResult[], diagnostic?: string): CycleReport => ({
      results,
      warnings,
      ...(diagnostic ? { diagnostic } : {}),
      startedAt,
      finishedAt: new Date().toISOString(),
    });

    if (this.running) return report([], CYCLE_IN_PROGRESS);
    this.running = true;
    try {
      let targets: Target[];
      try {
        const loaded = await this.deps.registry.load();
        loaded.warnings.forEach(warn);
        targets = loaded.targets;
      } catch (err) {
        return report([], `target registry failed: ${errorMessage(err)}`);
      }

      const limit = pLimit(Math.max(1, this.deps.concurrency ?? 1));
      // Promise.all keeps input order whatever the completion order.
      const results = await Promise.all(targets.map((t) => limit(() => this.checkTarget(t, warn))));
      return report(results);
    } finally {
      this.running = false;
    }
  }

  private async checkTarget(target: Target, warn: WarningHandler): Promise<CheckResult> {
    let result: CheckResult;
    try {
      result = await this.evaluate(target);
    } catch (err) {
      result = { url: target.url, status: "error", details: errorMessage(err) };
    }

    const logged = await this.deps.eventLog.append(logLine(result));
    if (!logged.ok) warn(logged.warning);
    return result;
  }

  private async evaluate(target: Target): Promise<CheckResult> {
    const fetched = await this.deps.fetcher.fetch(target.url);
    if (!fetched.ok) {
      return { url: target.url, status: "error", details: fetched.cause };
    }

    const text = extractText(fetched.html);
    const key = identityKey(target.url);
    const prior = await this.deps.store.load(key);
    const { result, action } = classify(target, text, prior);

    if (action.kind === "write") {
      // A failed save throws, so the caller reports an error rather than an unpersisted status.
      await this.deps.store.save(key, action.text);
    }
    return result;
  }
}

/** Wires a Monitor from resolved configuration. */
export function createMonitor(config: AppConfig, onWarning?: WarningHandler): Monitor {
  const firestore = createFirestore(config);
  const store: SnapshotStore = firestore
    ? new FirestoreSnapshotStore(firestore.collection(config.firestoreCollection))
    : new FileSnapshotStore(config.snapshotDir);

  return new Monitor({
    registry: new TargetRegistry(config.targetsFile),
    fetcher: new HttpFetcher({ userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs }),
    store,
    eventLog: new EventLog(config.logFile),
    concurrency: config.concurrency,
    onWarning,
  });
}
