import { describe, it, expect } from "vitest";
import { DEFAULT_USER_AGENT, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("resolves defaults against the working directory", () => {
    expect(loadConfig({}, "/srv/app")).toEqual({
      targetsFile: "/srv/app/data/targets.json",
      snapshotDir: "/srv/app/data/snapshots",
      logFile: "/srv/app/data/snapshots/log.txt",
      fetchTimeoutMs: 10000,
      userAgent: DEFAULT_USER_AGENT,
      concurrency: 1,
      cronSchedule: "*/15 * * * *",
      firestoreCollection: "pagewatch_snapshots",
      googleApplicationCredentials: undefined,
      firebaseServiceAccountJson: undefined,
    });
  });

  it("derives dependent paths from overrides", () => {
    const config = loadConfig({ DATA_DIR: "/var/lib/pagewatch", SNAPSHOT_DIR: "snaps" }, "/srv/app");
    expect(config.targetsFile).toBe("/var/lib/pagewatch/targets.json");
    expect(config.snapshotDir).toBe("/srv/app/snaps");
    expect(config.logFile).toBe("/srv/app/snaps/log.txt");
  });

  it("parses numbers with a floor of one", () => {
    expect(loadConfig({ CHECK_CONCURRENCY: "4", FETCH_TIMEOUT_MS: "2500" }, "/")).toMatchObject({
      concurrency: 4,
      fetchTimeoutMs: 2500,
    });
    expect(loadConfig({ CHECK_CONCURRENCY: "0" }, "/").concurrency).toBe(1);
    expect(loadConfig({ CHECK_CONCURRENCY: "lots" }, "/").concurrency).toBe(1);
  });

  it("rejects an invalid cron schedule", () => {
    expect(() => loadConfig({ CRON_SCHEDULE: "whenever" }, "/")).toThrow(
      "Invalid configuration: CRON_SCHEDULE: not a valid cron expression"
    );
  });

  it("is frozen", () => {
    expect(Object.isFrozen(loadConfig({}, "/"))).toBe(true);
  });
});
