import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, formatLogTimestamp } from "./utils.js";

export type AppendOutcome = { ok: true } | { ok: false; warning: string };

/**
 * Append-only event log, one `[timestamp] message` line per entry.
 *
 * Appends are chained so that each one starts after the previous finished:
 * lines land in call order and never interleave, even when several targets
 * are processed concurrently. A failing sink resolves to a warning, never a
 * rejection.
 */
export class EventLog {
  private last: Promise<unknown> = Promise.resolve();

  constructor(
    readonly file: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  append(message: string): Promise<AppendOutcome> {
    const line = `[${formatLogTimestamp(this.now())}] ${message}\n`;
    const pending = this.last.then(() => this.write(line));
    this.last = pending;
    return pending;
  }

  async tail(limit: number): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const lines = raw.split("\n").filter((l) => l.length > 0);
    return limit > 0 ? lines.slice(-limit) : [];
  }

  private async write(line: string): Promise<AppendOutcome> {
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.appendFile(this.file, line, "utf8");
      return { ok: true };
    } catch (err) {
      return { ok: false, warning: `event log unavailable: ${errorMessage(err)}` };
    }
  }
}
