import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

/** Storage key for a target: hex MD5 of the URL exactly as configured. */
export function identityKey(url: string): string {
  return crypto.createHash("md5").update(url, "utf8").digest("hex");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const pad = (n: number) => String(n).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * see either the previous content or the new content, never a partial file.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmp, data, "utf8");
    await fs.rename(tmp, filePath);
  } catch (err) {
    // best-effort cleanup; the write error is what propagates
    await fs.rm(tmp, { force: true }).catch(() => undefined);
    throw err;
  }
}
