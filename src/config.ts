import cron from "node-cron";
import { z } from "zod";
import path from "node:path";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const positiveInt = (fallback: string, min: number) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Math.max(min, parseInt(v, 10) || parseInt(fallback, 10)));

const schema = z.object({
  DATA_DIR: z.string().min(1).default("./data"),
  TARGETS_FILE: z.string().min(1).optional(),
  SNAPSHOT_DIR: z.string().min(1).optional(),
  LOG_FILE: z.string().min(1).optional(),
  FETCH_TIMEOUT_MS: positiveInt("10000", 1),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  CHECK_CONCURRENCY: positiveInt("1", 1),
  CRON_SCHEDULE: z
    .string()
    .default("*/15 * * * *")
    .refine((v) => cron.validate(v), "not a valid cron expression"),
  FIRESTORE_COLLECTION: z.string().min(1).default("pagewatch_snapshots"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export interface AppConfig {
  readonly targetsFile: string;
  readonly snapshotDir: string;
  readonly logFile: string;
  readonly fetchTimeoutMs: number;
  readonly userAgent: string;
  readonly concurrency: number;
  readonly cronSchedule: string;
  readonly firestoreCollection: string;
  readonly googleApplicationCredentials?: string;
  readonly firebaseServiceAccountJson?: string;
}

/**
 * Resolves the runtime configuration once. Relative paths are made absolute
 * against `cwd` so later calls never depend on the working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  const vars = parsed.data;

  const dataDir = path.resolve(cwd, vars.DATA_DIR);
  const snapshotDir = path.resolve(cwd, vars.SNAPSHOT_DIR ?? path.join(dataDir, "snapshots"));

  return Object.freeze({
    targetsFile: path.resolve(cwd, vars.TARGETS_FILE ?? path.join(dataDir, "targets.json")),
    snapshotDir,
    logFile: path.resolve(cwd, vars.LOG_FILE ?? path.join(snapshotDir, "log.txt")),
    fetchTimeoutMs: vars.FETCH_TIMEOUT_MS,
    userAgent: vars.USER_AGENT,
    concurrency: vars.CHECK_CONCURRENCY,
    cronSchedule: vars.CRON_SCHEDULE,
    firestoreCollection: vars.FIRESTORE_COLLECTION,
    googleApplicationCredentials: vars.GOOGLE_APPLICATION_CREDENTIALS || undefined,
    firebaseServiceAccountJson: vars.FIREBASE_SERVICE_ACCOUNT_JSON || undefined,
  });
}
