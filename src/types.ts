export interface Target {
  url: string;
  keywords: string[];
}

export interface Snapshot {
  timestamp: string; // ISO
  text: string;
}

export type CheckResult =
  | { url: string; status: "error"; details: string }
  | { url: string; status: "initialized" }
  | { url: string; status: "no-change" }
  | { url: string; status: "keyword-change"; matched_keywords: string[] }
  | { url: string; status: "changed-but-no-keywords" };

export type SnapshotAction = { kind: "none" } | { kind: "write"; text: string };

export interface Classification {
  result: CheckResult;
  action: SnapshotAction;
}

export type FetchOutcome =
  | { ok: true; html: string; contentType?: string }
  | { ok: false; cause: string };

export interface CycleReport {
  results: CheckResult[];
  warnings: string[];
  diagnostic?: string; // set only when the cycle could not run
  startedAt: string;
  finishedAt: string;
}

export type WarningHandler = (message: string) => void;
