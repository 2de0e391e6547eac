import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { Snapshot } from "./types.js";
import { errorMessage, writeFileAtomic } from "./utils.js";

export class StorageError extends Error {
  constructor(
    readonly operation: "read" | "write",
    readonly key: string,
    cause: unknown
  ) {
    super(`snapshot ${operation} failed for ${key}: ${errorMessage(cause)}`, { cause });
    this.name = "StorageError";
  }
}

const snapshotSchema = z.object({
  timestamp: z.string(),
  text: z.string(),
});

/**
 * Persistent key → snapshot map. One snapshot per key, last write wins.
 * Implementations must tolerate concurrent calls for different keys.
 */
export interface SnapshotStore {
  exists(key: string): Promise<boolean>;
  load(key: string): Promise<Snapshot | null>;
  save(key: string, text: string): Promise<Snapshot>;
}

function parseSnapshot(key: string, data: unknown): Snapshot {
  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new StorageError("read", key, new Error("malformed snapshot record"));
  }
  return parsed.data;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly dir: string) {}

  pathFor(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(key));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError("read", key, err);
    }
  }

  async load(key: string): Promise<Snapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(key), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError("read", key, err);
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new StorageError("read", key, err);
    }
    return parseSnapshot(key, data);
  }

  async save(key: string, text: string): Promise<Snapshot> {
    const snapshot: Snapshot = { timestamp: new Date().toISOString(), text };
    try {
      await writeFileAtomic(this.pathFor(key), JSON.stringify(snapshot, null, 2));
    } catch (err) {
      throw new StorageError("write", key, err);
    }
    return snapshot;
  }
}

/** The slice of a Firestore `CollectionReference` the store needs. */
export interface SnapshotCollection {
  doc(id: string): {
    get(): Promise<{ exists: boolean; data(): unknown }>;
    set(data: { timestamp: string; text: string }): Promise<unknown>;
  };
}

export class FirestoreSnapshotStore implements SnapshotStore {
  constructor(private readonly collection: SnapshotCollection) {}

  async exists(key: string): Promise<boolean> {
    try {
      const doc = await this.collection.doc(key).get();
      return doc.exists;
    } catch (err) {
      throw new StorageError("read", key, err);
    }
  }

  async load(key: string): Promise<Snapshot | null> {
    let data: unknown;
    try {
      const doc = await this.collection.doc(key).get();
      if (!doc.exists) return null;
      data = doc.data();
    } catch (err) {
      throw new StorageError("read", key, err);
    }
    return parseSnapshot(key, data);
  }

  async save(key: string, text: string): Promise<Snapshot> {
    const snapshot: Snapshot = { timestamp: new Date().toISOString(), text };
    try {
      // Full overwrite, no merge: a snapshot is replaced as a whole.
      await this.collection.doc(key).set(snapshot);
    } catch (err) {
      throw new StorageError("write", key, err);
    }
    return snapshot;
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, Snapshot>();

  async exists(key: string): Promise<boolean> {
    return this.snapshots.has(key);
  }

  async load(key: string): Promise<Snapshot | null> {
    const snapshot = this.snapshots.get(key);
    return snapshot ? { ...snapshot } : null;
  }

  async save(key: string, text: string): Promise<Snapshot> {
    const snapshot: Snapshot = { timestamp: new Date().toISOString(), text };
    this.snapshots.set(key, snapshot);
    return { ...snapshot };
  }
}
