import fs from "node:fs/promises";
import { z } from "zod";
import { Target } from "./types.js";
import { errorMessage, isHttpUrl, writeFileAtomic } from "./utils.js";

const targetSchema = z.object({
  url: z
    .string()
    .min(1)
    .refine((v) => v === v.trim(), "must not have surrounding whitespace")
    .refine(isHttpUrl, "must be an http(s) URL"),
  keywords: z
    .array(z.string())
    .optional()
    .transform((ks) => (ks ?? []).map((k) => k.trim()).filter((k) => k.length > 0)),
});

export interface RegistryLoad {
  targets: Target[];
  warnings: string[];
}

/**
 * Ordered list of monitored targets, stored as a JSON array of
 * `{ url, keywords? }` records. Reading never throws for a bad file: the
 * cycle runs against whatever could be read.
 */
export class TargetRegistry {
  constructor(readonly file: string) {}

  async load(): Promise<RegistryLoad> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        try {
          await writeFileAtomic(this.file, "[]\n");
        } catch (writeErr) {
          return { targets: [], warnings: [`could not create target registry: ${errorMessage(writeErr)}`] };
        }
        return { targets: [], warnings: [] };
      }
      return { targets: [], warnings: [`target registry unreadable: ${errorMessage(err)}`] };
    }

    if (raw.trim() === "") return { targets: [], warnings: [] };

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      return { targets: [], warnings: [`target registry is not valid JSON: ${errorMessage(err)}`] };
    }
    if (!Array.isArray(data)) {
      return { targets: [], warnings: ["target registry must be a JSON array"] };
    }

    const targets: Target[] = [];
    const warnings: string[] = [];
    const seen = new Set<string>();
    data.forEach((entry: unknown, index) => {
      const parsed = targetSchema.safeParse(entry);
      if (parsed.success) {
        // one target per identity key: the first occurrence wins
        if (seen.has(parsed.data.url)) {
          warnings.push(`skipping target #${index}: duplicate url ${parsed.data.url}`);
          return;
        }
        seen.add(parsed.data.url);
        targets.push(parsed.data);
      } else {
        const errs = parsed.error.errors.map((e) => `${e.path.join(".") || "entry"}: ${e.message}`).join(", ");
        warnings.push(`skipping target #${index}: ${errs}`);
      }
    });
    return { targets, warnings };
  }

  async list(): Promise<Target[]> {
    return (await this.load()).targets;
  }

  /** Appends a target. Rejects a non-http(s) URL or one already registered. */
  async add(input: { url: string; keywords?: string[] }): Promise<Target> {
    const parsed = targetSchema.safeParse(input);
    if (!parsed.success) {
      throw new Error(`Invalid target URL: ${input.url}`);
    }
    const target = parsed.data;

    const { targets, warnings } = await this.load();
    if (warnings.length > 0) {
      throw new Error(`Refusing to rewrite ${this.file}: ${warnings.join("; ")}`);
    }
    if (targets.some((t) => t.url === target.url)) {
      throw new Error(`Target already registered: ${target.url}`);
    }

    targets.push(target);
    await writeFileAtomic(this.file, `${JSON.stringify(targets, null, 2)}\n`);
    return target;
  }
}
