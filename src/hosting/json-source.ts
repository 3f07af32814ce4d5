import fs from "node:fs/promises";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PRRecord } from "../types/pr.js";
import type { PullRequestSource } from "./source.js";

/** One entry of a PR records file, as described by pr-records.schema.json. */
export type PRRecordJson = {
  number: number;
  title?: string;
  files_changed: string[];
  merged_at: string;
  diff_text?: string;
};

export function toPRRecord(json: PRRecordJson): PRRecord {
  return {
    number: json.number,
    ...(json.title !== undefined ? { title: json.title } : {}),
    files_changed: new Set(json.files_changed),
    merged_at: json.merged_at,
    diff_text: json.diff_text ?? "",
  };
}

/**
 * Reads PR records from a JSON array on disk, validated once and kept for the
 * rest of the run.
 */
export class JsonPullRequestSource implements PullRequestSource {
  private cache: Map<number, PRRecord> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly registry?: SchemaRegistry,
  ) {}

  private async load(): Promise<Map<number, PRRecord>> {
    if (this.cache) return this.cache;

    const raw = await fs.readFile(this.filePath, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(`${this.filePath}: invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const registry = this.registry ?? (await createRegistry());
    const check = registry.check<PRRecordJson[]>("pr-records", data);
    if (!check.valid) {
      throw new Error(`${this.filePath}: ${check.errors}`);
    }

    this.cache = new Map(check.value.map((json) => [json.number, toPRRecord(json)] as const));
    return this.cache;
  }

  /** Every record in the file when `numbers` is empty, otherwise the requested ones that exist. */
  async fetch(numbers: readonly number[]): Promise<PRRecord[]> {
    const records = await this.load();
    if (numbers.length === 0) return [...records.values()];
    return numbers.flatMap((n) => {
      const record = records.get(n);
      return record ? [record] : [];
    });
  }
}
