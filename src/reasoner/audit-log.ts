import fs from "node:fs/promises";
import path from "node:path";
import type { AuditEntry } from "../types/reasoner.js";

export const AUDIT_LOG_FILE = "reasoner-audit.jsonl";

const PREVIEW_LINES = 5;
const PREVIEW_CHARS = 200;

/** First five lines, at most 200 characters. */
export function preview(lines: readonly string[] | null | undefined): string {
  if (!lines || lines.length === 0) return "";
  return lines.slice(0, PREVIEW_LINES).join("\n").slice(0, PREVIEW_CHARS);
}

export interface AuditLog {
  append(entry: AuditEntry): Promise<void>;
}

/** Append-only JSONL file; entries are never rewritten. */
export class FileAuditLog implements AuditLog {
  readonly filePath: string;

  constructor(dir: string, fileName = AUDIT_LOG_FILE) {
    this.filePath = path.join(dir, fileName);
  }

  async append(entry: AuditEntry): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
  }
}

export class MemoryAuditLog implements AuditLog {
  readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}
