import fs from "node:fs";
import path from "node:path";
import { sha256 } from "./checksum.js";

export const RESOLUTION_LOG = "auto_resolved.log";
export const MANIFEST_FILE = "manifest.json";

export type ReportArtifact = {
  path: string;
  kind: string;
  sha256: string;
  produced_at: string;
};

export type ReportManifest = {
  created_at: string;
  producer: string;
  artifacts: ReportArtifact[];
};

/**
 * Report writer. Owns the log directory of a run. Writes JSON artifacts,
 * tracks their checksums and emits the manifest that lists them.
 */
export class ReportWriter {
  private artifacts: ReportArtifact[] = [];

  constructor(
    private readonly logDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  init(): void {
    fs.mkdirSync(this.logDir, { recursive: true });
  }

  /** Write `content` as pretty JSON and track it. Returns the full path. */
  writeJson(relativePath: string, kind: string, content: unknown): string {
    const fullPath = path.join(this.logDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });

    const json = JSON.stringify(content, null, 2) + "\n";
    fs.writeFileSync(fullPath, json, "utf8");

    // rewriting an artifact replaces its manifest entry
    this.artifacts = this.artifacts.filter((a) => a.path !== relativePath);
    this.artifacts.push({ path: relativePath, kind, sha256: sha256(json), produced_at: this.now().toISOString() });
    return fullPath;
  }

  /** Append lines to the run's plain-text resolution log. */
  appendLog(lines: readonly string[], fileName: string = RESOLUTION_LOG): string {
    const fullPath = path.join(this.logDir, fileName);
    if (lines.length > 0) {
      fs.mkdirSync(this.logDir, { recursive: true });
      fs.appendFileSync(fullPath, lines.join("\n") + "\n", "utf8");
    }
    return fullPath;
  }

  writeManifest(): ReportManifest {
    const manifest: ReportManifest = {
      created_at: this.now().toISOString(),
      producer: "triagectl",
      artifacts: [...this.artifacts],
    };
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.writeFileSync(path.join(this.logDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getLogDir(): string {
    return this.logDir;
  }

  getArtifacts(): ReportArtifact[] {
    return [...this.artifacts];
  }
}
