import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { WorkingTreeResolution } from "../src/git/working-tree.js";
import { sha256 } from "../src/report/checksum.js";
import { buildResolutionReport, formatResolutionLog, summarizeConfidence } from "../src/report/summary.js";
import { MANIFEST_FILE, RESOLUTION_LOG, ReportWriter } from "../src/report/writer.js";
import { createLogger } from "../src/core/logger.js";
import { tmpDir } from "./fakes.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

const OUTCOME: WorkingTreeResolution = {
  resolved: [{ file: "src/a.c", kind: "UU", reason: "modify/modify -> smart-resolved (lowest confidence high)" }],
  unresolvable: [{ file: "src/b.c", kind: "UU", reason: "modify/modify -> hunks 1 below minimum confidence" }],
  records: [
    { file: "src/a.c", pr: "12", hunk: 1, change_type: "whitespace_only", confidence: "high", action: "keep_theirs", reason: "r1" },
    { file: "src/b.c", pr: "12", hunk: 1, change_type: "functional", confidence: "review", action: "fallback_review", reason: "r2" },
    { file: "src/b.c", pr: "12", hunk: 2, change_type: "brace_style", confidence: "medium", action: "keep_ours", reason: "r3" },
  ],
};

describe("checksum", () => {
  it("hashes string content", () => {
    expect(sha256('{\n  "a": 1\n}\n')).toBe("5e36b6560513586ced65eca0e8b025fe88edbcab82ba2cb67a5fcb2d7b202383");
  });
});

describe("resolution summary", () => {
  it("counts hunks per confidence level", () => {
    expect(summarizeConfidence(OUTCOME.records)).toEqual({ total_hunks: 3, high: 1, medium: 1, review: 1, low: 0 });
  });

  it("builds the report", () => {
    const report = buildResolutionReport({
      pr: "12",
      mode: "cherry-pick",
      smart: true,
      head: "abc123",
      outcome: OUTCOME,
      now: NOW,
    });
    expect(report.timestamp).toBe("2026-03-01T12:00:00.000Z");
    expect(report.head).toBe("abc123");
    expect(report.files).toEqual({ resolved: OUTCOME.resolved, unresolvable: OUTCOME.unresolvable });
    expect(report.resolutions).toHaveLength(3);
  });

  it("formats log lines, resolved first", () => {
    expect(formatResolutionLog("12", OUTCOME)).toEqual([
      "PR#12|RESOLVED|src/a.c|modify/modify -> smart-resolved (lowest confidence high)",
      "PR#12|FAILED|src/b.c|modify/modify -> hunks 1 below minimum confidence",
    ]);
  });
});

describe("ReportWriter", () => {
  it("writes artifacts and a manifest with their checksums", () => {
    const dir = path.join(tmpDir(), "logs");
    const writer = new ReportWriter(dir, () => NOW);
    writer.init();
    const full = writer.writeJson("resolution-pr12.json", "resolution", { a: 1 });

    expect(full).toBe(path.join(dir, "resolution-pr12.json"));
    expect(fs.readFileSync(full, "utf-8")).toBe('{\n  "a": 1\n}\n');

    const manifest = writer.writeManifest();
    expect(manifest).toEqual({
      created_at: "2026-03-01T12:00:00.000Z",
      producer: "triagectl",
      artifacts: [
        {
          path: "resolution-pr12.json",
          kind: "resolution",
          sha256: "5e36b6560513586ced65eca0e8b025fe88edbcab82ba2cb67a5fcb2d7b202383",
          produced_at: "2026-03-01T12:00:00.000Z",
        },
      ],
    });
    expect(JSON.parse(fs.readFileSync(path.join(dir, MANIFEST_FILE), "utf-8"))).toEqual(manifest);
  });

  it("replaces the manifest entry of a rewritten artifact", () => {
    const writer = new ReportWriter(tmpDir(), () => NOW);
    writer.writeJson("r.json", "resolution", { a: 1 });
    writer.writeJson("r.json", "resolution", { a: 2 });
    expect(writer.getArtifacts().map((a) => a.sha256)).toEqual([
      "c34a422b9e2e50de25cd966dc034dff66d56e60ce9a4fe18e554580455cdd1c6",
    ]);
  });

  it("appends to the resolution log across runs", () => {
    const dir = tmpDir();
    new ReportWriter(dir).appendLog(["PR#1|RESOLVED|a.c|x"]);
    new ReportWriter(dir).appendLog(["PR#2|FAILED|b.c|y"]);
    new ReportWriter(dir).appendLog([]);
    expect(fs.readFileSync(path.join(dir, RESOLUTION_LOG), "utf-8")).toBe("PR#1|RESOLVED|a.c|x\nPR#2|FAILED|b.c|y\n");
  });
});

describe("logger", () => {
  function capture(opts: Parameters<typeof createLogger>[0]) {
    const lines: string[] = [];
    return { lines, logger: createLogger({ ...opts, output: (line) => lines.push(line) }) };
  }

  it("writes one JSON object per line in jsonl format", () => {
    const { lines, logger } = capture({ format: "jsonl", verbose: true });
    logger.info("resolved", { file: "a.c" });
    logger.debug("detail");
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { level: "info", message: "resolved", file: "a.c" },
      { level: "debug", message: "detail" },
    ]);
  });

  it("drops debug unless verbose and info when quiet", () => {
    const normal = capture({ format: "jsonl" });
    normal.logger.debug("hidden");
    normal.logger.warn("shown");
    expect(normal.lines).toEqual(['{"level":"warn","message":"shown"}']);

    const quiet = capture({ format: "jsonl", verbose: true, quiet: true });
    quiet.logger.info("hidden");
    quiet.logger.debug("hidden");
    quiet.logger.error("shown");
    expect(quiet.lines).toEqual(['{"level":"error","message":"shown"}']);
  });

  it("prefixes human lines with the level", () => {
    const { lines, logger } = capture({ format: "human" });
    logger.warn("careful", { file: "a.c" });
    logger.info("quiet data", { file: "a.c" });
    // strip colour codes
    const plain = lines.map((l) => l.replace(/\u001b\[[0-9;]*m/g, ""));
    expect(plain).toEqual(['[warn] careful {"file":"a.c"}', "[info] quiet data"]);
  });
});
