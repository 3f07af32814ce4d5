import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveConflictText, resolveConflictedFile, resolvePreferringSide } from "../src/merge/resolver.js";
import { ReasonerAdapter } from "../src/reasoner/adapter.js";
import { MemoryAuditLog } from "../src/reasoner/audit-log.js";
import { CallBudget } from "../src/reasoner/budget.js";
import { conflictText, FakeClient, FakeHunkReasoner, reasonerResult, RecordingLogger, tmpDir } from "./fakes.js";

// hunk 1 is whitespace-only (high), hunk 2 is functional (review without a reasoner)
const TWO_HUNKS =
  [
    "#include <stdio.h>",
    ...conflictText(["int x = 1;"], ["int  x=1;"]),
    "void f(void)",
    "{",
    ...conflictText(["    x = compute(a);"], ["    x = compute(b);"]),
    "}",
  ].join("\n") + "\n";

describe("resolveConflictText", () => {
  it("reassembles when every hunk meets the minimum", async () => {
    const res = await resolveConflictText("a.c", TWO_HUNKS, { mode: "cherry-pick", minConfidence: "review" });
    if (res.outcome !== "reassembled") throw new Error(res.outcome);
    expect(res.content).toBe("#include <stdio.h>\nint  x=1;\nvoid f(void)\n{\n    x = compute(b);\n}\n");
    expect(res.lowest).toBe("review");
    expect(res.hunks.map((h) => h.result.confidence)).toEqual(["high", "review"]);
  });

  it("aborts the whole file when one hunk is below the minimum", async () => {
    const res = await resolveConflictText("a.c", TWO_HUNKS, { mode: "cherry-pick", minConfidence: "medium" });
    expect(res.outcome).toBe("aborted");
    if (res.outcome !== "aborted") return;
    expect(res.below_minimum).toEqual([2]);
    expect(res.lowest).toBe("review");
  });

  it("reports no conflicts for clean content", async () => {
    expect(await resolveConflictText("a.c", "int x;\n", { mode: "revert", minConfidence: "high" })).toEqual({
      outcome: "no_conflicts",
    });
  });

  it("fails with low confidence on malformed markers", async () => {
    const res = await resolveConflictText("a.c", "<<<<<<< HEAD\nx\n", { mode: "revert", minConfidence: "low" });
    expect(res).toEqual({
      outcome: "failed",
      confidence: "low",
      error: "malformed conflict markers at line 2: unterminated conflict opened at line 1",
    });
  });

  it("passes bounded context to the reasoner", async () => {
    const reasoner = new FakeHunkReasoner(async () => reasonerResult(["    x = compute(a, b);"]));
    const res = await resolveConflictText("a.c", TWO_HUNKS, {
      mode: "cherry-pick",
      minConfidence: "medium",
      reasoner,
      contextLines: 1,
    });
    expect(res.outcome).toBe("reassembled");
    expect(reasoner.requests).toHaveLength(1);
    expect(reasoner.requests[0].contextBefore).toEqual(["{"]);
    expect(reasoner.requests[0].contextAfter).toEqual(["}"]);
  });

  it("sends the remaining hunks to the fallback once the budget runs out", async () => {
    const content =
      [
        ...conflictText(["a(1);"], ["a(2);"]),
        "mid();",
        ...conflictText(["b(1);"], ["b(2);"]),
        "mid();",
        ...conflictText(["c(1);"], ["c(2);"]),
      ].join("\n") + "\n";
    const client = new FakeClient(async () => ({ content: "a(3);", tokens: 2 }));
    const budget = new CallBudget(1);
    const auditLog = new MemoryAuditLog();
    const reasoner = new ReasonerAdapter({ client, budget, auditLog, timeoutMs: 1000 });

    const res = await resolveConflictText("a.c", content, { mode: "cherry-pick", minConfidence: "review", reasoner });

    expect(client.requests).toHaveLength(1);
    expect(budget.consumed).toBe(1);
    if (res.outcome !== "reassembled") throw new Error(res.outcome);
    expect(res.hunks.map((h) => [h.hunk.index, h.result.confidence, h.result.action])).toEqual([
      [1, "medium", "defer_to_reasoner"],
      [2, "review", "fallback_review"],
      [3, "review", "fallback_review"],
    ]);
    expect(res.hunks[1].result.reason).toBe(
      "functional conflict needs semantic resolution, reasoner unavailable; kept theirs, requires manual verification",
    );
    expect(res.content).toBe("a(3);\nmid();\nb(2);\nmid();\nc(2);\n");
    expect(auditLog.entries.map((e) => e.disposition).sort()).toEqual(["accepted", "budget_exhausted", "budget_exhausted"]);
  });

  it("logs one rationale line per hunk at debug", async () => {
    const logger = new RecordingLogger();
    await resolveConflictText("a.c", TWO_HUNKS, { mode: "cherry-pick", minConfidence: "low", logger });
    expect(logger.messages("debug")).toEqual([
      "[high  ] a.c hunk#1: whitespace_only -> whitespace-only difference, kept theirs",
      "[review] a.c hunk#2: functional -> functional conflict needs semantic resolution, no reasoner configured; kept theirs, requires manual verification",
    ]);
  });
});

describe("resolvePreferringSide", () => {
  it("keeps the mode side of every hunk", () => {
    expect(resolvePreferringSide(TWO_HUNKS, "revert")).toEqual({
      content: "#include <stdio.h>\nint x = 1;\nvoid f(void)\n{\n    x = compute(a);\n}\n",
      hunks: 2,
    });
    expect(resolvePreferringSide("<<<<<<< HEAD\n", "revert")).toBeNull();
  });
});

describe("resolveConflictedFile", () => {
  function writeConflict(content: string): string {
    const file = path.join(tmpDir(), "radio.c");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("rewrites the file when reassembled", async () => {
    const file = writeConflict(TWO_HUNKS);
    const res = await resolveConflictedFile(file, { mode: "revert", minConfidence: "review" });
    expect(res.outcome).toBe("reassembled");
    expect(fs.readFileSync(file, "utf-8")).toBe("#include <stdio.h>\nint x = 1;\nvoid f(void)\n{\n    x = compute(a);\n}\n");
  });

  it("leaves the file untouched under the abort policy", async () => {
    const file = writeConflict(TWO_HUNKS);
    const logger = new RecordingLogger();
    const res = await resolveConflictedFile(file, {
      mode: "cherry-pick",
      minConfidence: "high",
      onLowConfidence: "abort",
      logger,
    });
    expect(res).toMatchObject({ outcome: "aborted", below_minimum: [2] });
    expect(fs.readFileSync(file, "utf-8")).toBe(TWO_HUNKS);
    expect(logger.messages("warn")).toEqual([`${file}: hunks below high confidence`]);
  });

  it("falls back to the mode side under the fallback policy", async () => {
    const file = writeConflict(TWO_HUNKS);
    const res = await resolveConflictedFile(file, { mode: "cherry-pick", minConfidence: "high" });
    expect(res).toMatchObject({ outcome: "fell_back", below_minimum: [2] });
    expect(fs.readFileSync(file, "utf-8")).toBe("#include <stdio.h>\nint  x=1;\nvoid f(void)\n{\n    x = compute(b);\n}\n");
  });

  it("reports the side written after a fallback, not the discarded resolutions", async () => {
    const file = writeConflict(
      [...conflictText(["#include <a.h>"], ["#include <b.h>"]), ...conflictText(["return 1;"], ["return 2;"])].join("\n") + "\n",
    );
    const res = await resolveConflictedFile(file, { mode: "cherry-pick", minConfidence: "medium" });

    expect(res.outcome).toBe("fell_back");
    if (res.outcome !== "fell_back") return;
    expect(fs.readFileSync(file, "utf-8")).toBe("#include <b.h>\nreturn 2;\n");
    expect(res.hunks.map((h) => h.result)).toEqual([
      {
        resolved_lines: ["#include <b.h>"],
        confidence: "review",
        change_type: "include_reorder",
        action: "keep_theirs",
        reason: "file fell back to theirs (hunks 2 below minimum); discarded merge_both at high",
      },
      {
        resolved_lines: ["return 2;"],
        confidence: "review",
        change_type: "functional",
        action: "keep_theirs",
        reason: "file fell back to theirs (hunks 2 below minimum); discarded fallback_review at review",
      },
    ]);
  });

  it("does not write in dry-run mode", async () => {
    const file = writeConflict(TWO_HUNKS);
    const res = await resolveConflictedFile(file, { mode: "revert", minConfidence: "low", dryRun: true });
    expect(res.outcome).toBe("reassembled");
    expect(fs.readFileSync(file, "utf-8")).toBe(TWO_HUNKS);
  });

  it("fails with the path when the file cannot be read", async () => {
    const file = path.join(tmpDir(), "missing.c");
    const res = await resolveConflictedFile(file, { mode: "revert", minConfidence: "low" });
    expect(res.outcome).toBe("failed");
    if (res.outcome !== "failed") return;
    expect(res.error.startsWith(`cannot read ${file}: `)).toBe(true);
  });

  it("prefixes parse errors with the path", async () => {
    const file = writeConflict("<<<<<<< HEAD\na\n>>>>>>> x\n");
    const res = await resolveConflictedFile(file, { mode: "revert", minConfidence: "low" });
    expect(res).toEqual({
      outcome: "failed",
      filepath: file,
      confidence: "low",
      error: `${file}: malformed conflict markers at line 3: unexpected close marker in ours section`,
    });
  });
});
