import { describe, expect, it } from "vitest";
import {
  areIndependentlyAppendable,
  decide,
  DEFAULT_STRATEGY_OPTIONS,
  formatRationale,
  resolveHunk,
  type HunkContext,
} from "../src/merge/strategy.js";
import { FakeHunkReasoner, makeHunk, reasonerResult } from "./fakes.js";

function context(overrides: Partial<HunkContext> = {}): HunkContext {
  return {
    filepath: "src/wifi/radio.c",
    mode: "cherry-pick",
    options: DEFAULT_STRATEGY_OPTIONS,
    reasoner: null,
    contextBefore: [],
    contextAfter: [],
    ...overrides,
  };
}

describe("decide", () => {
  it("keeps the mode side of whitespace-only hunks", () => {
    const pick = decide("whitespace_only", ["a = 1;"], ["a=1;"], "cherry-pick");
    expect(pick).toEqual({
      kind: "resolved",
      action: "keep_theirs",
      confidence: "high",
      lines: ["a=1;"],
      reason: "whitespace-only difference, kept theirs",
    });
    const revert = decide("whitespace_only", ["a = 1;"], ["a=1;"], "revert");
    expect(revert.kind === "resolved" && revert.action).toBe("keep_ours");
  });

  it("merges include blocks", () => {
    const d = decide("include_reorder", ["#include <b.h>"], ["#include <a.h>"], "revert");
    expect(d).toEqual({
      kind: "resolved",
      action: "merge_both",
      confidence: "high",
      lines: ["#include <a.h>", "#include <b.h>"],
      reason: "both sides edit #include lines, merged and de-duplicated",
    });
  });

  it("keeps the more descriptive comment, theirs on a tie", () => {
    const longer = decide("comment_only", ["// explains the retry limit"], ["// retry"], "cherry-pick");
    expect(longer.kind === "resolved" && longer.action).toBe("keep_ours");
    expect(longer.kind === "resolved" && longer.reason).toBe("comment-only difference, kept the more descriptive ours");

    const tie = decide("comment_only", ["// abc"], ["// xyz"], "revert");
    expect(tie.kind === "resolved" && tie.action).toBe("keep_theirs");
  });

  it("keeps the mode side of comments under the mode policy", () => {
    const d = decide("comment_only", ["// explains the retry limit"], ["// retry"], "cherry-pick", {
      ...DEFAULT_STRATEGY_OPTIONS,
      commentPreference: "mode",
    });
    expect(d.kind === "resolved" && d.reason).toBe("comment-only difference, kept theirs");
  });

  it("prefers the side with more lines for allman and fewer for k&r", () => {
    const ours = ["if (x) {", "y();", "}"];
    const theirs = ["if (x)", "{", "y();", "}"];
    const allman = decide("brace_style", ours, theirs, "revert");
    expect(allman).toEqual({
      kind: "resolved",
      action: "keep_theirs",
      confidence: "medium",
      lines: theirs,
      reason: "brace placement difference, kept theirs (allman style)",
    });
    const kr = decide("brace_style", ours, theirs, "revert", { ...DEFAULT_STRATEGY_OPTIONS, braceStyle: "kr" });
    expect(kr.kind === "resolved" && kr.action).toBe("keep_ours");
  });

  it("keeps the mode side when brace variants have the same length", () => {
    const d = decide("brace_style", ["{", "a();"], ["a();", "}"], "revert");
    expect(d.kind === "resolved" && d.action).toBe("keep_ours");
  });

  it("keeps the side that adds a NULL guard regardless of mode", () => {
    const ours = ["ptr->x = 1;"];
    const theirs = ["if (ptr == NULL) return -1;", "ptr->x = 1;"];
    for (const mode of ["cherry-pick", "revert"] as const) {
      expect(decide("null_check_added", ours, theirs, mode)).toEqual({
        kind: "resolved",
        action: "keep_theirs",
        confidence: "medium",
        lines: theirs,
        reason: "theirs adds safety checks (NULL or error handling), kept theirs",
      });
    }
  });

  it("appends independent safety checks from both sides", () => {
    const d = decide("null_check_added", ["if (!a) return -1;"], ["if (!b) return -1;"], "cherry-pick");
    expect(d).toEqual({
      kind: "resolved",
      action: "merge_both",
      confidence: "medium",
      lines: ["if (!a) return -1;", "if (!b) return -1;"],
      reason: "both sides add independent safety checks, kept ours then theirs",
    });
  });

  it("defers safety hunks when the safety preference is off", () => {
    const d = decide("null_check_added", ["x();"], ["if (!p) return;", "x();"], "revert", {
      ...DEFAULT_STRATEGY_OPTIONS,
      safetyPreference: false,
    });
    expect(d).toEqual({
      kind: "deferred",
      fallback_side: "ours",
      fallback_lines: ["x();"],
      reason: "null_check_added conflict needs semantic resolution",
    });
  });

  it("defers functional hunks", () => {
    const d = decide("functional", ["x = f(a);"], ["x = f(b);"], "cherry-pick");
    expect(d.kind).toBe("deferred");
  });
});

describe("areIndependentlyAppendable", () => {
  it("rejects shared statements and empty sides", () => {
    expect(areIndependentlyAppendable(["a();"], ["b();"])).toBe(true);
    expect(areIndependentlyAppendable(["a();", "c();"], ["c();"])).toBe(false);
    expect(areIndependentlyAppendable([""], ["b();"])).toBe(false);
  });
});

describe("resolveHunk", () => {
  const functional = makeHunk(["x = compute(a);"], ["x = compute(b);"]);

  it("does not consult the reasoner for rule-resolved hunks", async () => {
    const reasoner = new FakeHunkReasoner(async () => reasonerResult(["unused"]));
    const result = await resolveHunk(makeHunk(["int x = 1;"], ["int  x=1;"]), context({ reasoner }));
    expect(result.confidence).toBe("high");
    expect(reasoner.requests).toHaveLength(0);
  });

  it("falls back to the mode side for review without a reasoner", async () => {
    const result = await resolveHunk(functional, context());
    expect(result).toEqual({
      resolved_lines: ["x = compute(b);"],
      confidence: "review",
      change_type: "functional",
      action: "fallback_review",
      reason: "functional conflict needs semantic resolution, no reasoner configured; kept theirs, requires manual verification",
    });
  });

  it("accepts a valid reasoner candidate at medium", async () => {
    const reasoner = new FakeHunkReasoner(async () => reasonerResult(["x = compute(a, b);"]));
    const result = await resolveHunk(
      functional,
      context({ reasoner, contextBefore: ["int x;"], contextAfter: ["return x;"], prContext: "PR #12" }),
    );
    expect(result).toEqual({
      resolved_lines: ["x = compute(a, b);"],
      confidence: "medium",
      change_type: "functional",
      action: "defer_to_reasoner",
      reason: "resolved by fake/m1: merged",
    });
    expect(reasoner.requests[0]).toEqual({
      filepath: "src/wifi/radio.c",
      ours: ["x = compute(a);"],
      theirs: ["x = compute(b);"],
      contextBefore: ["int x;"],
      contextAfter: ["return x;"],
      mode: "cherry-pick",
      prContext: "PR #12",
    });
  });

  it("falls back when the reasoner is unavailable", async () => {
    const reasoner = new FakeHunkReasoner(async () => null);
    const result = await resolveHunk(functional, context({ reasoner, mode: "revert" }));
    expect(result.resolved_lines).toEqual(["x = compute(a);"]);
    expect(result.reason).toBe(
      "functional conflict needs semantic resolution, reasoner unavailable; kept ours, requires manual verification",
    );
  });

  it("falls back when the candidate is rejected", async () => {
    const reasoner = new FakeHunkReasoner(async () =>
      reasonerResult(["x = {"], { valid: false, rejection_reason: "unbalanced {}" }),
    );
    const result = await resolveHunk(functional, context({ reasoner }));
    expect(result.confidence).toBe("review");
    expect(result.resolved_lines).toEqual(["x = compute(b);"]);
    expect(result.reason).toBe("reasoner candidate rejected (unbalanced {}); kept theirs, requires manual verification");
  });

  it("never rejects when the reasoner throws", async () => {
    const reasoner = new FakeHunkReasoner(async () => {
      throw new Error("boom");
    });
    const result = await resolveHunk(functional, context({ reasoner }));
    expect(result.action).toBe("fallback_review");
    expect(result.reason).toBe("reasoner failed: boom; kept theirs, requires manual verification");
  });
});

describe("formatRationale", () => {
  it("pads the confidence column", () => {
    const line = formatRationale("a.c", 2, {
      resolved_lines: [],
      confidence: "high",
      change_type: "whitespace_only",
      action: "keep_theirs",
      reason: "whitespace-only difference, kept theirs",
    });
    expect(line).toBe("[high  ] a.c hunk#2: whitespace_only -> whitespace-only difference, kept theirs");
  });
});
