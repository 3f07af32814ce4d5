import type { BraceStylePreference, CommentPreference } from "../types/config.js";
import type { ChangeType, Confidence, ConflictHunk, Mode, ResolutionAction, ResolutionResult, Side } from "../types/merge.js";
import { modeSide } from "../types/merge.js";
import type { HunkReasoner, ReasonerResult } from "../types/reasoner.js";
import { classifyHunk } from "./classifier.js";
import { mergeIncludes } from "./includes.js";
import { looksSafer, normalizeLines } from "./patterns.js";

export type StrategyOptions = {
  safetyPreference: boolean;
  braceStyle: BraceStylePreference;
  commentPreference: CommentPreference;
};

export const DEFAULT_STRATEGY_OPTIONS: StrategyOptions = {
  safetyPreference: true,
  braceStyle: "allman",
  commentPreference: "verbose",
};

export type Decision =
  | {
      kind: "resolved";
      action: Exclude<ResolutionAction, "defer_to_reasoner" | "fallback_review">;
      confidence: Confidence;
      lines: readonly string[];
      reason: string;
    }
  | {
      kind: "deferred";
      fallback_side: Side;
      fallback_lines: readonly string[];
      reason: string;
    };

export type HunkContext = {
  filepath: string;
  mode: Mode;
  options: StrategyOptions;
  reasoner: HunkReasoner | null;
  contextBefore: readonly string[];
  contextAfter: readonly string[];
  prContext?: string;
};

function sideLines(side: Side, ours: readonly string[], theirs: readonly string[]): readonly string[] {
  return side === "ours" ? ours : theirs;
}

function keep(
  side: Side,
  ours: readonly string[],
  theirs: readonly string[],
  confidence: Confidence,
  reason: string,
): Decision {
  return {
    kind: "resolved",
    action: side === "ours" ? "keep_ours" : "keep_theirs",
    confidence,
    lines: sideLines(side, ours, theirs),
    reason,
  };
}

function charCount(lines: readonly string[]): number {
  return lines.reduce((sum, l) => sum + l.length, 0);
}

/**
 * Both sides carry content and share no normalized line, so concatenating
 * them cannot duplicate a statement.
 */
export function areIndependentlyAppendable(ours: readonly string[], theirs: readonly string[]): boolean {
  const a = normalizeLines(ours);
  const b = normalizeLines(theirs);
  if (a.length === 0 || b.length === 0) return false;
  const seen = new Set(a);
  return !b.some((l) => seen.has(l));
}

function decideSafety(ours: readonly string[], theirs: readonly string[]): Decision | null {
  const oursSafe = looksSafer(ours);
  const theirsSafe = looksSafer(theirs);

  if (theirsSafe && !oursSafe) {
    return keep("theirs", ours, theirs, "medium", "theirs adds safety checks (NULL or error handling), kept theirs");
  }
  if (oursSafe && !theirsSafe) {
    return keep("ours", ours, theirs, "medium", "ours adds safety checks (NULL or error handling), kept ours");
  }
  if (oursSafe && theirsSafe && areIndependentlyAppendable(ours, theirs)) {
    return {
      kind: "resolved",
      action: "merge_both",
      confidence: "medium",
      lines: [...ours, ...theirs],
      reason: "both sides add independent safety checks, kept ours then theirs",
    };
  }
  return null;
}

/** Pick an action for an already classified hunk. Pure. */
export function decide(
  changeType: ChangeType,
  ours: readonly string[],
  theirs: readonly string[],
  mode: Mode,
  options: StrategyOptions = DEFAULT_STRATEGY_OPTIONS,
): Decision {
  const preferred = modeSide(mode);

  switch (changeType) {
    case "whitespace_only":
      return keep(preferred, ours, theirs, "high", `whitespace-only difference, kept ${preferred}`);

    case "include_reorder":
      return {
        kind: "resolved",
        action: "merge_both",
        confidence: "high",
        lines: mergeIncludes(ours, theirs),
        reason: "both sides edit #include lines, merged and de-duplicated",
      };

    case "comment_only": {
      if (options.commentPreference === "mode") {
        return keep(preferred, ours, theirs, "high", `comment-only difference, kept ${preferred}`);
      }
      const side: Side = charCount(ours) > charCount(theirs) ? "ours" : "theirs";
      return keep(side, ours, theirs, "high", `comment-only difference, kept the more descriptive ${side}`);
    }

    case "brace_style": {
      let side: Side = preferred;
      if (ours.length !== theirs.length) {
        const oursLonger = ours.length > theirs.length;
        if (options.braceStyle === "allman") side = oursLonger ? "ours" : "theirs";
        else side = oursLonger ? "theirs" : "ours";
      }
      return keep(side, ours, theirs, "medium", `brace placement difference, kept ${side} (${options.braceStyle} style)`);
    }

    case "null_check_added":
    case "error_handling": {
      if (options.safetyPreference) {
        const safety = decideSafety(ours, theirs);
        if (safety) return safety;
      }
      break;
    }

    case "functional":
    case "mixed":
      break;
  }

  return {
    kind: "deferred",
    fallback_side: preferred,
    fallback_lines: sideLines(preferred, ours, theirs),
    reason: `${changeType} conflict needs semantic resolution`,
  };
}

function fallbackReview(
  changeType: ChangeType,
  side: Side,
  lines: readonly string[],
  detail: string,
): ResolutionResult {
  return {
    resolved_lines: lines,
    confidence: "review",
    change_type: changeType,
    action: "fallback_review",
    reason: `${detail}; kept ${side}, requires manual verification`,
  };
}

/** Classify, decide and, for deferred hunks, consult the reasoner. Never rejects. */
export async function resolveHunk(hunk: ConflictHunk, context: HunkContext): Promise<ResolutionResult> {
  const ours = hunk.ours_lines;
  const theirs = hunk.theirs_lines;
  const { change_type: changeType } = classifyHunk(hunk);
  const decision = decide(changeType, ours, theirs, context.mode, context.options);

  if (decision.kind === "resolved") {
    return {
      resolved_lines: decision.lines,
      confidence: decision.confidence,
      change_type: changeType,
      action: decision.action,
      reason: decision.reason,
    };
  }

  if (!context.reasoner) {
    return fallbackReview(changeType, decision.fallback_side, decision.fallback_lines, `${decision.reason}, no reasoner configured`);
  }

  let outcome: ReasonerResult | null;
  try {
    outcome = await context.reasoner.resolve({
      filepath: context.filepath,
      ours,
      theirs,
      contextBefore: context.contextBefore,
      contextAfter: context.contextAfter,
      mode: context.mode,
      prContext: context.prContext,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fallbackReview(changeType, decision.fallback_side, decision.fallback_lines, `reasoner failed: ${message}`);
  }

  if (outcome === null) {
    return fallbackReview(changeType, decision.fallback_side, decision.fallback_lines, `${decision.reason}, reasoner unavailable`);
  }
  if (!outcome.valid) {
    return fallbackReview(
      changeType,
      decision.fallback_side,
      decision.fallback_lines,
      `reasoner candidate rejected (${outcome.rejection_reason ?? "invalid"})`,
    );
  }

  return {
    resolved_lines: outcome.lines,
    confidence: "medium",
    change_type: changeType,
    action: "defer_to_reasoner",
    reason: `resolved by ${outcome.provider}/${outcome.model}: ${outcome.rationale}`,
  };
}

/** One audit line: `[medium] path hunk#2: null_check_added -> reason`. */
export function formatRationale(file: string, index: number, result: ResolutionResult): string {
  return `[${result.confidence.padEnd(6)}] ${file} hunk#${index}: ${result.change_type} -> ${result.reason}`;
}
