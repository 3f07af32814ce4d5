import type { ChangeType, ClassifiedHunk, ConflictHunk } from "../types/merge.js";
import {
  hasErrorHandling,
  hasNullCheck,
  isCommentBlock,
  isIncludeBlock,
  normalizedEquivalent,
  stripBraces,
} from "./patterns.js";

export type ClassificationRule = {
  type: ChangeType;
  description: string;
  matches: (ours: readonly string[], theirs: readonly string[]) => boolean;
};

function exactlyOne(a: boolean, b: boolean): boolean {
  return a !== b;
}

function sameSequence(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Classification cascade. Order is the tie-break: the first rule that matches
 * names the hunk, so a whitespace-equivalent include block is whitespace_only.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    type: "whitespace_only",
    description: "sides are identical once whitespace is removed",
    matches: (ours, theirs) => normalizedEquivalent(ours, theirs),
  },
  {
    type: "include_reorder",
    description: "both sides are pure #include blocks",
    matches: (ours, theirs) => isIncludeBlock(ours) && isIncludeBlock(theirs),
  },
  {
    type: "comment_only",
    description: "both sides are pure comment blocks",
    matches: (ours, theirs) => isCommentBlock(ours) && isCommentBlock(theirs),
  },
  {
    type: "null_check_added",
    description: "exactly one side guards a pointer",
    matches: (ours, theirs) => exactlyOne(hasNullCheck(ours), hasNullCheck(theirs)),
  },
  {
    type: "error_handling",
    description: "exactly one side handles an error path",
    matches: (ours, theirs) => exactlyOne(hasErrorHandling(ours), hasErrorHandling(theirs)),
  },
  {
    type: "brace_style",
    description: "sides differ only in brace placement",
    matches: (ours, theirs) => sameSequence(stripBraces(ours), stripBraces(theirs)),
  },
];

/** Classify a hunk. Total: anything no rule claims is functional. */
export function classify(ours: readonly string[], theirs: readonly string[]): ChangeType {
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.matches(ours, theirs)) return rule.type;
  }
  return "functional";
}

export function classifyHunk(hunk: ConflictHunk): ClassifiedHunk {
  return { hunk, change_type: classify(hunk.ours_lines, hunk.theirs_lines) };
}
