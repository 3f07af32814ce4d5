/** Conflict-resolution vocabulary shared by the classifier, strategy engine and reports. */

/** Integrating a PR (incoming side preferred) or removing one (current side preferred). */
export type Mode = "cherry-pick" | "revert";

export type Side = "ours" | "theirs";

export type ChangeType =
  | "whitespace_only"
  | "include_reorder"
  | "comment_only"
  | "null_check_added"
  | "error_handling"
  | "brace_style"
  | "functional"
  | "mixed";

export type Confidence = "high" | "medium" | "review" | "low";

export type ResolutionAction =
  | "keep_ours"
  | "keep_theirs"
  | "merge_both"
  | "defer_to_reasoner"
  | "fallback_review";

export type ConflictHunk = {
  readonly index: number;
  readonly ours_lines: readonly string[];
  readonly theirs_lines: readonly string[];
  readonly base_lines?: readonly string[];
  readonly start_offset: number;
  readonly end_offset: number;
  readonly ours_label: string;
  readonly theirs_label: string;
};

export type ClassifiedHunk = {
  readonly hunk: ConflictHunk;
  readonly change_type: ChangeType;
};

export type ResolutionResult = {
  readonly resolved_lines: readonly string[];
  readonly confidence: Confidence;
  readonly change_type: ChangeType;
  readonly action: ResolutionAction;
  readonly reason: string;
};

/** One line of the per-run resolution log handed to the reporting collaborator. */
export type ResolutionRecord = {
  file: string;
  pr?: string;
  hunk: number;
  change_type: ChangeType;
  confidence: Confidence;
  action: ResolutionAction;
  reason: string;
};

/** Side kept when nothing better than "prefer the mode" is available. */
export function modeSide(mode: Mode): Side {
  return mode === "cherry-pick" ? "theirs" : "ours";
}
