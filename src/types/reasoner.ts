import type { Mode } from "./merge.js";

export type ReasonerRequest = {
  filepath: string;
  ours: readonly string[];
  theirs: readonly string[];
  contextBefore: readonly string[];
  contextAfter: readonly string[];
  mode: Mode;
  prContext?: string;
};

/** Outcome of one completed reasoner call. `valid` is false when the candidate failed a check. */
export type ReasonerResult = {
  lines: string[];
  valid: boolean;
  rejection_reason?: string;
  rationale: string;
  provider: string;
  model: string;
  elapsed_ms: number;
  tokens_used: number;
};

export type DependencyVerdict = {
  is_dependent: boolean;
  is_critical: boolean;
  answer: "YES_CRITICAL" | "YES_OPTIONAL" | "NO";
};

export type AuditDisposition = "accepted" | "rejected" | "error" | "timeout" | "budget_exhausted";

export type AuditEntry = {
  timestamp: string;
  kind: "conflict" | "dependency";
  file: string;
  mode?: Mode;
  provider: string;
  model: string;
  disposition: AuditDisposition;
  reason: string;
  elapsed_ms: number;
  ours_line_count: number;
  theirs_line_count: number;
  candidate_line_count: number;
  ours_preview: string;
  theirs_preview: string;
  candidate_preview: string;
};

/** What the strategy engine needs from a reasoner. */
export interface HunkReasoner {
  resolve(request: ReasonerRequest): Promise<ReasonerResult | null>;
}

/** What the dependency layer needs from a reasoner. `null` means the answer is unknown. */
export interface DependencyReasoner {
  evaluateDependency(newerDiff: string, olderDiff: string, label?: string): Promise<DependencyVerdict | null>;
}
