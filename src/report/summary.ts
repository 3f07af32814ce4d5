import type { Confidence, Mode, ResolutionRecord } from "../types/merge.js";
import type { DependencyAnalysis } from "../types/pr.js";
import type { FileOutcome, WorkingTreeResolution } from "../git/working-tree.js";

export type ConfidenceSummary = { total_hunks: number } & Record<Confidence, number>;

export type ResolutionReport = {
  pr: string;
  mode: Mode;
  smart: boolean;
  /** Commit the conflicts were resolved on top of. */
  head: string;
  timestamp: string;
  resolutions: ResolutionRecord[];
  files: { resolved: FileOutcome[]; unresolvable: FileOutcome[] };
  summary: ConfidenceSummary;
};

export type DependencyReport = DependencyAnalysis & {
  timestamp: string;
  included: number[];
};

export function summarizeConfidence(records: readonly ResolutionRecord[]): ConfidenceSummary {
  const summary: ConfidenceSummary = { total_hunks: records.length, high: 0, medium: 0, review: 0, low: 0 };
  for (const r of records) summary[r.confidence]++;
  return summary;
}

export function buildResolutionReport(input: {
  pr: string;
  mode: Mode;
  smart: boolean;
  head: string;
  outcome: WorkingTreeResolution;
  now?: Date;
}): ResolutionReport {
  return {
    pr: input.pr,
    mode: input.mode,
    smart: input.smart,
    head: input.head,
    timestamp: (input.now ?? new Date()).toISOString(),
    resolutions: input.outcome.records,
    files: { resolved: input.outcome.resolved, unresolvable: input.outcome.unresolvable },
    summary: summarizeConfidence(input.outcome.records),
  };
}

/** `PR#<n>|RESOLVED|<file>|<reason>` and `PR#<n>|FAILED|...` lines, resolved first. */
export function formatResolutionLog(pr: string, outcome: WorkingTreeResolution): string[] {
  return [
    ...outcome.resolved.map((f) => `PR#${pr}|RESOLVED|${f.file}|${f.reason}`),
    ...outcome.unresolvable.map((f) => `PR#${pr}|FAILED|${f.file}|${f.reason}`),
  ];
}
