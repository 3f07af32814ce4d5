/** Pull-request records and dependency findings. */
export type PRRecord = {
  readonly number: number;
  readonly title?: string;
  readonly files_changed: ReadonlySet<string>;
  readonly merged_at: string;
  readonly diff_text: string;
};

export type VerdictSource = "reasoner" | "policy";

export type DependencyFinding = {
  included_pr: number;
  depends_on_pr: number;
  shared_files: string[];
  is_dependent: boolean;
  is_critical: boolean;
  auto_included: boolean;
  verdict_source: VerdictSource;
  reason: string;
};

export type DependencyAnalysis = {
  findings: DependencyFinding[];
  /** PR numbers in the order the orchestrator should apply them. */
  operations: number[];
  auto_added: number[];
  has_deps: boolean;
};
