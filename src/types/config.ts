/** Configuration types. Layers: base.yaml ← <env>.yaml ← TRIAGE_* vars. */
import type { Confidence } from "./merge.js";

export type ConflictPolicy = "pause" | "skip";
export type BraceStylePreference = "allman" | "kr";
export type CommentPreference = "verbose" | "mode";
export type LowConfidencePolicy = "fallback" | "abort";
export type ReasonerProvider = "openai" | "anthropic" | "openai-compatible";
export type UnknownDependencyPolicy = "dependent" | "critical" | "independent";

export type ConflictResolutionConfig = {
  smart_merge: boolean;
  min_confidence: Confidence;
  safety_prefer: boolean;
  brace_style: BraceStylePreference;
  comment_preference: CommentPreference;
  on_low_confidence: LowConfidencePolicy;
  context_lines: number;
  smart_paths: string[];
};

export type LlmConfig = {
  enabled: boolean;
  provider: ReasonerProvider;
  model: string;
  api_key_env: string;
  endpoint?: string;
  temperature: number;
  max_calls_per_run: number;
  timeout_seconds: number;
};

export type DependencyConfig = {
  unknown_policy: UnknownDependencyPolicy;
};

export type TriageConfig = {
  schema_version: string;
  log_dir: string;
  conflict_policy: ConflictPolicy;
  conflict_resolution: ConflictResolutionConfig;
  llm: LlmConfig;
  dependencies: DependencyConfig;
};
