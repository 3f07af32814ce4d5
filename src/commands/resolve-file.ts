import path from "node:path";
import type { HunkReasoner } from "../types/reasoner.js";
import { parseConfidence } from "../merge/confidence.js";
import { resolveConflictedFile, type FileResolution } from "../merge/resolver.js";
import { formatRationale } from "../merge/strategy.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import {
  commandLogger,
  createRunReasoner,
  loadCommandConfig,
  parseMode,
  strategyOptions,
  type CommonOptions,
  type Failure,
} from "./shared.js";

export type ResolveFileCommandOptions = CommonOptions & {
  path: string;
  mode: string;
  minConfidence?: string;
  dryRun?: boolean;
  reasoner?: HunkReasoner | null;
};

export type ResolveFileCommandResult =
  | { ok: true; resolution: FileResolution; exitCode: ExitCode; lines: string[] }
  | Failure;

const OUTCOME_EXIT: Record<FileResolution["outcome"], ExitCode> = {
  no_conflicts: EXIT.SUCCESS,
  reassembled: EXIT.SUCCESS,
  fell_back: EXIT.SUCCESS,
  aborted: EXIT.ATTENTION,
  failed: EXIT.UNRESOLVED,
};

/** Run the conflict engine on one file outside any git operation. */
export async function resolveFile(opts: ResolveFileCommandOptions): Promise<ResolveFileCommandResult> {
  const logger = commandLogger(opts);

  const mode = parseMode(opts.mode);
  if (!mode) {
    return { ok: false, error: `--mode must be cherry-pick or revert, got '${opts.mode}'`, exitCode: EXIT.INVALID_ARGS };
  }

  const loaded = await loadCommandConfig(opts);
  if (!loaded.ok) return loaded;
  const { config } = loaded;

  const minConfidence = opts.minConfidence !== undefined ? parseConfidence(opts.minConfidence) : config.conflict_resolution.min_confidence;
  if (!minConfidence) {
    return { ok: false, error: `--min-confidence must be high, medium, review or low`, exitCode: EXIT.INVALID_ARGS };
  }

  const filepath = path.resolve(opts.path);
  const reasoner =
    opts.reasoner !== undefined
      ? opts.reasoner
      : createRunReasoner(config.llm, path.resolve(config.log_dir), logger, opts.env);

  const resolution = await resolveConflictedFile(filepath, {
    mode,
    minConfidence,
    strategy: strategyOptions(config.conflict_resolution),
    reasoner,
    contextLines: config.conflict_resolution.context_lines,
    onLowConfidence: config.conflict_resolution.on_low_confidence,
    dryRun: opts.dryRun ?? false,
    logger,
  });

  const lines =
    resolution.outcome === "failed" || resolution.outcome === "no_conflicts"
      ? []
      : resolution.hunks.map(({ hunk, result }) => formatRationale(opts.path, hunk.index, result));

  return { ok: true, resolution, exitCode: OUTCOME_EXIT[resolution.outcome], lines };
}
