import path from "node:path";
import type { Mode } from "../types/merge.js";
import type { HunkReasoner } from "../types/reasoner.js";
import { parseConfidence } from "../merge/confidence.js";
import { GitOperations, type VersionControl } from "../git/operations.js";
import { resolveWorkingTree } from "../git/working-tree.js";
import { buildResolutionReport, formatResolutionLog, type ResolutionReport } from "../report/summary.js";
import { ReportWriter } from "../report/writer.js";
import { EXIT } from "./exit-codes.js";
import {
  commandLogger,
  createRunReasoner,
  loadCommandConfig,
  parseMode,
  strategyOptions,
  type CommonOptions,
  type Failure,
} from "./shared.js";

export type ResolveCommandOptions = CommonOptions & {
  mode: string;
  pr: string;
  repo?: string;
  /** false disables the conflict engine; UU files then get the prefer-mode marker pass. */
  smart?: boolean;
  minConfidence?: string;
  /** Run `git <mode> --continue` once everything is resolved. */
  continueOperation?: boolean;
  vcs?: VersionControl;
  /** Overrides the reasoner built from `llm` config; `null` disables it. */
  reasoner?: HunkReasoner | null;
  now?: () => Date;
};

export type ResolveCommandResult =
  | { ok: true; report: ResolutionReport; reportPath: string; continued: boolean }
  | (Failure & { report?: ResolutionReport; reportPath?: string; aborted?: boolean });

export function resolutionReportName(pr: string): string {
  return `resolution-pr${pr}.json`;
}

/**
 * Resolve every conflicted path of an interrupted cherry-pick or revert and
 * record what was done. Unresolvable files leave the operation paused, or
 * abort it when `conflict_policy` is `skip`.
 */
export async function resolve(opts: ResolveCommandOptions): Promise<ResolveCommandResult> {
  const logger = commandLogger(opts);

  const mode: Mode | null = parseMode(opts.mode);
  if (!mode) {
    return { ok: false, error: `--mode must be cherry-pick or revert, got '${opts.mode}'`, exitCode: EXIT.INVALID_ARGS };
  }
  if (!/^\d+$/.test(opts.pr)) {
    return { ok: false, error: `--pr must be a PR number, got '${opts.pr}'`, exitCode: EXIT.INVALID_ARGS };
  }

  const loaded = await loadCommandConfig(opts);
  if (!loaded.ok) return loaded;
  const { config } = loaded;

  let minConfidence = config.conflict_resolution.min_confidence;
  if (opts.minConfidence !== undefined) {
    const parsed = parseConfidence(opts.minConfidence);
    if (!parsed) {
      return {
        ok: false,
        error: `--min-confidence must be high, medium, review or low, got '${opts.minConfidence}'`,
        exitCode: EXIT.INVALID_ARGS,
      };
    }
    minConfidence = parsed;
  }

  const repo = path.resolve(opts.repo ?? process.cwd());
  const vcs = opts.vcs ?? new GitOperations(repo);
  const logDir = path.resolve(vcs.root, config.log_dir);
  const smart = (opts.smart ?? true) && config.conflict_resolution.smart_merge;
  const reasoner =
    opts.reasoner !== undefined
      ? opts.reasoner
      : smart
        ? createRunReasoner(config.llm, logDir, logger, opts.env)
        : null;

  const head = await vcs.getCurrentSha();
  logger.info(`resolving conflicts for PR #${opts.pr}`, { mode, smart, min_confidence: minConfidence, head });

  const outcome = await resolveWorkingTree({
    vcs,
    mode,
    smart,
    smartPaths: config.conflict_resolution.smart_paths,
    engine: {
      minConfidence,
      strategy: strategyOptions(config.conflict_resolution),
      reasoner,
      contextLines: config.conflict_resolution.context_lines,
      onLowConfidence: config.conflict_resolution.on_low_confidence,
    },
    pr: opts.pr,
    logger,
  });

  const now = opts.now ?? (() => new Date());
  const report = buildResolutionReport({ pr: opts.pr, mode, smart, head, outcome, now: now() });
  const writer = new ReportWriter(logDir, now);
  writer.init();
  const reportPath = writer.writeJson(resolutionReportName(opts.pr), "resolution", report);
  writer.appendLog(formatResolutionLog(opts.pr, outcome));
  writer.writeManifest();

  if (outcome.unresolvable.length > 0) {
    const files = outcome.unresolvable.map((f) => f.file).join(", ");
    let aborted = false;
    if (config.conflict_policy === "skip") {
      await vcs.abortOperation(mode);
      aborted = true;
      logger.warn(`aborted ${mode} for PR #${opts.pr}`, { conflict_policy: "skip" });
    }
    return {
      ok: false,
      error: `${outcome.unresolvable.length} file(s) could not be resolved: ${files}`,
      exitCode: EXIT.UNRESOLVED,
      report,
      reportPath,
      aborted,
    };
  }

  let continued = false;
  if (opts.continueOperation) {
    await vcs.continueOperation(mode);
    continued = true;
  }
  return { ok: true, report, reportPath, continued };
}
