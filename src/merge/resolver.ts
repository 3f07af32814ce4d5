import fs from "node:fs/promises";
import type { LowConfidencePolicy } from "../types/config.js";
import type { Confidence, ConflictHunk, Mode, ResolutionResult } from "../types/merge.js";
import { modeSide } from "../types/merge.js";
import type { HunkReasoner } from "../types/reasoner.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { lowestConfidence, meetsMinimum } from "./confidence.js";
import { hunkContexts, parseConflicts, reassemble } from "./hunk-machine.js";
import { DEFAULT_STRATEGY_OPTIONS, formatRationale, resolveHunk, type StrategyOptions } from "./strategy.js";

export const DEFAULT_CONTEXT_LINES = 10;

export type HunkResolution = {
  hunk: ConflictHunk;
  result: ResolutionResult;
};

export type TextResolution =
  | { outcome: "no_conflicts" }
  | { outcome: "reassembled"; content: string; hunks: HunkResolution[]; lowest: Confidence }
  | { outcome: "aborted"; hunks: HunkResolution[]; below_minimum: number[]; lowest: Confidence }
  | { outcome: "failed"; confidence: "low"; error: string };

export type ResolveOptions = {
  mode: Mode;
  minConfidence: Confidence;
  strategy?: StrategyOptions;
  reasoner?: HunkReasoner | null;
  contextLines?: number;
  prContext?: string;
  logger?: Logger;
};

/**
 * Resolve every hunk of one file's content.
 *
 * All hunks are started together and joined before any decision is taken, so
 * a single hunk below `minConfidence` aborts the whole file and no partial
 * content is produced.
 */
export async function resolveConflictText(
  filepath: string,
  content: string,
  options: ResolveOptions,
): Promise<TextResolution> {
  const logger = options.logger ?? silentLogger;
  const parsed = parseConflicts(content);
  if (!parsed.ok) return { outcome: "failed", confidence: "low", error: parsed.error };
  if (parsed.hunks.length === 0) return { outcome: "no_conflicts" };

  const contexts = hunkContexts(parsed.segments, options.contextLines ?? DEFAULT_CONTEXT_LINES);
  const strategy = options.strategy ?? DEFAULT_STRATEGY_OPTIONS;

  const hunks = await Promise.all(
    parsed.hunks.map(async (hunk): Promise<HunkResolution> => {
      const context = contexts.get(hunk.index);
      const result = await resolveHunk(hunk, {
        filepath,
        mode: options.mode,
        options: strategy,
        reasoner: options.reasoner ?? null,
        contextBefore: context?.before ?? [],
        contextAfter: context?.after ?? [],
        prContext: options.prContext,
      });
      return { hunk, result };
    }),
  );

  for (const { hunk, result } of hunks) {
    logger.debug(formatRationale(filepath, hunk.index, result));
  }

  const lowest = lowestConfidence(hunks.map((h) => h.result.confidence)) ?? "high";
  const belowMinimum = hunks
    .filter((h) => !meetsMinimum(h.result.confidence, options.minConfidence))
    .map((h) => h.hunk.index);

  if (belowMinimum.length > 0) {
    return { outcome: "aborted", hunks, below_minimum: belowMinimum, lowest };
  }

  const resolved = new Map(hunks.map((h) => [h.hunk.index, h.result.resolved_lines] as const));
  return {
    outcome: "reassembled",
    content: reassemble(parsed.segments, resolved, parsed.trailingNewline),
    hunks,
    lowest,
  };
}

/** Keep the mode side of every hunk. `null` when the markers are malformed. */
export function resolvePreferringSide(content: string, mode: Mode): { content: string; hunks: number } | null {
  const parsed = parseConflicts(content);
  if (!parsed.ok) return null;
  const side = modeSide(mode);
  const resolved = new Map(
    parsed.hunks.map((h) => [h.index, side === "ours" ? h.ours_lines : h.theirs_lines] as const),
  );
  return {
    content: reassemble(parsed.segments, resolved, parsed.trailingNewline),
    hunks: parsed.hunks.length,
  };
}

export type FileResolution =
  | { outcome: "no_conflicts"; filepath: string }
  | { outcome: "reassembled"; filepath: string; hunks: HunkResolution[]; lowest: Confidence }
  | { outcome: "fell_back"; filepath: string; hunks: HunkResolution[]; below_minimum: number[] }
  | { outcome: "aborted"; filepath: string; hunks: HunkResolution[]; below_minimum: number[] }
  | { outcome: "failed"; filepath: string; confidence: "low"; error: string };

export type ResolveFileOptions = ResolveOptions & {
  onLowConfidence?: LowConfidencePolicy;
  /** Compute the outcome without touching the file. */
  dryRun?: boolean;
};

/**
 * What a fell-back file actually holds: the mode side of every hunk. The
 * engine's discarded proposal is kept only in the reason.
 */
function fellBackHunks(hunks: readonly HunkResolution[], mode: Mode, belowMinimum: readonly number[]): HunkResolution[] {
  const side = modeSide(mode);
  return hunks.map(({ hunk, result }): HunkResolution => ({
    hunk,
    result: {
      resolved_lines: side === "ours" ? hunk.ours_lines : hunk.theirs_lines,
      confidence: "review",
      change_type: result.change_type,
      action: side === "ours" ? "keep_ours" : "keep_theirs",
      reason: `file fell back to ${side} (hunks ${belowMinimum.join(", ")} below minimum); discarded ${result.action} at ${result.confidence}`,
    },
  }));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read, resolve and rewrite one conflicted file.
 *
 * An aborted file is left untouched under the `abort` policy; under `fallback`
 * it is rewritten with the mode side of every hunk, and its hunks report that
 * side at `review` confidence. I/O errors produce a
 * `failed` outcome carrying the path and cause.
 */
export async function resolveConflictedFile(
  filepath: string,
  options: ResolveFileOptions,
): Promise<FileResolution> {
  const logger = options.logger ?? silentLogger;

  let content: string;
  try {
    content = await fs.readFile(filepath, "utf-8");
  } catch (err) {
    return { outcome: "failed", filepath, confidence: "low", error: `cannot read ${filepath}: ${describe(err)}` };
  }

  const resolution = await resolveConflictText(filepath, content, options);

  let output: string;
  let result: FileResolution;
  switch (resolution.outcome) {
    case "no_conflicts":
      return { outcome: "no_conflicts", filepath };
    case "failed":
      return { outcome: "failed", filepath, confidence: "low", error: `${filepath}: ${resolution.error}` };
    case "reassembled":
      output = resolution.content;
      result = { outcome: "reassembled", filepath, hunks: resolution.hunks, lowest: resolution.lowest };
      break;
    case "aborted": {
      logger.warn(`${filepath}: hunks below ${options.minConfidence} confidence`, {
        hunks: resolution.below_minimum,
        lowest: resolution.lowest,
      });
      if ((options.onLowConfidence ?? "fallback") === "abort") {
        return { outcome: "aborted", filepath, hunks: resolution.hunks, below_minimum: resolution.below_minimum };
      }
      const fallback = resolvePreferringSide(content, options.mode);
      if (fallback === null) {
        return { outcome: "failed", filepath, confidence: "low", error: `${filepath}: malformed conflict markers` };
      }
      output = fallback.content;
      result = {
        outcome: "fell_back",
        filepath,
        hunks: fellBackHunks(resolution.hunks, options.mode, resolution.below_minimum),
        below_minimum: resolution.below_minimum,
      };
      break;
    }
  }

  if (options.dryRun) return result;

  try {
    await fs.writeFile(filepath, output, "utf-8");
  } catch (err) {
    return { outcome: "failed", filepath, confidence: "low", error: `cannot write ${filepath}: ${describe(err)}` };
  }
  return result;
}
