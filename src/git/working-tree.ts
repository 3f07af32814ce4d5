import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import type { Mode, ResolutionRecord } from "../types/merge.js";
import { modeSide } from "../types/merge.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { resolveConflictedFile, resolvePreferringSide, type ResolveFileOptions } from "../merge/resolver.js";
import type { ConflictEntry, VersionControl } from "./operations.js";

export type FileOutcome = {
  file: string;
  kind: ConflictEntry["kind"];
  reason: string;
};

export type WorkingTreeResolution = {
  resolved: FileOutcome[];
  unresolvable: FileOutcome[];
  records: ResolutionRecord[];
};

export type WorkingTreeOptions = {
  vcs: VersionControl;
  mode: Mode;
  /** Run the conflict engine on UU paths matching `smartPaths`. */
  smart: boolean;
  smartPaths: readonly string[];
  engine: Omit<ResolveFileOptions, "mode" | "logger">;
  pr?: string;
  logger?: Logger;
};

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function matchesSmartPath(file: string, patterns: readonly string[]): boolean {
  const normalized = file.split(path.sep).join("/");
  return patterns.some((p) => minimatch(normalized, p, { dot: true }));
}

/** Rewrite a file with the mode side of every hunk. Throws on I/O or malformed markers. */
async function preferSideOnDisk(absPath: string, mode: Mode): Promise<number> {
  const content = await fs.readFile(absPath, "utf-8");
  const result = resolvePreferringSide(content, mode);
  if (result === null) throw new Error("malformed conflict markers");
  await fs.writeFile(absPath, result.content, "utf-8");
  return result.hunks;
}

/**
 * Resolve every unmerged path with the policy for its porcelain kind.
 * The operation may continue only when `unresolvable` is empty.
 */
export async function resolveWorkingTree(options: WorkingTreeOptions): Promise<WorkingTreeResolution> {
  const { vcs, mode } = options;
  const logger = options.logger ?? silentLogger;
  const prefer = modeSide(mode);
  const outcome: WorkingTreeResolution = { resolved: [], unresolvable: [], records: [] };

  const entries = await vcs.listConflicts();
  logger.info(`${entries.length} conflicting file(s)`, { mode, prefer });

  const markerPass = async (entry: ConflictEntry, label: string): Promise<string> => {
    const hunks = await preferSideOnDisk(path.join(vcs.root, entry.path), mode);
    await vcs.stage(entry.path);
    return `${label} -> marker-resolved ${hunks} hunk(s) (prefer ${prefer})`;
  };

  const checkout = async (entry: ConflictEntry, side: typeof prefer, label: string): Promise<string> => {
    await vcs.checkoutSide(entry.path, side);
    await vcs.stage(entry.path);
    return `${label} -> kept ${side}`;
  };

  for (const entry of entries) {
    const { kind } = entry;
    const done = (reason: string) => outcome.resolved.push({ file: entry.path, kind, reason });
    const fail = (reason: string) => outcome.unresolvable.push({ file: entry.path, kind, reason });

    try {
      switch (kind) {
        case "DU":
          done(await checkout(entry, prefer, "modify/delete"));
          break;

        case "UD":
          if (mode === "cherry-pick") {
            await vcs.remove(entry.path);
            done("delete/modify -> accepted deletion");
          } else {
            done(await checkout(entry, "ours", "delete/modify"));
          }
          break;

        case "AA":
        case "AU":
        case "UA":
          try {
            done(await checkout(entry, prefer, "add/add"));
          } catch (err) {
            logger.warn(`${entry.path}: checkout --${prefer} failed, resolving markers`, { error: describe(err) });
            done(await markerPass(entry, "add/add"));
          }
          break;

        case "DD":
          await vcs.remove(entry.path);
          done("both deleted -> removed");
          break;

        case "RD":
        case "DR":
        case "RR":
          done(await checkout(entry, prefer, "rename conflict"));
          break;

        case "UU": {
          if (!options.smart || !matchesSmartPath(entry.path, options.smartPaths)) {
            done(await markerPass(entry, "modify/modify"));
            break;
          }
          const result = await resolveConflictedFile(path.join(vcs.root, entry.path), {
            ...options.engine,
            mode,
            logger,
          });
          if (result.outcome !== "failed" && result.outcome !== "no_conflicts") {
            for (const { hunk, result: r } of result.hunks) {
              outcome.records.push({
                file: entry.path,
                ...(options.pr !== undefined ? { pr: options.pr } : {}),
                hunk: hunk.index,
                change_type: r.change_type,
                confidence: r.confidence,
                action: r.action,
                reason: r.reason,
              });
            }
          }
          switch (result.outcome) {
            case "reassembled":
              await vcs.stage(entry.path);
              done(`modify/modify -> smart-resolved (lowest confidence ${result.lowest})`);
              break;
            case "fell_back":
              await vcs.stage(entry.path);
              done(`modify/modify -> hunks ${result.below_minimum.join(", ")} below minimum, fell back to ${prefer}`);
              break;
            case "no_conflicts":
              await vcs.stage(entry.path);
              done("modify/modify -> no markers left");
              break;
            case "aborted":
              fail(`modify/modify -> hunks ${result.below_minimum.join(", ")} below minimum confidence`);
              break;
            case "failed":
              fail(`modify/modify -> ${result.error}`);
              break;
          }
          break;
        }
      }
    } catch (err) {
      fail(`${kind} -> ${describe(err)}`);
    }
  }

  for (const r of outcome.resolved) logger.info(`resolved ${r.file}`, { kind: r.kind, reason: r.reason });
  for (const r of outcome.unresolvable) logger.error(`could not resolve ${r.file}`, { kind: r.kind, reason: r.reason });
  return outcome;
}
