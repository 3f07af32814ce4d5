import { simpleGit, type SimpleGit } from "simple-git";
import type { Mode, Side } from "../types/merge.js";

/** Porcelain XY codes git reports for unmerged paths. */
export const CONFLICT_KINDS = ["DD", "AU", "UD", "UA", "DU", "AA", "UU", "RD", "DR", "RR"] as const;
export type ConflictKind = (typeof CONFLICT_KINDS)[number];

export type ConflictEntry = {
  path: string;
  kind: ConflictKind;
};

export function isConflictKind(code: string): code is ConflictKind {
  return CONFLICT_KINDS.some((k) => k === code);
}

/** What conflict resolution needs from version control. */
export interface VersionControl {
  readonly root: string;
  listConflicts(): Promise<ConflictEntry[]>;
  checkoutSide(path: string, side: Side): Promise<void>;
  stage(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  continueOperation(mode: Mode): Promise<void>;
  abortOperation(mode: Mode): Promise<void>;
  getCurrentSha(ref?: string): Promise<string>;
}

/**
 * Git operations over simple-git.
 */
export class GitOperations implements VersionControl {
  private git: SimpleGit;

  constructor(readonly root: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(root);
  }

  /** Unmerged paths from porcelain status, in path order. */
  async listConflicts(): Promise<ConflictEntry[]> {
    const status = await this.git.status();
    const entries: ConflictEntry[] = [];
    for (const file of status.files) {
      const code = `${file.index}${file.working_dir}`;
      if (isConflictKind(code)) entries.push({ path: file.path, kind: code });
    }
    return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  async checkoutSide(path: string, side: Side): Promise<void> {
    await this.git.raw(["checkout", `--${side}`, "--", path]);
  }

  async stage(path: string): Promise<void> {
    await this.git.add(path);
  }

  async remove(path: string): Promise<void> {
    await this.git.rm(path);
  }

  /** Continue the interrupted cherry-pick or revert without opening an editor. */
  async continueOperation(mode: Mode): Promise<void> {
    await this.git.raw(["-c", "core.editor=true", mode, "--continue"]);
  }

  async abortOperation(mode: Mode): Promise<void> {
    await this.git.raw([mode, "--abort"]);
  }

  /** Get HEAD SHA of a ref (defaults to current HEAD). */
  async getCurrentSha(ref?: string): Promise<string> {
    const result = await this.git.revparse([ref ?? "HEAD"]);
    return result.trim();
  }
}
