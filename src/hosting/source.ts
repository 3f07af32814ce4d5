import type { PRRecord } from "../types/pr.js";

/** Supplies PR records for a run. Implementations cache what they fetch. */
export interface PullRequestSource {
  fetch(numbers: readonly number[]): Promise<PRRecord[]>;
}
