import type { UnknownDependencyPolicy } from "../types/config.js";
import type { DependencyAnalysis, DependencyFinding, PRRecord } from "../types/pr.js";
import type { DependencyReasoner, DependencyVerdict } from "../types/reasoner.js";
import { silentLogger, type Logger } from "../core/logger.js";

export type CandidatePair = {
  included_pr: number;
  depends_on_pr: number;
  shared_files: string[];
};

export type AnalyzeOptions = {
  prs: readonly PRRecord[];
  included: readonly number[];
  reasoner: DependencyReasoner | null;
  unknownPolicy?: UnknownDependencyPolicy;
  logger?: Logger;
};

const POLICY_VERDICTS: Record<UnknownDependencyPolicy, Pick<DependencyVerdict, "is_dependent" | "is_critical">> = {
  dependent: { is_dependent: true, is_critical: false },
  critical: { is_dependent: true, is_critical: true },
  independent: { is_dependent: false, is_critical: false },
};

/** file path -> numbers of the PRs touching it */
export function buildFileIndex(prs: readonly PRRecord[]): Map<string, Set<number>> {
  const index = new Map<string, Set<number>>();
  for (const pr of prs) {
    for (const file of pr.files_changed) {
      let owners = index.get(file);
      if (!owners) {
        owners = new Set();
        index.set(file, owners);
      }
      owners.add(pr.number);
    }
  }
  return index;
}

function mergedBefore(a: PRRecord, b: PRRecord): boolean {
  const ta = Date.parse(a.merged_at);
  const tb = Date.parse(b.merged_at);
  // unknown merge times cannot rule a dependency out
  if (Number.isNaN(ta) || Number.isNaN(tb)) return true;
  return ta < tb;
}

function byMergeOrder(a: PRRecord, b: PRRecord): number {
  const ta = Date.parse(a.merged_at);
  const tb = Date.parse(b.merged_at);
  if (ta !== tb && !Number.isNaN(ta) && !Number.isNaN(tb)) return ta - tb;
  return a.number - b.number;
}

/**
 * For each included PR (ascending), every non-included PR that shares a file
 * and was merged strictly earlier. One pair per (included, other).
 */
export function findCandidatePairs(prs: readonly PRRecord[], included: readonly number[]): CandidatePair[] {
  const byNumber = new Map(prs.map((pr) => [pr.number, pr] as const));
  const includedSet = new Set(included);
  const index = buildFileIndex(prs);
  const pairs: CandidatePair[] = [];

  for (const incNum of [...includedSet].sort((a, b) => a - b)) {
    const inc = byNumber.get(incNum);
    if (!inc) continue;

    const shared = new Map<number, string[]>();
    for (const file of inc.files_changed) {
      for (const other of index.get(file) ?? []) {
        if (includedSet.has(other)) continue;
        const files = shared.get(other) ?? [];
        files.push(file);
        shared.set(other, files);
      }
    }

    for (const otherNum of [...shared.keys()].sort((a, b) => a - b)) {
      const other = byNumber.get(otherNum);
      if (!other || !mergedBefore(other, inc)) continue;
      pairs.push({
        included_pr: incNum,
        depends_on_pr: otherNum,
        shared_files: (shared.get(otherNum) ?? []).sort(),
      });
    }
  }
  return pairs;
}

/**
 * Included PRs in merge order, with each critical dependency inserted once,
 * immediately before the earliest operation that needs it.
 */
export function orderOperations(
  prs: readonly PRRecord[],
  included: readonly number[],
  findings: readonly DependencyFinding[],
): { operations: number[]; auto_added: number[] } {
  const byNumber = new Map(prs.map((pr) => [pr.number, pr] as const));
  const includedSet = new Set(included);
  const records = [...includedSet].map((n) => byNumber.get(n));
  const operations = records
    .filter((pr): pr is PRRecord => pr !== undefined)
    .sort(byMergeOrder)
    .map((pr) => pr.number);
  // included numbers with no record still run, after the known ones
  for (const n of [...includedSet].sort((a, b) => a - b)) {
    if (!byNumber.has(n)) operations.push(n);
  }

  const critical = new Map<number, Set<number>>();
  for (const f of findings) {
    if (!f.is_critical || includedSet.has(f.depends_on_pr)) continue;
    const dependants = critical.get(f.depends_on_pr) ?? new Set<number>();
    dependants.add(f.included_pr);
    critical.set(f.depends_on_pr, dependants);
  }

  const deps = [...critical.keys()]
    .map((n) => byNumber.get(n))
    .filter((pr): pr is PRRecord => pr !== undefined)
    .sort(byMergeOrder);

  const autoAdded: number[] = [];
  for (const dep of deps) {
    const dependants = critical.get(dep.number) ?? new Set<number>();
    const position = operations.findIndex((n) => dependants.has(n));
    if (position < 0) continue;
    operations.splice(position, 0, dep.number);
    autoAdded.push(dep.number);
  }
  return { operations, auto_added: autoAdded.sort((a, b) => a - b) };
}

/**
 * Find PRs the included set builds on and decide which must be pulled in.
 * Pairs are evaluated one at a time so budget slots are drawn in a stable order.
 */
export async function analyzeDependencies(options: AnalyzeOptions): Promise<DependencyAnalysis> {
  const logger = options.logger ?? silentLogger;
  const policy = options.unknownPolicy ?? "dependent";
  const byNumber = new Map(options.prs.map((pr) => [pr.number, pr] as const));
  const pairs = findCandidatePairs(options.prs, options.included);
  logger.info(`${pairs.length} candidate dependency pair(s)`, { included: [...options.included] });

  const findings: DependencyFinding[] = [];
  for (const pair of pairs) {
    const newerDiff = byNumber.get(pair.included_pr)?.diff_text ?? "";
    const olderDiff = byNumber.get(pair.depends_on_pr)?.diff_text ?? "";
    const label = `PR#${pair.included_pr}<-PR#${pair.depends_on_pr}`;

    let verdict: DependencyVerdict | null = null;
    let unknownReason: string;
    if (!newerDiff || !olderDiff) {
      unknownReason = "missing diff";
    } else if (!options.reasoner) {
      unknownReason = "no reasoner configured";
    } else {
      verdict = await options.reasoner.evaluateDependency(newerDiff, olderDiff, label);
      unknownReason = "reasoner gave no answer";
    }

    const finding: DependencyFinding = verdict
      ? {
          ...pair,
          is_dependent: verdict.is_dependent,
          is_critical: verdict.is_critical,
          auto_included: false,
          verdict_source: "reasoner",
          reason: `reasoner answered ${verdict.answer}`,
        }
      : {
          ...pair,
          ...POLICY_VERDICTS[policy],
          auto_included: false,
          verdict_source: "policy",
          reason: `${unknownReason}; applied unknown_policy=${policy}`,
        };

    logger.debug(`${label}: ${finding.reason}`, { shared_files: pair.shared_files });
    if (finding.is_dependent) findings.push(finding);
  }

  const { operations, auto_added } = orderOperations(options.prs, options.included, findings);
  const added = new Set(auto_added);
  for (const f of findings) {
    if (added.has(f.depends_on_pr)) f.auto_included = true;
  }

  return { findings, operations, auto_added, has_deps: findings.length > 0 };
}
