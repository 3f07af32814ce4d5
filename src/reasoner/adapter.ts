import type { Mode } from "../types/merge.js";
import type {
  AuditDisposition,
  AuditEntry,
  DependencyReasoner,
  DependencyVerdict,
  HunkReasoner,
  ReasonerRequest,
  ReasonerResult,
} from "../types/reasoner.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { preview, type AuditLog } from "./audit-log.js";
import type { CallBudget } from "./budget.js";
import { buildDependencyPrompt, buildResolvePrompt, DEPENDENCY_SYSTEM_PROMPT, RESOLVE_SYSTEM_PROMPT } from "./prompts.js";
import type { Completion, ReasonerClient } from "./providers/types.js";
import { cleanCandidate, validateCandidate } from "./validation.js";

export type ReasonerAdapterOptions = {
  client: ReasonerClient;
  budget: CallBudget;
  auditLog: AuditLog;
  timeoutMs: number;
  logger?: Logger;
  now?: () => Date;
};

type CallOutcome =
  | { kind: "ok"; completion: Completion; elapsed_ms: number }
  | { kind: "timeout"; elapsed_ms: number }
  | { kind: "error"; message: string; elapsed_ms: number };

type AuditDetails = {
  kind: AuditEntry["kind"];
  file: string;
  mode?: Mode;
  disposition: AuditDisposition;
  reason: string;
  elapsed_ms: number;
  ours?: readonly string[];
  theirs?: readonly string[];
  candidate?: readonly string[];
};

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parse a dependency reply. Anything but the three answers is unknown. */
export function parseDependencyAnswer(content: string): DependencyVerdict | null {
  const reply = content.trim().toUpperCase();
  if (reply.includes("YES_CRITICAL")) return { is_dependent: true, is_critical: true, answer: "YES_CRITICAL" };
  if (reply.includes("YES_OPTIONAL")) return { is_dependent: true, is_critical: false, answer: "YES_OPTIONAL" };
  if (/^NO\b/.test(reply)) return { is_dependent: false, is_critical: false, answer: "NO" };
  return null;
}

/**
 * Bounded access to an external model.
 *
 * Every call draws one slot from the shared budget before it starts, runs
 * under a hard timeout and is recorded in the audit log whatever its outcome.
 * Failures never escape: they come back as `null`.
 */
export class ReasonerAdapter implements HunkReasoner, DependencyReasoner {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: ReasonerAdapterOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async resolve(request: ReasonerRequest): Promise<ReasonerResult | null> {
    const base = { kind: "conflict" as const, file: request.filepath, mode: request.mode, ours: request.ours, theirs: request.theirs };

    if (!this.options.budget.tryAcquire()) {
      await this.audit({ ...base, disposition: "budget_exhausted", reason: this.budgetReason(), elapsed_ms: 0 });
      return null;
    }

    const outcome = await this.call(RESOLVE_SYSTEM_PROMPT, buildResolvePrompt(request));
    if (outcome.kind !== "ok") {
      await this.auditFailure(base, outcome);
      return null;
    }

    const lines = cleanCandidate(outcome.completion.content);
    const validation = validateCandidate(lines, request.ours, request.theirs);
    const { provider, model } = this.options.client;

    const result: ReasonerResult = validation.valid
      ? {
          lines,
          valid: true,
          rationale: `merged ${request.ours.length}+${request.theirs.length} lines into ${lines.length}`,
          provider,
          model,
          elapsed_ms: outcome.elapsed_ms,
          tokens_used: outcome.completion.tokens,
        }
      : {
          lines,
          valid: false,
          rejection_reason: validation.reason,
          rationale: `rejected: ${validation.reason}`,
          provider,
          model,
          elapsed_ms: outcome.elapsed_ms,
          tokens_used: outcome.completion.tokens,
        };

    await this.audit({
      ...base,
      disposition: result.valid ? "accepted" : "rejected",
      reason: result.rationale,
      elapsed_ms: outcome.elapsed_ms,
      candidate: lines,
    });
    if (result.valid) {
      this.logger.info(`reasoner resolved ${request.filepath}`, { elapsed_ms: outcome.elapsed_ms, tokens: result.tokens_used });
    } else {
      this.logger.warn(`reasoner candidate rejected for ${request.filepath}`, { reason: result.rejection_reason });
    }
    return result;
  }

  async evaluateDependency(newerDiff: string, olderDiff: string, label = "dependency"): Promise<DependencyVerdict | null> {
    const base = { kind: "dependency" as const, file: label };

    if (!this.options.budget.tryAcquire()) {
      await this.audit({ ...base, disposition: "budget_exhausted", reason: this.budgetReason(), elapsed_ms: 0 });
      return null;
    }

    const outcome = await this.call(DEPENDENCY_SYSTEM_PROMPT, buildDependencyPrompt(newerDiff, olderDiff));
    if (outcome.kind !== "ok") {
      await this.auditFailure(base, outcome);
      return null;
    }

    const verdict = parseDependencyAnswer(outcome.completion.content);
    const candidate = outcome.completion.content.trim().split("\n");
    await this.audit({
      ...base,
      disposition: verdict ? "accepted" : "rejected",
      reason: verdict ? verdict.answer : "unrecognised dependency answer",
      elapsed_ms: outcome.elapsed_ms,
      candidate,
    });
    return verdict;
  }

  private budgetReason(): string {
    return `call budget of ${this.options.budget.limit} exhausted`;
  }

  private async call(system: string, user: string): Promise<CallOutcome> {
    const controller = new AbortController();
    const started = Date.now();
    const elapsed = () => Date.now() - started;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<CallOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ kind: "timeout", elapsed_ms: elapsed() });
      }, this.options.timeoutMs);
    });

    const completion = this.options.client.complete({ system, user, signal: controller.signal }).then(
      (c): CallOutcome => ({ kind: "ok", completion: c, elapsed_ms: elapsed() }),
      (err: unknown): CallOutcome => ({ kind: "error", message: describe(err), elapsed_ms: elapsed() }),
    );

    try {
      return await Promise.race([completion, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async auditFailure(
    base: Pick<AuditDetails, "kind" | "file" | "mode" | "ours" | "theirs">,
    outcome: Exclude<CallOutcome, { kind: "ok" }>,
  ): Promise<void> {
    const reason =
      outcome.kind === "timeout" ? `no reply within ${this.options.timeoutMs}ms` : `call failed: ${outcome.message}`;
    this.logger.warn(`reasoner ${outcome.kind} for ${base.file}`, { reason });
    await this.audit({ ...base, disposition: outcome.kind, reason, elapsed_ms: outcome.elapsed_ms });
  }

  private async audit(details: AuditDetails): Promise<void> {
    const { provider, model } = this.options.client;
    const entry: AuditEntry = {
      timestamp: this.now().toISOString(),
      kind: details.kind,
      file: details.file,
      ...(details.mode ? { mode: details.mode } : {}),
      provider,
      model,
      disposition: details.disposition,
      reason: details.reason,
      elapsed_ms: details.elapsed_ms,
      ours_line_count: details.ours?.length ?? 0,
      theirs_line_count: details.theirs?.length ?? 0,
      candidate_line_count: details.candidate?.length ?? 0,
      ours_preview: preview(details.ours),
      theirs_preview: preview(details.theirs),
      candidate_preview: preview(details.candidate),
    };
    try {
      await this.options.auditLog.append(entry);
    } catch (err) {
      this.logger.warn(`could not append reasoner audit entry: ${describe(err)}`, { file: details.file });
    }
  }
}
