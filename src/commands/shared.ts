import type { ConflictResolutionConfig, LlmConfig, TriageConfig } from "../types/config.js";
import type { Mode } from "../types/merge.js";
import { createLogger, type LogFormat, type Logger } from "../core/logger.js";
import { loadValidatedConfig } from "../config/validator.js";
import type { StrategyOptions } from "../merge/strategy.js";
import { ReasonerAdapter } from "../reasoner/adapter.js";
import { FileAuditLog } from "../reasoner/audit-log.js";
import { CallBudget } from "../reasoner/budget.js";
import { createReasonerClient } from "../reasoner/providers/factory.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Failure = { ok: false; error: string; exitCode: ExitCode };

export type CommonOptions = {
  configDir?: string;
  envName?: string;
  format?: LogFormat;
  verbose?: boolean;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

const MODES: readonly Mode[] = ["cherry-pick", "revert"];

export function parseMode(value: string): Mode | null {
  return MODES.find((m) => m === value) ?? null;
}

/** "1,5, 7" → [1, 5, 7]; null when any entry is not a positive integer. */
export function parseNumberList(value: string): number[] | null {
  const parts = value.split(",").map((p) => p.trim()).filter((p) => p.length > 0);
  if (parts.length === 0 || parts.some((p) => !/^\d+$/.test(p) || Number(p) < 1)) return null;
  return parts.map(Number);
}

export function commandLogger(opts: CommonOptions): Logger {
  return opts.logger ?? createLogger({ format: opts.format ?? "human", verbose: opts.verbose ?? false });
}

export async function loadCommandConfig(opts: CommonOptions): Promise<{ ok: true; config: TriageConfig } | Failure> {
  const result = await loadValidatedConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env });
  if (!result.valid) {
    return { ok: false, error: `invalid configuration: ${result.errors}`, exitCode: EXIT.INVALID_ARGS };
  }
  return { ok: true, config: result.config };
}

export function strategyOptions(config: ConflictResolutionConfig): StrategyOptions {
  return {
    safetyPreference: config.safety_prefer,
    braceStyle: config.brace_style,
    commentPreference: config.comment_preference,
  };
}

/** One adapter per command run, so the call budget spans every file and PR it touches. */
export function createRunReasoner(
  llm: LlmConfig,
  logDir: string,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
): ReasonerAdapter | null {
  const client = createReasonerClient(llm, env, logger);
  if (!client) return null;
  logger.info(`reasoner active: ${client.provider}/${client.model}`, { max_calls: llm.max_calls_per_run });
  return new ReasonerAdapter({
    client,
    budget: new CallBudget(llm.max_calls_per_run),
    auditLog: new FileAuditLog(logDir),
    timeoutMs: llm.timeout_seconds * 1000,
    logger,
  });
}
