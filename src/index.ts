export type * from "./types/merge.js";
export type * from "./types/pr.js";
export type * from "./types/reasoner.js";
export type * from "./types/config.js";

export { classify, classifyHunk, CLASSIFICATION_RULES } from "./merge/classifier.js";
export { compareConfidence, meetsMinimum, lowestConfidence, parseConfidence, CONFIDENCE_ORDER } from "./merge/confidence.js";
export { mergeIncludes } from "./merge/includes.js";
export { decide, resolveHunk, formatRationale, DEFAULT_STRATEGY_OPTIONS } from "./merge/strategy.js";
export { parseConflicts, reassemble, hunkContexts } from "./merge/hunk-machine.js";
export { resolveConflictText, resolveConflictedFile, resolvePreferringSide } from "./merge/resolver.js";

export { ReasonerAdapter, parseDependencyAnswer } from "./reasoner/adapter.js";
export { CallBudget } from "./reasoner/budget.js";
export { validateCandidate, cleanCandidate } from "./reasoner/validation.js";
export { FileAuditLog, MemoryAuditLog } from "./reasoner/audit-log.js";
export { createReasonerClient } from "./reasoner/providers/factory.js";

export { analyzeDependencies, findCandidatePairs, orderOperations } from "./deps/analyzer.js";

export { GitOperations } from "./git/operations.js";
export { resolveWorkingTree } from "./git/working-tree.js";
export { JsonPullRequestSource } from "./hosting/json-source.js";
export { GitHubPullRequestSource } from "./hosting/github-source.js";

export { loadConfig } from "./config/loader.js";
export { loadValidatedConfig, validateConfig } from "./config/validator.js";
export { createLogger, silentLogger } from "./core/logger.js";
