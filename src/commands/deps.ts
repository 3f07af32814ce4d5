import path from "node:path";
import type { PRRecord } from "../types/pr.js";
import type { DependencyReasoner } from "../types/reasoner.js";
import { analyzeDependencies } from "../deps/analyzer.js";
import { GitHubPullRequestSource } from "../hosting/github-source.js";
import { JsonPullRequestSource } from "../hosting/json-source.js";
import type { PullRequestSource } from "../hosting/source.js";
import type { DependencyReport } from "../report/summary.js";
import { ReportWriter } from "../report/writer.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import {
  commandLogger,
  createRunReasoner,
  loadCommandConfig,
  parseNumberList,
  type CommonOptions,
  type Failure,
} from "./shared.js";

export const DEPENDENCY_REPORT = "dependency-analysis.json";

export type DepsCommandOptions = CommonOptions & {
  include: string;
  /** JSON file of PR records. */
  prs?: string;
  /** `<owner>/<repo>`; used with `numbers`. */
  github?: string;
  /** Window of PRs to consider besides the included ones (GitHub source). */
  numbers?: string;
  source?: PullRequestSource;
  reasoner?: DependencyReasoner | null;
  now?: () => Date;
};

export type DepsCommandResult =
  | { ok: true; report: DependencyReport; reportPath: string; exitCode: ExitCode }
  | Failure;

/** Find the PRs an inclusion list depends on and the order to apply them. */
export async function deps(opts: DepsCommandOptions): Promise<DepsCommandResult> {
  const logger = commandLogger(opts);

  const included = parseNumberList(opts.include);
  if (!included) {
    return { ok: false, error: `--include must be a comma-separated list of PR numbers`, exitCode: EXIT.INVALID_ARGS };
  }

  let source = opts.source;
  let window: number[] = [];
  if (!source) {
    if (opts.prs) {
      source = new JsonPullRequestSource(path.resolve(opts.prs));
    } else if (opts.github) {
      const numbers = opts.numbers !== undefined ? parseNumberList(opts.numbers) : [];
      if (!numbers) {
        return { ok: false, error: `--numbers must be a comma-separated list of PR numbers`, exitCode: EXIT.INVALID_ARGS };
      }
      try {
        source = GitHubPullRequestSource.forRepository(opts.github, (opts.env ?? process.env).GITHUB_TOKEN, logger);
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err), exitCode: EXIT.INVALID_ARGS };
      }
      window = [...new Set([...included, ...numbers])].sort((a, b) => a - b);
    } else {
      return { ok: false, error: "one of --prs or --github is required", exitCode: EXIT.INVALID_ARGS };
    }
  }

  const loaded = await loadCommandConfig(opts);
  if (!loaded.ok) return loaded;
  const { config } = loaded;
  const logDir = path.resolve(config.log_dir);

  let prs: PRRecord[];
  try {
    prs = await source.fetch(window);
  } catch (err) {
    return {
      ok: false,
      error: `cannot read PR records: ${err instanceof Error ? err.message : String(err)}`,
      exitCode: EXIT.INVALID_ARGS,
    };
  }
  const known = new Set(prs.map((pr) => pr.number));
  const missing = included.filter((n) => !known.has(n));
  if (missing.length > 0) {
    logger.warn(`included PRs without records: ${missing.join(", ")}`);
  }

  const reasoner = opts.reasoner !== undefined ? opts.reasoner : createRunReasoner(config.llm, logDir, logger, opts.env);
  const analysis = await analyzeDependencies({
    prs,
    included,
    reasoner,
    unknownPolicy: config.dependencies.unknown_policy,
    logger,
  });

  const now = opts.now ?? (() => new Date());
  const report: DependencyReport = { timestamp: now().toISOString(), included, ...analysis };
  const writer = new ReportWriter(logDir, now);
  writer.init();
  const reportPath = writer.writeJson(DEPENDENCY_REPORT, "dependency-analysis", report);
  writer.writeManifest();

  if (analysis.auto_added.length > 0) {
    logger.info(`auto-included critical dependencies: ${analysis.auto_added.join(", ")}`);
  }
  return { ok: true, report, reportPath, exitCode: analysis.has_deps ? EXIT.ATTENTION : EXIT.SUCCESS };
}
