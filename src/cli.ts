#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import type { LogFormat } from "./core/logger.js";
import { validateAll } from "./commands/validate.js";
import { resolve } from "./commands/resolve.js";
import { resolveFile } from "./commands/resolve-file.js";
import { deps } from "./commands/deps.js";
import { EXIT } from "./commands/exit-codes.js";

function parseFormat(value: string): LogFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("expected human or jsonl");
}

function emitError(format: LogFormat, error: string, extra: Record<string, unknown> = {}): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error, ...extra }) + "\n");
  } else {
    console.error(error);
  }
}

const program = new Command();

program
  .name("triagectl")
  .description("Merge-conflict triage and PR dependency analysis for cherry-picks and reverts")
  .version("0.1.0");

program
  .command("validate")
  .description("Validate base config and every environment layer")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Only validate base layered with this environment")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config: string; env?: string; format: LogFormat }) => {
    const res = await validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) {
          process.stdout.write(JSON.stringify(err) + "\n");
        }
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.ATTENTION);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", checked: res.checked }) + "\n");
    } else {
      for (const label of res.checked) console.log(`OK  ${label}`);
    }
  });

program
  .command("resolve")
  .description("Resolve the conflicts of a paused cherry-pick or revert")
  .requiredOption("--mode <mode>", "cherry-pick|revert")
  .requiredOption("--pr <number>", "PR number the operation applies")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Environment layer to apply over base.yaml")
  .option("--repo <path>", "Repository root", ".")
  .option("--no-smart", "Skip the conflict engine; prefer the mode side")
  .option("--min-confidence <level>", "high|medium|review|low")
  .option("--continue", "Continue the git operation once everything is resolved")
  .option("--verbose", "Log every hunk decision")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      mode: string;
      pr: string;
      config: string;
      env?: string;
      repo: string;
      smart: boolean;
      minConfidence?: string;
      continue?: boolean;
      verbose?: boolean;
      format: LogFormat;
    }) => {
      const res = await resolve({
        mode: opts.mode,
        pr: opts.pr,
        configDir: opts.config,
        envName: opts.env,
        repo: opts.repo,
        smart: opts.smart,
        minConfidence: opts.minConfidence,
        continueOperation: opts.continue,
        verbose: opts.verbose,
        format: opts.format,
      });

      if (!res.ok) {
        emitError(opts.format, res.error, res.reportPath ? { report: res.reportPath } : {});
        process.exit(res.exitCode);
      }

      const { summary } = res.report;
      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", report: res.reportPath, continued: res.continued, summary }) + "\n",
        );
      } else {
        for (const f of res.report.files.resolved) console.log(`${f.file}  ${f.reason}`);
        console.log(
          `${summary.total_hunks} hunk(s): ${summary.high} high, ${summary.medium} medium, ${summary.review} review, ${summary.low} low`,
        );
        console.log(`Report: ${res.reportPath}`);
      }
    },
  );

program
  .command("resolve-file")
  .description("Run the conflict engine on a single file")
  .argument("<path>", "File containing conflict markers")
  .requiredOption("--mode <mode>", "cherry-pick|revert")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Environment layer to apply over base.yaml")
  .option("--min-confidence <level>", "high|medium|review|low")
  .option("--dry-run", "Report the outcome without rewriting the file")
  .option("--verbose", "Log every hunk decision")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (
      file: string,
      opts: {
        mode: string;
        config: string;
        env?: string;
        minConfidence?: string;
        dryRun?: boolean;
        verbose?: boolean;
        format: LogFormat;
      },
    ) => {
      const res = await resolveFile({
        path: file,
        mode: opts.mode,
        configDir: opts.config,
        envName: opts.env,
        minConfidence: opts.minConfidence,
        dryRun: opts.dryRun,
        verbose: opts.verbose,
        format: opts.format,
      });

      if (!res.ok) {
        emitError(opts.format, res.error);
        process.exit(res.exitCode);
      }

      const { resolution } = res;
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", ...resolution }) + "\n");
      } else {
        for (const line of res.lines) console.log(line);
        console.log(resolution.outcome === "failed" ? `failed: ${resolution.error}` : resolution.outcome);
      }
      process.exit(res.exitCode);
    },
  );

program
  .command("deps")
  .description("Find the PRs an inclusion list depends on")
  .requiredOption("--include <numbers>", "Comma-separated PR numbers to apply")
  .option("--prs <file>", "JSON file of PR records")
  .option("--github <owner/repo>", "Read PRs from GitHub (token from GITHUB_TOKEN)")
  .option("--numbers <numbers>", "Other PR numbers to consider with --github")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Environment layer to apply over base.yaml")
  .option("--verbose", "Log every pair decision")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      include: string;
      prs?: string;
      github?: string;
      numbers?: string;
      config: string;
      env?: string;
      verbose?: boolean;
      format: LogFormat;
    }) => {
      const res = await deps({
        include: opts.include,
        prs: opts.prs,
        github: opts.github,
        numbers: opts.numbers,
        configDir: opts.config,
        envName: opts.env,
        verbose: opts.verbose,
        format: opts.format,
      });

      if (!res.ok) {
        emitError(opts.format, res.error);
        process.exit(res.exitCode);
      }

      const { report } = res;
      if (opts.format === "jsonl") {
        for (const f of report.findings) process.stdout.write(JSON.stringify(f) + "\n");
        process.stdout.write(
          JSON.stringify({ level: "info", operations: report.operations, auto_added: report.auto_added, report: res.reportPath }) +
            "\n",
        );
      } else {
        for (const f of report.findings) {
          const kind = f.is_critical ? "critical" : "optional";
          console.log(`PR#${f.included_pr} <- PR#${f.depends_on_pr}  ${kind}  ${f.shared_files.join(", ")}  (${f.reason})`);
        }
        console.log(`Apply order: ${report.operations.join(", ")}`);
        if (report.auto_added.length > 0) console.log(`Auto-added: ${report.auto_added.join(", ")}`);
      }
      process.exit(res.exitCode);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
