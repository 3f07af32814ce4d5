import { Octokit } from "octokit";
import type { PRRecord } from "../types/pr.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { PullRequestSource } from "./source.js";

export type PullSummary = {
  title: string;
  merged_at: string | null;
  created_at: string;
};

/** The three GitHub reads this source needs. */
export interface PullsClient {
  getPull(number: number): Promise<PullSummary>;
  listFiles(number: number): Promise<string[]>;
  getDiff(number: number): Promise<string>;
}

export class OctokitPullsClient implements PullsClient {
  private octokit: Octokit;

  constructor(
    private readonly owner: string,
    private readonly repo: string,
    token?: string,
  ) {
    this.octokit = new Octokit({ auth: token });
  }

  async getPull(number: number): Promise<PullSummary> {
    const { data } = await this.octokit.rest.pulls.get({ owner: this.owner, repo: this.repo, pull_number: number });
    return { title: data.title, merged_at: data.merged_at, created_at: data.created_at };
  }

  async listFiles(number: number): Promise<string[]> {
    const files = await this.octokit.paginate(this.octokit.rest.pulls.listFiles, {
      owner: this.owner,
      repo: this.repo,
      pull_number: number,
      per_page: 100,
    });
    return files.map((f) => f.filename);
  }

  async getDiff(number: number): Promise<string> {
    const response = await this.octokit.rest.pulls.get({
      owner: this.owner,
      repo: this.repo,
      pull_number: number,
      mediaType: { format: "diff" },
    });
    // the diff media type returns text, which the generated types do not model
    const body: unknown = response.data;
    return typeof body === "string" ? body : "";
  }
}

export function parseRepoSlug(slug: string): { owner: string; repo: string } | null {
  const m = /^([\w.-]+)\/([\w.-]+)$/.exec(slug.trim());
  return m ? { owner: m[1], repo: m[2] } : null;
}

/**
 * PR metadata, changed files and unified diffs from GitHub.
 * Each PR is requested at most once per source instance.
 */
export class GitHubPullRequestSource implements PullRequestSource {
  private cache = new Map<number, Promise<PRRecord>>();
  private logger: Logger;

  constructor(
    private readonly client: PullsClient,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  static forRepository(slug: string, token: string | undefined, logger?: Logger): GitHubPullRequestSource {
    const parsed = parseRepoSlug(slug);
    if (!parsed) throw new Error(`expected <owner>/<repo>, got '${slug}'`);
    return new GitHubPullRequestSource(new OctokitPullsClient(parsed.owner, parsed.repo, token), logger);
  }

  async fetch(numbers: readonly number[]): Promise<PRRecord[]> {
    return Promise.all(numbers.map((n) => this.fetchOne(n)));
  }

  private fetchOne(number: number): Promise<PRRecord> {
    const cached = this.cache.get(number);
    if (cached) return cached;
    const pending = this.load(number);
    this.cache.set(number, pending);
    return pending;
  }

  private async load(number: number): Promise<PRRecord> {
    const [pr, files, diff] = await Promise.all([
      this.client.getPull(number),
      this.client.listFiles(number),
      this.client.getDiff(number),
    ]);

    if (!pr.merged_at) {
      this.logger.warn(`PR #${number} is not merged; ordering it by creation time`);
    }

    return {
      number,
      title: pr.title,
      files_changed: new Set(files),
      merged_at: pr.merged_at ?? pr.created_at,
      diff_text: diff,
    };
  }
}
