/**
 * GitHub pull request metadata provider
 *
 * Resolves a PR URL into the clone endpoints, branches and commits a trial
 * needs. Authentication is optional; anonymous calls are rate limited.
 */

import { Octokit } from '@octokit/rest';
import pino from 'pino';
import { InvalidUrlError } from '../errors.js';
import { prInfoSchema, type PRInfo } from '../types.js';

export interface GitHubClientConfig {
  token?: string;
  baseUrl?: string;
  logger?: pino.Logger;
  /** Replaces the global fetch used for API calls */
  fetch?: typeof fetch;
}

export interface ParsedPrUrl {
  owner: string;
  repo: string;
  prNumber: number;
}

const PR_URL_PATTERN = /github\.com\/([^/\s]+)\/([^/\s]+)\/pull\/(\d+)/;

/**
 * Parse owner, repository and number out of a PR URL.
 *
 * @throws InvalidUrlError if the URL does not point at a pull request
 */
export function parsePrUrl(prUrl: string): ParsedPrUrl {
  const match = PR_URL_PATTERN.exec(prUrl);
  if (!match) {
    throw new InvalidUrlError(prUrl);
  }
  const [, owner, repo, prNumber] = match;
  return { owner, repo, prNumber: Number.parseInt(prNumber, 10) };
}

export function createGitHubClient(config: GitHubClientConfig = {}): Octokit {
  const log = (config.logger ?? pino({ level: 'silent' })).child({ component: 'github' });
  return new Octokit({
    auth: config.token,
    baseUrl: config.baseUrl,
    userAgent: 'pr-trial-verifier/0.1.0',
    log: {
      debug: (message: string) => log.debug(message),
      info: (message: string) => log.info(message),
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.error(message),
    },
    request: config.fetch ? { fetch: config.fetch } : undefined,
  });
}

export class GitHubPrProvider {
  private client: Octokit;

  constructor(client: Octokit) {
    this.client = client;
  }

  /**
   * Fetch PR metadata. Transport and API errors propagate unchanged.
   *
   * @throws InvalidUrlError if the URL cannot be parsed
   */
  async getPrInfo(prUrl: string): Promise<PRInfo> {
    const { owner, repo, prNumber } = parsePrUrl(prUrl);
    const { data } = await this.client.rest.pulls.get({ owner, repo, pull_number: prNumber });

    // Head repo is null when the fork was deleted; the PR ref still lives on the base
    const sourceRepoUrl = data.head.repo?.clone_url ?? data.base.repo.clone_url;

    return prInfoSchema.parse({
      prUrl,
      repoOwner: owner,
      repoName: repo,
      prNumber,
      sourceBranch: data.head.ref,
      sourceCommit: data.head.sha,
      sourceRepoUrl,
      targetBranch: data.base.ref,
      targetCommit: data.base.sha,
      targetRepoUrl: data.base.repo.clone_url,
      title: data.title,
      state: data.merged_at ? 'merged' : data.state,
    });
  }
}
