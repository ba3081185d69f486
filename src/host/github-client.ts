/**
 * Source-host discovery: lists the repositories the authenticated user can
 * push to and keeps those that look like registry packages.
 *
 * Not part of the held-back engine; it shares no data with it.
 */

import { z } from 'zod';
import { HOST_TOKEN_ENV, loadConfig } from '../config/config.js';
import { describeIssues } from '../schemas/registry.schema.js';
import { ConfigError, HostApiError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_PACKAGE_SUFFIX = '.jl';
const PAGE_SIZE = 100;

export const HostRepository = z.object({
  name: z.string(),
  fork: z.boolean(),
});

export type HostRepository = z.infer<typeof HostRepository>;

const RepositoryPage = z.array(HostRepository);

/**
 * Client interface for the source host. Injectable for testability.
 */
export interface HostClient {
  listRepositories(): Promise<HostRepository[]>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export class GitHubClient implements HostClient {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Page through `/user/repos` until an empty page comes back.
   */
  async listRepositories(): Promise<HostRepository[]> {
    const repos: HostRepository[] = [];
    for (let page = 1; ; page++) {
      const results = await this.getPage(page);
      if (results.length === 0) break;
      repos.push(...results);
    }
    return repos;
  }

  private async getPage(page: number): Promise<HostRepository[]> {
    const url = `${this.apiUrl}/user/repos?per_page=${PAGE_SIZE}&page=${page}`;
    this.logger.debug(`GET ${url}`);

    const response = await this.fetchImpl(url, {
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${this.token}`,
      },
    });
    if (!response.ok) {
      throw new HostApiError(response.status, url, await response.text());
    }

    const parsed = RepositoryPage.safeParse(await response.json());
    if (!parsed.success) {
      throw new HostApiError(response.status, url, `unexpected payload: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}

/**
 * Base names of non-fork repositories ending in the package suffix.
 */
export function packageNamesFromRepositories(
  repos: readonly HostRepository[],
  suffix: string = DEFAULT_PACKAGE_SUFFIX,
): Set<string> {
  const names = new Set<string>();
  for (const repo of repos) {
    if (repo.fork) continue;
    if (!repo.name.endsWith(suffix) || repo.name.length === suffix.length) continue;
    names.add(repo.name.slice(0, -suffix.length));
  }
  return names;
}

export interface FindPackagesOptions {
  client?: HostClient;
  env?: NodeJS.ProcessEnv;
  suffix?: string;
  apiUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Discover registry packages the current user can push to.
 * Requires a token in `GITHUB_AUTH` unless a client is supplied.
 */
export async function findPackagesOnHost(options: FindPackagesOptions = {}): Promise<Set<string>> {
  const client = options.client ?? createClientFromEnv(options);
  const repos = await client.listRepositories();
  return packageNamesFromRepositories(repos, options.suffix);
}

function createClientFromEnv(options: FindPackagesOptions): GitHubClient {
  const token = loadConfig(options.env).hostToken;
  if (token === undefined) {
    throw new ConfigError(`Set ${HOST_TOKEN_ENV} to a source-host API token to discover packages`);
  }
  return new GitHubClient({ token, apiUrl: options.apiUrl, fetch: options.fetch, logger: options.logger });
}
