/**
 * GitHub REST API client
 * Handles fetching the authenticated user, repositories, and a year of commits
 */

import {
  isRepositoryIncluded,
  organizationsToScan,
  unmatchedRepositoryEntries,
} from '../domain/filter';
import type { CommitCollection, CommitRecord, FilterConfig, SkippedSource } from '../domain/models';
import { silentLogger, type Logger } from '../logger';
import type {
  GitHubCommit,
  GitHubError,
  GitHubRepository,
  GitHubUser,
  PaginationInfo,
} from './types';

const GITHUB_API_BASE = 'https://api.github.com';

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
    public rateLimited = false,
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface GitHubClientOptions {
  baseUrl?: string;
  maxRetries?: number;
  /** Minimum ms between requests */
  minRequestInterval?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface AuthenticatedUser {
  login: string;
  name: string | null;
}

/**
 * Parse Link header for pagination
 */
export function parseLinkHeader(header: string | null): PaginationInfo {
  if (!header) return {};

  const links: PaginationInfo = {};
  const parts = header.split(',');

  for (const part of parts) {
    const match = part.match(/<([^>]+)>;\s*rel="([^"]+)"/);
    if (match) {
      const [, url, rel] = match;
      if (url && (rel === 'next' || rel === 'prev' || rel === 'first' || rel === 'last')) {
        links[rel] = url;
      }
    }
  }

  return links;
}

/**
 * Check if an ISO date falls within the calendar year (UTC)
 */
export function isDateInYear(dateStr: string, year: number): boolean {
  const time = new Date(dateStr).getTime();
  return time >= Date.UTC(year, 0, 1, 0, 0, 0) && time <= Date.UTC(year, 11, 31, 23, 59, 59, 999);
}

/**
 * Sleep for a specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function ownerOf(fullName: string): string {
  return fullName.split('/')[0] ?? fullName;
}

/**
 * GitHub API client for fetching user activity
 */
export class GitHubClient {
  private token: string;
  private baseUrl: string;
  private maxRetries: number;
  private readonly minRequestInterval: number;
  private fetchFn: typeof fetch;
  private sleepFn: (ms: number) => Promise<void>;
  private logger: Logger;
  private requestCount = 0;
  private lastRequestTime = 0;
  private user: AuthenticatedUser | null = null;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.token = token;
    this.baseUrl = options.baseUrl ?? GITHUB_API_BASE;
    this.maxRetries = options.maxRetries ?? 3;
    this.minRequestInterval = options.minRequestInterval ?? 100;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Rate limit: ensure minimum time between requests
   */
  private async rateLimit(): Promise<void> {
    const now = Date.now();
    const timeSinceLastRequest = now - this.lastRequestTime;

    if (timeSinceLastRequest < this.minRequestInterval) {
      await this.sleepFn(this.minRequestInterval - timeSinceLastRequest);
    }

    this.lastRequestTime = Date.now();
    this.requestCount++;
  }

  /**
   * Make an authenticated request to GitHub API with rate limit handling
   */
  private async request<T>(
    endpoint: string,
    retryCount = 0,
  ): Promise<{ data: T; pagination: PaginationInfo }> {
    await this.rateLimit();

    const url = endpoint.startsWith('http') ? endpoint : `${this.baseUrl}${endpoint}`;

    const response = await this.fetchFn(url, {
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${this.token}`,
        'User-Agent': 'creative-report-cli',
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });

    // Handle rate limiting
    if (response.status === 403 || response.status === 429) {
      const rateLimitRemaining = response.headers.get('X-RateLimit-Remaining');
      const rateLimitReset = response.headers.get('X-RateLimit-Reset');

      if (rateLimitRemaining === '0' || response.status === 429) {
        if (retryCount >= this.maxRetries) {
          throw new GitHubClientError(
            'Rate limit exceeded. Please wait and try again later.',
            response.status,
            endpoint,
            true,
          );
        }

        // Calculate wait time
        let waitTime = 60000; // Default 1 minute
        if (rateLimitReset) {
          const resetTime = parseInt(rateLimitReset, 10) * 1000;
          waitTime = Math.max(resetTime - Date.now() + 1000, 1000);
          // Cap at 5 minutes for sanity
          waitTime = Math.min(waitTime, 300000);
        }

        this.logger.warn(`Rate limited. Waiting ${Math.ceil(waitTime / 1000)}s before retrying...`);
        await this.sleepFn(waitTime);
        return this.request<T>(endpoint, retryCount + 1);
      }
    }

    if (!response.ok) {
      let errorMessage = `GitHub API error: ${response.status} ${response.statusText}`;

      const text = await response.text().catch(() => '');
      if (text) {
        try {
          const errorBody = JSON.parse(text) as GitHubError;
          if (errorBody.message) {
            errorMessage = `GitHub API error: ${errorBody.message}`;
          }
        } catch {
          // Non-JSON error body, keep the status line
        }
      }

      throw new GitHubClientError(errorMessage, response.status, endpoint);
    }

    const data = (await response.json()) as T;
    const pagination = parseLinkHeader(response.headers.get('Link'));

    return { data, pagination };
  }

  /**
   * Fetch all pages of a paginated endpoint
   */
  private async fetchAllPages<T>(endpoint: string): Promise<T[]> {
    const results: T[] = [];
    let nextUrl: string | undefined = `${this.baseUrl}${endpoint}`;

    while (nextUrl) {
      const response: { data: T[]; pagination: PaginationInfo } = await this.request<T[]>(nextUrl);
      results.push(...response.data);
      nextUrl = response.pagination.next;
    }

    return results;
  }

  /**
   * Get the user the token belongs to
   */
  async getAuthenticatedUser(): Promise<AuthenticatedUser> {
    if (!this.user) {
      const { data } = await this.request<GitHubUser>('/user');
      this.user = { login: data.login, name: data.name };
    }
    return this.user;
  }

  /**
   * Get all repositories the authenticated user has access to, plus the repositories
   * of every organization the filter names. Organizations that cannot be listed are
   * reported rather than dropped.
   */
  async listRepositories(
    filter: FilterConfig,
  ): Promise<{ repositories: GitHubRepository[]; skippedOrganizations: SkippedSource[] }> {
    const repoMap = new Map<string, GitHubRepository>();
    const skippedOrganizations: SkippedSource[] = [];

    const userRepos = await this.fetchAllPages<GitHubRepository>(
      '/user/repos?per_page=100&affiliation=owner,collaborator,organization_member&sort=pushed&direction=desc'
    );
    for (const repo of userRepos) {
      repoMap.set(repo.full_name.toLowerCase(), repo);
    }
    this.logger.verbose(`    Found ${userRepos.length} repos via user/repos API`);

    for (const org of organizationsToScan(filter)) {
      try {
        const orgRepos = await this.fetchAllPages<GitHubRepository>(
          `/orgs/${encodeURIComponent(org)}/repos?per_page=100&type=all`
        );
        this.logger.verbose(`    Found ${orgRepos.length} repos in ${org}`);
        for (const repo of orgRepos) {
          const key = repo.full_name.toLowerCase();
          if (!repoMap.has(key)) {
            repoMap.set(key, repo);
          }
        }
      } catch (error) {
        if (!(error instanceof GitHubClientError) || error.statusCode === 401 || error.rateLimited) {
          throw error;
        }
        this.logger.warn(`Could not list repositories for organization ${org}: ${error.message}`);
        skippedOrganizations.push({ name: org, reason: error.message });
      }
    }

    return { repositories: Array.from(repoMap.values()), skippedOrganizations };
  }

  /**
   * Fetch the user's commits in one repository for a calendar year
   */
  async listRepositoryCommits(
    repoFullName: string,
    author: string,
    year: number,
  ): Promise<CommitRecord[]> {
    // The API bounds the committer date; the author date decides the year
    const since = `${year}-01-01T00:00:00Z`;

    const commits = await this.fetchAllPages<GitHubCommit>(
      `/repos/${repoFullName}/commits?author=${encodeURIComponent(author)}` +
        `&since=${since}&per_page=100`
    );

    const records: CommitRecord[] = [];
    for (const commit of commits) {
      const signature = commit.commit.author ?? commit.commit.committer;
      if (!signature || !isDateInYear(signature.date, year)) {
        continue;
      }

      records.push({
        repositoryFullName: repoFullName,
        sha: commit.sha,
        message: commit.commit.message,
        authorDate: signature.date,
        author: signature.name,
        url: commit.html_url,
      });
    }

    return records;
  }

  /**
   * Fetch every commit the user authored in the year across all included repositories.
   * A 401 aborts; an inaccessible organization or repository is recorded and skipped.
   */
  async fetchCommitsForYear(year: number, filter: FilterConfig): Promise<CommitCollection> {
    const user = await this.getAuthenticatedUser();
    this.logger.log(`Fetching commits for ${user.login} in ${year}...`);

    const { repositories, skippedOrganizations } = await this.listRepositories(filter);
    const included = repositories.filter((repo) => isRepositoryIncluded(repo.full_name, filter));
    this.logger.log(`  Scanning ${included.length} of ${repositories.length} accessible repositories`);

    const unmatched = unmatchedRepositoryEntries(
      repositories.map((repo) => repo.full_name),
      filter
    );
    for (const entry of unmatched) {
      this.logger.warn(`Repository filter "${entry}" matches no accessible repository`);
    }

    const inaccessible = new Set(skippedOrganizations.map((org) => org.name.toLowerCase()));
    const skippedRepositories: SkippedSource[] = [];
    const commits: CommitRecord[] = [];
    let repositoriesScanned = 0;

    for (const [i, repo] of included.entries()) {
      const owner = ownerOf(repo.full_name);

      if (inaccessible.has(owner.toLowerCase())) {
        this.logger.verbose(`    Skipping ${repo.full_name}: organization ${owner} is not accessible`);
        continue;
      }

      this.logger.progress(`\r  Fetching commits: ${i + 1}/${included.length}...`.padEnd(60));

      try {
        const repoCommits = await this.listRepositoryCommits(repo.full_name, user.login, year);
        repositoriesScanned++;
        if (repoCommits.length > 0) {
          this.logger.verbose(`    Found ${repoCommits.length} commits in ${repo.full_name}`);
          commits.push(...repoCommits);
        }
      } catch (error) {
        if (!(error instanceof GitHubClientError) || error.statusCode === 401 || error.rateLimited) {
          throw error;
        }

        const isOrganization = owner.toLowerCase() !== user.login.toLowerCase();
        if (error.statusCode === 403 && isOrganization) {
          // Typically SAML SSO: the token is not authorized for this organization
          this.logger.warn(`Organization ${owner} is not accessible: ${error.message}`);
          skippedOrganizations.push({ name: owner, reason: error.message });
          inaccessible.add(owner.toLowerCase());
        } else if (error.statusCode === 409) {
          // Empty repository
          this.logger.verbose(`    ${repo.full_name} is empty`);
          repositoriesScanned++;
        } else {
          this.logger.warn(`Could not fetch commits from ${repo.full_name}: ${error.message}`);
          skippedRepositories.push({ name: repo.full_name, reason: error.message });
        }
      }
    }

    this.logger.progress('\r'.padEnd(60) + '\r');
    this.logger.verbose(`  ${this.requestCount} GitHub API requests`);

    return { commits, repositoriesScanned, skippedOrganizations, skippedRepositories };
  }
}
