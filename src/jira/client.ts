/**
 * Jira REST API client
 * Uses Basic Auth with the account email and an API token
 */

import type { TicketCollection, TicketDetail } from '../domain/models';
import { projectKeyOf } from '../domain/ticket-keys';
import { silentLogger, type Logger } from '../logger';
import type { JiraErrorResponse, JiraIssue, JiraProject } from './types';

const ISSUE_FIELDS = 'summary,description,issuetype,status,project';

export class JiraClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
  ) {
    super(message);
    this.name = 'JiraClientError';
  }
}

export interface JiraClientConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface JiraClientOptions {
  maxRetries?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) return `${response.status} ${response.statusText}`.trim();

  try {
    const body = JSON.parse(text) as JiraErrorResponse;
    const messages = [...(body.errorMessages ?? []), ...Object.values(body.errors ?? {})];
    if (messages.length > 0) return messages.join('; ');
  } catch {
    // Not JSON (HTML error pages), use the raw text below
  }
  return text.slice(0, 200);
}

/**
 * Map a Jira issue to ticket details. The project key always comes from the
 * key that referenced the issue.
 */
export function mapIssue(requestedKey: string, issue: JiraIssue, baseUrl: string): TicketDetail {
  const projectKey = projectKeyOf(requestedKey);
  return {
    key: requestedKey,
    projectKey,
    projectName: issue.fields.project?.name ?? projectKey,
    summary: issue.fields.summary ?? '',
    description: issue.fields.description ?? '',
    issueType: issue.fields.issuetype?.name ?? '',
    status: issue.fields.status?.name ?? '',
    url: `${baseUrl}/browse/${issue.key}`,
  };
}

export class JiraClient {
  private config: JiraClientConfig;
  private maxRetries: number;
  private fetchFn: typeof fetch;
  private sleepFn: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(config: JiraClientConfig, options: JiraClientOptions = {}) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.maxRetries = options.maxRetries ?? 3;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * GET a Jira REST path, retrying 429 responses with a linear backoff
   */
  private async request<T>(path: string): Promise<T> {
    const url = `${this.config.baseUrl}${path}`;
    const auth = Buffer.from(`${this.config.email}:${this.config.apiToken}`).toString('base64');

    for (let attempt = 0; ; attempt++) {
      const response = await this.fetchFn(url, {
        headers: {
          Authorization: `Basic ${auth}`,
          Accept: 'application/json',
        },
      });

      if (response.status === 429 && attempt < this.maxRetries) {
        const waitTime = (attempt + 1) * 2000;
        this.logger.warn(`Jira rate limit exceeded. Waiting ${waitTime / 1000} seconds...`);
        await this.sleepFn(waitTime);
        continue;
      }

      if (!response.ok) {
        const message = await readErrorMessage(response);
        throw new JiraClientError(`Jira API error: ${message}`, response.status, path);
      }

      return (await response.json()) as T;
    }
  }

  /**
   * Get details for a single ticket. Returns null when the ticket does not
   * resolve; throws only when the credential itself is rejected.
   */
  async getTicket(ticketKey: string): Promise<TicketDetail | null> {
    try {
      const issue = await this.request<JiraIssue>(
        `/rest/api/2/issue/${encodeURIComponent(ticketKey)}?fields=${ISSUE_FIELDS}`
      );
      return mapIssue(ticketKey, issue, this.config.baseUrl);
    } catch (error) {
      if (error instanceof JiraClientError && error.statusCode === 401) {
        throw error;
      }
      if (error instanceof JiraClientError && error.statusCode === 404) {
        this.logger.warn(`Ticket ${ticketKey} not found`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Could not fetch ticket ${ticketKey}: ${message}`);
      }
      return null;
    }
  }

  /**
   * Get details for many tickets. Keys that do not resolve are returned
   * in unresolvedKeys.
   */
  async fetchTickets(
    ticketKeys: readonly string[],
    onProgress?: (current: number, total: number) => void
  ): Promise<TicketCollection> {
    const tickets = new Map<string, TicketDetail>();
    const unresolvedKeys: string[] = [];

    for (const [index, key] of ticketKeys.entries()) {
      onProgress?.(index + 1, ticketKeys.length);
      const ticket = await this.getTicket(key);
      if (ticket) {
        tickets.set(key, ticket);
      } else {
        unresolvedKeys.push(key);
      }
    }

    return { tickets, unresolvedKeys };
  }

  /**
   * Look up project display names. Projects that cannot be read are left out,
   * and callers fall back to the key.
   */
  async fetchProjectNames(projectKeys: readonly string[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();

    for (const key of projectKeys) {
      try {
        const project = await this.request<JiraProject>(
          `/rest/api/2/project/${encodeURIComponent(key)}`
        );
        names.set(key, project.name);
      } catch (error) {
        if (error instanceof JiraClientError && error.statusCode === 401) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger.verbose(`    Could not fetch project ${key}: ${message}`);
      }
    }

    return names;
  }
}
