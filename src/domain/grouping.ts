/**
 * Commit grouping logic
 * Links commits to Jira tickets and groups them by project key
 */

import type {
  CommitRecord,
  GroupingResult,
  ProjectAggregate,
  TicketDetail,
} from './models';
import { compareTicketKeys, extractTicketKeys, projectKeyOf } from './ticket-keys';

interface ProjectDraft {
  projectKey: string;
  commits: CommitRecord[];
  ticketKeys: Set<string>;
}

/**
 * Remove commits whose SHA was already seen, keeping the first occurrence
 */
export function deduplicateCommits(commits: readonly CommitRecord[]): CommitRecord[] {
  const seen = new Set<string>();
  const unique: CommitRecord[] = [];

  for (const commit of commits) {
    if (seen.has(commit.sha)) continue;
    seen.add(commit.sha);
    unique.push(commit);
  }

  return unique;
}

/**
 * Sort commits chronologically by author date; Array.prototype.sort is stable,
 * so commits with the same date keep their fetch order
 */
function sortCommits(commits: readonly CommitRecord[]): CommitRecord[] {
  return [...commits].sort(
    (a, b) => new Date(a.authorDate).getTime() - new Date(b.authorDate).getTime()
  );
}

/**
 * Group commits by the Jira project of the ticket keys they reference.
 * A commit referencing several projects is added to each of them.
 */
export function groupByProject(
  commits: readonly CommitRecord[],
  tickets: ReadonlyMap<string, TicketDetail>,
  projectNames: ReadonlyMap<string, string> = new Map()
): GroupingResult {
  const drafts = new Map<string, ProjectDraft>();
  const unlinkedCommits: CommitRecord[] = [];

  for (const commit of commits) {
    const keys = extractTicketKeys(commit.message);
    if (keys.length === 0) {
      unlinkedCommits.push(commit);
      continue;
    }

    const touched = new Set<string>();
    for (const key of keys) {
      const projectKey = projectKeyOf(key);
      let draft = drafts.get(projectKey);
      if (!draft) {
        draft = { projectKey, commits: [], ticketKeys: new Set() };
        drafts.set(projectKey, draft);
      }
      draft.ticketKeys.add(key);

      if (!touched.has(projectKey)) {
        touched.add(projectKey);
        draft.commits.push(commit);
      }
    }
  }

  const projects = new Map<string, ProjectAggregate>();
  const unresolved: string[] = [];

  for (const [projectKey, draft] of drafts) {
    const ticketKeys = Array.from(draft.ticketKeys).sort(compareTicketKeys);
    const resolved: TicketDetail[] = [];

    for (const key of ticketKeys) {
      const ticket = tickets.get(key);
      if (ticket) {
        resolved.push(ticket);
      } else {
        unresolved.push(key);
      }
    }

    projects.set(projectKey, {
      projectKey,
      projectName: resolved[0]?.projectName || projectNames.get(projectKey) || projectKey,
      commits: sortCommits(draft.commits),
      ticketKeys,
      tickets: resolved,
    });
  }

  return {
    projects,
    unlinkedCommits,
    unresolvedTicketKeys: unresolved.sort(compareTicketKeys),
  };
}

/**
 * Projects in key order
 */
export function sortedProjects(projects: ReadonlyMap<string, ProjectAggregate>): ProjectAggregate[] {
  return Array.from(projects.values()).sort((a, b) =>
    a.projectKey < b.projectKey ? -1 : a.projectKey > b.projectKey ? 1 : 0
  );
}

/**
 * Calculate statistics from grouped projects
 */
export function calculateStats(result: GroupingResult): {
  totalProjects: number;
  linkedCommits: number;
  unlinkedCommits: number;
  totalTicketKeys: number;
  resolvedTickets: number;
} {
  const linked = new Set<string>();
  let totalTicketKeys = 0;
  let resolvedTickets = 0;

  for (const project of result.projects.values()) {
    for (const commit of project.commits) {
      linked.add(commit.sha);
    }
    totalTicketKeys += project.ticketKeys.length;
    resolvedTickets += project.tickets.length;
  }

  return {
    totalProjects: result.projects.size,
    linkedCommits: linked.size,
    unlinkedCommits: result.unlinkedCommits.length,
    totalTicketKeys,
    resolvedTickets,
  };
}
