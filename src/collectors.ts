/**
 * Commit and ticket collection backed by the response cache
 */

import type { Cache } from './cache';
import type { CommitCollection, FilterConfig, TicketCollection, TicketDetail } from './domain/models';

export interface CommitSource {
  fetchCommitsForYear(year: number, filter: FilterConfig): Promise<CommitCollection>;
}

export interface TicketSource {
  fetchTickets(
    ticketKeys: readonly string[],
    onProgress?: (current: number, total: number) => void
  ): Promise<TicketCollection>;
}

interface CachedTickets {
  tickets: Array<[string, TicketDetail]>;
  unresolvedKeys: string[];
}

function filterParams(filter: FilterConfig): Record<string, string> {
  return {
    organizations: [...filter.organizations].sort().join(','),
    repositories: [...filter.repositories].sort().join(','),
  };
}

/**
 * Collect the user's commits for a year, reusing a cached collection when one exists
 */
export async function collectCommits(
  source: CommitSource,
  cache: Cache,
  params: { year: number; login: string; filter: FilterConfig }
): Promise<CommitCollection & { fromCache: boolean }> {
  const key = {
    login: params.login,
    year: String(params.year),
    ...filterParams(params.filter),
  };

  const cached = await cache.get<CommitCollection>('commits', key);
  if (cached) {
    return { ...cached, fromCache: true };
  }

  const collection = await source.fetchCommitsForYear(params.year, params.filter);
  await cache.set('commits', key, collection);
  return { ...collection, fromCache: false };
}

/**
 * Resolve ticket keys, reusing a cached resolution of the same key set
 */
export async function collectTickets(
  source: TicketSource,
  cache: Cache,
  ticketKeys: readonly string[],
  onProgress?: (current: number, total: number) => void
): Promise<TicketCollection & { fromCache: boolean }> {
  if (ticketKeys.length === 0) {
    return { tickets: new Map(), unresolvedKeys: [], fromCache: false };
  }

  const key = { keys: ticketKeys.join(',') };

  const cached = await cache.get<CachedTickets>('tickets', key);
  if (cached) {
    return {
      tickets: new Map(cached.tickets),
      unresolvedKeys: cached.unresolvedKeys,
      fromCache: true,
    };
  }

  const collection = await source.fetchTickets(ticketKeys, onProgress);
  const entry: CachedTickets = {
    tickets: [...collection.tickets.entries()],
    unresolvedKeys: collection.unresolvedKeys,
  };
  await cache.set('tickets', key, entry);
  return { ...collection, fromCache: false };
}
