/**
 * Jira ticket key extraction from commit messages
 */

import type { CommitRecord } from './models';

/**
 * PROJECT-NUMBER, where PROJECT starts with a letter. A key must not touch a
 * letter, digit or underscore in any script on either side.
 */
const TICKET_KEY_PATTERN = /(?<![\p{L}\p{N}_])[A-Za-z][A-Za-z0-9]*-\d+(?![\p{L}\p{N}_])/gu;

/**
 * Extract the distinct ticket keys in a message, upper-cased, in order of first appearance
 */
export function extractTicketKeys(message: string): string[] {
  if (!message) return [];

  const keys = new Set<string>();
  for (const match of message.matchAll(TICKET_KEY_PATTERN)) {
    keys.add(match[0].toUpperCase());
  }
  return Array.from(keys);
}

/**
 * Project segment of a ticket key ("PROJ-123" -> "PROJ")
 */
export function projectKeyOf(ticketKey: string): string {
  const index = ticketKey.lastIndexOf('-');
  return index === -1 ? ticketKey : ticketKey.slice(0, index);
}

function ticketNumberOf(ticketKey: string): number {
  return Number.parseInt(ticketKey.slice(ticketKey.lastIndexOf('-') + 1), 10);
}

/**
 * Order keys by project, then by ticket number
 */
export function compareTicketKeys(a: string, b: string): number {
  const projectA = projectKeyOf(a);
  const projectB = projectKeyOf(b);
  if (projectA !== projectB) {
    return projectA < projectB ? -1 : 1;
  }
  return ticketNumberOf(a) - ticketNumberOf(b);
}

/**
 * Union of ticket keys across all commits
 */
export function collectTicketKeys(commits: readonly CommitRecord[]): string[] {
  const keys = new Set<string>();
  for (const commit of commits) {
    for (const key of extractTicketKeys(commit.message)) {
      keys.add(key);
    }
  }
  return Array.from(keys).sort(compareTicketKeys);
}
