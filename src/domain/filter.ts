/**
 * Repository filtering by organization or repository name
 *
 * A non-empty repositories list takes precedence: organizations are then
 * ignored entirely, not combined with it.
 */

import { ConfigError } from '../config';
import type { FilterConfig, FilterRule } from './models';

function normalizeOrganization(entry: string): string {
  const value = entry.trim().toLowerCase();
  if (value === '') {
    throw new ConfigError('Invalid organization filter: entries must not be empty');
  }
  if (value.includes('/')) {
    throw new ConfigError(
      `Invalid organization filter "${entry}": organization names cannot contain "/"`
    );
  }
  return value;
}

function normalizeRepository(entry: string): string {
  const value = entry.trim().toLowerCase();
  const parts = value.split('/');
  if (value === '' || parts.length > 2 || parts.some((part) => part === '')) {
    throw new ConfigError(
      `Invalid repository filter "${entry}": expected "org/repo" or "repo"`
    );
  }
  return value;
}

/**
 * Build a validated, lower-cased filter configuration
 */
export function createFilterConfig(
  organizations: readonly string[] = [],
  repositories: readonly string[] = []
): FilterConfig {
  return {
    organizations: new Set(organizations.map(normalizeOrganization)),
    repositories: new Set(repositories.map(normalizeRepository)),
  };
}

/**
 * Decide which rule a filter configuration applies
 */
export function decideFilterRule(config: FilterConfig): FilterRule {
  if (config.repositories.size > 0) return 'repositories';
  if (config.organizations.size > 0) return 'organizations';
  return 'none';
}

function splitFullName(fullName: string): { owner: string; name: string } {
  const lower = fullName.toLowerCase();
  const index = lower.indexOf('/');
  if (index === -1) {
    return { owner: '', name: lower };
  }
  return { owner: lower.slice(0, index), name: lower.slice(index + 1) };
}

function matchesRepositoryEntry(fullName: string, entry: string): boolean {
  if (entry.includes('/')) {
    return entry === fullName.toLowerCase();
  }
  return entry === splitFullName(fullName).name;
}

/**
 * Whether a repository ("org/repo") passes the filter
 */
export function isRepositoryIncluded(fullName: string, config: FilterConfig): boolean {
  switch (decideFilterRule(config)) {
    case 'repositories':
      for (const entry of config.repositories) {
        if (matchesRepositoryEntry(fullName, entry)) return true;
      }
      return false;
    case 'organizations':
      return config.organizations.has(splitFullName(fullName).owner);
    case 'none':
      return true;
  }
}

/**
 * Repository entries that match none of the given repositories
 */
export function unmatchedRepositoryEntries(
  fullNames: readonly string[],
  config: FilterConfig
): string[] {
  return Array.from(config.repositories).filter(
    (entry) => !fullNames.some((fullName) => matchesRepositoryEntry(fullName, entry))
  );
}

/**
 * Organizations whose repositories are listed explicitly, which only the
 * organizations rule asks for
 */
export function organizationsToScan(config: FilterConfig): string[] {
  return decideFilterRule(config) === 'organizations' ? Array.from(config.organizations) : [];
}

/**
 * Human-readable description of the active filter
 */
export function describeFilter(config: FilterConfig): string {
  switch (decideFilterRule(config)) {
    case 'repositories':
      return `repositories: ${Array.from(config.repositories).join(', ')}`;
    case 'organizations':
      return `organizations: ${Array.from(config.organizations).join(', ')}`;
    case 'none':
      return 'none (all accessible repositories)';
  }
}
