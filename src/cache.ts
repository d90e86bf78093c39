/**
 * Simple file-based cache for GitHub and Jira responses
 * One JSON file per key under the configured cache directory
 */

import { existsSync } from 'fs';
import { mkdir, readFile, readdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { silentLogger, type Logger } from './logger';

const CACHE_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours

interface CacheEntry<T> {
  data: T;
  timestamp: number;
  version: number;
}

const CACHE_VERSION = 1;

/**
 * Generate a cache key from parameters
 */
export function generateKey(prefix: string, params: Record<string, string>): string {
  const sortedParams = Object.entries(params)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join('&');

  // Create a simple hash
  const str = `${prefix}:${sortedParams}`;
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash; // Convert to 32bit integer
  }
  return `${prefix}_${Math.abs(hash).toString(16)}`;
}

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'data' in value &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'version' in value &&
    typeof value.version === 'number'
  );
}

export interface CacheOptions {
  enabled?: boolean;
  dir: string;
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Cache manager for storing and retrieving data
 */
export class Cache {
  private enabled: boolean;
  private dir: string;
  private ttlMs: number;
  private logger: Logger;
  private now: () => number;

  constructor(options: CacheOptions) {
    this.enabled = options.enabled ?? true;
    this.dir = options.dir;
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  private pathFor(key: string): string {
    return join(this.dir, `${key}.json`);
  }

  /**
   * Get cached data if available and not expired.
   * The caller owns the shape of T; entries are written only by set().
   */
  async get<T>(prefix: string, params: Record<string, string>): Promise<T | null> {
    if (!this.enabled) return null;

    const path = this.pathFor(generateKey(prefix, params));
    if (!existsSync(path)) return null;

    let entry: unknown;
    try {
      entry = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.verbose(`  Ignoring unreadable cache entry ${path}: ${message}`);
      return null;
    }

    if (!isCacheEntry(entry) || entry.version !== CACHE_VERSION) {
      return null;
    }

    if (this.now() - entry.timestamp > this.ttlMs) {
      return null;
    }

    return entry.data as T;
  }

  /**
   * Store data in cache. A failed write only costs a refetch next run.
   */
  async set<T>(prefix: string, params: Record<string, string>, data: T): Promise<void> {
    if (!this.enabled) return;

    const path = this.pathFor(generateKey(prefix, params));
    const entry: CacheEntry<T> = {
      data,
      timestamp: this.now(),
      version: CACHE_VERSION,
    };

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(path, JSON.stringify(entry));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not write cache entry ${path}: ${message}`);
    }
  }

  /**
   * Clear all cached data. Returns the number of entries removed.
   */
  async clear(): Promise<number> {
    if (!existsSync(this.dir)) return 0;

    const files = (await readdir(this.dir)).filter((file) => file.endsWith('.json'));
    await Promise.all(files.map((file) => unlink(join(this.dir, file))));
    return files.length;
  }

  /**
   * Check if caching is enabled
   */
  isEnabled(): boolean {
    return this.enabled;
  }
}
