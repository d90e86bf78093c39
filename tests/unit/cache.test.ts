import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Cache, generateKey } from '../../src/cache';

describe('generateKey', () => {
  it('does not depend on parameter order', () => {
    expect(generateKey('commits', { year: '2024', login: 'tester' })).toBe(
      generateKey('commits', { login: 'tester', year: '2024' })
    );
  });

  it('differs for different parameters', () => {
    expect(generateKey('commits', { year: '2024' })).not.toBe(generateKey('commits', { year: '2023' }));
  });

  it('starts with the prefix', () => {
    expect(generateKey('tickets', { keys: 'A-1' }).startsWith('tickets_')).toBe(true);
  });
});

describe('Cache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'creative-report-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns stored data', async () => {
    // Arrange
    const cache = new Cache({ dir });

    // Act
    await cache.set('commits', { year: '2024' }, { total: 3 });
    const value = await cache.get<{ total: number }>('commits', { year: '2024' });

    // Assert
    expect(value).toEqual({ total: 3 });
  });

  it('creates the cache directory on first write', async () => {
    // Arrange
    const nested = join(dir, 'nested');
    const cache = new Cache({ dir: nested });

    // Act
    await cache.set('commits', { year: '2024' }, []);

    // Assert
    expect(await readdir(nested)).toHaveLength(1);
  });

  it('misses for unknown keys', async () => {
    const cache = new Cache({ dir });
    expect(await cache.get('commits', { year: '1999' })).toBeNull();
  });

  it('expires entries after the TTL', async () => {
    // Arrange
    let now = 1_000;
    const cache = new Cache({ dir, ttlMs: 100, now: () => now });
    await cache.set('commits', { year: '2024' }, 'data');

    // Act
    now = 1_200;
    const value = await cache.get('commits', { year: '2024' });

    // Assert
    expect(value).toBeNull();
  });

  it('ignores unreadable entries', async () => {
    // Arrange
    const cache = new Cache({ dir });
    await writeFile(join(dir, `${generateKey('commits', { year: '2024' })}.json`), '{not json');

    // Act & Assert
    expect(await cache.get('commits', { year: '2024' })).toBeNull();
  });

  it('does nothing when disabled', async () => {
    // Arrange
    const cache = new Cache({ dir, enabled: false });

    // Act
    await cache.set('commits', { year: '2024' }, 'data');

    // Assert
    expect(await cache.get('commits', { year: '2024' })).toBeNull();
    expect(await readdir(dir)).toEqual([]);
    expect(cache.isEnabled()).toBe(false);
  });

  it('clears every entry', async () => {
    // Arrange
    const cache = new Cache({ dir });
    await cache.set('commits', { year: '2024' }, 1);
    await cache.set('tickets', { keys: 'A-1' }, 2);

    // Act
    const removed = await cache.clear();

    // Assert
    expect(removed).toBe(2);
    expect(await readdir(dir)).toEqual([]);
  });
});
