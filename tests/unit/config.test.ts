import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, loadConfigFile, parseList, parseYear } from '../../src/config';

const credentials: NodeJS.ProcessEnv = {
  GITHUB_TOKEN: 'test-github-token',
  JIRA_URL: 'https://jira.example.com/',
  JIRA_EMAIL: 'user@example.com',
  JIRA_API_TOKEN: 'test-secret',
};

const now = new Date('2023-06-01T00:00:00Z');

describe('parseList', () => {
  it('splits, trims and drops empty entries', () => {
    expect(parseList(' acme, tools ,,web ')).toEqual(['acme', 'tools', 'web']);
  });
});

describe('parseYear', () => {
  it('accepts four-digit years', () => {
    expect(parseYear('2024')).toBe(2024);
    expect(parseYear(1999)).toBe(1999);
  });

  it('rejects anything else', () => {
    expect(() => parseYear('abc')).toThrow(ConfigError);
    expect(() => parseYear('2024.5')).toThrow(ConfigError);
    expect(() => parseYear('12')).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  it('reads credentials from the environment and applies defaults', () => {
    // Act
    const config = loadConfig({}, credentials, now);

    // Assert
    expect(config.github.token).toBe('test-github-token');
    expect(config.jira.url).toBe('https://jira.example.com');
    expect(config.report.year).toBe(2023);
    expect(config.report.outputPath).toBe('report_2023.xlsx');
    expect(config.report.hoursPerCommit).toBe(3);
    expect(config.report.ctdAllocation).toBe(0.75);
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.llm.model).toBe('gemini-1.5-flash');
    expect(config.cache.enabled).toBe(true);
  });

  it('prefers command line values over the environment', () => {
    // Act
    const config = loadConfig(
      { githubToken: 'cli-token', year: '2021', output: 'out.xlsx', organizations: ['cli-org'] },
      { ...credentials, GITHUB_ORGANIZATIONS: 'env-org' },
      now
    );

    // Assert
    expect(config.github.token).toBe('cli-token');
    expect(config.report.year).toBe(2021);
    expect(config.report.outputPath).toBe('out.xlsx');
    expect(config.github.organizations).toEqual(['cli-org']);
  });

  it('parses comma lists from the environment', () => {
    // Act
    const config = loadConfig(
      {},
      { ...credentials, GITHUB_ORGANIZATIONS: 'acme, tools', GITHUB_REPOSITORIES: 'acme/web' },
      now
    );

    // Assert
    expect(config.github.organizations).toEqual(['acme', 'tools']);
    expect(config.github.repositories).toEqual(['acme/web']);
  });

  it('names every missing credential', () => {
    expect(() => loadConfig({}, {}, now)).toThrow(
      'Missing required configuration:\n' +
        '  - GITHUB_TOKEN (or --github-token)\n' +
        '  - JIRA_URL (or --jira-url)\n' +
        '  - JIRA_EMAIL (or --jira-email)\n' +
        '  - JIRA_API_TOKEN (or --jira-token)'
    );
  });

  it('rejects a Jira URL that is not http(s)', () => {
    expect(() => loadConfig({ jiraUrl: 'jira.example.com' }, credentials, now)).toThrow(
      'Invalid JIRA_URL "jira.example.com": expected an http(s) URL'
    );
  });

  it('rejects an invalid year', () => {
    expect(() => loadConfig({ year: 'next' }, credentials, now)).toThrow(ConfigError);
  });

  it('disables the cache when asked', () => {
    expect(loadConfig({ cache: false }, credentials, now).cache.enabled).toBe(false);
  });

  it('rejects a missing template', () => {
    expect(() => loadConfig({ template: '/nonexistent/template.xlsx' }, credentials, now)).toThrow(
      'Report template not found: /nonexistent/template.xlsx'
    );
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'creative-report-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads YAML values below the environment', async () => {
    // Arrange
    const path = join(dir, 'config.yaml');
    await writeFile(
      path,
      [
        'github:',
        '  token: file-token',
        '  organizations: [file-org]',
        'report:',
        '  company_name: File Co',
        '  default_year: 2022',
        '  hours_per_commit: 2',
        'llm:',
        '  model: gemini-1.5-pro',
      ].join('\n')
    );

    // Act
    const config = loadConfig({ config: path }, { ...credentials, GITHUB_TOKEN: undefined }, now);

    // Assert
    expect(config.github.token).toBe('file-token');
    expect(config.github.organizations).toEqual(['file-org']);
    expect(config.report.companyName).toBe('File Co');
    expect(config.report.year).toBe(2022);
    expect(config.report.outputPath).toBe('report_2022.xlsx');
    expect(config.report.hoursPerCommit).toBe(2);
    expect(config.llm.model).toBe('gemini-1.5-pro');
  });

  it('accepts an empty file', async () => {
    // Arrange
    const path = join(dir, 'empty.yaml');
    await writeFile(path, '');

    // Act
    const file = loadConfigFile(path);

    // Assert
    expect(file.report.hours_per_commit).toBe(3);
    expect(file.cache.enabled).toBe(true);
  });

  it('rejects values outside their range', async () => {
    // Arrange
    const path = join(dir, 'bad.yaml');
    await writeFile(path, 'report:\n  ctd_allocation: 2\n');

    // Act & Assert
    expect(() => loadConfigFile(path)).toThrow(`Invalid config file ${path}:`);
  });

  it('rejects malformed YAML', async () => {
    // Arrange
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'github: [unclosed');

    // Act & Assert
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });

  it('requires an explicitly named file to exist', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadConfigFile(path)).toThrow(`Config file not found: ${path}`);
  });
});
