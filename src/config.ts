/**
 * Configuration management for creative-report CLI
 * Merges CLI flags, environment variables and an optional YAML file
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

export interface Config {
  github: {
    token: string;
    organizations: string[];
    repositories: string[];
    maxRetries: number;
  };
  jira: {
    url: string;
    email: string;
    apiToken: string;
    maxRetries: number;
  };
  llm: LLMConfig;
  report: {
    companyName: string;
    employeeName?: string;
    year: number;
    outputPath: string;
    hoursPerCommit: number;
    ctdAllocation: number;
    templatePath?: string;
  };
  cache: {
    enabled: boolean;
    dir: string;
  };
}

export interface LLMConfig {
  /** Absent when no model credential is configured */
  apiKey?: string;
  model: string;
  maxTokens: number;
  maxSummaryLength: number;
}

/**
 * Values given on the command line; they win over everything else
 */
export interface ConfigOverrides {
  year?: string;
  output?: string;
  githubToken?: string;
  jiraUrl?: string;
  jiraEmail?: string;
  jiraToken?: string;
  llmKey?: string;
  llmModel?: string;
  companyName?: string;
  employeeName?: string;
  organizations?: string[];
  repositories?: string[];
  config?: string;
  template?: string;
  cache?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG_PATH = join('config', 'config.yaml');
export const DEFAULT_LLM_MODEL = 'gemini-1.5-flash';
export const DEFAULT_CACHE_DIR = join(homedir(), '.creative-report-cache');

const optionalString = z.string().nullish();
const stringList = z.array(z.string()).nullish();

const fileConfigSchema = z
  .object({
    github: z
      .object({
        token: optionalString,
        organizations: stringList,
        repositories: stringList,
        max_retries: z.number().int().min(0).default(3),
      })
      .default({}),
    jira: z
      .object({
        url: optionalString,
        email: optionalString,
        api_token: optionalString,
        max_retries: z.number().int().min(0).default(3),
      })
      .default({}),
    llm: z
      .object({
        api_key: optionalString,
        model: z.string().default(DEFAULT_LLM_MODEL),
        max_tokens: z.number().int().positive().default(1024),
        max_summary_length: z.number().int().min(20).default(500),
      })
      .default({}),
    report: z
      .object({
        company_name: optionalString,
        employee_name: optionalString,
        default_year: z.number().int().nullish(),
        hours_per_commit: z.number().nonnegative().default(3),
        ctd_allocation: z.number().min(0).max(1).default(0.75),
        template_path: optionalString,
      })
      .default({}),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        dir: optionalString,
      })
      .default({}),
  })
  .default({});

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Read and validate the YAML config file. An explicitly named file must exist;
 * the default location is optional.
 */
export function loadConfigFile(path?: string): FileConfig {
  const explicit = path !== undefined;
  const configPath = resolve(path ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(configPath)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return fileConfigSchema.parse(undefined);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read config file ${configPath}: ${message}`);
  }

  const parsed = fileConfigSchema.safeParse(raw ?? undefined);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config file ${configPath}:\n${issues}`);
  }
  return parsed.data;
}

/**
 * Gets a trimmed environment variable, or undefined when unset or blank
 */
function env(name: string, source: NodeJS.ProcessEnv): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

/**
 * Expand a leading ~ to the home directory
 */
function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

/**
 * Cache directory named by a config file, else the default
 */
export function resolveCacheDir(file: FileConfig): string {
  return file.cache.dir ? expandHome(file.cache.dir) : DEFAULT_CACHE_DIR;
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function firstNonEmpty(...values: Array<string[] | null | undefined>): string[] {
  for (const value of values) {
    if (value && value.length > 0) return value;
  }
  return [];
}

/**
 * Parse and validate a report year
 */
export function parseYear(value: string | number): number {
  const year = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new ConfigError(`Invalid year: "${value}". Expected a four-digit year such as 2024.`);
  }
  return year;
}

/**
 * Loads configuration with precedence CLI > environment > file > defaults,
 * and checks that every required credential is present
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  source: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): Config {
  const file = loadConfigFile(overrides.config);

  const year = parseYear(
    overrides.year ?? file.report.default_year ?? now.getUTCFullYear()
  );

  const templatePath = overrides.template ?? file.report.template_path ?? undefined;
  if (templatePath && !existsSync(templatePath)) {
    throw new ConfigError(`Report template not found: ${templatePath}`);
  }

  const envOrgs = env('GITHUB_ORGANIZATIONS', source);
  const envRepos = env('GITHUB_REPOSITORIES', source);

  const config: Config = {
    github: {
      token: overrides.githubToken ?? env('GITHUB_TOKEN', source) ?? file.github.token ?? '',
      organizations: firstNonEmpty(
        overrides.organizations,
        envOrgs ? parseList(envOrgs) : undefined,
        file.github.organizations
      ),
      repositories: firstNonEmpty(
        overrides.repositories,
        envRepos ? parseList(envRepos) : undefined,
        file.github.repositories
      ),
      maxRetries: file.github.max_retries,
    },
    jira: {
      url: (overrides.jiraUrl ?? env('JIRA_URL', source) ?? file.jira.url ?? '').replace(/\/+$/, ''),
      email: overrides.jiraEmail ?? env('JIRA_EMAIL', source) ?? file.jira.email ?? '',
      apiToken: overrides.jiraToken ?? env('JIRA_API_TOKEN', source) ?? file.jira.api_token ?? '',
      maxRetries: file.jira.max_retries,
    },
    llm: {
      apiKey: overrides.llmKey ?? env('LLM_API_KEY', source) ?? file.llm.api_key ?? undefined,
      model: overrides.llmModel ?? env('LLM_MODEL', source) ?? file.llm.model,
      maxTokens: file.llm.max_tokens,
      maxSummaryLength: file.llm.max_summary_length,
    },
    report: {
      companyName:
        overrides.companyName ?? env('COMPANY_NAME', source) ?? file.report.company_name ?? '',
      employeeName:
        overrides.employeeName ?? env('EMPLOYEE_NAME', source) ?? file.report.employee_name ?? undefined,
      year,
      outputPath: overrides.output ?? `report_${year}.xlsx`,
      hoursPerCommit: file.report.hours_per_commit,
      ctdAllocation: file.report.ctd_allocation,
      templatePath,
    },
    cache: {
      enabled: overrides.cache !== false && file.cache.enabled,
      dir: resolveCacheDir(file),
    },
  };

  validateConfig(config);
  return config;
}

/**
 * Validates that every required credential is present.
 * Call this early to fail fast with clear error messages
 */
export function validateConfig(config: Config): void {
  const missing: string[] = [];

  if (!config.github.token) {
    missing.push('GITHUB_TOKEN (or --github-token)');
  }
  if (!config.jira.url) {
    missing.push('JIRA_URL (or --jira-url)');
  }
  if (!config.jira.email) {
    missing.push('JIRA_EMAIL (or --jira-email)');
  }
  if (!config.jira.apiToken) {
    missing.push('JIRA_API_TOKEN (or --jira-token)');
  }

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration:\n` +
      missing.map((v) => `  - ${v}`).join('\n') +
      `\n\nSet these in the environment, a .env file, the config file, or on the command line.`
    );
  }

  if (config.jira.url && !/^https?:\/\//.test(config.jira.url)) {
    throw new ConfigError(`Invalid JIRA_URL "${config.jira.url}": expected an http(s) URL`);
  }
}
