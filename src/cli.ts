/**
 * CLI command definitions and orchestration
 * Uses commander for argument parsing
 */

import { Command } from 'commander';
import { Cache } from './cache';
import { collectCommits, collectTickets, type CommitSource, type TicketSource } from './collectors';
import {
  ConfigError,
  loadConfig,
  loadConfigFile,
  parseList,
  resolveCacheDir,
  type Config,
  type ConfigOverrides,
} from './config';
import { createFilterConfig, describeFilter } from './domain/filter';
import { calculateStats, deduplicateCommits, groupByProject, sortedProjects } from './domain/grouping';
import type { GroupingResult, ReportHeader, RunAnnotations } from './domain/models';
import { collectTicketKeys, projectKeyOf } from './domain/ticket-keys';
import { GitHubClient, GitHubClientError, type AuthenticatedUser } from './github/client';
import { JiraClient, JiraClientError } from './jira/client';
import { createSummaryProducer, summarizeProjects, type SummaryProducer } from './llm/summarizer';
import { createLogger, type Logger } from './logger';
import { ExcelReportWriter, ReportWriteError, type ReportWriter } from './report/excel';
import { buildReportRows } from './report/rows';

export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  ConfigError: 2,
  CollaboratorError: 3,
  WriteError: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/** Pause between language model calls */
const SUMMARY_DELAY_MS = 500;

export interface GenerateOptions extends ConfigOverrides {
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * External services used by a report run
 */
export interface Collaborators {
  github: CommitSource & {
    getAuthenticatedUser(): Promise<AuthenticatedUser>;
  };
  jira: TicketSource & {
    fetchProjectNames(projectKeys: readonly string[]): Promise<Map<string, string>>;
  };
  summarizer: SummaryProducer;
  writer: ReportWriter;
  cache: Cache;
}

export type CollaboratorFactory = (config: Config, logger: Logger) => Collaborators;

export interface RunDependencies {
  createCollaborators?: CollaboratorFactory;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

/**
 * Build the real GitHub, Jira, summary and spreadsheet collaborators
 */
export function createCollaborators(config: Config, logger: Logger): Collaborators {
  return {
    github: new GitHubClient(config.github.token, {
      maxRetries: config.github.maxRetries,
      logger,
    }),
    jira: new JiraClient(
      { baseUrl: config.jira.url, email: config.jira.email, apiToken: config.jira.apiToken },
      { maxRetries: config.jira.maxRetries, logger }
    ),
    summarizer: createSummaryProducer(config.llm, logger),
    writer: new ExcelReportWriter({
      templatePath: config.report.templatePath,
      ctdAllocation: config.report.ctdAllocation,
    }),
    cache: new Cache({ enabled: config.cache.enabled, dir: config.cache.dir, logger }),
  };
}

/**
 * Collect repeatable list options, splitting comma-separated values
 */
function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...parseList(value)];
}

/**
 * Print grouped projects for dry-run mode
 */
function printGroups(result: GroupingResult, logger: Logger): void {
  logger.log('\n📋 Projects Found:\n');

  for (const project of sortedProjects(result.projects)) {
    logger.log(`\n## ${project.projectName} (${project.projectKey})`);
    logger.log(`  Tickets: ${project.ticketKeys.join(', ')}`);
    for (const commit of project.commits) {
      const subject = commit.message.split('\n')[0] ?? '';
      logger.log(`  - ${commit.authorDate.slice(0, 10)} ${commit.repositoryFullName}@${commit.sha.slice(0, 7)}: ${subject}`);
    }
  }

  logger.log(`\n\nTotal: ${result.projects.size} projects, ${result.unlinkedCommits.length} unlinked commits`);
  logger.log('\nRun without --dry-run to write the report.');
}

/**
 * Report an error and map it to an exit code
 */
function handleError(error: unknown, logger: Logger): ExitCodeValue {
  logger.log('');

  if (error instanceof ConfigError) {
    logger.error(`Configuration Error:\n${error.message}`);
    return ExitCode.ConfigError;
  }

  if (error instanceof GitHubClientError) {
    logger.error(`GitHub API Error: ${error.message}`);
    if (error.statusCode === 401) {
      logger.error('  Check that your GITHUB_TOKEN is valid.');
    } else if (error.rateLimited) {
      logger.error('  Rate limit retries exhausted. Try again later.');
    }
    return ExitCode.CollaboratorError;
  }

  if (error instanceof JiraClientError) {
    logger.error(`Jira API Error: ${error.message}`);
    if (error.statusCode === 401) {
      logger.error('  Check JIRA_EMAIL and JIRA_API_TOKEN.');
    }
    return ExitCode.CollaboratorError;
  }

  if (error instanceof ReportWriteError) {
    logger.error(`Report Error: ${error.message}`);
    logger.error('  Fetched data is cached; rerun to rebuild the report without refetching.');
    return ExitCode.WriteError;
  }

  if (error instanceof Error) {
    logger.error(`Error: ${error.message}`);
  } else {
    logger.error('An unexpected error occurred');
  }
  return ExitCode.Unexpected;
}

/**
 * Run the generate command and return its exit code
 */
export async function runReport(
  options: GenerateOptions,
  dependencies: RunDependencies = {}
): Promise<ExitCodeValue> {
  const logger = dependencies.logger ?? createLogger(options);
  const makeCollaborators = dependencies.createCollaborators ?? createCollaborators;

  try {
    // Everything that can be wrong locally fails here, before any request
    const config = loadConfig(options, dependencies.env, dependencies.now);
    const filter = createFilterConfig(config.github.organizations, config.github.repositories);

    logger.log('');
    logger.log('╔════════════════════════════════════════╗');
    logger.log('║        Creative Work Report            ║');
    logger.log('╚════════════════════════════════════════╝');
    logger.log('');
    logger.log(`Year: ${config.report.year}`);
    logger.log(`Filter: ${describeFilter(filter)}`);
    if (options.dryRun) {
      logger.log('Mode: Dry run (no summaries, no file)');
    } else {
      logger.log(`Output: ${config.report.outputPath}`);
    }
    const { github, jira, summarizer, writer, cache } = makeCollaborators(config, logger);
    if (!cache.isEnabled()) {
      logger.log('Cache: Disabled');
    }
    logger.log('');

    // Step 1: Commits
    logger.log('📥 Fetching commits from GitHub...');
    const user = await github.getAuthenticatedUser();
    logger.verbose(`  Authenticated as ${user.login}`);

    const collection = await collectCommits(github, cache, {
      year: config.report.year,
      login: user.login,
      filter,
    });
    if (collection.fromCache) {
      logger.log('  (commits loaded from cache)');
    }
    const commits = deduplicateCommits(collection.commits);
    logger.log(`Found ${commits.length} commits in ${collection.repositoriesScanned} repositories`);

    for (const skipped of collection.skippedOrganizations) {
      logger.warn(`Skipped organization ${skipped.name}: ${skipped.reason}`);
    }
    for (const skipped of collection.skippedRepositories) {
      logger.verbose(`  Skipped repository ${skipped.name}: ${skipped.reason}`);
    }
    logger.log('');

    // Step 2: Tickets
    const ticketKeys = collectTicketKeys(commits);
    logger.log(`🎫 Fetching ${ticketKeys.length} tickets from Jira...`);
    const ticketCollection = await collectTickets(jira, cache, ticketKeys, (current, total) => {
      logger.progress(`\r  Fetching tickets: ${current}/${total}...`);
    });
    if (ticketKeys.length > 0) {
      logger.progress('\n');
    }

    const resolvedProjects = new Set(
      [...ticketCollection.tickets.values()].map((ticket) => ticket.projectKey)
    );
    const unnamedProjects = [...new Set(ticketKeys.map(projectKeyOf))].filter(
      (key) => !resolvedProjects.has(key)
    );
    const projectNames =
      unnamedProjects.length > 0 ? await jira.fetchProjectNames(unnamedProjects) : new Map<string, string>();
    logger.log('');

    // Step 3: Group
    logger.log('📊 Grouping commits by project...');
    const grouping = groupByProject(commits, ticketCollection.tickets, projectNames);
    const stats = calculateStats(grouping);
    logger.log(`Grouped into ${stats.totalProjects} projects`);
    if (stats.unlinkedCommits > 0) {
      logger.warn(`${stats.unlinkedCommits} commits reference no ticket key`);
    }
    if (grouping.unresolvedTicketKeys.length > 0) {
      logger.warn(`Unresolved ticket keys: ${grouping.unresolvedTicketKeys.join(', ')}`);
    }
    logger.log('');

    if (options.dryRun) {
      printGroups(grouping, logger);
      return ExitCode.Success;
    }

    // Step 4: Summaries
    const projects = sortedProjects(grouping.projects);
    logger.log(
      summarizer.kind === 'model'
        ? '🤖 Summarizing projects with Gemini...'
        : '📝 Summarizing projects (rule-based, no LLM_API_KEY)...'
    );
    const summaries = await summarizeProjects(projects, summarizer, {
      delayMs: SUMMARY_DELAY_MS,
      onProgress: (current, total) => {
        logger.progress(`\r  Summarizing: ${current}/${total}...`);
      },
    });
    if (projects.length > 0) {
      logger.progress('\n');
    }
    logger.log('');

    // Step 5: Report
    logger.log('📝 Writing report...');
    const rows = buildReportRows(grouping.projects, summaries, {
      hoursPerCommit: config.report.hoursPerCommit,
    });
    const header: ReportHeader = {
      employeeName: config.report.employeeName ?? user.name ?? user.login,
      companyName: config.report.companyName,
      year: config.report.year,
    };
    const annotations: RunAnnotations = {
      totalCommits: commits.length,
      unlinkedCommits: stats.unlinkedCommits,
      unresolvedTicketKeys: grouping.unresolvedTicketKeys,
      skippedOrganizations: collection.skippedOrganizations,
      skippedRepositories: collection.skippedRepositories,
      summaryStrategy: summarizer.kind,
    };
    await writer.write(rows, header, annotations, config.report.outputPath);
    logger.log(`Report written to: ${config.report.outputPath}`);
    logger.log('');

    // Print summary
    logger.log('╔════════════════════════════════════════╗');
    logger.log('║              Summary                   ║');
    logger.log('╠════════════════════════════════════════╣');
    logger.log(`║  Projects:    ${String(stats.totalProjects).padEnd(24)}║`);
    logger.log(`║  Commits:     ${String(commits.length).padEnd(24)}║`);
    logger.log(`║  Tickets:     ${String(stats.resolvedTickets).padEnd(24)}║`);
    logger.log(`║  Unlinked:    ${String(stats.unlinkedCommits).padEnd(24)}║`);
    logger.log('╚════════════════════════════════════════╝');
    logger.log('');
    logger.log('✅ Done!');

    return ExitCode.Success;
  } catch (error) {
    return handleError(error, logger);
  }
}

/**
 * Remove cached responses, honoring a configured cache dir
 */
export async function runClearCache(
  options: { config?: string },
  logger: Logger = createLogger()
): Promise<ExitCodeValue> {
  try {
    const file = loadConfigFile(options.config);
    const cache = new Cache({ dir: resolveCacheDir(file), logger });
    const removed = await cache.clear();
    logger.log(`Cache cleared (${removed} entries).`);
    return ExitCode.Success;
  } catch (error) {
    return handleError(error, logger);
  }
}

/**
 * Create the CLI program. Dependencies are passed to every generate run.
 */
export function createProgram(dependencies: RunDependencies = {}): Command {
  const program = new Command();

  program
    .name('creative-report')
    .description('Generate a yearly Creative Work Report from GitHub commits and Jira tickets')
    .version('1.0.0');

  program
    .command('generate')
    .description('Generate the report for the authenticated GitHub user')
    .option('--year <year>', 'Report year (default: config default_year, else the current year)')
    .option('-o, --output <file>', 'Output file path (default: report_<year>.xlsx)')
    .option('--github-token <token>', 'GitHub token (default: GITHUB_TOKEN)')
    .option('--jira-url <url>', 'Jira base URL (default: JIRA_URL)')
    .option('--jira-email <email>', 'Jira account email (default: JIRA_EMAIL)')
    .option('--jira-token <token>', 'Jira API token (default: JIRA_API_TOKEN)')
    .option('--llm-key <key>', 'Gemini API key (default: LLM_API_KEY); without one, summaries are rule-based')
    .option('--llm-model <model>', 'Gemini model (default: LLM_MODEL, else gemini-1.5-flash)')
    .option('--company-name <name>', 'Company name for the report header')
    .option('--employee-name <name>', 'Employee name for the report header (default: GitHub profile name)')
    .option('--organizations <names>', 'Organizations to include (repeatable, comma-separated)', collectList)
    .option(
      '--repositories <names>',
      'Repositories to include as org/repo or repo (repeatable, comma-separated); overrides --organizations',
      collectList
    )
    .option('-c, --config <file>', 'YAML config file (default: config/config.yaml if present)')
    .option('--template <file>', 'XLSX template with a CreativeTime sheet')
    .option('--dry-run', 'Show grouped projects without summarizing or writing a file')
    .option('--no-cache', 'Disable caching of GitHub and Jira responses')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Minimal output')
    .action(async (options: GenerateOptions) => {
      process.exitCode = await runReport(options, dependencies);
    });

  program
    .command('clear-cache')
    .description('Clear cached GitHub and Jira responses')
    .option('-c, --config <file>', 'YAML config file naming the cache dir')
    .action(async (options: { config?: string }) => {
      process.exitCode = await runClearCache(options, dependencies.logger);
    });

  return program;
}
