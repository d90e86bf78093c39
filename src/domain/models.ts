/**
 * Domain models for the creative-report CLI tool
 */

/**
 * A commit authored by the user, as fetched from GitHub
 */
export interface CommitRecord {
  repositoryFullName: string;
  sha: string;
  message: string;
  /** ISO-8601 timestamp of the author date */
  authorDate: string;
  author: string;
  url: string;
}

/**
 * Jira ticket details for a key referenced by at least one commit
 */
export interface TicketDetail {
  key: string;
  /** PROJECT segment of the key that referenced this ticket */
  projectKey: string;
  projectName: string;
  summary: string;
  description: string;
  issueType: string;
  status: string;
  url: string;
}

/**
 * All work linked to one Jira project
 */
export interface ProjectAggregate {
  projectKey: string;
  projectName: string;
  /** Sorted by author date, ties kept in fetch order */
  commits: CommitRecord[];
  /** Distinct keys, sorted by ticket number */
  ticketKeys: string[];
  /** Resolved details, in ticketKeys order */
  tickets: TicketDetail[];
}

/**
 * Repository filters, lower-cased
 */
export interface FilterConfig {
  organizations: ReadonlySet<string>;
  /** Each entry is either "org/repo" or a bare "repo" */
  repositories: ReadonlySet<string>;
}

/**
 * Which filter rule applies for a FilterConfig
 */
export type FilterRule = 'repositories' | 'organizations' | 'none';

/**
 * An organization or repository the collector could not read
 */
export interface SkippedSource {
  name: string;
  reason: string;
}

/**
 * Result of collecting a year of commits
 */
export interface CommitCollection {
  commits: CommitRecord[];
  repositoriesScanned: number;
  skippedOrganizations: SkippedSource[];
  skippedRepositories: SkippedSource[];
}

/**
 * Result of resolving ticket keys against Jira
 */
export interface TicketCollection {
  tickets: Map<string, TicketDetail>;
  unresolvedKeys: string[];
}

/**
 * Output of the project grouper
 */
export interface GroupingResult {
  projects: Map<string, ProjectAggregate>;
  /** Commits that reference no ticket key */
  unlinkedCommits: CommitRecord[];
  /** Referenced keys with no ticket details */
  unresolvedTicketKeys: string[];
}

/**
 * Summary text for one project
 */
export interface ProjectSummaryText {
  creativeWorkDescription: string;
  technicalSummary: string;
}

/**
 * One project entry in the spreadsheet
 */
export interface ReportRow {
  projectNumber: number;
  projectKey: string;
  projectName: string;
  creativeWorkDescription: string;
  technicalSummary: string;
  /** Estimated contracted hours for the project */
  timeAllocation: number;
}

/**
 * Report header metadata
 */
export interface ReportHeader {
  employeeName: string;
  companyName: string;
  year: number;
}

/**
 * Completeness counts written alongside the report
 */
export interface RunAnnotations {
  totalCommits: number;
  unlinkedCommits: number;
  unresolvedTicketKeys: string[];
  skippedOrganizations: SkippedSource[];
  skippedRepositories: SkippedSource[];
  summaryStrategy: 'model' | 'rule-based';
}
