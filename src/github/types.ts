/**
 * GitHub API response types
 * These types represent the raw responses from GitHub's REST API
 */

/**
 * Authenticated user (GET /user)
 */
export interface GitHubUser {
  login: string;
  id: number;
  name: string | null;
  html_url: string;
}

/**
 * GitHub repository owner
 */
export interface GitHubOwner {
  login: string;
  id: number;
  type: string;
}

/**
 * GitHub repository response
 */
export interface GitHubRepository {
  id: number;
  name: string;
  full_name: string;
  owner: GitHubOwner;
  html_url: string;
  default_branch: string;
  private: boolean;
  fork: boolean;
}

/**
 * GitHub commit author/committer
 */
export interface GitHubCommitAuthor {
  name: string;
  email: string;
  date: string;
}

/**
 * GitHub commit details
 */
export interface GitHubCommitDetails {
  author: GitHubCommitAuthor | null;
  committer: GitHubCommitAuthor | null;
  message: string;
}

/**
 * GitHub commit response
 */
export interface GitHubCommit {
  sha: string;
  commit: GitHubCommitDetails;
  html_url: string;
}

/**
 * GitHub API error response
 */
export interface GitHubError {
  message: string;
  documentation_url?: string;
}

/**
 * Pagination info from Link header
 */
export interface PaginationInfo {
  next?: string;
  prev?: string;
  first?: string;
  last?: string;
}
