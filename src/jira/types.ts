/**
 * Jira REST API (v2) response types
 */

export interface JiraNamedField {
  name: string;
}

export interface JiraProject {
  key: string;
  name: string;
}

export interface JiraIssue {
  key: string;
  fields: {
    summary: string | null;
    description: string | null;
    issuetype: JiraNamedField | null;
    status: JiraNamedField | null;
    project: JiraProject | null;
  };
}

export interface JiraErrorResponse {
  errorMessages?: string[];
  errors?: Record<string, string>;
}
