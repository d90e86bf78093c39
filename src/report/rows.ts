/**
 * Report row construction: one numbered row per project, in project key order
 */

import { sortedProjects } from '../domain/grouping';
import type { ProjectAggregate, ProjectSummaryText, ReportRow } from '../domain/models';

export interface ReportRowOptions {
  /** Estimated contracted hours per commit */
  hoursPerCommit: number;
}

export function buildReportRows(
  projects: ReadonlyMap<string, ProjectAggregate>,
  summaries: ReadonlyMap<string, ProjectSummaryText>,
  options: ReportRowOptions
): ReportRow[] {
  return sortedProjects(projects).map((project, index) => {
    const summary = summaries.get(project.projectKey);

    return {
      projectNumber: index + 1,
      projectKey: project.projectKey,
      projectName: project.projectName,
      creativeWorkDescription:
        summary?.creativeWorkDescription ?? `Development work on ${project.projectName}.`,
      technicalSummary: summary?.technicalSummary ?? '',
      timeAllocation: project.commits.length * options.hoursPerCommit,
    };
  });
}
