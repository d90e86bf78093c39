import { describe, it, expect } from 'vitest';
import { buildReportRows } from '../../src/report/rows';
import { makeCommit, makeProject } from '../fixtures/domain';

describe('buildReportRows', () => {
  it('numbers projects in key order and estimates time from commits', () => {
    // Arrange
    const projects = new Map([
      ['ZED', makeProject({ projectKey: 'ZED', projectName: 'Zed', commits: [makeCommit()] })],
      [
        'ABC',
        makeProject({
          projectKey: 'ABC',
          projectName: 'Abc',
          commits: [makeCommit({ sha: '1' }), makeCommit({ sha: '2' })],
        }),
      ],
    ]);
    const summaries = new Map([
      ['ABC', { creativeWorkDescription: 'Built ABC.', technicalSummary: 'Node.' }],
      ['ZED', { creativeWorkDescription: 'Built Zed.', technicalSummary: 'SQL.' }],
    ]);

    // Act
    const rows = buildReportRows(projects, summaries, { hoursPerCommit: 3 });

    // Assert
    expect(rows).toEqual([
      {
        projectNumber: 1,
        projectKey: 'ABC',
        projectName: 'Abc',
        creativeWorkDescription: 'Built ABC.',
        technicalSummary: 'Node.',
        timeAllocation: 6,
      },
      {
        projectNumber: 2,
        projectKey: 'ZED',
        projectName: 'Zed',
        creativeWorkDescription: 'Built Zed.',
        technicalSummary: 'SQL.',
        timeAllocation: 3,
      },
    ]);
  });

  it('fills a default description when a project has no summary', () => {
    // Arrange
    const projects = new Map([['PROJ', makeProject()]]);

    // Act
    const [row] = buildReportRows(projects, new Map(), { hoursPerCommit: 2 });

    // Assert
    expect(row?.creativeWorkDescription).toBe('Development work on Project Alpha.');
    expect(row?.technicalSummary).toBe('');
    expect(row?.timeAllocation).toBe(2);
  });

  it('returns no rows for no projects', () => {
    expect(buildReportRows(new Map(), new Map(), { hoursPerCommit: 3 })).toEqual([]);
  });
});
