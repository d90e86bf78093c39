import { describe, it, expect, vi } from 'vitest';
import type { LLMClient } from '../../src/llm/client';
import {
  buildProjectContext,
  createSummaryProducer,
  LLMSummaryProducer,
  parseSummaryResponse,
  RuleBasedSummaryProducer,
  summarizeProjects,
  truncate,
} from '../../src/llm/summarizer';
import { makeCommit, makeProject, makeTicket } from '../fixtures/domain';
import { createRecordingLogger } from '../fixtures/logger';

const llmConfig = {
  model: 'gemini-1.5-flash',
  maxTokens: 1024,
  maxSummaryLength: 500,
};

function threeCommitProject() {
  return makeProject({
    projectKey: 'OPS',
    projectName: 'Operations',
    ticketKeys: ['OPS-1'],
    tickets: [],
    commits: [
      makeCommit({ sha: '1', message: 'a' }),
      makeCommit({ sha: '2', message: 'b\n\nlonger body' }),
      makeCommit({ sha: '3', message: 'c' }),
    ],
  });
}

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
  });
});

describe('RuleBasedSummaryProducer', () => {
  it('builds the description from commit first lines when there are no tickets', async () => {
    // Arrange
    const producer = new RuleBasedSummaryProducer();

    // Act
    const summary = await producer.produce(threeCommitProject());

    // Assert
    expect(summary).toEqual({
      creativeWorkDescription: 'a; b; c',
      technicalSummary: 'Implemented 3 changes across 3 commits.',
    });
  });

  it('prefers distinct ticket summaries', () => {
    // Arrange
    const project = makeProject({
      tickets: [
        makeTicket({ key: 'PROJ-1', summary: 'Add login form' }),
        makeTicket({ key: 'PROJ-2', summary: 'Add login form' }),
        makeTicket({ key: 'PROJ-3', summary: 'Reset password' }),
      ],
      commits: [makeCommit()],
    });

    // Act
    const summary = new RuleBasedSummaryProducer().summarize(project);

    // Assert
    expect(summary.creativeWorkDescription).toBe('Add login form; Reset password');
    expect(summary.technicalSummary).toBe('Implemented 2 changes across 1 commit.');
  });

  it('falls back to a generic sentence when nothing else is available', () => {
    // Arrange
    const project = makeProject({
      projectName: 'Operations',
      tickets: [],
      commits: [makeCommit({ message: '   ' })],
    });

    // Act
    const summary = new RuleBasedSummaryProducer().summarize(project);

    // Assert
    expect(summary.creativeWorkDescription).toBe('Development work on Operations.');
    expect(summary.technicalSummary).toBe('Implemented 0 changes across 1 commit.');
  });

  it('truncates to the configured length', () => {
    // Arrange
    const project = makeProject({ tickets: [makeTicket({ summary: 'x'.repeat(100) })] });

    // Act
    const summary = new RuleBasedSummaryProducer(30).summarize(project);

    // Assert
    expect(summary.creativeWorkDescription).toBe(`${'x'.repeat(27)}...`);
  });
});

describe('parseSummaryResponse', () => {
  it('parses a JSON object', () => {
    expect(parseSummaryResponse('{"description":"Built it.","technical":"TypeScript."}')).toEqual({
      creativeWorkDescription: 'Built it.',
      technicalSummary: 'TypeScript.',
    });
  });

  it('unwraps a fenced code block', () => {
    // Arrange
    const response = '```json\n{"description":"D","technical":"T"}\n```';

    // Act & Assert
    expect(parseSummaryResponse(response)).toEqual({
      creativeWorkDescription: 'D',
      technicalSummary: 'T',
    });
  });

  it('returns null for text that is not the expected object', () => {
    expect(parseSummaryResponse('Sure! Here is a summary.')).toBeNull();
    expect(parseSummaryResponse('{"description":"only one field"}')).toBeNull();
    expect(parseSummaryResponse('{"description":"","technical":"T"}')).toBeNull();
  });
});

describe('buildProjectContext', () => {
  it('lists ticket summaries and commit subjects', () => {
    // Arrange
    const project = makeProject({
      tickets: [makeTicket({ key: 'PROJ-1', summary: 'Add login form', description: 'Line one\n\nline two' })],
      commits: [makeCommit({ message: 'PROJ-1: add form\n\nbody' })],
    });

    // Act
    const context = buildProjectContext(project);

    // Assert
    expect(context.split('\n')).toEqual([
      '## Project Project Alpha (PROJ)',
      'Statistics: 1 commit, 1 ticket',
      '',
      'Jira Ticket Summaries:',
      '- PROJ-1: Add login form',
      '',
      'Jira Ticket Descriptions:',
      '- PROJ-1: Line one line two',
      '',
      'Commit Messages:',
      '- PROJ-1: add form',
    ]);
  });

  it('caps the number of commit messages', () => {
    // Arrange
    const commits = Array.from({ length: 23 }, (_, i) =>
      makeCommit({ sha: String(i), message: `PROJ-1 change ${i}` })
    );

    // Act
    const context = buildProjectContext(makeProject({ commits }));

    // Assert
    expect(context).toContain('- PROJ-1 change 19');
    expect(context).not.toContain('- PROJ-1 change 20');
    expect(context.endsWith('... and 3 more commits')).toBe(true);
  });
});

describe('LLMSummaryProducer', () => {
  it('returns the parsed model response', async () => {
    // Arrange
    const complete = vi.fn().mockResolvedValue('{"description":"Built login.","technical":"OAuth."}');
    const producer = new LLMSummaryProducer({ complete });

    // Act
    const summary = await producer.produce(makeProject());

    // Assert
    expect(summary).toEqual({ creativeWorkDescription: 'Built login.', technicalSummary: 'OAuth.' });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0]?.[1]).toMatchObject({ temperature: 0.3, maxTokens: 1024, json: true });
  });

  it('falls back to the rule-based summary when the client fails', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const client: LLMClient = { complete: vi.fn().mockRejectedValue(new Error('quota exceeded')) };
    const producer = new LLMSummaryProducer(client, { logger });

    // Act
    const summary = await producer.produce(threeCommitProject());

    // Assert
    expect(summary).toEqual({
      creativeWorkDescription: 'a; b; c',
      technicalSummary: 'Implemented 3 changes across 3 commits.',
    });
    expect(logger.messages.warn).toEqual([
      'LLM error for OPS: quota exceeded; using rule-based summary',
    ]);
  });

  it('falls back when the response cannot be parsed', async () => {
    // Arrange
    const logger = createRecordingLogger();
    const producer = new LLMSummaryProducer(
      { complete: vi.fn().mockResolvedValue('not json') },
      { logger }
    );

    // Act
    const summary = await producer.produce(threeCommitProject());

    // Assert
    expect(summary.creativeWorkDescription).toBe('a; b; c');
    expect(logger.messages.warn).toEqual([
      'Unusable LLM response for OPS, using rule-based summary',
    ]);
  });
});

describe('createSummaryProducer', () => {
  it('uses the rule-based producer without an API key', () => {
    // Arrange
    const factory = vi.fn();

    // Act
    const producer = createSummaryProducer(llmConfig, undefined, factory);

    // Assert
    expect(producer.kind).toBe('rule-based');
    expect(factory).not.toHaveBeenCalled();
  });

  it('uses the model producer with an API key', () => {
    // Arrange
    const factory = vi.fn().mockReturnValue({ complete: vi.fn() });

    // Act
    const producer = createSummaryProducer({ ...llmConfig, apiKey: 'test-secret' }, undefined, factory);

    // Assert
    expect(producer.kind).toBe('model');
    expect(factory).toHaveBeenCalledWith('test-secret', 'gemini-1.5-flash');
  });
});

describe('summarizeProjects', () => {
  it('summarizes every project keyed by project key and reports progress', async () => {
    // Arrange
    const progress: string[] = [];
    const projects = [makeProject({ projectKey: 'A' }), makeProject({ projectKey: 'B' })];

    // Act
    const summaries = await summarizeProjects(projects, new RuleBasedSummaryProducer(), {
      delayMs: 1000,
      onProgress: (current, total) => progress.push(`${current}/${total}`),
    });

    // Assert
    expect([...summaries.keys()]).toEqual(['A', 'B']);
    expect(progress).toEqual(['1/2', '2/2']);
  });
});
