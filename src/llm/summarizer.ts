/**
 * Project summarizers
 * Turn a project's commits and tickets into report text, with a language
 * model when one is configured and a rule-based summary otherwise
 */

import { z } from 'zod';
import type { LLMConfig } from '../config';
import type { ProjectAggregate, ProjectSummaryText } from '../domain/models';
import { silentLogger, type Logger } from '../logger';
import { createLLMClient, type LLMClient } from './client';

/**
 * Interface for project summarization
 */
export interface SummaryProducer {
  readonly kind: 'model' | 'rule-based';
  /** Never rejects */
  produce(project: ProjectAggregate): Promise<ProjectSummaryText>;
}

/**
 * System prompt for project summaries
 */
const SYSTEM_PROMPT = `You are a technical writer creating professional summaries of software development work for a Creative Work Report.

You will be given a project's Jira tickets and commit messages. Analyze the work and describe it.

Respond ONLY with a valid JSON object in the following format:
{
  "description": "2-4 sentences describing the creative work accomplished: specific features, improvements, or fixes, in business-friendly language",
  "technical": "1-2 sentences summarizing key technologies, patterns, or technical achievements"
}

Be specific and concrete. Avoid generic phrases like "various improvements".
Do NOT include any text outside the JSON object. Do NOT use markdown code blocks.`;

const summaryResponseSchema = z.object({
  description: z.string().trim().min(1),
  technical: z.string().trim().min(1),
});

/**
 * Shorten text to a maximum length, marking the cut with an ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

/**
 * First line of a commit message
 */
export function firstLine(message: string): string {
  return (message.split('\n')[0] ?? '').trim();
}

function distinct(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  }
  return result;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Build context string from project data for the LLM.
 * Sizes are bounded to keep the prompt small.
 */
export function buildProjectContext(project: ProjectAggregate): string {
  const parts: string[] = [];

  parts.push(`## Project ${project.projectName} (${project.projectKey})`);
  parts.push(`Statistics: ${plural(project.commits.length, 'commit')}, ${plural(project.ticketKeys.length, 'ticket')}`);

  const summaries = distinct(project.tickets.map((t) => `${t.key}: ${t.summary}`));
  if (summaries.length > 0) {
    parts.push('\nJira Ticket Summaries:');
    for (const summary of summaries.slice(0, 10)) {
      parts.push(`- ${summary}`);
    }
  }

  const descriptions = project.tickets.filter((t) => t.description.trim()).slice(0, 5);
  if (descriptions.length > 0) {
    parts.push('\nJira Ticket Descriptions:');
    for (const ticket of descriptions) {
      const description = ticket.description.replace(/\s+/g, ' ').trim();
      parts.push(`- ${ticket.key}: ${truncate(description, 200)}`);
    }
  }

  const messages = distinct(project.commits.map((c) => firstLine(c.message)));
  if (messages.length > 0) {
    parts.push('\nCommit Messages:');
    for (const message of messages.slice(0, 20)) {
      parts.push(`- ${truncate(message, 150)}`);
    }
    if (messages.length > 20) {
      parts.push(`... and ${messages.length - 20} more commits`);
    }
  }

  return parts.join('\n');
}

/**
 * Parse the LLM response into summary text, or null if it is unusable
 */
export function parseSummaryResponse(response: string): ProjectSummaryText | null {
  let jsonStr = response.trim();

  // Handle case where LLM wraps in code blocks
  const codeBlockMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (codeBlockMatch?.[1]) {
    jsonStr = codeBlockMatch[1];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonStr);
  } catch {
    return null;
  }

  const parsed = summaryResponseSchema.safeParse(raw);
  if (!parsed.success) return null;

  return {
    creativeWorkDescription: parsed.data.description,
    technicalSummary: parsed.data.technical,
  };
}

/**
 * Deterministic summarizer used without a model, and as the fallback when a model call fails
 */
export class RuleBasedSummaryProducer implements SummaryProducer {
  readonly kind = 'rule-based' as const;
  private maxLength: number;

  constructor(maxLength = 500) {
    this.maxLength = maxLength;
  }

  summarize(project: ProjectAggregate): ProjectSummaryText {
    let items = distinct(project.tickets.map((t) => t.summary));
    if (items.length === 0) {
      items = distinct(project.commits.map((c) => firstLine(c.message)));
    }

    const description =
      items.length > 0 ? items.join('; ') : `Development work on ${project.projectName}.`;
    const technical = `Implemented ${plural(items.length, 'change')} across ${plural(project.commits.length, 'commit')}.`;

    return {
      creativeWorkDescription: truncate(description, this.maxLength),
      technicalSummary: truncate(technical, this.maxLength),
    };
  }

  async produce(project: ProjectAggregate): Promise<ProjectSummaryText> {
    return this.summarize(project);
  }
}

export interface LLMSummaryOptions {
  maxTokens?: number;
  maxSummaryLength?: number;
  logger?: Logger;
}

/**
 * LLM-based project summarizer
 */
export class LLMSummaryProducer implements SummaryProducer {
  readonly kind = 'model' as const;
  private client: LLMClient;
  private fallback: RuleBasedSummaryProducer;
  private maxTokens: number;
  private maxLength: number;
  private logger: Logger;

  constructor(client: LLMClient, options: LLMSummaryOptions = {}) {
    this.client = client;
    this.maxTokens = options.maxTokens ?? 1024;
    this.maxLength = options.maxSummaryLength ?? 500;
    this.fallback = new RuleBasedSummaryProducer(this.maxLength);
    this.logger = options.logger ?? silentLogger;
  }

  async produce(project: ProjectAggregate): Promise<ProjectSummaryText> {
    try {
      const response = await this.client.complete(buildProjectContext(project), {
        systemPrompt: SYSTEM_PROMPT,
        temperature: 0.3,
        maxTokens: this.maxTokens,
        json: true,
      });

      const parsed = parseSummaryResponse(response);
      if (!parsed) {
        this.logger.warn(`Unusable LLM response for ${project.projectKey}, using rule-based summary`);
        return this.fallback.summarize(project);
      }

      return {
        creativeWorkDescription: truncate(parsed.creativeWorkDescription, this.maxLength),
        technicalSummary: truncate(parsed.technicalSummary, this.maxLength),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`LLM error for ${project.projectKey}: ${message}; using rule-based summary`);
      return this.fallback.summarize(project);
    }
  }
}

/**
 * Pick the summarizer once, based on whether a model credential is configured
 */
export function createSummaryProducer(
  config: LLMConfig,
  logger: Logger = silentLogger,
  clientFactory: (apiKey: string, model: string) => LLMClient = createLLMClient
): SummaryProducer {
  if (!config.apiKey) {
    return new RuleBasedSummaryProducer(config.maxSummaryLength);
  }

  return new LLMSummaryProducer(clientFactory(config.apiKey, config.model), {
    maxTokens: config.maxTokens,
    maxSummaryLength: config.maxSummaryLength,
    logger,
  });
}

/**
 * Summarize projects one at a time with progress callback
 */
export async function summarizeProjects(
  projects: readonly ProjectAggregate[],
  producer: SummaryProducer,
  options: {
    /** Pause between model calls to avoid rate limiting */
    delayMs?: number;
    onProgress?: (current: number, total: number) => void;
  } = {}
): Promise<Map<string, ProjectSummaryText>> {
  const summaries = new Map<string, ProjectSummaryText>();
  const delayMs = options.delayMs ?? 0;

  for (const [index, project] of projects.entries()) {
    options.onProgress?.(index + 1, projects.length);

    summaries.set(project.projectKey, await producer.produce(project));

    if (producer.kind === 'model' && delayMs > 0 && index < projects.length - 1) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  return summaries;
}
