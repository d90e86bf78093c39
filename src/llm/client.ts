/**
 * LLM client using Google Generative AI SDK
 * Single-turn completions with Gemini, optionally constrained to JSON output
 */

import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  /** Ask the model for a JSON document instead of free text */
  json?: boolean;
}

/**
 * Abstract interface for LLM clients
 */
export interface LLMClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export class LLMClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = 'LLMClientError';
  }
}

export class GeminiClient implements LLMClient {
  private genAI: GoogleGenerativeAI;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let text: string;
    try {
      const model = this.genAI.getGenerativeModel({
        model: this.model,
        systemInstruction: options.systemPrompt,
        generationConfig: {
          temperature: options.temperature ?? 0.3,
          maxOutputTokens: options.maxTokens ?? 1024,
          responseMimeType: options.json ? 'application/json' : 'text/plain',
        },
      });

      // text() throws when the candidate was blocked
      const result = await model.generateContent(prompt);
      text = result.response.text();
    } catch (error) {
      if (error instanceof GoogleGenerativeAIFetchError) {
        throw new LLMClientError(`Gemini API error: ${error.message}`, error.status);
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new LLMClientError(`Gemini API error: ${message}`);
    }

    if (!text.trim()) {
      throw new LLMClientError('LLM returned empty response');
    }
    return text;
  }
}

/**
 * Create an LLM client from configuration
 */
export function createLLMClient(apiKey: string, model: string): LLMClient {
  return new GeminiClient(apiKey, model);
}
