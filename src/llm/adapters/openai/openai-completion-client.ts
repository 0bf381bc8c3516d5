// src/llm/adapters/openai/openai-completion-client.ts

/**
 * @file ICompletionClient backed by the official OpenAI SDK.
 * Points at Groq's OpenAI-compatible endpoint by default; any compatible base URL works.
 */

import OpenAI from 'openai';
import {
  COMPLETION_UNAVAILABLE_TEXT,
  CompletionHealth,
  CompletionOptions,
  CompletionResult,
  ICompletionClient,
} from '../../types';
import { ConfigurationError, LLMError } from '../../../core/errors';
import { errorMessage } from '../../../core/utils';

export const DEFAULT_COMPLETION_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_COMPLETION_MODEL = 'llama-3.1-8b-instant';

/**
 * Configuration options for the OpenAICompletionClient.
 */
export interface OpenAICompletionClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  /** Per-request timeout. @default 60 */
  timeoutSeconds?: number;
  /** Name recorded in action logs. @default 'groq' */
  name?: string;
}

export class OpenAICompletionClient implements ICompletionClient {
  public readonly name: string;
  private openai: OpenAI;
  private model: string;
  private timeoutMs: number;

  constructor(options: OpenAICompletionClientOptions = {}) {
    const apiKey = options.apiKey || process.env.GROQ_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        'Completion API key is required. Provide it in options or set the GROQ_API_KEY environment variable.'
      );
    }

    this.name = options.name || 'groq';
    this.model = options.model || DEFAULT_COMPLETION_MODEL;
    this.timeoutMs = (options.timeoutSeconds ?? 60) * 1000;
    // Retries are disabled: a single failed attempt goes straight to the fallback.
    this.openai = new OpenAI({
      apiKey,
      baseURL: options.baseURL || DEFAULT_COMPLETION_BASE_URL,
      maxRetries: 0,
      timeout: this.timeoutMs,
    });

    console.info(`[OpenAICompletionClient] Initialized '${this.name}' with model: ${this.model}.`);
  }

  /**
   * Requests a single completion for the prompt. Resolves with `succeeded: false`
   * on any SDK error or empty answer.
   */
  async generateResponse(prompt: string, options: CompletionOptions): Promise<CompletionResult> {
    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: options.maxTokens,
          temperature: options.temperature,
        },
        { timeout: this.timeoutMs }
      );

      const text = completion.choices[0]?.message?.content?.trim();
      if (!text) {
        throw new LLMError('Completion response contained no text.', 'empty_response', { model: this.model });
      }
      return { succeeded: true, text };
    } catch (error: unknown) {
      const llmError = this.toLLMError(error);
      console.error(`[OpenAICompletionClient] Completion failed (${llmError.errorType}): ${llmError.message}`);
      return { succeeded: false, text: COMPLETION_UNAVAILABLE_TEXT, error: llmError.message };
    }
  }

  /** Lists models as a lightweight availability probe. */
  async healthCheck(): Promise<CompletionHealth> {
    try {
      await this.openai.models.list({ timeout: Math.min(this.timeoutMs, 10000) });
      return { available: true, model: this.model };
    } catch (error: unknown) {
      const message = errorMessage(error);
      console.warn(`[OpenAICompletionClient] Health check failed: ${message}`);
      return { available: false, model: this.model, error: message };
    }
  }

  private toLLMError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    if (error instanceof OpenAI.APIError) {
      const errorType = error.type || 'api_error';
      return new LLMError(error.message, errorType, { statusCode: error.status, provider: this.name });
    }
    return new LLMError(errorMessage(error), 'sdk_error', { provider: this.name });
  }
}
