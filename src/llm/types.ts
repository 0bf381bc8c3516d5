// src/llm/types.ts

/**
 * @file Interfaces for completion services.
 */

/**
 * Outcome of a completion request. A failed request still carries non-empty text,
 * {@link COMPLETION_UNAVAILABLE_TEXT} unless the client has something better.
 */
export type CompletionResult =
  | { succeeded: true; text: string }
  | { succeeded: false; text: string; error: string };

export interface CompletionOptions {
  /** Upper bound on generated tokens. */
  maxTokens: number;
  /** Sampling temperature; higher is more varied. */
  temperature: number;
}

export interface CompletionHealth {
  available: boolean;
  model?: string;
  error?: string;
}

/** Text a completion client returns with `succeeded: false` when it has nothing better. */
export const COMPLETION_UNAVAILABLE_TEXT = 'The completion service is currently unavailable. Please try again later.';

/**
 * A completion backend. Implementations resolve every call, reporting failure through
 * `succeeded: false`.
 */
export interface ICompletionClient {
  /** Backend name recorded in action logs, e.g. 'groq'. */
  readonly name: string;
  generateResponse(prompt: string, options: CompletionOptions): Promise<CompletionResult>;
  healthCheck(): Promise<CompletionHealth>;
}
