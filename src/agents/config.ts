// src/agents/config.ts

/**
 * @file Defines the tunable parameters of a mentoring run.
 */

export interface MentorRunConfig {
  /**
   * Number of fragments requested from retrieval.
   * @default 5
   */
  topK: number;

  /**
   * Number of leading fragments (in upstream order) joined into the prompt context
   * and surfaced as sources.
   * @default 3
   */
  contextFragments: number;

  /**
   * Characters of fragment content kept in each source preview.
   * @default 200
   */
  sourcePreviewLength: number;

  /**
   * Maximum number of tokens to generate in the completion.
   * @default 1200
   */
  maxTokens: number;

  /**
   * Sampling temperature for the completion.
   * Higher values (e.g., 0.8) make output more varied, lower values more deterministic.
   * @default 0.7
   */
  temperature: number;
}

/**
 * Default configuration values for a mentoring run.
 * Can be overridden per agent at construction time.
 */
export const DEFAULT_MENTOR_RUN_CONFIG: MentorRunConfig = {
  topK: 5,
  contextFragments: 3,
  sourcePreviewLength: 200,
  maxTokens: 1200,
  temperature: 0.7,
};
