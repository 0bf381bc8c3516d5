// src/agents/persona.ts

/**
 * @file Defines the persona structure that specializes a MentorAgent for one domain.
 */

import { PromptPersona } from '../llm/prompt-builder';
import { CompletionFallbackTemplate } from '../fallback/synthesizer';

export interface MentorPersona {
  /** Agent name reported in envelopes and logs, e.g. 'EduMentorAgent'. */
  agentName: string;
  /** Persona identifier, e.g. 'educational_mentor'. */
  id: string;
  description: string;
  /** Prepended to the query before it is sent to retrieval. */
  retrievalFraming: string;
  /** Action label written to the action log. */
  action: string;
  /** Recorded in envelope metadata as `guidanceType`. */
  guidanceType: string;
  /** Words whose presence in a query is reported back in the envelope. */
  keywords: string[];
  /** Tone requested from the content service for platform variants. */
  contentTone: string;
  prompt: PromptPersona;
  fallback: CompletionFallbackTemplate;
}
