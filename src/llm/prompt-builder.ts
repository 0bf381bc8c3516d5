// src/llm/prompt-builder.ts

/**
 * @file Builds persona-styled completion prompts from a query and retrieved context.
 */

/**
 * The parts of a persona that shape its prompt.
 */
export interface PromptPersona {
  /** Opening instruction; the quoted query follows it after a colon. */
  roleIntro: string;
  /** Label placed before the retrieved context, e.g. 'Educational Context'. */
  contextLabel: string;
  /** Line used when no context was retrieved. */
  noContextInstruction: string;
  /** Completes "Please respond as ... who:". */
  respondAs: string;
  traits: string[];
  /** Items the answer should contain. */
  responseSections: string[];
  /** Final cue the model continues from, e.g. 'Educational Guidance'. */
  answerLabel: string;
}

function formatBullets(items: string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

/**
 * Generates the completion prompt for a mentoring query.
 *
 * @param knowledgeContext Space-joined retrieved fragments; '' when retrieval produced nothing.
 * @returns A string containing the full prompt.
 */
export function buildMentorPrompt(persona: PromptPersona, query: string, knowledgeContext: string): string {
  const contextBlock = knowledgeContext
    ? `${persona.contextLabel}: ${knowledgeContext}`
    : persona.noContextInstruction;

  return `${persona.roleIntro}: "${query}"

${contextBlock}

Please respond as ${persona.respondAs} who:
${formatBullets(persona.traits)}

Your response should include:
${formatBullets(persona.responseSections)}

${persona.answerLabel}:`;
}
