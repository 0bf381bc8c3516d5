/**
 * @file Composition root: builds the gateways and clients described by a MentorConfig
 * and injects them into a mentoring agent. Any client can be replaced, e.g. by a test double.
 */

import { MentorConfig } from '../config/mentor-config';
import { HttpGateway } from '../gateway/http-gateway';
import { AuthenticatedGateway } from '../gateway/authenticated-gateway';
import { FetchLike } from '../gateway/types';
import { RagClient } from '../retrieval/rag-client';
import { IRetrievalClient } from '../retrieval/types';
import { OpenAICompletionClient } from '../llm/adapters/openai/openai-completion-client';
import { ICompletionClient } from '../llm/types';
import { ContentServiceClient } from '../content/content-client';
import { IContentClient } from '../content/types';
import { IActionLogSink } from '../actions/types';
import { MemoryActionLog } from '../actions/memory-action-log';
import { MentorAgent } from '../agents/mentor-agent';
import { EduMentorAgent } from '../agents/edu-mentor-agent';
import { MentorPersona } from '../agents/persona';
import { MentorAgentDependencies } from '../agents/types';
import { MentorRunConfig } from '../agents/config';

export interface CreateMentorAgentOptions {
  /** @default a new MemoryActionLog */
  actionLog?: IActionLogSink;
  /** Used by every HTTP gateway instead of the global fetch. */
  fetchImpl?: FetchLike;
  retrieval?: IRetrievalClient;
  completion?: ICompletionClient;
  content?: IContentClient;
  runConfig?: Partial<MentorRunConfig>;
}

/**
 * Builds the dependencies an agent needs. Clients given in `options` are used as they are.
 */
export function buildMentorDependencies(
  config: MentorConfig,
  options: CreateMentorAgentOptions = {}
): MentorAgentDependencies {
  const retrieval =
    options.retrieval ||
    new RagClient(
      new HttpGateway({
        baseUrl: config.rag.apiUrl,
        defaultTimeoutSeconds: config.rag.timeoutSeconds,
        fetchImpl: options.fetchImpl,
        label: 'RagGateway',
      }),
      { timeoutSeconds: config.rag.timeoutSeconds, defaultTopK: config.rag.topK }
    );

  const completion =
    options.completion ||
    new OpenAICompletionClient({
      apiKey: config.completion.apiKey,
      baseURL: config.completion.baseUrl,
      model: config.completion.model,
      timeoutSeconds: config.completion.timeoutSeconds,
    });

  let content = options.content;
  if (!content && config.content) {
    const gateway = new AuthenticatedGateway({
      baseUrl: config.content.baseUrl,
      credentials: { username: config.content.username, password: config.content.password },
      defaultTimeoutSeconds: config.content.timeoutSeconds,
      loginTimeoutSeconds: config.content.timeoutSeconds,
      fetchImpl: options.fetchImpl,
      label: 'ContentGateway',
    });
    content = new ContentServiceClient(gateway, {
      timeoutSeconds: config.content.timeoutSeconds,
      longTimeoutSeconds: config.content.longTimeoutSeconds,
    });
  }

  return {
    retrieval,
    completion,
    actionLog: options.actionLog || new MemoryActionLog(),
    content,
  };
}

function runConfigFrom(config: MentorConfig, overrides: Partial<MentorRunConfig> = {}): Partial<MentorRunConfig> {
  return {
    topK: config.rag.topK,
    maxTokens: config.completion.maxTokens,
    temperature: config.completion.temperature,
    ...overrides,
  };
}

/** Creates an agent for any persona. */
export function createMentorAgent(
  persona: MentorPersona,
  config: MentorConfig,
  options: CreateMentorAgentOptions = {}
): MentorAgent {
  return new MentorAgent(persona, buildMentorDependencies(config, options), runConfigFrom(config, options.runConfig));
}

/** Creates the educational mentor agent. */
export function createEduMentorAgent(config: MentorConfig, options: CreateMentorAgentOptions = {}): EduMentorAgent {
  return new EduMentorAgent(buildMentorDependencies(config, options), runConfigFrom(config, options.runConfig));
}
