/**
 * @file Entry point of the knowledge mentor library.
 * Exports the agents, the upstream clients and the types applications consume.
 */

// --- Core ---
export { ApplicationError, ConfigurationError, LLMError } from './core/errors';
export type { JsonObject } from './core/utils';

// --- Configuration ---
export {
  loadMentorConfig,
  readConfigFile,
  validateConfig,
  DEFAULT_RAG_CONFIG,
  DEFAULT_COMPLETION_CONFIG,
  DEFAULT_CONTENT_CONFIG,
} from './config/mentor-config';
export type {
  MentorConfig,
  RagConfig,
  CompletionConfig,
  ContentConfig,
  LoadMentorConfigOptions,
} from './config/mentor-config';

// --- HTTP Gateways ---
export { HttpGateway } from './gateway/http-gateway';
export { AuthenticatedGateway } from './gateway/authenticated-gateway';
export { UNREACHABLE_STATUS } from './gateway/types';
export type {
  GatewayResult,
  GatewaySuccess,
  TransportFailure,
  FetchLike,
  HttpGatewayOptions,
  AuthenticatedGatewayOptions,
  GatewayCredentials,
} from './gateway/types';

// --- Retrieval ---
export { RagClient } from './retrieval/rag-client';
export type { RagClientOptions } from './retrieval/rag-client';
export { normalizeRetrievalPayload, normalizeChunk, createFragment, UPSTREAM_TAGS } from './retrieval/normalizer';
export { FALLBACK_SCORE } from './retrieval/types';
export type { Fragment, RetrievalResult, RetrievalMetadata, RetrievalHealth, IRetrievalClient } from './retrieval/types';

// --- Fallbacks ---
export {
  createRetrievalFallback,
  createCompletionFallback,
  EDUCATIONAL_FALLBACK_TEMPLATE,
  FALLBACK_TAGS,
  FALLBACK_STATUS_CODE,
  FALLBACK_SOURCE_ID,
} from './fallback/synthesizer';
export type { CompletionFallbackTemplate } from './fallback/synthesizer';

// --- Completion ---
export { COMPLETION_UNAVAILABLE_TEXT } from './llm/types';
export type { ICompletionClient, CompletionResult, CompletionOptions, CompletionHealth } from './llm/types';
export { OpenAICompletionClient } from './llm/adapters/openai/openai-completion-client';
export type { OpenAICompletionClientOptions } from './llm/adapters/openai/openai-completion-client';
export { buildMentorPrompt } from './llm/prompt-builder';
export type { PromptPersona } from './llm/prompt-builder';

// --- Content service ---
export { ContentServiceClient, DEFAULT_PLATFORMS, DEFAULT_LANGUAGES } from './content/content-client';
export type { ContentServiceClientOptions } from './content/content-client';
export { detectContentFeatures } from './content/content-triggers';
export type { ContentResult, ContentType, ContentFeature, ContentFeatureRequest, IContentClient } from './content/types';

// --- Action log ---
export { MemoryActionLog } from './actions/memory-action-log';
export type { ActionLogRecord, IActionLogSink } from './actions/types';

// --- Agents ---
export { MentorAgent, deriveHealthStatus, ERROR_RESPONSE_TEXT } from './agents/mentor-agent';
export { EduMentorAgent, EDUCATIONAL_MENTOR_PERSONA } from './agents/edu-mentor-agent';
export { DEFAULT_MENTOR_RUN_CONFIG } from './agents/config';
export type { MentorRunConfig } from './agents/config';
export type { MentorPersona } from './agents/persona';
export type {
  IMentorAgent,
  MentoringEnvelope,
  MentoringSuccessEnvelope,
  MentoringErrorEnvelope,
  OrchestrationState,
  SourcePreview,
  AgentHealthReport,
  HealthStatus,
  MentorAgentDependencies,
  ProcessQueryOptions,
} from './agents/types';

// --- Facade ---
export { createMentorAgent, createEduMentorAgent, buildMentorDependencies } from './facades/mentor';
export type { CreateMentorAgentOptions } from './facades/mentor';
