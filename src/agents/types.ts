// src/agents/types.ts

/**
 * @file Defines core types for mentoring agents: orchestration states, the envelope
 * returned to callers, health reports and injected dependencies.
 */

import { IRetrievalClient } from '../retrieval/types';
import { ICompletionClient } from '../llm/types';
import { IActionLogSink } from '../actions/types';
import { ContentFeature, ContentResult, IContentClient } from '../content/types';

/**
 * Steps of one orchestration. The sequence is linear; `error` is reachable from any step.
 */
export type OrchestrationState =
  | 'start'
  | 'context_retrieved'
  | 'completion_built'
  | 'logged'
  | 'done'
  | 'error';

/** A retrieved fragment as surfaced to the caller, with a shortened content preview. */
export interface SourcePreview {
  content: string;
  source: string;
  score: number;
  documentId: string;
  folder: string;
}

export interface MentoringSuccessEnvelope {
  status: 'success';
  response: string;
  /** Correlation id of the query. */
  queryId: string;
  query: string;
  agent: string;
  persona: string;
  knowledgeUsed: boolean;
  completionEnhanced: boolean;
  sources: SourcePreview[];
  ragData: {
    totalSources: number;
    method: string;
    knowledgeContextLength: number;
    hasSynthesizedAnswer: boolean;
  };
  /** True when at least one content-service feature succeeded. */
  contentEnhanced: boolean;
  contentData: Partial<Record<ContentFeature, ContentResult>>;
  timestamp: string;
  metadata: {
    /** Persona keywords found in the query. */
    matchedKeywords: string[];
    guidanceType: string;
    enhancementMethod: string;
    contentFeaturesUsed: ContentFeature[];
  };
}

export interface MentoringErrorEnvelope {
  status: 'error';
  response: string;
  queryId: string;
  query: string;
  agent: string;
  /** Message of the unexpected exception, for diagnostics. */
  error: string;
  /** Last state reached before the failure. */
  failedAt: OrchestrationState;
  timestamp: string;
}

/** The uniform response every mentoring agent returns. Never null, never thrown. */
export type MentoringEnvelope = MentoringSuccessEnvelope | MentoringErrorEnvelope;

export type HealthStatus = 'healthy' | 'partial' | 'degraded';

export interface AgentHealthReport {
  agent: string;
  status: HealthStatus;
  ragApiAvailable: boolean;
  completionApiAvailable: boolean;
  timestamp: string;
}

/**
 * Collaborators handed to an agent at construction time.
 */
export interface MentorAgentDependencies {
  retrieval: IRetrievalClient;
  completion: ICompletionClient;
  actionLog: IActionLogSink;
  /** Enables content-service enrichment when present. */
  content?: IContentClient;
}

export interface ProcessQueryOptions {
  /** Correlation id to reuse; a fresh one is generated when absent. */
  taskId?: string;
}

/**
 * A mentoring agent's public surface.
 */
export interface IMentorAgent {
  readonly name: string;
  processQuery(query: string, taskId?: string): Promise<MentoringEnvelope>;
  run(input: string, options?: ProcessQueryOptions): Promise<MentoringEnvelope>;
  healthCheck(): Promise<AgentHealthReport>;
}
