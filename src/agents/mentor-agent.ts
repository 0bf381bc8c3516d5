// src/agents/mentor-agent.ts

/**
 * @file MentorAgent - routes a query through retrieval, completion, optional content
 * enrichment and action logging, and folds the outcome into a MentoringEnvelope.
 *
 * Orchestration states: start → context_retrieved → completion_built → logged → done.
 * Upstream failures are modeled outcomes and degrade to fallbacks in place. Anything
 * else that escapes ends in the `error` state, which still returns an envelope.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AgentHealthReport,
  HealthStatus,
  IMentorAgent,
  MentorAgentDependencies,
  MentoringEnvelope,
  MentoringErrorEnvelope,
  OrchestrationState,
  ProcessQueryOptions,
  SourcePreview,
} from './types';
import { MentorPersona } from './persona';
import { DEFAULT_MENTOR_RUN_CONFIG, MentorRunConfig } from './config';
import { Fragment, IRetrievalClient, RetrievalResult } from '../retrieval/types';
import { CompletionResult, ICompletionClient } from '../llm/types';
import { buildMentorPrompt } from '../llm/prompt-builder';
import { createCompletionFallback } from '../fallback/synthesizer';
import { IActionLogSink } from '../actions/types';
import { ContentFeature, ContentFeatureRequest, ContentResult, IContentClient } from '../content/types';
import { detectContentFeatures } from '../content/content-triggers';
import { errorMessage, truncateCodePoints, truncateForLog } from '../core/utils';

export const ERROR_RESPONSE_TEXT =
  "I apologize, but I'm experiencing difficulties providing guidance at this moment. Please try again later.";

interface KnowledgeContext {
  context: string;
  sources: SourcePreview[];
  hasSynthesizedAnswer: boolean;
}

interface Guidance {
  text: string;
  completionEnhanced: boolean;
}

interface ContentEnrichment {
  features: ContentFeature[];
  data: Partial<Record<ContentFeature, ContentResult>>;
  enhanced: boolean;
}

export class MentorAgent implements IMentorAgent {
  public readonly name: string;
  protected readonly persona: MentorPersona;
  protected readonly runConfig: MentorRunConfig;
  private retrieval: IRetrievalClient;
  private completion: ICompletionClient;
  private actionLog: IActionLogSink;
  private content?: IContentClient;

  constructor(persona: MentorPersona, dependencies: MentorAgentDependencies, runConfig: Partial<MentorRunConfig> = {}) {
    this.persona = persona;
    this.name = persona.agentName;
    this.runConfig = { ...DEFAULT_MENTOR_RUN_CONFIG, ...runConfig };
    this.retrieval = dependencies.retrieval;
    this.completion = dependencies.completion;
    this.actionLog = dependencies.actionLog;
    this.content = dependencies.content;

    console.info(
      `[${this.name}] Initialized with retrieval and '${this.completion.name}' completion${this.content ? ' and content enrichment' : ''}.`
    );
  }

  /**
   * Processes one query. Always resolves with an envelope; never rejects.
   * @param taskId Correlation id; a UUID is generated when omitted.
   */
  async processQuery(query: string, taskId?: string): Promise<MentoringEnvelope> {
    const queryId = taskId || uuidv4();
    let state: OrchestrationState = 'start';

    try {
      console.info(`[${this.name}] Processing query: '${truncateForLog(query)}'`);

      const retrieval = await this.retrieveKnowledge(query);
      const knowledge = this.buildKnowledgeContext(retrieval);
      state = 'context_retrieved';

      const guidance = await this.generateGuidance(query, knowledge.context);
      state = 'completion_built';

      const enrichment = await this.enrichWithContent(query, guidance.text);

      this.logAction(queryId, query, knowledge, guidance);
      state = 'logged';

      const envelope: MentoringEnvelope = {
        status: 'success',
        response: guidance.text,
        queryId,
        query,
        agent: this.name,
        persona: this.persona.id,
        knowledgeUsed: knowledge.context !== '',
        completionEnhanced: guidance.completionEnhanced,
        sources: knowledge.sources,
        ragData: {
          totalSources: knowledge.sources.length,
          method: 'rag_api_enhanced',
          knowledgeContextLength: knowledge.context.length,
          hasSynthesizedAnswer: knowledge.hasSynthesizedAnswer,
        },
        contentEnhanced: enrichment.enhanced,
        contentData: enrichment.data,
        timestamp: new Date().toISOString(),
        metadata: {
          matchedKeywords: this.matchKeywords(query),
          guidanceType: this.persona.guidanceType,
          enhancementMethod: guidance.completionEnhanced ? this.completion.name : 'fallback',
          contentFeaturesUsed: enrichment.features,
        },
      };
      state = 'done';

      console.info(`[${this.name}] Completed processing for task ${queryId}`);
      return envelope;
    } catch (error: unknown) {
      console.error(`[${this.name}] Unexpected error after state '${state}':`, error);
      return this.createErrorEnvelope(query, queryId, errorMessage(error), state);
    }
  }

  /** Entry point kept for hosts that pass an input string and options object. */
  async run(input: string, options: ProcessQueryOptions = {}): Promise<MentoringEnvelope> {
    return this.processQuery(input, options.taskId);
  }

  /**
   * Probes both upstreams in turn. A probe that throws counts as unavailable.
   */
  async healthCheck(): Promise<AgentHealthReport> {
    let ragApiAvailable = false;
    let completionApiAvailable = false;

    try {
      ragApiAvailable = (await this.retrieval.healthCheck()).available;
    } catch (error: unknown) {
      console.warn(`[${this.name}] RAG API health check failed: ${errorMessage(error)}`);
    }

    try {
      completionApiAvailable = (await this.completion.healthCheck()).available;
    } catch (error: unknown) {
      console.warn(`[${this.name}] Completion API health check failed: ${errorMessage(error)}`);
    }

    return {
      agent: this.name,
      status: deriveHealthStatus(ragApiAvailable, completionApiAvailable),
      ragApiAvailable,
      completionApiAvailable,
      timestamp: new Date().toISOString(),
    };
  }

  private async retrieveKnowledge(query: string): Promise<RetrievalResult | null> {
    try {
      return await this.retrieval.query(`${this.persona.retrievalFraming}${query}`, this.runConfig.topK);
    } catch (error: unknown) {
      console.error(`[${this.name}] Error getting knowledge context: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Takes the leading fragments in upstream order, not by score.
   * A fallback or empty result yields no context.
   */
  private buildKnowledgeContext(result: RetrievalResult | null): KnowledgeContext {
    if (result === null || result.origin !== 'upstream' || result.statusCode !== 200 || result.fragments.length === 0) {
      console.warn(`[${this.name}] No knowledge context retrieved.`);
      return { context: '', sources: [], hasSynthesizedAnswer: false };
    }

    const leading = result.fragments.slice(0, this.runConfig.contextFragments);
    return {
      context: leading.map((fragment) => fragment.content).join(' '),
      sources: leading.map((fragment) => this.toSourcePreview(fragment)),
      hasSynthesizedAnswer: result.metadata.hasSynthesizedAnswer,
    };
  }

  private toSourcePreview(fragment: Fragment): SourcePreview {
    return {
      content: `${truncateCodePoints(fragment.content, this.runConfig.sourcePreviewLength)}...`,
      source: fragment.sourceId,
      score: fragment.score,
      documentId: fragment.documentId,
      folder: fragment.originRegion,
    };
  }

  private async generateGuidance(query: string, knowledgeContext: string): Promise<Guidance> {
    const prompt = buildMentorPrompt(this.persona.prompt, query, knowledgeContext);

    let result: CompletionResult | null;
    try {
      result = await this.completion.generateResponse(prompt, {
        maxTokens: this.runConfig.maxTokens,
        temperature: this.runConfig.temperature,
      });
    } catch (error: unknown) {
      console.error(`[${this.name}] Completion error: ${errorMessage(error)}`);
      result = null;
    }

    if (result !== null && result.succeeded && result.text) {
      return { text: result.text, completionEnhanced: true };
    }

    console.warn(`[${this.name}] Completion enhancement failed, using fallback.`);
    return {
      text: createCompletionFallback(query, knowledgeContext, this.persona.fallback),
      completionEnhanced: false,
    };
  }

  /**
   * Runs the content features the query triggers, one after another.
   * Each failure is recorded in the returned data and does not stop the others.
   */
  private async enrichWithContent(query: string, responseText: string): Promise<ContentEnrichment> {
    const enrichment: ContentEnrichment = { features: [], data: {}, enhanced: false };
    if (!this.content) {
      return enrichment;
    }

    const request = detectContentFeatures(query);
    for (const feature of request.features) {
      let outcome: ContentResult;
      try {
        outcome = await this.runContentFeature(this.content, feature, responseText, request);
      } catch (error: unknown) {
        outcome = { success: false, error: errorMessage(error) };
      }
      if (!outcome.success) {
        console.warn(`[${this.name}] Content feature '${feature}' failed: ${outcome.error}`);
      }
      enrichment.features.push(feature);
      enrichment.data[feature] = outcome;
      enrichment.enhanced = enrichment.enhanced || outcome.success;
    }
    return enrichment;
  }

  private runContentFeature(
    content: IContentClient,
    feature: ContentFeature,
    text: string,
    request: ContentFeatureRequest
  ): Promise<ContentResult> {
    switch (feature) {
      case 'translation':
        return content.translateContent(text, request.targetLanguages);
      case 'platform_content':
        return content.generateContent(text, request.platforms, this.persona.contentTone);
      case 'voice':
        return content.generateVoice(text, request.targetLanguages[0]);
      case 'security':
        return content.analyzeContentSecurity(text);
      default: {
        const unknownFeature: never = feature;
        throw new Error(`Unknown content feature: ${String(unknownFeature)}`);
      }
    }
  }

  /**
   * Hands the record to the sink without waiting for it to settle.
   * Synchronous throws and rejections are logged and dropped.
   */
  private logAction(queryId: string, query: string, knowledge: KnowledgeContext, guidance: Guidance): void {
    const reportFailure = (error: unknown) => {
      console.error(`[${this.name}] Action logging failed for task ${queryId}: ${errorMessage(error)}`);
    };

    try {
      const pending = this.actionLog.logAction({
        taskId: queryId,
        agent: this.name,
        backend: guidance.completionEnhanced ? this.completion.name : 'fallback',
        action: this.persona.action,
        metadata: {
          query,
          knowledgeRetrieved: knowledge.context !== '',
          completionEnhanced: guidance.completionEnhanced,
          persona: this.persona.id,
          sourcesCount: knowledge.sources.length,
        },
        timestamp: new Date().toISOString(),
      });
      if (pending instanceof Promise) {
        pending.catch(reportFailure);
      }
    } catch (error: unknown) {
      reportFailure(error);
    }
  }

  private matchKeywords(query: string): string[] {
    const lower = query.toLowerCase();
    return this.persona.keywords.filter((keyword) => lower.includes(keyword));
  }

  private createErrorEnvelope(
    query: string,
    queryId: string,
    message: string,
    failedAt: OrchestrationState
  ): MentoringErrorEnvelope {
    return {
      status: 'error',
      response: ERROR_RESPONSE_TEXT,
      queryId,
      query,
      agent: this.name,
      error: message,
      failedAt,
      timestamp: new Date().toISOString(),
    };
  }
}

/** healthy when both upstreams answer, partial when one does, degraded when neither. */
export function deriveHealthStatus(ragApiAvailable: boolean, completionApiAvailable: boolean): HealthStatus {
  if (ragApiAvailable && completionApiAvailable) {
    return 'healthy';
  }
  if (ragApiAvailable || completionApiAvailable) {
    return 'partial';
  }
  return 'degraded';
}
