// src/content/types.ts

/**
 * @file Types for the multilingual / multiplatform content service.
 */

import { JsonObject } from '../core/utils';

/**
 * Outcome of a content-service operation.
 * When a create-then-operate flow fails at the second step, `contentId` names the
 * content item that was created and left behind.
 */
export type ContentResult<T = JsonObject> =
  | { success: true; data: T }
  | { success: false; error: string; contentId?: string };

export type ContentType = 'tweet' | 'voice_script' | 'post' | 'article';

/** Enrichment an agent can request from the content service. */
export type ContentFeature = 'translation' | 'platform_content' | 'voice' | 'security';

export interface ContentFeatureRequest {
  features: ContentFeature[];
  /** Language codes to translate into, when `translation` was triggered. */
  targetLanguages: string[];
  /** Platforms named in the query, when `platform_content` was triggered. */
  platforms: string[];
}

/** What an orchestrator needs from a content client. */
export interface IContentClient {
  generateContent(text: string, platforms?: string[], tone?: string, language?: string): Promise<ContentResult>;
  translateContent(text: string, targetLanguages: string[], tone?: string): Promise<ContentResult>;
  generateVoice(text: string, language?: string, tone?: string, voiceTag?: string): Promise<ContentResult>;
  analyzeContentSecurity(text: string): Promise<ContentResult>;
}
