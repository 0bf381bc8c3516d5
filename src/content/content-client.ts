// src/content/content-client.ts

/**
 * @file Client for the multilingual / multiplatform content service.
 * Most operations first create a content item and then act on its id.
 */

import { AuthenticatedGateway } from '../gateway/authenticated-gateway';
import { ContentResult, ContentType, IContentClient } from './types';
import { JsonObject, isJsonObject, isStringArray } from '../core/utils';

export const DEFAULT_PLATFORMS: readonly string[] = ['twitter', 'instagram', 'linkedin', 'spotify'];
export const DEFAULT_LANGUAGES: readonly string[] = ['en', 'hi', 'sa', 'mr', 'gu', 'ta', 'te', 'kn', 'ml', 'bn'];
export const DEFAULT_GENERATION_PLATFORMS: readonly string[] = ['twitter', 'instagram', 'linkedin'];

export interface ContentServiceClientOptions {
  /** Timeout for create, security, detection and catalogue calls. @default 30 */
  timeoutSeconds?: number;
  /** Timeout for generation, translation and voice calls. @default 60 */
  longTimeoutSeconds?: number;
  /** Recorded as `metadata.source` on every created item. @default 'knowledge_mentor' */
  source?: string;
}

function toJsonObject(data: unknown): JsonObject {
  return isJsonObject(data) ? data : { result: data };
}

export class ContentServiceClient implements IContentClient {
  private gateway: AuthenticatedGateway;
  private timeoutSeconds: number;
  private longTimeoutSeconds: number;
  private source: string;

  constructor(gateway: AuthenticatedGateway, options: ContentServiceClientOptions = {}) {
    this.gateway = gateway;
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.longTimeoutSeconds = options.longTimeoutSeconds ?? 60;
    this.source = options.source || 'knowledge_mentor';
  }

  /**
   * Creates a content item, the first step of most operations.
   * @returns The new item's id.
   */
  async createContent(text: string, contentType: ContentType = 'tweet', language = 'en'): Promise<ContentResult<string>> {
    const result = await this.gateway.call(
      '/api/v1/content/create',
      { text, content_type: contentType, language, metadata: { source: this.source } },
      this.timeoutSeconds
    );

    if (!result.ok) {
      console.error(`[ContentServiceClient] Content creation failed: ${result.error}`);
      return { success: false, error: `Content creation failed: ${result.error}` };
    }

    const contentId = isJsonObject(result.data) ? result.data.content_id : undefined;
    if ((typeof contentId !== 'string' && typeof contentId !== 'number') || contentId === '') {
      console.error('[ContentServiceClient] Content creation response carried no content_id.');
      return { success: false, error: 'Content creation response carried no content_id' };
    }

    console.info(`[ContentServiceClient] Content created with ID: ${contentId}`);
    return { success: true, data: String(contentId) };
  }

  /** Generates platform-specific variants of the text. */
  async generateContent(
    text: string,
    platforms: string[] = [...DEFAULT_GENERATION_PLATFORMS],
    tone = 'neutral',
    language = 'en'
  ): Promise<ContentResult> {
    return this.createThen(text, 'tweet', language, 'Content generation', '/api/v1/agents/generate-content', (contentId) => ({
      content_id: contentId,
      platforms,
      tone,
      language,
    }));
  }

  async translateContent(text: string, targetLanguages: string[], tone = 'neutral'): Promise<ContentResult> {
    return this.createThen(text, 'tweet', 'en', 'Translation', '/api/v1/multilingual/translate', (contentId) => ({
      content_id: contentId,
      target_languages: targetLanguages,
      tone,
    }));
  }

  /**
   * Generates spoken audio for the text.
   * @param voiceTag Defaults to the female devotional voice of `language`.
   */
  async generateVoice(
    text: string,
    language = 'hi',
    tone = 'devotional',
    voiceTag = `${language}_in_female_devotional`
  ): Promise<ContentResult> {
    return this.createThen(text, 'voice_script', language, 'Voice generation', '/api/v1/agents/generate-voice', (contentId) => ({
      content_id: contentId,
      language,
      tone,
      voice_tag: voiceTag,
    }));
  }

  async analyzeContentSecurity(text: string): Promise<ContentResult> {
    return this.createThen(
      text,
      'tweet',
      'en',
      'Security analysis',
      '/api/v1/security/analyze-content',
      (contentId) => ({ content_id: contentId }),
      this.timeoutSeconds
    );
  }

  /** Detects the language of raw text; needs no content item. */
  async detectLanguage(text: string): Promise<ContentResult> {
    const result = await this.gateway.call('/api/v1/multilingual/detect-language', { content: text }, this.timeoutSeconds);
    if (!result.ok) {
      console.error(`[ContentServiceClient] Language detection failed: ${result.error}`);
      return { success: false, error: `Language detection failed: ${result.error}` };
    }
    return { success: true, data: toJsonObject(result.data) };
  }

  /** Platforms the service supports, or the built-in list when it cannot say. */
  async getSupportedPlatforms(): Promise<string[]> {
    return this.getCatalogue('/api/v1/agents/platforms', DEFAULT_PLATFORMS);
  }

  /** Language codes the service supports, or the built-in list when it cannot say. */
  async getSupportedLanguages(): Promise<string[]> {
    return this.getCatalogue('/api/v1/agents/languages', DEFAULT_LANGUAGES);
  }

  private async getCatalogue(endpoint: string, defaults: readonly string[]): Promise<string[]> {
    const result = await this.gateway.get(endpoint, this.timeoutSeconds);
    if (result.ok && isStringArray(result.data)) {
      return result.data;
    }
    console.warn(`[ContentServiceClient] Using default catalogue for ${endpoint}.`);
    return [...defaults];
  }

  /**
   * Creates a content item, then posts the payload built from its id.
   * The created item is not removed if the second call fails; its id is returned instead.
   */
  private async createThen(
    text: string,
    contentType: ContentType,
    language: string,
    operationLabel: string,
    endpoint: string,
    buildPayload: (contentId: string) => JsonObject,
    timeoutSeconds: number = this.longTimeoutSeconds
  ): Promise<ContentResult> {
    const created = await this.createContent(text, contentType, language);
    if (!created.success) {
      return { success: false, error: created.error };
    }

    const contentId = created.data;
    const result = await this.gateway.call(endpoint, buildPayload(contentId), timeoutSeconds);
    if (!result.ok) {
      console.error(`[ContentServiceClient] ${operationLabel} failed for content ${contentId}: ${result.error}`);
      return { success: false, error: `${operationLabel} failed: ${result.error}`, contentId };
    }

    console.info(`[ContentServiceClient] ${operationLabel} successful.`);
    return { success: true, data: toJsonObject(result.data) };
  }
}
