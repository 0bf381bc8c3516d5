// src/content/content-triggers.ts

/**
 * @file Maps trigger words in a query to content-service features.
 * Trigger words must appear as whole words in the lower-cased query.
 */

import { ContentFeature, ContentFeatureRequest } from './types';

const LANGUAGE_CODES: ReadonlyArray<[string, string]> = [
  ['english', 'en'],
  ['hindi', 'hi'],
  ['sanskrit', 'sa'],
  ['marathi', 'mr'],
  ['gujarati', 'gu'],
  ['tamil', 'ta'],
  ['telugu', 'te'],
  ['kannada', 'kn'],
  ['malayalam', 'ml'],
  ['bengali', 'bn'],
];

const TRANSLATION_TRIGGERS = ['translate', 'convert'];
const PLATFORM_TRIGGERS = ['twitter', 'instagram', 'linkedin', 'spotify'];
const VOICE_TRIGGERS = ['voice', 'audio', 'speak'];
const SECURITY_TRIGGERS = ['safe', 'security', 'check'];

/** Language used when translation is asked for without naming a language. */
export const DEFAULT_TRANSLATION_LANGUAGE = 'hi';

/**
 * Works out which content features a query asks for.
 * @example detectContentFeatures('Explain dharma in Hindi and Sanskrit')
 * // { features: ['translation'], targetLanguages: ['hi', 'sa'], platforms: [] }
 */
export function detectContentFeatures(query: string): ContentFeatureRequest {
  const lower = query.toLowerCase();
  const mentions = (word: string) => new RegExp(`\\b${word}\\b`).test(lower);

  const targetLanguages = LANGUAGE_CODES.filter(([name]) => mentions(name)).map(([, code]) => code);
  const platforms = PLATFORM_TRIGGERS.filter(mentions);
  const features: ContentFeature[] = [];

  if (targetLanguages.length > 0 || TRANSLATION_TRIGGERS.some(mentions)) {
    features.push('translation');
    if (targetLanguages.length === 0) {
      targetLanguages.push(DEFAULT_TRANSLATION_LANGUAGE);
    }
  }
  if (platforms.length > 0) {
    features.push('platform_content');
  }
  if (VOICE_TRIGGERS.some(mentions)) {
    features.push('voice');
  }
  if (SECURITY_TRIGGERS.some(mentions)) {
    features.push('security');
  }

  return { features, targetLanguages, platforms };
}
