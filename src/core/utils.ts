/**
 * @file Core utility functions shared across the project.
 * Most of them coerce loosely-typed upstream JSON into known shapes without throwing.
 */

/** A parsed JSON object whose fields have not been checked yet. */
export type JsonObject = Record<string, unknown>;

/**
 * Narrows an unknown value to a plain JSON object.
 * Arrays and null are not objects for this purpose.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the value as a JSON object, or an empty object when it is anything else. */
export function asJsonObject(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

/** Returns the value if it is a string, otherwise the fallback. */
export function coerceString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Coerces a number or numeric string to a finite number.
 * @returns The parsed number, or `fallback` for anything unparseable.
 */
export function coerceNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/** Restricts a number to the inclusive range [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Returns true when the value is an array made only of strings. */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Shortens text for log lines.
 * @example truncateForLog('abcdef', 3) // 'abc...'
 */
export function truncateForLog(text: string, maxLength = 100): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}

/**
 * Keeps the first `maxLength` code points, so a surrogate pair is never split.
 * @example truncateCodePoints('ab😀c', 3) // 'ab😀'
 */
export function truncateCodePoints(text: string, maxLength: number): string {
  return Array.from(text).slice(0, maxLength).join('');
}

/** Extracts a readable message from anything that was thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
