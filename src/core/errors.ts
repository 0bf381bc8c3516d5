// src/core/errors.ts

/**
 * @file Defines custom error classes for the library.
 * Upstream failures travel as result values; these errors are reserved for
 * misconfiguration and for faults raised inside adapters before they are folded
 * into a result.
 */

/**
 * Base class for custom application errors.
 * This allows catching all library-specific errors with `instanceof ApplicationError`.
 */
export class ApplicationError extends Error {
  /**
   * Optional additional data associated with the error.
   */
  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;

    // Restores the prototype chain when compiled down to ES5.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown during configuration validation or when configuration is missing.
 */
export class ConfigurationError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error raised when a completion request fails or returns an unusable response.
 */
export class LLMError extends ApplicationError {
  /**
   * The kind of failure (e.g., 'api_error', 'empty_response', 'timeout').
   */
  public readonly errorType?: string;

  constructor(message: string, errorType?: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'LLMError';
    this.errorType = errorType;
  }
}
