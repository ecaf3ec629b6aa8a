/**
 * Retrieval Service Errors
 */

/**
 * Base class for all retrieval errors
 */
export abstract class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Embedding the question or searching the collection failed
 */
export class VectorSearchError extends RetrievalError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Vector search failed: ${message}`, 'RETRIEVAL_SEARCH_FAILED', true);
  }
}

/**
 * The completion call failed or produced no text
 */
export class CompletionError extends RetrievalError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Completion failed: ${message}`, 'RETRIEVAL_COMPLETION_FAILED', true);
  }
}

/**
 * No credential source holds the provider's API key
 */
export class MissingCredentialError extends RetrievalError {
  constructor(
    public readonly key: string,
    public readonly provider: string,
  ) {
    super(
      `${key} is required for the ${provider} provider (checked secrets directory and environment)`,
      'RETRIEVAL_MISSING_CREDENTIAL',
      false,
    );
  }
}

/**
 * A configuration value is present but unusable
 */
export class InvalidConfigurationError extends RetrievalError {
  constructor(
    public readonly key: string,
    public readonly value: string,
    expectation: string,
  ) {
    super(
      `${key} must be ${expectation}, got "${value}"`,
      'RETRIEVAL_INVALID_CONFIGURATION',
      false,
    );
  }
}
