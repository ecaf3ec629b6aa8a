/**
 * Persist Stage Custom Errors
 */

export class PersistStageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersistStageError';
  }
}

export class QdrantPersistenceError extends PersistStageError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Qdrant persistence failed: ${message}`);
    this.name = 'QdrantPersistenceError';
  }
}

export class EmbeddingError extends PersistStageError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Embedding failed: ${message}`);
    this.name = 'EmbeddingError';
  }
}
