/**
 * Chunk Stage Error Classes
 */

/**
 * Base error for all chunk stage errors
 */
export class ChunkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'ChunkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidChunkOptionsError extends ChunkError {
  constructor(
    public readonly chunkSize: number,
    public readonly overlap: number,
  ) {
    super(
      `Invalid chunk options: chunkSize=${chunkSize}, overlap=${overlap} ` +
        `(require chunkSize >= 1 and 0 <= overlap < chunkSize)`,
      'CHUNK_INVALID_OPTIONS',
      false,
    );
    this.name = 'InvalidChunkOptionsError';
  }
}
