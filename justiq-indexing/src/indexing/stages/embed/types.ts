/**
 * Embed Stage Types
 */

import type { ChunkRecord } from '../chunk/types';

export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}

/**
 * Chunk with its dense embedding
 */
export interface ChunkWithEmbedding {
  chunk: ChunkRecord;
  embedding: number[];
}
