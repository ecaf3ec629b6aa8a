/**
 * Persist Stage Types
 */

import type { QdrantClient } from '@qdrant/js-client-rest';
import type { ChunkMetadata } from '../../chunk/types';

/**
 * Subset of the Qdrant client used to write chunk points
 */
export type QdrantWriter = Pick<QdrantClient, 'upsert' | 'delete'>;

/**
 * Payload stored with each Qdrant point; read back by the retrieval service
 */
export interface ChunkPointPayload {
  [key: string]: unknown;
  content: string;
  metadata: ChunkMetadata;
}

export interface QdrantPersistenceResult {
  vectorsUpserted: number;
  documentsReplaced: number;
  durationMs: number;
}
