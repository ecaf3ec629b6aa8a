import type { ChunkRecord } from '../types';

/**
 * Output DTO for Chunk Stage
 */
export interface ChunkOutputDto {
  chunks: ChunkRecord[];
  chunkMetadata: ChunkOutputMetadata;
}

/**
 * Chunk output metadata for audit and debugging
 */
export interface ChunkOutputMetadata {
  documentCount: number;
  chunkCount: number;
  /** `type:docId` of documents that produced no chunk (empty content) */
  emptyDocuments: string[];
  averageChunkLength: number;
  processingTime: number;
}
