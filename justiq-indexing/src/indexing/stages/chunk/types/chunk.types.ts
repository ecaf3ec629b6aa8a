/**
 * Chunk Stage Types
 */

import type { DocumentMetadata } from '../../load/types/load.types';

/**
 * Document metadata plus the chunk's position within its document
 */
export interface ChunkMetadata extends DocumentMetadata {
  chunkIdx: number;
  /** `{docId}_chunk_{chunkIdx}` */
  chunkId: string;
}

/**
 * Atomic unit of retrieval handed to the vector store
 */
export interface ChunkRecord {
  content: string;
  metadata: ChunkMetadata;
}

/**
 * A window of the source text; `text` is the trimmed slice [start, end)
 */
export interface TextWindow {
  start: number;
  end: number;
  text: string;
}

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}
