import type { DocumentRecord } from '../../load/types/load.types';

/**
 * Input DTO for Chunk Stage
 * Receives the documents produced by the Load Stage
 */
export interface ChunkInputDto {
  documents: DocumentRecord[];
  chunkSize: number;
  overlap: number;
}
