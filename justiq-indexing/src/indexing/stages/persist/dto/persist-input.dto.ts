import type { ChunkRecord } from '../../chunk/types';

export interface PersistInputDto {
  chunks: ChunkRecord[];
}
