import { Injectable } from '@nestjs/common';

/**
 * Chunk ID Generator Service
 * Chunk IDs are positional: `{docId}_chunk_{chunkIdx}`. They are unique
 * within a document; the category is needed to make them globally unique.
 */
@Injectable()
export class ChunkIdGeneratorService {
  private readonly CHUNK_INFIX = 'chunk';

  generateChunkId(docId: string, chunkIdx: number): string {
    return `${docId}_${this.CHUNK_INFIX}_${chunkIdx}`;
  }

  /**
   * Globally unique key for a document: `{type}:{docId}`
   */
  generateDocumentKey(type: string, docId: string): string {
    return `${type}:${docId}`;
  }

  /**
   * Globally unique key for a chunk: category plus chunk ID
   */
  generateGlobalKey(type: string, chunkId: string): string {
    return `${type}:${chunkId}`;
  }
}
