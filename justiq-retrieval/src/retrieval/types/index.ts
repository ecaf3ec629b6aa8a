/**
 * Retrieval Service Types
 */

import type { DocumentCategory } from '../../common/constants/document-categories';

/**
 * One ranked chunk returned by the vector store
 */
export interface SearchResult {
  content: string;
  /** Chunk payload metadata as stored at index time (`docId`, `typeName`, ...) */
  metadata: Record<string, unknown>;
  /** Lower is more similar; display similarity is `1 - distance` */
  distance: number;
}

/**
 * Vector-store collaborator
 */
export interface VectorStore {
  /**
   * Most similar chunks first
   * @throws VectorSearchError
   */
  search(
    query: string,
    nResults: number,
    filterType: DocumentCategory | null,
  ): Promise<SearchResult[]>;
}

/**
 * Chat-completion collaborator
 */
export interface CompletionClient {
  /**
   * @throws CompletionError when the call fails or the model returns no text
   */
  complete(
    systemMessage: string,
    userMessage: string,
    temperature: number,
    maxOutputTokens: number,
  ): Promise<string>;
}
