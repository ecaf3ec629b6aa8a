/**
 * Qdrant Service
 * Dense vector search over the legal chunk collection
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { QdrantClient } from '@qdrant/js-client-rest';
import type { Embeddings } from '@langchain/core/embeddings';
import type { DocumentCategory } from '../../common/constants/document-categories';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { DEFAULT_COLLECTION_NAME, QDRANT_CLIENT } from '../retrieval.constants';
import type { SearchResult, VectorStore } from '../types';
import { VectorSearchError } from '../errors';

export type QdrantSearcher = Pick<QdrantClient, 'search'>;

type ScoredPoint = Awaited<ReturnType<QdrantClient['search']>>[number];

@Injectable()
export class QdrantService implements VectorStore {
  private readonly logger = new Logger(QdrantService.name);
  private readonly collectionName: string;
  private readonly embeddingModel: Embeddings;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly client: QdrantSearcher,
    embeddingProviderFactory: EmbeddingProviderFactory,
    configService: ConfigService,
  ) {
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      DEFAULT_COLLECTION_NAME,
    );
    this.embeddingModel = embeddingProviderFactory.createEmbeddingModel();
  }

  /**
   * Embed the query and return the nearest chunks, most similar first
   * @param filterType - Restrict results to one category
   */
  async search(
    query: string,
    nResults: number,
    filterType: DocumentCategory | null,
  ): Promise<SearchResult[]> {
    try {
      const vector = await this.embeddingModel.embedQuery(query);

      const points = await this.client.search(this.collectionName, {
        vector,
        limit: nResults,
        with_payload: true,
        ...(filterType
          ? {
              filter: {
                must: [{ key: 'metadata.type', match: { value: filterType } }],
              },
            }
          : {}),
      });

      this.logger.log(
        `Search returned ${points.length} result(s) (limit=${nResults}, filterType=${filterType ?? 'none'})`,
      );

      return points.map((point) => this.toSearchResult(point));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Vector search failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new VectorSearchError(
        message,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Cosine similarity score to distance
   */
  private toSearchResult(point: ScoredPoint): SearchResult {
    const payload = point.payload ?? {};
    const metadata = payload.metadata;

    return {
      content: typeof payload.content === 'string' ? payload.content : '',
      metadata: isRecord(metadata) ? metadata : {},
      distance: 1 - point.score,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
