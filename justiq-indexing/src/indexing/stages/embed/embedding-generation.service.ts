/**
 * Embedding Generation Service
 * Dense embeddings for chunk contents, computed in sequential batches
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import type { ChunkRecord } from '../chunk/types';
import type { ChunkWithEmbedding } from './types';

@Injectable()
export class EmbeddingGenerationService {
  private readonly logger = new Logger(EmbeddingGenerationService.name);
  private readonly embeddingModel: Embeddings;
  private readonly batchSize: number;

  constructor(
    embeddingProviderFactory: EmbeddingProviderFactory,
    private readonly configService: ConfigService,
  ) {
    this.embeddingModel = embeddingProviderFactory.createEmbeddingModel();

    const batchSizeRaw = Number(
      this.configService.get<string>('EMBEDDING_BATCH_SIZE', '100'),
    );
    this.batchSize = Number.isFinite(batchSizeRaw)
      ? Math.max(1, Math.floor(batchSizeRaw))
      : 100;
  }

  async embedChunks(chunks: ChunkRecord[]): Promise<ChunkWithEmbedding[]> {
    const results: ChunkWithEmbedding[] = [];
    const totalBatches = Math.ceil(chunks.length / this.batchSize);

    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const batch = chunks.slice(i, i + this.batchSize);
      const embeddings = await this.embeddingModel.embedDocuments(
        batch.map((chunk) => chunk.content),
      );

      if (embeddings.length !== batch.length) {
        throw new Error(
          `Embedding model returned ${embeddings.length} vectors for ${batch.length} chunks`,
        );
      }

      batch.forEach((chunk, index) => {
        results.push({ chunk, embedding: embeddings[index] });
      });

      this.logger.log(
        `Embedded batch ${i / this.batchSize + 1}/${totalBatches} (${batch.length} chunks)`,
      );
    }

    return results;
  }
}
