/**
 * Persist Stage
 * Embeds chunks and hands them to the vector store
 */

import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingGenerationService } from '../embed/embedding-generation.service';
import { QdrantPersistenceService } from './services/qdrant-persistence.service';
import type { PersistInputDto, PersistOutputDto } from './dto';
import { EmbeddingError } from './errors';
import type { ChunkWithEmbedding } from '../embed/types';

@Injectable()
export class PersistStage {
  private readonly logger = new Logger(PersistStage.name);

  constructor(
    private readonly embeddingService: EmbeddingGenerationService,
    private readonly qdrantPersistenceService: QdrantPersistenceService,
  ) {}

  async execute(input: PersistInputDto): Promise<PersistOutputDto> {
    const startTime = Date.now();
    this.logger.log(`Starting Persist Stage: ${input.chunks.length} chunk(s)`);

    if (input.chunks.length === 0) {
      return { vectorsUpserted: 0, documentsReplaced: 0, durationMs: 0 };
    }

    let embedded: ChunkWithEmbedding[];
    try {
      embedded = await this.embeddingService.embedChunks(input.chunks);
    } catch (error) {
      throw new EmbeddingError(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    const result = await this.qdrantPersistenceService.upsert(embedded);
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `Persist Stage complete: ${result.vectorsUpserted} vector(s) in ${durationMs}ms`,
    );

    return {
      vectorsUpserted: result.vectorsUpserted,
      documentsReplaced: result.documentsReplaced,
      durationMs,
    };
  }
}
