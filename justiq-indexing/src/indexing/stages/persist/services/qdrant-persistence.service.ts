/**
 * Qdrant Persistence Service
 * Upserts embedded chunks into the chunk collection
 */

import { Injectable, Logger, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { DEFAULT_COLLECTION_NAME, QDRANT_CLIENT } from '../persist.constants';
import type {
  ChunkPointPayload,
  QdrantPersistenceResult,
  QdrantWriter,
} from '../types';
import type { ChunkWithEmbedding } from '../../embed/types';
import { ChunkIdGeneratorService } from '../../chunk/services';
import { QdrantPersistenceError } from '../errors';

@Injectable()
export class QdrantPersistenceService {
  private readonly logger = new Logger(QdrantPersistenceService.name);
  private readonly collectionName: string;
  private readonly BATCH_SIZE = 100;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantWriter,
    private readonly idGenerator: ChunkIdGeneratorService,
    configService: ConfigService,
  ) {
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      DEFAULT_COLLECTION_NAME,
    );
  }

  /**
   * Replace the stored chunks of every document present in the input
   */
  async upsert(
    embedded: ChunkWithEmbedding[],
  ): Promise<QdrantPersistenceResult> {
    const startTime = Date.now();

    try {
      const documentsReplaced = await this.deleteExistingDocuments(embedded);

      let vectorsUpserted = 0;
      for (let i = 0; i < embedded.length; i += this.BATCH_SIZE) {
        const batch = embedded.slice(i, i + this.BATCH_SIZE);

        await this.qdrantClient.upsert(this.collectionName, {
          wait: true,
          points: batch.map(({ chunk, embedding }) => {
            const payload: ChunkPointPayload = {
              content: chunk.content,
              metadata: chunk.metadata,
            };
            return {
              id: this.pointId(chunk.metadata.type, chunk.metadata.chunkId),
              vector: embedding,
              payload,
            };
          }),
        });

        vectorsUpserted += batch.length;
        this.logger.log(
          `Upserted chunk vectors: ${vectorsUpserted}/${embedded.length}`,
        );
      }

      return {
        vectorsUpserted,
        documentsReplaced,
        durationMs: Date.now() - startTime,
      };
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Qdrant persistence failed: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new QdrantPersistenceError(
        errorMessage,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Deterministic UUID for a chunk. Qdrant point IDs must be UUIDs or
   * unsigned integers; doc IDs are only unique per category, so the
   * category is part of the key.
   */
  pointId(type: string, chunkId: string): string {
    const hash = crypto
      .createHash('md5')
      .update(this.idGenerator.generateGlobalKey(type, chunkId))
      .digest('hex');

    return [
      hash.slice(0, 8),
      hash.slice(8, 12),
      hash.slice(12, 16),
      hash.slice(16, 20),
      hash.slice(20, 32),
    ].join('-');
  }

  /**
   * Delete previously indexed chunks of the incoming documents, one
   * request per category
   */
  private async deleteExistingDocuments(
    embedded: ChunkWithEmbedding[],
  ): Promise<number> {
    const docIdsByType = new Map<string, Set<string>>();
    for (const { chunk } of embedded) {
      const docIds = docIdsByType.get(chunk.metadata.type) ?? new Set<string>();
      docIds.add(chunk.metadata.docId);
      docIdsByType.set(chunk.metadata.type, docIds);
    }

    let replaced = 0;
    for (const [type, docIds] of docIdsByType) {
      await this.qdrantClient.delete(this.collectionName, {
        wait: true,
        filter: {
          must: [
            { key: 'metadata.type', match: { value: type } },
            { key: 'metadata.docId', match: { any: [...docIds] } },
          ],
        },
      });
      replaced += docIds.size;
    }

    this.logger.log(`Cleared previous chunks of ${replaced} document(s)`);
    return replaced;
  }
}
