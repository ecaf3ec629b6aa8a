/**
 * Qdrant Initialization Service
 * Creates the chunk collection on module initialization
 */

import { Injectable, Logger, Inject, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { DEFAULT_COLLECTION_NAME, QDRANT_CLIENT } from '../persist.constants';
import { EmbeddingProviderFactory } from '../../embed/embedding-provider.factory';

@Injectable()
export class QdrantInitService implements OnModuleInit {
  private readonly logger = new Logger(QdrantInitService.name);
  private readonly collectionName: string;
  private readonly vectorSize: number;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantClient,
    configService: ConfigService,
    embeddingProviderFactory: EmbeddingProviderFactory,
  ) {
    this.collectionName = configService.get<string>(
      'QDRANT_COLLECTION',
      DEFAULT_COLLECTION_NAME,
    );
    this.vectorSize = embeddingProviderFactory.getEmbeddingDimensions();
  }

  async onModuleInit(): Promise<void> {
    this.logger.log(
      `Initializing Qdrant collection "${this.collectionName}" (${this.vectorSize}D)...`,
    );

    try {
      await this.ensureCollectionExists();
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to initialize Qdrant collection: ${errorMessage}`,
      );
      throw error;
    }
  }

  private async ensureCollectionExists(): Promise<void> {
    const { exists } = await this.qdrantClient.collectionExists(
      this.collectionName,
    );
    if (exists) {
      this.logger.log(`Collection "${this.collectionName}" already exists`);
      return;
    }

    await this.qdrantClient.createCollection(this.collectionName, {
      vectors: {
        size: this.vectorSize,
        distance: 'Cosine',
      },
    });

    // Category filter and per-document replacement both filter on these
    for (const fieldName of ['metadata.type', 'metadata.docId']) {
      await this.qdrantClient.createPayloadIndex(this.collectionName, {
        field_name: fieldName,
        field_schema: 'keyword',
      });
    }

    this.logger.log(`Created collection "${this.collectionName}"`);
  }
}
