/**
 * Embed Stage Module
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EmbeddingGenerationService } from './embedding-generation.service';

@Module({
  imports: [ConfigModule],
  providers: [EmbeddingProviderFactory, EmbeddingGenerationService],
  exports: [EmbeddingProviderFactory, EmbeddingGenerationService],
})
export class EmbedModule {}
