import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { RetrievalController } from './retrieval.controller';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { CredentialResolver } from './providers/credential-resolver';
import { QdrantService } from './services/qdrant.service';
import { CompletionService } from './services/completion.service';
import { ContextFormatterService } from './services/context-formatter.service';
import { AnswerService } from './services/answer.service';
import {
  COMPLETION_CLIENT,
  QDRANT_CLIENT,
  VECTOR_STORE,
} from './retrieval.constants';

@Module({
  imports: [ConfigModule],
  controllers: [RetrievalController],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService): QdrantClient => {
        const url = configService.get<string>(
          'QDRANT_URL',
          'http://localhost:6333',
        );
        const apiKey = configService.get<string>('QDRANT_API_KEY');

        return new QdrantClient({ url, ...(apiKey ? { apiKey } : {}) });
      },
      inject: [ConfigService],
    },
    CredentialResolver,
    EmbeddingProviderFactory,
    LLMProviderFactory,
    QdrantService,
    CompletionService,
    ContextFormatterService,
    AnswerService,
    { provide: VECTOR_STORE, useExisting: QdrantService },
    { provide: COMPLETION_CLIENT, useExisting: CompletionService },
  ],
  exports: [AnswerService],
})
export class RetrievalModule {}
