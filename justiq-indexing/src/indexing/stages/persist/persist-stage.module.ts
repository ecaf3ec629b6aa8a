import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { QdrantPersistenceService } from './services/qdrant-persistence.service';
import { QdrantInitService } from './services/qdrant-init.service';
import { PersistStage } from './persist.stage';
import { QDRANT_CLIENT } from './persist.constants';
import { EmbedModule } from '../embed/embed.module';
import { ChunkStageModule } from '../chunk/chunk-stage.module';

@Module({
  imports: [ConfigModule, EmbedModule, ChunkStageModule],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService): QdrantClient => {
        const url =
          configService.get<string>('QDRANT_URL') || 'http://localhost:6333';

        const apiKey = configService.get<string>('QDRANT_API_KEY');

        return new QdrantClient({
          url,
          ...(apiKey ? { apiKey } : {}),
        });
      },
      inject: [ConfigService],
    },
    QdrantPersistenceService,
    QdrantInitService,
    PersistStage,
  ],
  exports: [PersistStage],
})
export class PersistStageModule {}
