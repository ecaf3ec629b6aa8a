import { Module } from '@nestjs/common';
import { IndexingService } from './indexing.service';
import { LoadStageModule } from './stages/load/load-stage.module';
import { ChunkStageModule } from './stages/chunk/chunk-stage.module';
import { PersistStageModule } from './stages/persist/persist-stage.module';

@Module({
  imports: [LoadStageModule, ChunkStageModule, PersistStageModule],
  providers: [IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
