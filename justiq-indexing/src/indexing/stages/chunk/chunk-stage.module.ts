import { Module } from '@nestjs/common';
import { ChunkStage } from './chunk.stage';
import {
  ChunkIdGeneratorService,
  SentenceWindowSplitterService,
} from './services';

@Module({
  providers: [ChunkStage, SentenceWindowSplitterService, ChunkIdGeneratorService],
  exports: [ChunkStage, ChunkIdGeneratorService],
})
export class ChunkStageModule {}
