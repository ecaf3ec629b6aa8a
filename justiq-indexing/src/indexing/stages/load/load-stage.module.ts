import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoadStage } from './load.stage';
import { ColumnExtractorService, CsvReaderService } from './services';

@Module({
  imports: [ConfigModule],
  providers: [LoadStage, CsvReaderService, ColumnExtractorService],
  exports: [LoadStage],
})
export class LoadStageModule {}
