import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  IndexingService,
} from './indexing/indexing.service';

/**
 * One-shot index run: load, chunk and upsert the whole corpus, then exit
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const configService = app.get(ConfigService);

  try {
    const result = await app.get(IndexingService).buildIndex({
      chunkSize: Number(
        configService.get<string>('CHUNK_SIZE', String(DEFAULT_CHUNK_SIZE)),
      ),
      overlap: Number(
        configService.get<string>(
          'CHUNK_OVERLAP',
          String(DEFAULT_CHUNK_OVERLAP),
        ),
      ),
    });

    for (const failure of result.failures) {
      logger.warn(`Skipped ${failure.filePath} [${failure.code}]`);
    }
    logger.log(
      `Indexed ${result.chunkCount} chunk(s) from ${result.documentCount} document(s)`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Index run failed', error);
  process.exit(1);
});
