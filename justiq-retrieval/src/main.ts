import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 50053);
  await app.listen(port);
  logger.log(`🚀 Retrieval service is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Retrieval service failed to start', error);
  process.exit(1);
});
