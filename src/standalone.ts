import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LoggerService } from './logger/logger.service';

// Same module graph without the HTTP listener; the cron schedule keeps the process alive
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const logger = await app.resolve(LoggerService);
  logger.setContext('Bootstrap');
  app.useLogger(logger);
  app.enableShutdownHooks();

  logger.log('Standalone alert runner started');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start standalone runner', error);
  process.exit(1);
});
