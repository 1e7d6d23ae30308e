import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { loadStartupConfig, reportStartupFailure } from './bootstrap';
import { StructuredLoggerService } from './shared/logging/structured-logger.service';

async function bootstrap(): Promise<void> {
  const { port, rateLimit } = loadStartupConfig();
  const app = await NestFactory.create(AppModule.forRoot(rateLimit), { bufferLogs: true });
  const logger = app.get(StructuredLoggerService);
  app.useLogger(logger);
  app.use(helmet());
  app.enableShutdownHooks();

  logger.log(`Starting rate limiter service on :${port}...`, 'Bootstrap');
  logger.log(`Test with: http://localhost:${port}/limited`, 'Bootstrap');
  logger.log(`Test with: http://localhost:${port}/unlimited`, 'Bootstrap');
  await app.listen(port);
}

bootstrap().catch((error: unknown) => {
  reportStartupFailure(error, new StructuredLoggerService());
  process.exitCode = 1;
});
