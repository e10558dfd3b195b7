import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ConfigService } from '@nestjs/config';
import multipart from '@fastify/multipart';
import { AppModule } from './app.module';
import { jsonBodyLimitBytes } from './config/configuration';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { CORRELATION_ID_HEADER } from './shared/logging/correlation-id.middleware';

/**
 * Bootstrap the NestJS HTTP service on Fastify
 */
async function bootstrap() {
  // Body limit only governs JSON bodies; multipart has its own per-file cap below
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ bodyLimit: jsonBodyLimitBytes(process.env) }),
    { bufferLogs: true },
  );

  // Get services
  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  const bootstrapLogger = logger.forContext('Bootstrap');

  const http = configService.getOrThrow('http', { infer: true });
  const processing = configService.getOrThrow('processing', { infer: true });
  const port = configService.getOrThrow('port', { infer: true });

  app.setGlobalPrefix(http.apiPrefix);

  app.enableCors({
    origin: http.corsOrigins.includes('*') ? true : http.corsOrigins,
    credentials: !http.corsOrigins.includes('*'),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_ID_HEADER],
    exposedHeaders: [CORRELATION_ID_HEADER, 'Content-Disposition'],
    maxAge: 86400,
  });

  await app.register(multipart, {
    limits: { fileSize: processing.maxFileSizeBytes },
    // Oversized files arrive truncated and fail individually
    throwFileSizeLimit: false,
  });

  // Enable graceful shutdown
  app.enableShutdownHooks();

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    bootstrapLogger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(port, '0.0.0.0');

  bootstrapLogger.info(
    {
      port,
      pid: process.pid,
      apiPrefix: http.apiPrefix,
      ocrEngine: configService.getOrThrow('ocr', { infer: true }).engine,
      storage: configService.getOrThrow('storage', { infer: true }).backend,
    },
    'OCR summary service listening',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start service:', error);
  process.exit(1);
});
