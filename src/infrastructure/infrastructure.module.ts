import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';

// Shared services (existing infrastructure)
import { S3Module } from '../shared/aws/s3/s3.module';
import { S3Service } from '../shared/aws/s3/s3.service';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';

import {
  IMAGE_NORMALIZER_PORT,
  IMAGE_STORAGE_PORT,
  REPORT_RENDERER_PORT,
  SUMMARIZER_PORT,
  TEXT_EXTRACTOR_PORT,
} from '../application/ports/output/injection-tokens';
import type { ImageStoragePort } from '../application/ports/output/image-storage.port';
import type { TextExtractorPort } from '../application/ports/output/text-extractor.port';

// Adapters (implementations)
import { SharpImageNormalizerAdapter } from './adapters/imaging/sharp-image-normalizer.adapter';
import { TesseractTextExtractorAdapter } from './adapters/ocr/tesseract-text-extractor.adapter';
import { GoogleVisionTextExtractorAdapter } from './adapters/ocr/google-vision-text-extractor.adapter';
import { ChatCompletionSummarizerAdapter } from './adapters/summarization/chat-completion-summarizer.adapter';
import { S3ImageStorageAdapter } from './adapters/storage/s3-image-storage.adapter';
import { PdfLibReportRendererAdapter } from './adapters/reporting/pdf-lib-report-renderer.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (S3, HTTP client, logging)
 * 2. Binds adapters to port tokens; OCR engine and storage backend are picked from config
 * 3. Exports the tokens so they can be injected into use cases and health indicators
 */
@Module({
  imports: [LoggingModule, HttpModule, S3Module],
  providers: [
    // Image normalization
    {
      provide: IMAGE_NORMALIZER_PORT,
      useClass: SharpImageNormalizerAdapter,
    },

    // OCR engine
    {
      provide: TEXT_EXTRACTOR_PORT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>): TextExtractorPort =>
        configService.getOrThrow('ocr', { infer: true }).engine === 'google-vision'
          ? new GoogleVisionTextExtractorAdapter(configService)
          : new TesseractTextExtractorAdapter(configService),
    },

    // Summarization
    {
      provide: SUMMARIZER_PORT,
      useClass: ChatCompletionSummarizerAdapter,
    },

    // Storage; null disables persistence and images are returned inline
    {
      provide: IMAGE_STORAGE_PORT,
      inject: [ConfigService, S3Service],
      useFactory: (
        configService: ConfigService<AppConfig>,
        s3Service: S3Service,
      ): ImageStoragePort | null =>
        configService.getOrThrow('storage', { infer: true }).backend === 's3'
          ? new S3ImageStorageAdapter(s3Service, configService)
          : null,
    },

    // Reporting
    {
      provide: REPORT_RENDERER_PORT,
      useClass: PdfLibReportRendererAdapter,
    },
  ],
  exports: [
    // Export port tokens so they can be injected
    IMAGE_NORMALIZER_PORT,
    TEXT_EXTRACTOR_PORT,
    SUMMARIZER_PORT,
    IMAGE_STORAGE_PORT,
    REPORT_RENDERER_PORT,
  ],
})
export class InfrastructureModule {}
