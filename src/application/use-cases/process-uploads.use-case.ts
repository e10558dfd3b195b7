import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import {
  PipelineError,
  PipelineStage,
  errorMessage,
} from '../../domain/errors/pipeline.errors';
import { FileOutcome, ImageReference } from '../../domain/entities/file-outcome.entity';
import { UploadedImageVO } from '../../domain/value-objects/uploaded-image.vo';
import { ConcurrencyLimiter } from '../../shared/concurrency/concurrency-limiter';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type {
  ProcessUploadsCommand,
  ProcessUploadsPort,
  UploadedFile,
} from '../ports/input/process-uploads.port';
import type { ImageNormalizerPort, NormalizedImage } from '../ports/output/image-normalizer.port';
import type { ImageStoragePort } from '../ports/output/image-storage.port';
import type { SummarizerPort } from '../ports/output/summarizer.port';
import type { TextExtractorPort } from '../ports/output/text-extractor.port';
import {
  IMAGE_NORMALIZER_PORT,
  IMAGE_STORAGE_PORT,
  SUMMARIZER_PORT,
  TEXT_EXTRACTOR_PORT,
} from '../ports/output/injection-tokens';

/**
 * Process Uploads Use Case
 * Runs each uploaded file through validate → normalize → extract → summarize → store.
 * A failing file becomes a failed outcome; the rest of the batch carries on.
 */
@Injectable()
export class ProcessUploadsUseCase implements ProcessUploadsPort {
  private readonly logger: PinoLoggerService;
  private readonly maxFileSizeBytes: number;
  private readonly concurrency: number;

  constructor(
    @Inject(IMAGE_NORMALIZER_PORT)
    private readonly imageNormalizer: ImageNormalizerPort,
    @Inject(TEXT_EXTRACTOR_PORT)
    private readonly textExtractor: TextExtractorPort,
    @Inject(SUMMARIZER_PORT)
    private readonly summarizer: SummarizerPort,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
    @Optional()
    @Inject(IMAGE_STORAGE_PORT)
    private readonly imageStorage: ImageStoragePort | null = null,
  ) {
    const processing = configService.getOrThrow('processing', { infer: true });
    this.maxFileSizeBytes = processing.maxFileSizeBytes;
    this.concurrency = processing.concurrency;
    this.logger = logger.forContext(ProcessUploadsUseCase.name);
  }

  async execute(command: ProcessUploadsCommand): Promise<FileOutcome[]> {
    const logger = this.logger.withCorrelationId(command.correlationId);
    const startTime = Date.now();

    logger.info(
      {
        fileCount: command.files.length,
        engine: this.textExtractor.engine,
        storage: this.imageStorage?.backend ?? 'none',
      },
      'Processing uploaded files',
    );

    // A fresh limiter per request: the cap applies to the files of one batch
    const limiter = new ConcurrencyLimiter(this.concurrency);
    const outcomes = await limiter.map(command.files, (file) => this.processFile(file, logger));

    logger.info(
      { ...FileOutcome.summarize(outcomes), durationMs: Date.now() - startTime },
      'Finished processing uploaded files',
    );

    return outcomes;
  }

  private async processFile(file: UploadedFile, logger: PinoLoggerService): Promise<FileOutcome> {
    let stage: PipelineStage = 'validation';

    try {
      const image = UploadedImageVO.create(file, { maxBytes: this.maxFileSizeBytes });
      const normalized = await this.imageNormalizer.normalize(image);

      stage = 'extraction';
      const text = await this.textExtractor.extractText(normalized);

      stage = 'summarization';
      const summary = text.trim() ? await this.summarizer.summarize(text) : '';

      stage = 'storage';
      const imageReference = await this.persistImage(normalized, file.filename);

      logger.debug(
        { filename: file.filename, textLength: text.length, image: imageReference.type },
        'File processed',
      );

      return FileOutcome.succeeded({
        filename: file.filename,
        text,
        summary,
        image: imageReference,
      });
    } catch (error) {
      const failedStage = error instanceof PipelineError ? error.stage : stage;
      const message = errorMessage(error);

      logger.warn(
        { filename: file.filename, stage: failedStage, error: message },
        'File processing failed',
      );

      return FileOutcome.failed({ filename: file.filename, stage: failedStage, error: message });
    }
  }

  private async persistImage(image: NormalizedImage, filename: string): Promise<ImageReference> {
    if (!this.imageStorage) {
      return { type: 'inline', data: image.data, contentType: image.contentType };
    }

    const stored = await this.imageStorage.store(
      image.data,
      replaceExtension(filename, image.extension),
      image.contentType,
    );

    return {
      type: 'stored',
      key: stored.key,
      url: stored.url,
      contentType: stored.contentType,
      expiresAt: stored.expiresAt,
    };
  }
}

function replaceExtension(filename: string, extension: string): string {
  const dot = filename.lastIndexOf('.');
  const base = dot > 0 ? filename.slice(0, dot) : filename;
  return `${base}.${extension}`;
}
