import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as tesseract from 'node-tesseract-ocr';
import type { AppConfig } from '../../../config/configuration';
import { ExtractionError, errorMessage } from '../../../domain/errors/pipeline.errors';
import type { NormalizedImage } from '../../../application/ports/output/image-normalizer.port';
import type { TextExtractorPort } from '../../../application/ports/output/text-extractor.port';
import { ConcurrencyLimiter } from '../../../shared/concurrency/concurrency-limiter';
import { withTimeout } from '../../../shared/utils/with-timeout';

/**
 * Tesseract Text Extractor Adapter
 * Implements TextExtractorPort by running the local tesseract binary on a temp file.
 *
 * A timed-out run cannot be killed through node-tesseract-ocr, so each run keeps
 * its process slot until the binary exits. Live tesseract processes never
 * exceed PROCESSING_CONCURRENCY, even when callers have given up on them.
 */
@Injectable()
export class TesseractTextExtractorAdapter implements TextExtractorPort {
  readonly engine = 'tesseract';

  private readonly logger = new Logger(TesseractTextExtractorAdapter.name);
  private readonly config: tesseract.Config;
  private readonly timeoutMs: number;
  private readonly processSlots: ConcurrencyLimiter;

  constructor(configService: ConfigService<AppConfig>) {
    const ocr = configService.getOrThrow('ocr', { infer: true });
    this.config = {
      lang: ocr.languages,
      oem: 1, // LSTM only
      psm: 3, // automatic page segmentation
      binary: ocr.tesseractBinary,
    };
    this.timeoutMs = ocr.timeoutMs;
    this.processSlots = new ConcurrencyLimiter(
      configService.getOrThrow('processing', { infer: true }).concurrency,
    );
  }

  /** Tesseract runs that have not exited yet */
  get liveRuns(): number {
    return this.processSlots.activeCount;
  }

  async extractText(image: NormalizedImage): Promise<string> {
    try {
      const release = await this.processSlots.acquire();
      // The deadline starts once a slot is held; the slot outlives the deadline
      const recognition = this.recognizeFile(image).finally(release);
      const text = await withTimeout(recognition, this.timeoutMs, 'Tesseract OCR');
      this.logger.debug(`Tesseract returned ${text.length} characters`);
      return text.trim();
    } catch (error) {
      throw new ExtractionError(`OCR failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Piping a Buffer through stdin leaves an unhandled EPIPE when the binary exits
   * early, so the image goes through a file instead.
   */
  private async recognizeFile(image: NormalizedImage): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'ocr-'));
    try {
      const imagePath = join(dir, `image.${image.extension}`);
      await writeFile(imagePath, image.data);
      return await tesseract.recognize(imagePath, this.config);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
