import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ImageAnnotatorClient } from '@google-cloud/vision';
import type { AppConfig } from '../../../config/configuration';
import { ExtractionError, errorMessage } from '../../../domain/errors/pipeline.errors';
import type { NormalizedImage } from '../../../application/ports/output/image-normalizer.port';
import type { TextExtractorPort } from '../../../application/ports/output/text-extractor.port';
import { withTimeout } from '../../../shared/utils/with-timeout';

/**
 * Google Vision Text Extractor Adapter
 * Implements TextExtractorPort with Cloud Vision document text detection.
 * Credentials come from the standard GOOGLE_APPLICATION_CREDENTIALS lookup.
 */
@Injectable()
export class GoogleVisionTextExtractorAdapter implements TextExtractorPort, OnModuleDestroy {
  readonly engine = 'google-vision';

  private readonly logger = new Logger(GoogleVisionTextExtractorAdapter.name);
  private readonly client: ImageAnnotatorClient;
  private readonly languageHints: string[];
  private readonly timeoutMs: number;

  constructor(configService: ConfigService<AppConfig>) {
    const ocr = configService.getOrThrow('ocr', { infer: true });
    this.client = new ImageAnnotatorClient();
    this.languageHints = ocr.visionLanguageHints;
    this.timeoutMs = ocr.timeoutMs;
  }

  async extractText(image: NormalizedImage): Promise<string> {
    let text: string;
    try {
      const [result] = await withTimeout(
        this.client.annotateImage({
          image: { content: image.data.toString('base64') },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
          imageContext: { languageHints: this.languageHints },
        }),
        this.timeoutMs,
        'Cloud Vision OCR',
      );

      if (result.error?.message) {
        throw new Error(result.error.message);
      }
      text = result.fullTextAnnotation?.text ?? '';
    } catch (error) {
      throw new ExtractionError(`OCR failed: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug(`Cloud Vision returned ${text.length} characters`);
    return text.trim();
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.close();
  }
}
