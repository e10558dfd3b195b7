import type { NormalizedImage } from './image-normalizer.port';

/**
 * Text Extractor Port (Driven Port)
 * Thin pass-through to an OCR engine. Empty text is a valid result;
 * engine failures and timeouts surface as ExtractionError.
 */
export interface TextExtractorPort {
  readonly engine: string;

  extractText(image: NormalizedImage): Promise<string>;
}
