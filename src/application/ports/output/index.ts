/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { ImageNormalizerPort, NormalizedImage, ColorMode } from './image-normalizer.port';
export type { TextExtractorPort } from './text-extractor.port';
export type { SummarizerPort } from './summarizer.port';
export type { ImageStoragePort, StoredImage } from './image-storage.port';
export type { ReportRendererPort, ReportEntry } from './report-renderer.port';
export {
  IMAGE_NORMALIZER_PORT,
  TEXT_EXTRACTOR_PORT,
  SUMMARIZER_PORT,
  IMAGE_STORAGE_PORT,
  REPORT_RENDERER_PORT,
} from './injection-tokens';
