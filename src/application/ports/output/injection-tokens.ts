// Injection tokens (string symbols for DI)
export const IMAGE_NORMALIZER_PORT = 'ImageNormalizerPort';
export const TEXT_EXTRACTOR_PORT = 'TextExtractorPort';
export const SUMMARIZER_PORT = 'SummarizerPort';
export const IMAGE_STORAGE_PORT = 'ImageStoragePort';
export const REPORT_RENDERER_PORT = 'ReportRendererPort';
