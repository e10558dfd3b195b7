/**
 * In-Memory Adapters for unit testing
 */
export { InMemoryImageStorageAdapter } from './in-memory-image-storage.adapter';
export { InMemoryTextExtractorAdapter } from './in-memory-text-extractor.adapter';
export { InMemorySummarizerAdapter } from './in-memory-summarizer.adapter';
export { InMemoryReportRendererAdapter } from './in-memory-report-renderer.adapter';
