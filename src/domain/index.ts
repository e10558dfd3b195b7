/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no dependencies on Nest or on infrastructure libraries.
 */

// Entities
export {
  FileOutcome,
  type FileFailed,
  type FileSucceeded,
  type ImageReference,
} from './entities/file-outcome.entity';

// Value Objects
export {
  UploadedImageVO,
  ACCEPTED_IMAGE_EXTENSIONS,
  type ImageExtension,
  type UploadLimits,
  type UploadedImageProps,
} from './value-objects/uploaded-image.vo';

// Errors
export {
  PipelineError,
  ValidationError,
  ExtractionError,
  SummarizationError,
  StorageError,
  ConfigurationError,
  errorMessage,
  type PipelineStage,
} from './errors/pipeline.errors';
