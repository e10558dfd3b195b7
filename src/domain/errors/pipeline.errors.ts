/**
 * Pipeline stage in which a per-file failure happened.
 */
export type PipelineStage =
  | 'validation'
  | 'extraction'
  | 'summarization'
  | 'storage'
  | 'configuration';

/**
 * Base class for every error the upload pipeline raises on purpose.
 * Anything else reaching the orchestrator is attributed to the stage that was running.
 */
export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input: empty file, disallowed type, corrupt image, oversize. */
export class ValidationError extends PipelineError {
  readonly stage = 'validation' as const;
}

/** OCR engine invocation failed or timed out. */
export class ExtractionError extends PipelineError {
  readonly stage = 'extraction' as const;
}

/** Upstream chat-completion API failed. */
export class SummarizationError extends PipelineError {
  readonly stage = 'summarization' as const;
}

/** Object storage upload or download failed. */
export class StorageError extends PipelineError {
  readonly stage = 'storage' as const;
}

/** Missing or invalid configuration (credentials, bucket, environment). */
export class ConfigurationError extends PipelineError {
  readonly stage = 'configuration' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
