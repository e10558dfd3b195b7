import type { PipelineStage } from '../errors/pipeline.errors';

/**
 * Where the processed image of a successful upload lives.
 */
export type ImageReference =
  | {
      readonly type: 'inline';
      readonly data: Buffer;
      readonly contentType: string;
    }
  | {
      readonly type: 'stored';
      readonly key: string;
      readonly url: string;
      readonly contentType: string;
      readonly expiresAt: Date;
    };

export interface FileSucceeded {
  readonly status: 'succeeded';
  readonly filename: string;
  readonly text: string;
  readonly summary: string;
  readonly image: ImageReference;
}

export interface FileFailed {
  readonly status: 'failed';
  readonly filename: string;
  readonly stage: PipelineStage;
  readonly error: string;
}

/**
 * Outcome of running one uploaded file through the pipeline.
 * Exactly one variant per file; a batch keeps them in request order.
 */
export type FileOutcome = FileSucceeded | FileFailed;

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace FileOutcome {
  export function succeeded(props: Omit<FileSucceeded, 'status'>): FileSucceeded {
    const outcome: FileSucceeded = { status: 'succeeded', ...props };
    return Object.freeze(outcome);
  }

  export function failed(props: Omit<FileFailed, 'status'>): FileFailed {
    const outcome: FileFailed = { status: 'failed', ...props };
    return Object.freeze(outcome);
  }

  export function isSucceeded(outcome: FileOutcome): outcome is FileSucceeded {
    return outcome.status === 'succeeded';
  }

  export function summarize(outcomes: ReadonlyArray<FileOutcome>): {
    total: number;
    succeeded: number;
    failed: number;
  } {
    const succeeded = outcomes.filter(isSucceeded).length;
    return { total: outcomes.length, succeeded, failed: outcomes.length - succeeded };
  }
}
