import type { FileOutcome } from '../../../domain/entities/file-outcome.entity';

/**
 * A file as received from the multipart body
 */
export interface UploadedFile {
  filename: string;
  contentType: string;
  data: Buffer;
  truncated: boolean;
}

/**
 * Process Uploads Command
 */
export interface ProcessUploadsCommand {
  files: UploadedFile[];
  correlationId?: string;
}

/**
 * Process Uploads Port (Driving Port / Use Case Interface)
 * Runs every file through validate → extract → summarize → store.
 * Never rejects because of a single file; the outcomes keep request order.
 */
export interface ProcessUploadsPort {
  execute(command: ProcessUploadsCommand): Promise<FileOutcome[]>;
}
