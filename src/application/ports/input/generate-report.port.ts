/**
 * A result entry as supplied by the client. The image comes either inline
 * (base64) or as a reference to an object issued by the storage backend.
 */
export interface ReportRequestEntry {
  page?: number;
  filename?: string;
  summary: string;
  text: string;
  image?: string;
  imageKey?: string;
  imageUrl?: string;
}

/**
 * Generate Report Command
 */
export interface GenerateReportCommand {
  entries: ReportRequestEntry[];
  correlationId?: string;
}

/**
 * Generate Report Result
 */
export interface GenerateReportResult {
  pdf: Buffer;
  entryCount: number;
  skippedImages: number;
}

/**
 * Generate Report Port (Driving Port / Use Case Interface)
 */
export interface GenerateReportPort {
  execute(command: GenerateReportCommand): Promise<GenerateReportResult>;
}
