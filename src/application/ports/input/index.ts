/**
 * Input Ports (Driving Ports) Barrel Export
 */
export type {
  ProcessUploadsPort,
  ProcessUploadsCommand,
  UploadedFile,
} from './process-uploads.port';
export type {
  GenerateReportPort,
  GenerateReportCommand,
  GenerateReportResult,
  ReportRequestEntry,
} from './generate-report.port';

// Injection tokens for the driving side
export const PROCESS_UPLOADS_PORT = 'ProcessUploadsPort';
export const GENERATE_REPORT_PORT = 'GenerateReportPort';
