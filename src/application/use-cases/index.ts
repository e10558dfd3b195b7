/**
 * Use Cases Barrel Export
 */
export { ProcessUploadsUseCase } from './process-uploads.use-case';
export { GenerateReportUseCase } from './generate-report.use-case';
