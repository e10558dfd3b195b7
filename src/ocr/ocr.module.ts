import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { GenerateReportUseCase, ProcessUploadsUseCase } from '../application/use-cases';
import { GENERATE_REPORT_PORT, PROCESS_UPLOADS_PORT } from '../application/ports/input';
import { OcrController } from './controllers/ocr.controller';

/**
 * HTTP driving adapter: upload processing and report download
 */
@Module({
  imports: [ApplicationModule],
  controllers: [OcrController],
  providers: [
    { provide: PROCESS_UPLOADS_PORT, useExisting: ProcessUploadsUseCase },
    { provide: GENERATE_REPORT_PORT, useExisting: GenerateReportUseCase },
  ],
})
export class OcrModule {}
