import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Req,
  StreamableFile,
} from '@nestjs/common';
import type { ProcessUploadsPort } from '../../application/ports/input/process-uploads.port';
import type { GenerateReportPort } from '../../application/ports/input/generate-report.port';
import { PROCESS_UPLOADS_PORT, GENERATE_REPORT_PORT } from '../../application/ports/input';
import { CORRELATION_ID_HEADER } from '../../shared/logging/correlation-id.middleware';
import { ZodValidationPipe } from '../../shared/http/zod-validation.pipe';
import {
  GenerateReportRequestSchema,
  toReportRequestEntry,
} from '../dto/generate-report.dto';
import type { GenerateReportRequestDto } from '../dto/generate-report.dto';
import { toOcrResultDto } from '../dto/ocr-result.dto';
import type { OcrResponseDto } from '../dto/ocr-result.dto';
import { readUploadedFiles } from '../multipart/read-uploaded-files';
import type { MultipartRequest } from '../multipart/read-uploaded-files';

export const REPORT_FILENAME = 'ocr_results.pdf';

@Controller()
export class OcrController {
  constructor(
    @Inject(PROCESS_UPLOADS_PORT)
    private readonly processUploads: ProcessUploadsPort,
    @Inject(GENERATE_REPORT_PORT)
    private readonly generateReport: GenerateReportPort,
  ) {}

  @Post('ocr')
  @HttpCode(HttpStatus.OK)
  async ocr(
    @Req() request: MultipartRequest,
    @Headers(CORRELATION_ID_HEADER) correlationId?: string,
  ): Promise<OcrResponseDto> {
    const files = await readUploadedFiles(request);
    const outcomes = await this.processUploads.execute({ files, correlationId });
    return { results: outcomes.map(toOcrResultDto) };
  }

  @Post('generate-pdf')
  @HttpCode(HttpStatus.OK)
  async generatePdf(
    @Body(new ZodValidationPipe(GenerateReportRequestSchema)) body: GenerateReportRequestDto,
    @Headers(CORRELATION_ID_HEADER) correlationId?: string,
  ): Promise<StreamableFile> {
    const { pdf } = await this.generateReport.execute({
      entries: body.results.map(toReportRequestEntry),
      correlationId,
    });

    return new StreamableFile(pdf, {
      type: 'application/pdf',
      disposition: `attachment; filename="${REPORT_FILENAME}"`,
      length: pdf.length,
    });
  }
}
