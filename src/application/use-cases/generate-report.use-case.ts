import { Inject, Injectable, Optional } from '@nestjs/common';
import { errorMessage } from '../../domain/errors/pipeline.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type {
  GenerateReportCommand,
  GenerateReportPort,
  GenerateReportResult,
  ReportRequestEntry,
} from '../ports/input/generate-report.port';
import type { ImageStoragePort } from '../ports/output/image-storage.port';
import type { ReportEntry, ReportRendererPort } from '../ports/output/report-renderer.port';
import { IMAGE_STORAGE_PORT, REPORT_RENDERER_PORT } from '../ports/output/injection-tokens';

/**
 * Generate Report Use Case
 * Resolves each entry's image (inline base64 or a stored object) and renders the PDF.
 * An image that cannot be resolved is left out; the entry is still rendered.
 */
@Injectable()
export class GenerateReportUseCase implements GenerateReportPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(REPORT_RENDERER_PORT)
    private readonly reportRenderer: ReportRendererPort,
    logger: PinoLoggerService,
    @Optional()
    @Inject(IMAGE_STORAGE_PORT)
    private readonly imageStorage: ImageStoragePort | null = null,
  ) {
    this.logger = logger.forContext(GenerateReportUseCase.name);
  }

  async execute(command: GenerateReportCommand): Promise<GenerateReportResult> {
    const logger = this.logger.withCorrelationId(command.correlationId);
    let skippedImages = 0;

    const entries: ReportEntry[] = [];
    for (const entry of command.entries) {
      let image: Buffer | undefined;
      try {
        image = await this.resolveImage(entry);
      } catch (error) {
        skippedImages++;
        logger.warn(
          { filename: entry.filename, page: entry.page, error: errorMessage(error) },
          'Skipping report image',
        );
      }

      entries.push({
        page: entry.page,
        filename: entry.filename,
        summary: entry.summary,
        text: entry.text,
        image,
      });
    }

    const pdf = await this.reportRenderer.render(entries);

    logger.info(
      { entryCount: entries.length, skippedImages, bytes: pdf.length },
      'Report generated',
    );

    return { pdf, entryCount: entries.length, skippedImages };
  }

  private async resolveImage(entry: ReportRequestEntry): Promise<Buffer | undefined> {
    if (entry.image) {
      return decodeBase64Image(entry.image);
    }

    if (!entry.imageKey && !entry.imageUrl) {
      return undefined;
    }

    if (!this.imageStorage) {
      throw new Error('Image references require a storage backend');
    }

    const key = entry.imageKey ?? this.imageStorage.keyFromUrl(entry.imageUrl ?? '');
    return this.imageStorage.retrieve(key);
  }
}

/**
 * Accepts raw base64 or a data URL
 */
function decodeBase64Image(value: string): Buffer {
  const payload = value.startsWith('data:') ? value.slice(value.indexOf(',') + 1) : value;
  const data = Buffer.from(payload, 'base64');
  if (data.length === 0) {
    throw new Error('Image is not valid base64');
  }
  return data;
}
