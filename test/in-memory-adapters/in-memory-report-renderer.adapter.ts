import { Injectable } from '@nestjs/common';
import type {
  ReportEntry,
  ReportRendererPort,
} from '../../src/application/ports/output/report-renderer.port';

/**
 * In-Memory Report Renderer Adapter
 * Records what it was asked to render and returns a placeholder document
 */
@Injectable()
export class InMemoryReportRendererAdapter implements ReportRendererPort {
  readonly rendered: ReportEntry[][] = [];

  async render(entries: ReadonlyArray<ReportEntry>): Promise<Buffer> {
    this.rendered.push([...entries]);
    return Buffer.from(`%PDF-fake ${entries.length}`);
  }
}
