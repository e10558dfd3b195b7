/**
 * One result to lay out in the report
 */
export interface ReportEntry {
  page?: number;
  filename?: string;
  summary: string;
  text: string;
  image?: Buffer;
}

/**
 * Report Renderer Port (Driven Port)
 * Produces a paginated PDF; images that cannot be embedded are skipped.
 */
export interface ReportRendererPort {
  render(entries: ReadonlyArray<ReportEntry>): Promise<Buffer>;
}
