import { z } from 'zod';
import type { ReportRequestEntry } from '../../application/ports/input/generate-report.port';

export const ReportResultSchema = z.object({
  page: z.number().int().positive().optional(),
  filename: z.string().optional(),
  summary: z.string(),
  text: z.string(),
  image: z.string().optional(), // base64 or data URL
  image_url: z.string().url().optional(),
  image_key: z.string().min(1).optional(),
});

export const GenerateReportRequestSchema = z.object({
  results: z.array(ReportResultSchema).min(1, 'results must contain at least one entry'),
});

export type ReportResultDto = z.infer<typeof ReportResultSchema>;
export type GenerateReportRequestDto = z.infer<typeof GenerateReportRequestSchema>;

export function toReportRequestEntry(dto: ReportResultDto): ReportRequestEntry {
  return {
    page: dto.page,
    filename: dto.filename,
    summary: dto.summary,
    text: dto.text,
    image: dto.image,
    imageKey: dto.image_key,
    imageUrl: dto.image_url,
  };
}
