import { FileOutcome } from '../../domain/entities/file-outcome.entity';

export type OcrResultDto =
  | { filename: string; text: string; summary: string; image: string }
  | { filename: string; text: string; summary: string; image_url: string; image_key: string }
  | { filename: string; error: string };

export interface OcrResponseDto {
  results: OcrResultDto[];
}

export function toOcrResultDto(outcome: FileOutcome): OcrResultDto {
  if (!FileOutcome.isSucceeded(outcome)) {
    return { filename: outcome.filename, error: outcome.error };
  }

  const { filename, text, summary, image } = outcome;
  if (image.type === 'inline') {
    return { filename, text, summary, image: image.data.toString('base64') };
  }
  return { filename, text, summary, image_url: image.url, image_key: image.key };
}
