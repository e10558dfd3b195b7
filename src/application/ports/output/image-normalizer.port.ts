import type { UploadedImageVO } from '../../../domain/value-objects/uploaded-image.vo';

export type ColorMode = 'grayscale' | 'rgb';

/**
 * Decoded, downscaled and re-encoded image ready for OCR
 */
export interface NormalizedImage {
  data: Buffer;
  format: 'png' | 'jpeg';
  contentType: string;
  extension: string;
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
  colorMode: ColorMode;
}

/**
 * Image Normalizer Port (Driven Port)
 * Decodes and verifies an upload, downsamples oversized images and normalizes the color mode.
 * Throws ValidationError when the bytes are not a decodable image.
 */
export interface ImageNormalizerPort {
  normalize(image: UploadedImageVO): Promise<NormalizedImage>;
}
