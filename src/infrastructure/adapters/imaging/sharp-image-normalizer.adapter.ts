import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import type { AppConfig } from '../../../config/configuration';
import { ValidationError, errorMessage } from '../../../domain/errors/pipeline.errors';
import type { UploadedImageVO } from '../../../domain/value-objects/uploaded-image.vo';
import type {
  ColorMode,
  ImageNormalizerPort,
  NormalizedImage,
} from '../../../application/ports/output/image-normalizer.port';

/**
 * Sharp Image Normalizer Adapter
 * Implements ImageNormalizerPort using sharp (libvips)
 */
@Injectable()
export class SharpImageNormalizerAdapter implements ImageNormalizerPort {
  private readonly logger = new Logger(SharpImageNormalizerAdapter.name);
  private readonly maxWidth: number;
  private readonly maxHeight: number;

  constructor(configService: ConfigService<AppConfig>) {
    const processing = configService.getOrThrow('processing', { infer: true });
    this.maxWidth = processing.maxWidth;
    this.maxHeight = processing.maxHeight;
  }

  async normalize(image: UploadedImageVO): Promise<NormalizedImage> {
    try {
      return await this.transform(image);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      throw new ValidationError(`Invalid image file: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async transform(image: UploadedImageVO): Promise<NormalizedImage> {
    // failOn 'error' rejects truncated or corrupt data instead of decoding garbage
    let pipeline = sharp(image.data, { failOn: 'error' });
    const metadata = await pipeline.metadata();

    const originalWidth = metadata.width ?? 0;
    const originalHeight = metadata.height ?? 0;
    if (!originalWidth || !originalHeight) {
      throw new ValidationError('Invalid image file: unable to read dimensions');
    }

    if (metadata.hasAlpha) {
      pipeline = pipeline.flatten({ background: '#ffffff' });
    }

    if (originalWidth > this.maxWidth || originalHeight > this.maxHeight) {
      pipeline = pipeline.resize({
        width: this.maxWidth,
        height: this.maxHeight,
        fit: 'inside',
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      });
    }

    const colorMode: ColorMode =
      metadata.space === 'b-w' || metadata.channels === 1 || metadata.channels === 2
        ? 'grayscale'
        : 'rgb';
    pipeline = pipeline.toColourspace(colorMode === 'grayscale' ? 'b-w' : 'srgb');

    const format = metadata.format === 'jpeg' ? 'jpeg' : 'png';
    pipeline = format === 'jpeg' ? pipeline.jpeg({ quality: 90 }) : pipeline.png();

    const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });

    this.logger.debug(
      `Normalized ${image.filename}: ${originalWidth}x${originalHeight} -> ${info.width}x${info.height} (${colorMode}, ${format})`,
    );

    return {
      data,
      format,
      contentType: format === 'jpeg' ? 'image/jpeg' : 'image/png',
      extension: format === 'jpeg' ? 'jpg' : 'png',
      width: info.width,
      height: info.height,
      originalWidth,
      originalHeight,
      colorMode,
    };
  }
}
