import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../../../config/configuration';
import { StorageError, errorMessage } from '../../../domain/errors/pipeline.errors';
import type {
  ImageStoragePort,
  StoredImage,
} from '../../../application/ports/output/image-storage.port';
import { S3Service } from '../../../shared/aws/s3/s3.service';

/**
 * S3 Image Storage Adapter
 * Implements ImageStoragePort using AWS S3 and presigned GET URLs
 */
@Injectable()
export class S3ImageStorageAdapter implements ImageStoragePort {
  readonly backend = 's3';

  private readonly logger = new Logger(S3ImageStorageAdapter.name);
  private readonly signedUrlTtlSeconds: number;

  constructor(
    private readonly s3Service: S3Service,
    configService: ConfigService<AppConfig>,
  ) {
    this.signedUrlTtlSeconds = configService.getOrThrow('storage', { infer: true }).signedUrlTtlSeconds;
  }

  async store(data: Buffer, suggestedName: string, contentType: string): Promise<StoredImage> {
    const key = `${uuidv4()}.${this.extensionFor(suggestedName)}`;

    try {
      const uploaded = await this.s3Service.uploadBuffer(key, data, {
        contentType,
        metadata: { 'original-filename': encodeURIComponent(suggestedName) },
      });
      const url = await this.s3Service.getSignedDownloadUrl(uploaded.key, this.signedUrlTtlSeconds);

      this.logger.debug(`Stored ${suggestedName} as ${uploaded.key}`);

      return {
        key: uploaded.key,
        bucket: this.s3Service.bucket,
        contentType,
        url,
        expiresAt: new Date(Date.now() + this.signedUrlTtlSeconds * 1000),
      };
    } catch (error) {
      throw new StorageError(`Failed to store image: ${errorMessage(error)}`, { cause: error });
    }
  }

  async retrieve(key: string): Promise<Buffer> {
    try {
      const result = await this.s3Service.downloadBuffer(key);
      return result.body;
    } catch (error) {
      throw new StorageError(`Failed to retrieve image ${key}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Presigned URLs end with the object name; the prefix is restored on retrieve
   */
  keyFromUrl(url: string): string {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch (error) {
      throw new StorageError(`Invalid image URL: ${errorMessage(error)}`, { cause: error });
    }

    const segment = pathname.split('/').filter(Boolean).pop();
    if (!segment) {
      throw new StorageError(`Image URL has no object key: ${url}`);
    }
    return decodeURIComponent(segment);
  }

  async checkReachability(): Promise<Record<string, unknown>> {
    try {
      const result = await this.s3Service.headBucket();
      return { backend: this.backend, bucket: result.bucket };
    } catch (error) {
      throw new StorageError(`Bucket ${this.s3Service.bucket} is not reachable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private extensionFor(filename: string): string {
    const dot = filename.lastIndexOf('.');
    const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
    return /^[a-z0-9]{1,5}$/.test(extension) ? extension : 'bin';
  }
}
