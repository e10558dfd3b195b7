import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, GetObjectCommand, HeadBucketCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  cacheControl?: string;
}

export interface DownloadResult {
  body: Buffer;
  contentType?: string;
  etag?: string;
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly client: S3Client;
  private readonly bucketName: string;
  private readonly prefix: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const storageConfig = this.configService.getOrThrow('storage', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = storageConfig.bucketName;
    this.prefix = storageConfig.prefix;

    this.logger = logger.forContext(S3Service.name);
  }

  get bucket(): string {
    return this.bucketName;
  }

  /**
   * Upload a buffer to S3
   */
  async uploadBuffer(
    key: string,
    buffer: Buffer,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const fullKey = this.getFullKey(key);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucketName,
        Key: fullKey,
        Body: buffer,
        ContentType: options?.contentType,
        Metadata: options?.metadata,
        CacheControl: options?.cacheControl,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    const result = await upload.done();

    this.logger.info(
      { key: fullKey, size: buffer.length },
      'Buffer uploaded successfully',
    );

    return {
      key: fullKey,
      etag: result.ETag || '',
      size: buffer.length,
    };
  }

  /**
   * Download an object fully into memory
   */
  async downloadBuffer(key: string): Promise<DownloadResult> {
    const fullKey = this.getFullKey(key);

    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucketName,
        Key: fullKey,
      }),
    );

    if (!response.Body) {
      throw new Error(`Empty body for s3://${this.bucketName}/${fullKey}`);
    }

    const body = Buffer.from(await response.Body.transformToByteArray());

    this.logger.debug({ key: fullKey, size: body.length }, 'Object downloaded');

    return {
      body,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  /**
   * Check that the bucket exists and the credentials can reach it
   */
  async headBucket(): Promise<{ bucket: string; region?: string }> {
    const response = await this.client.send(
      new HeadBucketCommand({
        Bucket: this.bucketName,
      }),
    );

    return {
      bucket: this.bucketName,
      region: response.BucketRegion,
    };
  }

  async getSignedDownloadUrl(key: string, expiresInSeconds = 3600): Promise<string> {
    const fullKey = this.getFullKey(key);

    const command = new GetObjectCommand({
      Bucket: this.bucketName,
      Key: fullKey,
    });

    return getSignedUrl(this.client, command, {
      expiresIn: expiresInSeconds,
    });
  }

  getFullKey(key: string): string {
    if (key.startsWith(this.prefix)) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
