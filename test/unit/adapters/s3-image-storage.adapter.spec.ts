import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { S3ImageStorageAdapter } from '../../../src/infrastructure/adapters/storage/s3-image-storage.adapter';
import { S3Service } from '../../../src/shared/aws/s3/s3.service';
import { StorageError } from '../../../src/domain/errors/pipeline.errors';
import { createTestConfig, createTestLogger } from '../helpers/test-config';

const UUID_PNG_KEY = /^uploads\/[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.png$/;

describe('S3ImageStorageAdapter', () => {
  let s3Service: S3Service;
  let adapter: S3ImageStorageAdapter;

  beforeEach(() => {
    const config = createTestConfig({
      STORAGE_BACKEND: 's3',
      S3_BUCKET_NAME: 'test-bucket',
      SIGNED_URL_TTL_SECONDS: '7200',
    });
    s3Service = new S3Service(config, createTestLogger(config));
    adapter = new S3ImageStorageAdapter(s3Service, config);

    vi.spyOn(s3Service, 'uploadBuffer').mockImplementation(async (key, buffer) => ({
      key: s3Service.getFullKey(key),
      etag: '"etag"',
      size: buffer.length,
    }));
    vi.spyOn(s3Service, 'getSignedDownloadUrl').mockImplementation(
      async (key) => `https://test-bucket.s3.amazonaws.com/${key}?X-Amz-Expires=7200`,
    );
  });

  it('should upload under a fresh uuid key and return a signed url', async () => {
    const before = Date.now();

    const stored = await adapter.store(Buffer.from('png-bytes'), 'Scan 01.PNG', 'image/png');

    expect(stored.key).toMatch(UUID_PNG_KEY);
    expect(stored.bucket).toBe('test-bucket');
    expect(stored.contentType).toBe('image/png');
    expect(stored.url).toBe(`https://test-bucket.s3.amazonaws.com/${stored.key}?X-Amz-Expires=7200`);
    expect(stored.expiresAt.getTime()).toBeGreaterThanOrEqual(before + 7200 * 1000);
    expect(s3Service.getSignedDownloadUrl).toHaveBeenCalledWith(stored.key, 7200);
    expect(s3Service.uploadBuffer).toHaveBeenCalledWith(
      expect.stringMatching(/\.png$/),
      Buffer.from('png-bytes'),
      { contentType: 'image/png', metadata: { 'original-filename': 'Scan%2001.PNG' } },
    );
  });

  it('should never reuse a key', async () => {
    const first = await adapter.store(Buffer.from('a'), 'same.png', 'image/png');
    const second = await adapter.store(Buffer.from('b'), 'same.png', 'image/png');

    expect(first.key).not.toBe(second.key);
  });

  it('should fall back to a neutral extension for odd names', async () => {
    const stored = await adapter.store(Buffer.from('x'), 'no-extension', 'application/octet-stream');

    expect(stored.key).toMatch(/\.bin$/);
  });

  it('should wrap upload failures in StorageError', async () => {
    vi.spyOn(s3Service, 'uploadBuffer').mockRejectedValue(new Error('AccessDenied'));

    await expect(adapter.store(Buffer.from('x'), 'a.png', 'image/png')).rejects.toThrow(
      new StorageError('Failed to store image: AccessDenied'),
    );
  });

  it('should download an object by key', async () => {
    vi.spyOn(s3Service, 'downloadBuffer').mockResolvedValue({ body: Buffer.from('stored') });

    await expect(adapter.retrieve('abc.png')).resolves.toEqual(Buffer.from('stored'));
    expect(s3Service.downloadBuffer).toHaveBeenCalledWith('abc.png');
  });

  it('should wrap download failures in StorageError', async () => {
    vi.spyOn(s3Service, 'downloadBuffer').mockRejectedValue(new Error('NoSuchKey'));

    await expect(adapter.retrieve('gone.png')).rejects.toThrow(
      'Failed to retrieve image gone.png: NoSuchKey',
    );
  });

  it('should recover the object name from a presigned url', () => {
    expect(
      adapter.keyFromUrl(
        'https://test-bucket.s3.amazonaws.com/uploads/0b5e-file%20name.png?X-Amz-Signature=abc',
      ),
    ).toBe('0b5e-file name.png');
  });

  it('should reject urls without an object name', () => {
    expect(() => adapter.keyFromUrl('https://test-bucket.s3.amazonaws.com/')).toThrow(StorageError);
    expect(() => adapter.keyFromUrl('not a url')).toThrow('Invalid image URL');
  });

  it('should report the bucket when it is reachable', async () => {
    vi.spyOn(s3Service, 'headBucket').mockResolvedValue({ bucket: 'test-bucket' });

    await expect(adapter.checkReachability()).resolves.toEqual({ backend: 's3', bucket: 'test-bucket' });
  });

  it('should fail the reachability check when HeadBucket fails', async () => {
    vi.spyOn(s3Service, 'headBucket').mockRejectedValue(new Error('Forbidden'));

    await expect(adapter.checkReachability()).rejects.toThrow(
      'Bucket test-bucket is not reachable: Forbidden',
    );
  });
});

describe('S3Service.getFullKey', () => {
  it('should add the prefix once', () => {
    const config = createTestConfig({ S3_PREFIX: 'images/' });
    const service = new S3Service(config, createTestLogger(config));

    expect(service.getFullKey('a.png')).toBe('images/a.png');
    expect(service.getFullKey('images/a.png')).toBe('images/a.png');
  });
});

describe('S3ImageStorageAdapter against an in-memory bucket', () => {
  const objects = new Map<string, Buffer>();
  let adapter: S3ImageStorageAdapter;

  beforeEach(() => {
    objects.clear();
    // Upload sends a single PutObject for bodies smaller than one part
    vi.spyOn(S3Client.prototype, 'send').mockImplementation(async (command) => {
      if (command instanceof PutObjectCommand) {
        const { Bucket, Key, Body } = command.input;
        if (!(Body instanceof Uint8Array)) {
          throw new Error('Expected a byte body');
        }
        objects.set(`${Bucket}/${Key}`, Buffer.from(Body));
        return { ETag: '"etag-1"' };
      }
      if (command instanceof GetObjectCommand) {
        const stored = objects.get(`${command.input.Bucket}/${command.input.Key}`);
        if (!stored) {
          throw new Error('NoSuchKey');
        }
        return {
          Body: { transformToByteArray: async () => new Uint8Array(stored) },
          ContentType: 'image/png',
        };
      }
      if (command instanceof HeadBucketCommand) {
        return { BucketRegion: 'us-east-1' };
      }
      throw new Error(`Unexpected command ${command.constructor.name}`);
    });

    const config = createTestConfig({
      STORAGE_BACKEND: 's3',
      S3_BUCKET_NAME: 'test-bucket',
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });
    adapter = new S3ImageStorageAdapter(new S3Service(config, createTestLogger(config)), config);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return identical bytes by issued key and by signed url', async () => {
    const data = Buffer.from(Array.from({ length: 4096 }, (_, i) => i % 251));

    const stored = await adapter.store(data, 'receipt.png', 'image/png');

    expect(stored.key).toMatch(UUID_PNG_KEY);
    expect(objects.has(`test-bucket/${stored.key}`)).toBe(true);
    expect(new URL(stored.url).searchParams.get('X-Amz-Expires')).toBe('3600');

    const byKey = await adapter.retrieve(stored.key);
    const byUrl = await adapter.retrieve(adapter.keyFromUrl(stored.url));

    expect(byKey.equals(data)).toBe(true);
    expect(byUrl.equals(data)).toBe(true);
  });

  it('should surface a missing object as StorageError', async () => {
    await expect(adapter.retrieve('missing.png')).rejects.toThrow(
      new StorageError('Failed to retrieve image missing.png: NoSuchKey'),
    );
  });

  it('should reach the bucket through HeadBucket', async () => {
    await expect(adapter.checkReachability()).resolves.toEqual({ backend: 's3', bucket: 'test-bucket' });
  });
});
