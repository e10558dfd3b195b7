import { describe, it, expect, beforeEach } from 'vitest';
import sharp from 'sharp';
import { SharpImageNormalizerAdapter } from '../../../src/infrastructure/adapters/imaging/sharp-image-normalizer.adapter';
import { UploadedImageVO } from '../../../src/domain/value-objects/uploaded-image.vo';
import { ValidationError } from '../../../src/domain/errors/pipeline.errors';
import { createTestConfig } from '../helpers/test-config';
import { CORRUPT_PNG, createJpeg, createPng } from '../helpers/test-images';

const upload = (filename: string, data: Buffer) =>
  UploadedImageVO.create({ filename, contentType: 'image/png', data }, { maxBytes: 10 * 1024 * 1024 });

describe('SharpImageNormalizerAdapter', () => {
  let adapter: SharpImageNormalizerAdapter;

  beforeEach(() => {
    adapter = new SharpImageNormalizerAdapter(createTestConfig());
  });

  it('should downscale a wide image to fit the bounds and keep the aspect ratio', async () => {
    const result = await adapter.normalize(upload('wide.png', await createPng(1600, 900)));

    expect(result.originalWidth).toBe(1600);
    expect(result.originalHeight).toBe(900);
    expect(result.width).toBe(800);
    expect(result.height).toBe(450);
    expect(result.format).toBe('png');
    expect(result.contentType).toBe('image/png');
  });

  it('should downscale a tall image by its height', async () => {
    const result = await adapter.normalize(upload('tall.png', await createPng(500, 2000)));

    expect(result.width).toBe(200);
    expect(result.height).toBe(800);
  });

  it('should leave images within bounds at their size', async () => {
    const result = await adapter.normalize(upload('small.png', await createPng(120, 80)));

    expect(result.width).toBe(120);
    expect(result.height).toBe(80);
  });

  it('should honor configured bounds', async () => {
    adapter = new SharpImageNormalizerAdapter(
      createTestConfig({ IMAGE_MAX_WIDTH: '100', IMAGE_MAX_HEIGHT: '100' }),
    );

    const result = await adapter.normalize(upload('wide.png', await createPng(400, 200)));

    expect(result.width).toBe(100);
    expect(result.height).toBe(50);
  });

  it('should flatten transparency and produce RGB output', async () => {
    const result = await adapter.normalize(upload('alpha.png', await createPng(50, 50, { alpha: true })));
    const metadata = await sharp(result.data).metadata();

    expect(result.colorMode).toBe('rgb');
    expect(metadata.hasAlpha).toBe(false);
    expect(metadata.channels).toBe(3);
  });

  it('should keep grayscale images single-channel', async () => {
    const result = await adapter.normalize(
      upload('gray.png', await createPng(60, 40, { grayscale: true })),
    );
    const metadata = await sharp(result.data).metadata();

    expect(result.colorMode).toBe('grayscale');
    expect(metadata.channels).toBe(1);
  });

  it('should keep JPEG input as JPEG', async () => {
    const result = await adapter.normalize(upload('photo.jpg', await createJpeg(64, 64)));

    expect(result.format).toBe('jpeg');
    expect(result.extension).toBe('jpg');
    expect(result.data.subarray(0, 3)).toEqual(Buffer.from([0xff, 0xd8, 0xff]));
  });

  it('should reject bytes that are not an image', async () => {
    await expect(adapter.normalize(upload('fake.png', Buffer.from('plain text')))).rejects.toThrow(
      ValidationError,
    );
  });

  it('should reject a corrupt image with an invalid image message', async () => {
    await expect(adapter.normalize(upload('broken.png', CORRUPT_PNG))).rejects.toThrow(
      /^Invalid image file: /,
    );
  });
});
