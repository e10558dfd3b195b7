import { describe, it, expect, beforeEach, vi } from 'vitest';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as tesseract from 'node-tesseract-ocr';
import { TesseractTextExtractorAdapter } from '../../../src/infrastructure/adapters/ocr/tesseract-text-extractor.adapter';
import { GoogleVisionTextExtractorAdapter } from '../../../src/infrastructure/adapters/ocr/google-vision-text-extractor.adapter';
import type { NormalizedImage } from '../../../src/application/ports/output/image-normalizer.port';
import { ExtractionError } from '../../../src/domain/errors/pipeline.errors';
import { createTestConfig } from '../helpers/test-config';

const { annotateImage, close } = vi.hoisted(() => ({
  annotateImage: vi.fn(),
  close: vi.fn(async () => undefined),
}));

vi.mock('node-tesseract-ocr', () => ({
  recognize: vi.fn(),
}));

vi.mock('@google-cloud/vision', () => ({
  ImageAnnotatorClient: vi.fn(function () {
    return { annotateImage, close };
  }),
}));

const image: NormalizedImage = {
  data: Buffer.from([0x89, 0x50, 0x4e, 0x47]),
  format: 'png',
  contentType: 'image/png',
  extension: 'png',
  width: 10,
  height: 10,
  originalWidth: 10,
  originalHeight: 10,
  colorMode: 'rgb',
};

describe('TesseractTextExtractorAdapter', () => {
  const recognize = vi.mocked(tesseract.recognize);

  beforeEach(() => {
    recognize.mockReset();
  });

  it('should pass the image file and configured languages to tesseract', async () => {
    recognize.mockResolvedValue('  안녕하세요 Hello\n\n');
    const adapter = new TesseractTextExtractorAdapter(
      createTestConfig({ OCR_LANGUAGES: 'kor+eng', TESSERACT_BINARY: '/opt/bin/tesseract' }),
    );

    const text = await adapter.extractText(image);

    expect(text).toBe('안녕하세요 Hello');
    expect(recognize).toHaveBeenCalledWith(expect.stringMatching(/ocr-[^/\\]+[/\\]image\.png$/), {
      lang: 'kor+eng',
      oem: 1,
      psm: 3,
      binary: '/opt/bin/tesseract',
    });
    expect(adapter.engine).toBe('tesseract');
  });

  it('should hand tesseract a temp file with the image bytes and remove it afterwards', async () => {
    let imagePath = '';
    let written = Buffer.alloc(0);
    recognize.mockImplementation(async (input) => {
      imagePath = String(input);
      written = await readFile(imagePath);
      return 'text';
    });
    const adapter = new TesseractTextExtractorAdapter(createTestConfig());

    await adapter.extractText(image);

    expect(written.equals(image.data)).toBe(true);
    expect(existsSync(imagePath)).toBe(false);
  });

  it('should remove the temp file when tesseract fails', async () => {
    let imagePath = '';
    recognize.mockImplementation(async (input) => {
      imagePath = String(input);
      throw new Error('exit code 1');
    });
    const adapter = new TesseractTextExtractorAdapter(createTestConfig());

    await expect(adapter.extractText(image)).rejects.toThrow('OCR failed: exit code 1');
    expect(imagePath).not.toBe('');
    expect(existsSync(imagePath)).toBe(false);
  });

  it('should return an empty string when nothing is recognized', async () => {
    recognize.mockResolvedValue('\n');
    const adapter = new TesseractTextExtractorAdapter(createTestConfig());

    await expect(adapter.extractText(image)).resolves.toBe('');
  });

  it('should wrap engine failures in ExtractionError', async () => {
    recognize.mockRejectedValue(new Error('tesseract: command not found'));
    const adapter = new TesseractTextExtractorAdapter(createTestConfig());

    await expect(adapter.extractText(image)).rejects.toThrow(
      new ExtractionError('OCR failed: tesseract: command not found'),
    );
  });

  it('should fail with ExtractionError when the engine exceeds the deadline', async () => {
    let finish: (text: string) => void = () => undefined;
    recognize.mockReturnValue(
      new Promise<string>((resolve) => {
        finish = resolve;
      }),
    );
    const adapter = new TesseractTextExtractorAdapter(createTestConfig({ OCR_TIMEOUT_MS: '20' }));

    await expect(adapter.extractText(image)).rejects.toThrow(
      'OCR failed: Tesseract OCR timed out after 20ms',
    );
    finish('');
  });

  it('should keep a timed-out run counted until tesseract exits', async () => {
    let finishFirst: (text: string) => void = () => undefined;
    recognize
      .mockImplementationOnce(
        () =>
          new Promise<string>((resolve) => {
            finishFirst = resolve;
          }),
      )
      .mockResolvedValueOnce('second page');
    const adapter = new TesseractTextExtractorAdapter(
      createTestConfig({ OCR_TIMEOUT_MS: '20', PROCESSING_CONCURRENCY: '1' }),
    );

    await expect(adapter.extractText(image)).rejects.toThrow('timed out after 20ms');
    expect(adapter.liveRuns).toBe(1);

    const second = adapter.extractText(image);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(recognize).toHaveBeenCalledTimes(1);

    finishFirst('late text');

    await expect(second).resolves.toBe('second page');
    expect(recognize).toHaveBeenCalledTimes(2);
    expect(adapter.liveRuns).toBe(0);
  });
});

describe('GoogleVisionTextExtractorAdapter', () => {
  beforeEach(() => {
    annotateImage.mockReset();
  });

  it('should request document text detection with language hints', async () => {
    annotateImage.mockResolvedValue([{ fullTextAnnotation: { text: 'Invoice 42\n' } }]);
    const adapter = new GoogleVisionTextExtractorAdapter(
      createTestConfig({ OCR_ENGINE: 'google-vision', VISION_LANGUAGE_HINTS: 'ko, en' }),
    );

    const text = await adapter.extractText(image);

    expect(text).toBe('Invoice 42');
    expect(annotateImage).toHaveBeenCalledWith({
      image: { content: image.data.toString('base64') },
      features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
      imageContext: { languageHints: ['ko', 'en'] },
    });
    expect(adapter.engine).toBe('google-vision');
  });

  it('should treat a missing annotation as empty text', async () => {
    annotateImage.mockResolvedValue([{ fullTextAnnotation: null }]);
    const adapter = new GoogleVisionTextExtractorAdapter(createTestConfig());

    await expect(adapter.extractText(image)).resolves.toBe('');
  });

  it('should surface an error carried in the response', async () => {
    annotateImage.mockResolvedValue([{ error: { code: 3, message: 'Bad image data.' } }]);
    const adapter = new GoogleVisionTextExtractorAdapter(createTestConfig());

    await expect(adapter.extractText(image)).rejects.toThrow(
      new ExtractionError('OCR failed: Bad image data.'),
    );
  });

  it('should close the client on shutdown', async () => {
    const adapter = new GoogleVisionTextExtractorAdapter(createTestConfig());

    await adapter.onModuleDestroy();

    expect(close).toHaveBeenCalled();
  });
});
