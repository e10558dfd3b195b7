import { BadRequestException } from '@nestjs/common';
import type { UploadedFile } from '../../application/ports/input/process-uploads.port';

/**
 * The parts of a @fastify/multipart file the reader relies on
 */
export interface MultipartFilePart {
  filename: string;
  mimetype: string;
  file: { truncated: boolean };
  toBuffer(): Promise<Buffer>;
}

/**
 * A Fastify request decorated by @fastify/multipart
 */
export interface MultipartRequest {
  isMultipart(): boolean;
  files(): AsyncIterableIterator<MultipartFilePart>;
}

/**
 * Buffers every file part of the request in arrival order.
 * Files over the size cap come back truncated rather than failing the request.
 */
export async function readUploadedFiles(request: MultipartRequest): Promise<UploadedFile[]> {
  if (!request.isMultipart()) {
    throw new BadRequestException({ error: 'Request must be multipart/form-data' });
  }

  const files: UploadedFile[] = [];
  try {
    for await (const part of request.files()) {
      const data = await part.toBuffer();
      // Browsers send an unnamed empty part when no file was picked
      if (!part.filename) {
        continue;
      }
      files.push({
        filename: part.filename,
        contentType: part.mimetype,
        data,
        truncated: part.file.truncated,
      });
    }
  } catch (error) {
    throw new BadRequestException({
      error: `Malformed multipart body: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  if (files.length === 0) {
    throw new BadRequestException({ error: 'No files uploaded' });
  }

  return files;
}
