import { ValidationError } from '../errors/pipeline.errors';

/**
 * Uploaded Image Value Object
 * Encapsulates the upload-level validation rules (size, emptiness, extension).
 * Decoding the pixels is left to the image normalizer.
 */
export interface UploadedImageProps {
  filename: string;
  contentType: string;
  data: Buffer;
  truncated?: boolean;
}

export interface UploadLimits {
  maxBytes: number;
}

export const ACCEPTED_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'bmp', 'gif', 'tiff'] as const;

export type ImageExtension = (typeof ACCEPTED_IMAGE_EXTENSIONS)[number];

export class UploadedImageVO {
  private readonly _filename: string;
  private readonly _contentType: string;
  private readonly _extension: ImageExtension;
  private readonly _data: Buffer;

  private constructor(props: UploadedImageProps, extension: ImageExtension) {
    this._filename = props.filename;
    this._contentType = props.contentType;
    this._extension = extension;
    this._data = props.data;
  }

  static create(props: UploadedImageProps, limits: UploadLimits): UploadedImageVO {
    const extension = UploadedImageVO.validate(props, limits);
    return new UploadedImageVO(props, extension);
  }

  static extensionOf(filename: string): string {
    const dot = filename.lastIndexOf('.');
    return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
  }

  private static isAcceptedExtension(value: string): value is ImageExtension {
    return ACCEPTED_IMAGE_EXTENSIONS.some((extension) => extension === value);
  }

  private static validate(props: UploadedImageProps, limits: UploadLimits): ImageExtension {
    if (props.truncated || props.data.length > limits.maxBytes) {
      const limitMb = Math.round((limits.maxBytes / (1024 * 1024)) * 100) / 100;
      throw new ValidationError(`File exceeds the ${limitMb} MB size limit`);
    }

    if (props.data.length === 0) {
      throw new ValidationError('File is empty');
    }

    const extension = UploadedImageVO.extensionOf(props.filename);
    if (!UploadedImageVO.isAcceptedExtension(extension)) {
      throw new ValidationError(
        `Unsupported file type "${extension ? `.${extension}` : props.filename}"; ` +
          `accepted: ${ACCEPTED_IMAGE_EXTENSIONS.join(', ')}`,
      );
    }

    return extension;
  }

  get filename(): string {
    return this._filename;
  }

  get contentType(): string {
    return this._contentType;
  }

  get extension(): ImageExtension {
    return this._extension;
  }

  get data(): Buffer {
    return this._data;
  }

  get size(): number {
    return this._data.length;
  }

  toJSON() {
    return {
      filename: this._filename,
      contentType: this._contentType,
      extension: this._extension,
      size: this._data.length,
    };
  }
}
