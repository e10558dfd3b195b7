/**
 * Application Configuration Module
 *
 * Loads the environment once at startup, validates it with the zod schema in
 * `validation.schema.ts` and exposes a typed `AppConfig` through
 * `ConfigService<AppConfig>`.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const ocr = this.configService.getOrThrow('ocr', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { jsonBodyLimitMbSchema, validateEnv } from './validation.schema';
import type { EnvConfig } from './validation.schema';

export type OcrEngine = 'tesseract' | 'google-vision';
export type StorageBackend = 'none' | 's3';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  http: {
    apiPrefix: string;
    corsOrigins: string[];
  };
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  /**
   * Per-request upload pipeline settings.
   *
   * ### maxFileSizeBytes (Environment: MAX_FILE_SIZE_MB)
   * - Enforced by the multipart parser; larger files arrive truncated and
   *   fail individually with a validation error.
   *
   * ### concurrency (Environment: PROCESSING_CONCURRENCY)
   * - Files of one request processed at the same time. Keep it low enough
   *   for the OCR host CPU and the summarization API rate limit.
   *
   * ### maxWidth / maxHeight (Environment: IMAGE_MAX_WIDTH / IMAGE_MAX_HEIGHT)
   * - Larger images are downscaled (aspect preserved) before OCR.
   */
  processing: {
    maxFileSizeBytes: number;
    concurrency: number;
    maxWidth: number;
    maxHeight: number;
  };
  ocr: {
    engine: OcrEngine;
    tesseractBinary: string;
    languages: string;
    visionLanguageHints: string[];
    timeoutMs: number;
  };
  summarizer: {
    baseUrl: string;
    apiKey?: string;
    model: string;
    systemPrompt: string;
    maxInputChars: number;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
  };
  storage: {
    backend: StorageBackend;
    bucketName: string;
    prefix: string;
    signedUrlTtlSeconds: number;
  };
  report: {
    fontPath?: string;
  };
}

const MB = 1024 * 1024;

export function buildConfiguration(source: Record<string, unknown>): AppConfig {
  const env: EnvConfig = validateEnv(source);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    http: {
      apiPrefix: env.API_PREFIX,
      corsOrigins: env.CORS_ORIGINS,
    },
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    processing: {
      maxFileSizeBytes: Math.round(env.MAX_FILE_SIZE_MB * MB),
      concurrency: env.PROCESSING_CONCURRENCY,
      maxWidth: env.IMAGE_MAX_WIDTH,
      maxHeight: env.IMAGE_MAX_HEIGHT,
    },
    ocr: {
      engine: env.OCR_ENGINE,
      tesseractBinary: env.TESSERACT_BINARY,
      languages: env.OCR_LANGUAGES,
      visionLanguageHints: env.VISION_LANGUAGE_HINTS,
      timeoutMs: env.OCR_TIMEOUT_MS,
    },
    summarizer: {
      baseUrl: env.SUMMARIZER_BASE_URL.replace(/\/+$/, ''),
      apiKey: env.SUMMARIZER_API_KEY || undefined,
      model: env.SUMMARIZER_MODEL,
      systemPrompt: env.SUMMARIZER_SYSTEM_PROMPT,
      maxInputChars: env.SUMMARIZER_MAX_INPUT_CHARS,
      timeoutMs: env.SUMMARIZER_TIMEOUT_MS,
      maxRetries: env.SUMMARIZER_MAX_RETRIES,
      retryDelayMs: env.SUMMARIZER_RETRY_DELAY_MS,
    },
    storage: {
      backend: env.STORAGE_BACKEND,
      bucketName: env.S3_BUCKET_NAME ?? '',
      prefix: env.S3_PREFIX,
      signedUrlTtlSeconds: env.SIGNED_URL_TTL_SECONDS,
    },
    report: {
      fontPath: env.REPORT_FONT_PATH || undefined,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

/**
 * The Fastify body limit is fixed when the adapter is built, before `.env` files are read,
 * so it comes straight from the process environment.
 */
export function jsonBodyLimitBytes(source: Record<string, unknown>): number {
  const parsed = jsonBodyLimitMbSchema.safeParse(source.JSON_BODY_LIMIT_MB);
  return Math.round((parsed.success ? parsed.data : 25) * MB);
}

export default (): AppConfig => buildConfiguration(process.env);
