import { z } from 'zod';
import { ConfigurationError } from '../domain/errors/pipeline.errors';

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean),
    );

/** Shared with main.ts, which needs the limit before the config module has loaded */
export const jsonBodyLimitMbSchema = z.coerce.number().positive().default(25);

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    API_PREFIX: z.string().default('api'),
    CORS_ORIGINS: commaList('*'),
    JSON_BODY_LIMIT_MB: jsonBodyLimitMbSchema,

    // Uploads
    MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),
    PROCESSING_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
    IMAGE_MAX_WIDTH: z.coerce.number().int().positive().default(800),
    IMAGE_MAX_HEIGHT: z.coerce.number().int().positive().default(800),

    // OCR
    OCR_ENGINE: z.enum(['tesseract', 'google-vision']).default('tesseract'),
    TESSERACT_BINARY: z.string().default('tesseract'),
    OCR_LANGUAGES: z.string().default('kor+eng'),
    VISION_LANGUAGE_HINTS: commaList('ko,en'),
    OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

    // Summarization
    SUMMARIZER_BASE_URL: z.string().url().default('https://api.openai.com'),
    SUMMARIZER_API_KEY: z.string().optional(),
    SUMMARIZER_MODEL: z.string().default('gpt-4o-mini'),
    SUMMARIZER_SYSTEM_PROMPT: z.string().default('Summarize the following text concisely.'),
    SUMMARIZER_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(12000),
    SUMMARIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    SUMMARIZER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
    SUMMARIZER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),

    // Storage
    STORAGE_BACKEND: z.enum(['none', 's3']).default('none'),
    S3_BUCKET_NAME: z.string().optional(),
    S3_PREFIX: z.string().default('uploads/'),
    SIGNED_URL_TTL_SECONDS: z.coerce.number().int().min(3600).max(86400).default(3600),

    // AWS
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

    // Report
    REPORT_FONT_PATH: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'Required when STORAGE_BACKEND=s3',
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
