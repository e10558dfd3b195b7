import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Pool, Dispatcher } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the payload is JSON, raw text otherwise */
  body: unknown;
}

/** Statuses worth another attempt; everything else is returned to the caller as-is */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly pools: Map<string, Dispatcher> = new Map();
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 3;
  private readonly defaultRetryDelay = 1000;
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  protected getPool(origin: string): Dispatcher {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  /**
   * Send a request, retrying transport errors and retryable statuses with
   * exponential backoff. After the last attempt the final response is
   * returned (retryable status) or the last error is thrown.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const origin = `${parsedUrl.protocol}//${parsedUrl.host}`;
    const path = parsedUrl.pathname + parsedUrl.search;

    const pool = this.getPool(origin);
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;
    const timeout = options.timeout ?? this.defaultTimeout;

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const isLastAttempt = attempt === maxRetries;

      try {
        const response = await pool.request({
          origin,
          path,
          method: options.method || 'GET',
          headers: options.headers,
          body: options.body,
          headersTimeout: timeout,
          bodyTimeout: timeout,
        });

        const bodyText = await response.body.text();
        const result: HttpResponse = {
          statusCode: response.statusCode,
          headers: response.headers,
          body: this.parseBody(bodyText),
        };

        if (!RETRYABLE_STATUS_CODES.has(result.statusCode) || isLastAttempt) {
          return result;
        }

        this.logger.warn(
          { url, attempt, statusCode: result.statusCode },
          'HTTP request returned retryable status, retrying',
        );
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (isLastAttempt) {
          break;
        }

        this.logger.warn(
          { url, attempt, error: lastError.message },
          'HTTP request failed, retrying',
        );
      }

      await this.delay(retryDelay * Math.pow(2, attempt));
    }

    this.logger.error(
      { url, maxRetries, error: lastError?.message },
      'HTTP request failed after all retries',
    );
    throw lastError ?? new Error(`HTTP request to ${url} failed`);
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  private parseBody(text: string): unknown {
    if (!text) {
      return '';
    }
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async onModuleDestroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }
}
