import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { AppConfig } from '../../../config/configuration';
import {
  ConfigurationError,
  SummarizationError,
  errorMessage,
} from '../../../domain/errors/pipeline.errors';
import type { SummarizerPort } from '../../../application/ports/output/summarizer.port';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.unknown(),
        }),
      }),
    )
    .min(1),
});

/**
 * Message content is either a plain string or an array of typed parts.
 */
export function extractTextFromChatContent(content: unknown): string {
  if (typeof content === 'string') return content.trim();
  if (!Array.isArray(content)) return '';

  const parts: string[] = content
    .map((part: unknown) => {
      if (!part || typeof part !== 'object' || !('text' in part)) return '';
      return typeof part.text === 'string' ? part.text : '';
    })
    .filter(Boolean);

  return parts.join('\n').trim();
}

/**
 * Chat Completion Summarizer Adapter
 * Implements SummarizerPort against an OpenAI-compatible /v1/chat/completions endpoint
 */
@Injectable()
export class ChatCompletionSummarizerAdapter implements SummarizerPort {
  private readonly logger = new Logger(ChatCompletionSummarizerAdapter.name);
  private readonly config: AppConfig['summarizer'];

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig>,
  ) {
    this.config = configService.getOrThrow('summarizer', { infer: true });
  }

  async summarize(text: string): Promise<string> {
    const input = text.trim();
    if (!input) {
      return '';
    }

    const apiKey = this.requireApiKey();
    const content =
      input.length > this.config.maxInputChars ? input.slice(0, this.config.maxInputChars) : input;
    if (content.length < input.length) {
      this.logger.debug(`Truncated summarizer input from ${input.length} to ${content.length} characters`);
    }

    let response: HttpResponse;
    try {
      response = await this.httpClient.post(
        `${this.config.baseUrl}/v1/chat/completions`,
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: this.config.systemPrompt },
            { role: 'user', content },
          ],
        },
        {
          headers: { Authorization: `Bearer ${apiKey}` },
          timeout: this.config.timeoutMs,
          maxRetries: this.config.maxRetries,
          retryDelay: this.config.retryDelayMs,
        },
      );
    } catch (error) {
      throw new SummarizationError(`Summarization request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      // The upstream body stays in the log; clients only see the status
      const message = `Summarization API responded with status ${response.statusCode}`;
      this.logger.warn(`${message}: ${this.describeBody(response.body)}`);
      throw new SummarizationError(message);
    }

    const parsed = chatCompletionSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new SummarizationError('Summarization API returned an unexpected response body');
    }

    const summary = extractTextFromChatContent(parsed.data.choices[0].message.content);
    if (!summary) {
      throw new SummarizationError('Summarization API returned an empty summary');
    }

    return summary;
  }

  async checkAvailability(): Promise<{ model: string; baseUrl: string }> {
    const apiKey = this.requireApiKey();

    const response = await this.httpClient.get(`${this.config.baseUrl}/v1/models`, {
      headers: { Authorization: `Bearer ${apiKey}` },
      timeout: 5000,
      maxRetries: 0,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new SummarizationError(`Summarization API responded with status ${response.statusCode}`);
    }

    return { model: this.config.model, baseUrl: this.config.baseUrl };
  }

  private requireApiKey(): string {
    if (!this.config.apiKey) {
      throw new ConfigurationError('SUMMARIZER_API_KEY is not configured');
    }
    return this.config.apiKey;
  }

  private describeBody(body: unknown): string {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return text.length > 200 ? `${text.slice(0, 200)}...` : text;
  }
}
