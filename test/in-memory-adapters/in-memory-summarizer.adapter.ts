import { Injectable } from '@nestjs/common';
import type { SummarizerPort } from '../../src/application/ports/output/summarizer.port';
import { SummarizationError } from '../../src/domain/errors/pipeline.errors';

/**
 * In-Memory Summarizer Adapter
 * Summary is the first line of the text, prefixed so assertions can spot it
 */
@Injectable()
export class InMemorySummarizerAdapter implements SummarizerPort {
  readonly inputs: string[] = [];
  private failure: Error | null = null;

  async summarize(text: string): Promise<string> {
    this.inputs.push(text);
    if (this.failure) {
      throw this.failure;
    }
    return `summary: ${text.split('\n')[0]}`;
  }

  async checkAvailability(): Promise<{ model: string; baseUrl: string }> {
    if (this.failure) {
      throw this.failure;
    }
    return { model: 'memory', baseUrl: 'memory://' };
  }

  // Test helpers
  failWith(error: Error = new SummarizationError('Upstream unavailable')): void {
    this.failure = error;
  }
}
