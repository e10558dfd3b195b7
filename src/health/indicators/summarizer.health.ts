import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { errorMessage } from '../../domain/errors/pipeline.errors';
import type { SummarizerPort } from '../../application/ports/output/summarizer.port';
import { SUMMARIZER_PORT } from '../../application/ports/output/injection-tokens';

@Injectable()
export class SummarizerHealthIndicator extends HealthIndicator {
  constructor(
    @Inject(SUMMARIZER_PORT)
    private readonly summarizer: SummarizerPort,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const details = await this.summarizer.checkAvailability();
      return this.getStatus(key, true, details);
    } catch (error) {
      throw new HealthCheckError(
        'Summarizer health check failed',
        this.getStatus(key, false, { error: errorMessage(error) }),
      );
    }
  }
}
