import { Inject, Injectable, Optional } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { errorMessage } from '../../domain/errors/pipeline.errors';
import type { ImageStoragePort } from '../../application/ports/output/image-storage.port';
import { IMAGE_STORAGE_PORT } from '../../application/ports/output/injection-tokens';

@Injectable()
export class StorageHealthIndicator extends HealthIndicator {
  constructor(
    @Optional()
    @Inject(IMAGE_STORAGE_PORT)
    private readonly imageStorage: ImageStoragePort | null = null,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    if (!this.imageStorage) {
      return this.getStatus(key, true, { backend: 'none' });
    }

    try {
      const details = await this.imageStorage.checkReachability();
      return this.getStatus(key, true, details);
    } catch (error) {
      throw new HealthCheckError(
        'Storage health check failed',
        this.getStatus(key, false, { backend: this.imageStorage.backend, error: errorMessage(error) }),
      );
    }
  }
}
