import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import { HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { StorageHealthIndicator } from './indicators/storage.health';
import { SummarizerHealthIndicator } from './indicators/summarizer.health';
import { runHealthCheck } from './health-report';
import type { HealthReport } from './health-report';

/**
 * The subset of the Fastify reply the handler touches
 */
export interface StatusReply {
  status(code: number): unknown;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly storageHealth: StorageHealthIndicator,
    private readonly summarizerHealth: SummarizerHealthIndicator,
  ) {}

  @Get()
  async check(@Res({ passthrough: true }) reply: StatusReply): Promise<HealthReport> {
    const report = await runHealthCheck(() =>
      this.health.check([
        () => this.memory.checkHeap('memory_heap', 500 * 1024 * 1024), // 500MB
        () => this.storageHealth.isHealthy('storage'),
        () => this.summarizerHealth.isHealthy('summarizer'),
      ]),
    );

    reply.status(report.status === 'healthy' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE);
    return report;
  }

  @Get('live')
  async liveness(@Res({ passthrough: true }) reply: StatusReply): Promise<HealthReport> {
    // Simple liveness check - just verify the service is running
    const report = await runHealthCheck(() =>
      this.health.check([() => this.memory.checkHeap('memory_heap', 500 * 1024 * 1024)]),
    );

    reply.status(report.status === 'healthy' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE);
    return report;
  }
}
