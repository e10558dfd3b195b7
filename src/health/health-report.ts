import { ServiceUnavailableException } from '@nestjs/common';
import type { HealthCheckResult } from '@nestjs/terminus';

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  details: HealthCheckResult['details'];
}

function isHealthCheckResult(value: unknown): value is HealthCheckResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    'details' in value &&
    typeof value.details === 'object' &&
    value.details !== null
  );
}

/**
 * Runs a terminus check and folds both outcomes into one report.
 * HealthCheckService.check() rejects with a 503 carrying the result when any indicator is down.
 */
export async function runHealthCheck(check: () => Promise<HealthCheckResult>): Promise<HealthReport> {
  try {
    const result = await check();
    return { status: result.status === 'ok' ? 'healthy' : 'unhealthy', details: result.details };
  } catch (error) {
    if (error instanceof ServiceUnavailableException) {
      const response = error.getResponse();
      if (isHealthCheckResult(response)) {
        return { status: 'unhealthy', details: response.details };
      }
    }
    return {
      status: 'unhealthy',
      details: {
        health: {
          status: 'down',
          error: error instanceof Error ? error.message : String(error),
        },
      },
    };
  }
}
