import { Controller, Get } from '@nestjs/common';
import { MetricsService } from '../../shared/observability/metrics.service';
import { RateLimiterService } from '../../shared/rate-limit/rate-limiter.service';
import type { TokenBucketSnapshot } from '../../shared/rate-limit/token-bucket';

export type HealthReport = {
  status: 'ok' | 'degraded';
  timestamp: string;
  uptimeSeconds: number;
  limiter: TokenBucketSnapshot;
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly limiter: RateLimiterService,
    private readonly metrics: MetricsService
  ) {}

  @Get()
  check(): HealthReport {
    const limiter = this.limiter.snapshot();

    return {
      status: limiter.state === 'running' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptimeSeconds: this.metrics.snapshot().uptimeSeconds,
      limiter
    };
  }
}
