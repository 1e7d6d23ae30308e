import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { MetricsService } from '../observability/metrics.service';
import { RATE_LIMIT_CONFIG } from './rate-limit.config';
import type { RateLimitConfig } from './rate-limit.config';
import { TokenBucket } from './token-bucket';
import type { StartTimer, TokenBucketSnapshot } from './token-bucket';

export const REFILL_TIMER = 'REFILL_TIMER';

/**
 * Owns the process-wide bucket for as long as the Nest application lives and
 * stops it when the module is torn down.
 */
@Injectable()
export class RateLimiterService implements OnModuleDestroy {
  private readonly bucket: TokenBucket;

  constructor(
    @Inject(RATE_LIMIT_CONFIG) private readonly config: RateLimitConfig,
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService,
    @Inject(REFILL_TIMER) startTimer: StartTimer
  ) {
    this.bucket = new TokenBucket(config, { startTimer, logger });
    this.metrics.trackTokens(() => this.bucket.available);
  }

  allow(): boolean {
    const admitted = this.bucket.allow();
    this.metrics.recordDecision(admitted);
    return admitted;
  }

  retryAfterMs(): number {
    return this.config.intervalMs;
  }

  snapshot(): TokenBucketSnapshot {
    return this.bucket.snapshot();
  }

  onModuleDestroy(): void {
    this.bucket.stop();
    this.logger.log('Token bucket stopped', RateLimiterService.name);
  }
}
