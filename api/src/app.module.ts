import { DynamicModule, MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { DemoController } from './modules/demo/demo.controller';
import { HealthController } from './modules/health/health.controller';
import { MetricsController } from './modules/metrics/metrics.controller';
import { TokenBucketGuard } from './shared/guards/token-bucket.guard';
import { StructuredLoggerService } from './shared/logging/structured-logger.service';
import { MetricsService } from './shared/observability/metrics.service';
import { RequestLoggingMiddleware } from './shared/observability/request-logging.middleware';
import { RATE_LIMIT_CONFIG } from './shared/rate-limit/rate-limit.config';
import type { RateLimitConfig } from './shared/rate-limit/rate-limit.config';
import { REFILL_TIMER, RateLimiterService } from './shared/rate-limit/rate-limiter.service';
import { startIntervalTimer } from './shared/rate-limit/token-bucket';

@Module({})
export class AppModule implements NestModule {
  /** Config is loaded before the app is created, so a bad value fails in `bootstrap()`. */
  static forRoot(config: RateLimitConfig): DynamicModule {
    return {
      module: AppModule,
      controllers: [DemoController, HealthController, MetricsController],
      providers: [
        StructuredLoggerService,
        MetricsService,
        RateLimiterService,
        {
          provide: RATE_LIMIT_CONFIG,
          useValue: config
        },
        {
          provide: REFILL_TIMER,
          useValue: startIntervalTimer
        },
        {
          provide: APP_GUARD,
          useClass: TokenBucketGuard
        }
      ]
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggingMiddleware).forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
