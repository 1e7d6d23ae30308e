import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RATE_LIMITED_KEY } from '../decorators/rate-limited.decorator';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { RateLimitExceededException } from '../rate-limit/rate-limit-exceeded.exception';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';

@Injectable()
export class TokenBucketGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly limiter: RateLimiterService,
    private readonly logger: StructuredLoggerService
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const limited = this.reflector.getAllAndOverride<boolean | undefined>(RATE_LIMITED_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (!limited) {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<{ path?: string; originalUrl?: string }>();
    const path = request.path ?? request.originalUrl ?? '';

    if (this.limiter.allow()) {
      this.logger.log(`Request ALLOWED for ${path}`, TokenBucketGuard.name);
      return true;
    }

    this.logger.warn(`Request DENIED for ${path}`, TokenBucketGuard.name);

    const retryAfterMs = this.limiter.retryAfterMs();
    const response = http.getResponse<{ setHeader(name: string, value: string): unknown }>();
    response.setHeader('Retry-After', String(Math.max(1, Math.ceil(retryAfterMs / 1000))));

    throw new RateLimitExceededException(retryAfterMs);
  }
}
