import { StructuredLoggerService } from './shared/logging/structured-logger.service';
import { loadPort, loadRateLimitConfig } from './shared/rate-limit/rate-limit.config';
import type { RateLimitConfig } from './shared/rate-limit/rate-limit.config';

type Env = Record<string, string | undefined>;

export type StartupConfig = {
  port: number;
  rateLimit: RateLimitConfig;
};

export function loadStartupConfig(env: Env = process.env): StartupConfig {
  return {
    port: loadPort(env),
    rateLimit: loadRateLimitConfig(env)
  };
}

export function reportStartupFailure(error: unknown, logger: StructuredLoggerService): void {
  logger.error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
    'Bootstrap'
  );
}
