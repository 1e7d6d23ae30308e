import { TokenBucketConfigError } from './token-bucket';
import type { TokenBucketOptions } from './token-bucket';

export const RATE_LIMIT_CONFIG = 'RATE_LIMIT_CONFIG';

export type RateLimitConfig = TokenBucketOptions;

type Env = Record<string, string | undefined>;

const DEFAULTS: RateLimitConfig = {
  capacity: 10,
  rate: 1,
  intervalMs: 2000
};

export function loadRateLimitConfig(env: Env = process.env): RateLimitConfig {
  return {
    capacity: readPositiveInt(env, 'RATE_LIMIT_CAPACITY', DEFAULTS.capacity),
    rate: readPositiveInt(env, 'RATE_LIMIT_REFILL_AMOUNT', DEFAULTS.rate),
    intervalMs: readPositiveInt(env, 'RATE_LIMIT_INTERVAL_MS', DEFAULTS.intervalMs)
  };
}

export function loadPort(env: Env = process.env): number {
  return readPositiveInt(env, 'PORT', 8080);
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new TokenBucketConfigError(name, raw);
  }

  return parsed;
}
