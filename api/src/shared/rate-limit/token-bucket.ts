import type { LoggerService } from '@nestjs/common';

export type TokenBucketOptions = {
  /** Tokens added on every tick. */
  rate: number;
  /** Maximum tokens the bucket can hold; the bucket starts full. */
  capacity: number;
  intervalMs: number;
};

export type TokenBucketState = 'running' | 'stopped';

export type TokenBucketSnapshot = TokenBucketOptions & {
  tokens: number;
  state: TokenBucketState;
};

export type RefillTimer = {
  stop(): void;
};

export type StartTimer = (onTick: () => void, intervalMs: number) => RefillTimer;

export type TokenBucketDeps = {
  startTimer?: StartTimer;
  logger?: LoggerService;
};

export class TokenBucketConfigError extends Error {
  constructor(
    public readonly field: string,
    value: unknown
  ) {
    super(`${field} must be a positive integer, got ${String(value)}`);
    this.name = 'TokenBucketConfigError';
  }
}

export const startIntervalTimer: StartTimer = (onTick, intervalMs) => {
  const handle = setInterval(onTick, intervalMs);
  handle.unref();
  return {
    stop: () => clearInterval(handle)
  };
};

/**
 * Fixed-interval token bucket.
 *
 * `allow()` and the refill tick both run to completion on the event loop, so
 * each update of `tokens` happens as one uninterrupted step.
 */
export class TokenBucket {
  private readonly rate: number;
  private readonly capacity: number;
  private readonly intervalMs: number;
  private readonly logger?: LoggerService;
  private tokens: number;
  private timer: RefillTimer | null;

  constructor(options: TokenBucketOptions, deps: TokenBucketDeps = {}) {
    assertPositiveInteger('rate', options.rate);
    assertPositiveInteger('capacity', options.capacity);
    assertPositiveInteger('intervalMs', options.intervalMs);

    this.rate = options.rate;
    this.capacity = options.capacity;
    this.intervalMs = options.intervalMs;
    this.logger = deps.logger;
    this.tokens = options.capacity;

    const startTimer = deps.startTimer ?? startIntervalTimer;
    this.timer = startTimer(() => this.refill(), options.intervalMs);
  }

  get available(): number {
    return this.tokens;
  }

  get state(): TokenBucketState {
    return this.timer ? 'running' : 'stopped';
  }

  allow(): boolean {
    if (this.tokens > 0) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  /** Safe to call any number of times; only the first call releases the timer. */
  stop(): void {
    if (!this.timer) {
      return;
    }

    const timer = this.timer;
    this.timer = null;
    timer.stop();
  }

  snapshot(): TokenBucketSnapshot {
    return {
      tokens: this.tokens,
      capacity: this.capacity,
      rate: this.rate,
      intervalMs: this.intervalMs,
      state: this.state
    };
  }

  private refill(): void {
    // a tick already queued when stop() ran must not add tokens
    if (!this.timer) {
      return;
    }

    this.tokens = Math.min(this.capacity, this.tokens + this.rate);
    this.logger?.debug?.(`Refilled tokens. Current count: ${this.tokens}`, TokenBucket.name);
  }
}

function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new TokenBucketConfigError(field, value);
  }
}
