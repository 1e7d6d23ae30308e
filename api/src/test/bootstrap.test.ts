import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { AppModule } from '../app.module';
import { loadStartupConfig, reportStartupFailure } from '../bootstrap';
import { StructuredLoggerService } from '../shared/logging/structured-logger.service';
import { RATE_LIMIT_CONFIG } from '../shared/rate-limit/rate-limit.config';
import { TokenBucketConfigError } from '../shared/rate-limit/token-bucket';

describe('loadStartupConfig', () => {
  it('reads port and bucket settings together', () => {
    assert.deepEqual(loadStartupConfig({ PORT: '9000', RATE_LIMIT_CAPACITY: '3' }), {
      port: 9000,
      rateLimit: { capacity: 3, rate: 1, intervalMs: 2000 }
    });
  });

  it('fails before the app is created on a bad bucket setting', () => {
    assert.throws(
      () => loadStartupConfig({ RATE_LIMIT_CAPACITY: '0' }),
      (error: unknown) => error instanceof TokenBucketConfigError && error.field === 'RATE_LIMIT_CAPACITY'
    );
  });
});

describe('reportStartupFailure', () => {
  it('writes the failure as a structured error line', () => {
    const stderr: string[] = [];
    const logger = new StructuredLoggerService({ stdout: () => undefined, stderr: (line) => stderr.push(line) }, 'log');

    try {
      loadStartupConfig({ RATE_LIMIT_CAPACITY: '0' });
    } catch (error) {
      reportStartupFailure(error, logger);
    }

    assert.equal(stderr.length, 1);
    const entry: { level: string; context: string; message: string; trace?: string } = JSON.parse(stderr[0]);
    assert.equal(entry.level, 'error');
    assert.equal(entry.context, 'Bootstrap');
    assert.equal(entry.message, 'RATE_LIMIT_CAPACITY must be a positive integer, got 0');
    assert.match(entry.trace ?? '', /^TokenBucketConfigError: /);
  });
});

describe('AppModule.forRoot', () => {
  it('provides the preloaded bucket settings as a value', () => {
    const config = { capacity: 5, rate: 2, intervalMs: 500 };

    const providers = AppModule.forRoot(config).providers ?? [];
    const provider = providers.find(
      (item) => typeof item === 'object' && 'provide' in item && item.provide === RATE_LIMIT_CONFIG
    );

    assert.ok(provider && 'useValue' in provider);
    assert.equal(provider.useValue, config);
  });
});
