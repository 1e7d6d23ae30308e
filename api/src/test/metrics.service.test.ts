import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { MetricsService } from '../shared/observability/metrics.service';

describe('MetricsService', () => {
  it('exports request and admission metrics in prometheus format', async () => {
    const metrics = new MetricsService();
    metrics.trackTokens(() => 7);

    metrics.record('/limited', 'GET', 200, 4);
    metrics.record('/limited', 'GET', 429, 30);
    metrics.recordDecision(true);
    metrics.recordDecision(true);
    metrics.recordDecision(false);

    const text = await metrics.toPrometheus();

    assert.match(text, /^http_requests_total\{method="GET",route="\/limited",status="200"\} 1$/m);
    assert.match(text, /^http_requests_total\{method="GET",route="\/limited",status="429"\} 1$/m);
    assert.match(text, /^http_request_duration_ms_sum\{method="GET",route="\/limited"\} 34$/m);
    assert.match(text, /^http_request_duration_ms_count\{method="GET",route="\/limited"\} 2$/m);
    assert.match(text, /^rate_limit_decisions_total\{decision="admitted"\} 2$/m);
    assert.match(text, /^rate_limit_decisions_total\{decision="rejected"\} 1$/m);
    assert.match(text, /^rate_limit_tokens_available 7$/m);
  });

  it('reads the tracked bucket in its snapshot', () => {
    const metrics = new MetricsService();
    metrics.trackTokens(() => 3);

    const snapshot = metrics.snapshot();

    assert.equal(snapshot.tokensAvailable, 3);
  });
});
