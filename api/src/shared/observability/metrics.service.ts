import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000];

type Decision = 'admitted' | 'rejected';

@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly startedAt = Date.now();
  private readonly requests: Counter<'method' | 'route' | 'status'>;
  private readonly latency: Histogram<'method' | 'route'>;
  private readonly decisions: Counter<'decision'>;
  private readTokens: () => number = () => 0;

  constructor() {
    collectDefaultMetrics({ register: this.registry });

    this.requests = new Counter({
      name: 'http_requests_total',
      help: 'Total HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry]
    });

    this.latency = new Histogram({
      name: 'http_request_duration_ms',
      help: 'HTTP request latency in milliseconds',
      labelNames: ['method', 'route'],
      buckets: LATENCY_BUCKETS_MS,
      registers: [this.registry]
    });

    this.decisions = new Counter({
      name: 'rate_limit_decisions_total',
      help: 'Admission decisions taken by the token bucket',
      labelNames: ['decision'],
      registers: [this.registry]
    });

    const readTokens = (): number => this.readTokens();
    new Gauge({
      name: 'rate_limit_tokens_available',
      help: 'Tokens currently available in the bucket',
      registers: [this.registry],
      collect() {
        this.set(readTokens());
      }
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  trackTokens(read: () => number): void {
    this.readTokens = read;
  }

  record(route: string, method: string, statusCode: number, durationMs: number): void {
    this.requests.inc({ method, route, status: String(statusCode) });
    this.latency.observe({ method, route }, durationMs);
  }

  recordDecision(admitted: boolean): void {
    const decision: Decision = admitted ? 'admitted' : 'rejected';
    this.decisions.inc({ decision });
  }

  snapshot(): {
    uptimeSeconds: number;
    tokensAvailable: number;
  } {
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      tokensAvailable: this.readTokens()
    };
  }

  toPrometheus(): Promise<string> {
    return this.registry.metrics();
  }
}
