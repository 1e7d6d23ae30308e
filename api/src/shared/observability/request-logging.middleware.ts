import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { MetricsService } from './metrics.service';

const UNMATCHED_ROUTE = 'unmatched';

// the parts of express' Request/Response this middleware touches
export type AccessRequest = {
  method: string;
  originalUrl: string;
  baseUrl: string;
  headers: IncomingHttpHeaders;
  route?: { path?: unknown };
};

export type AccessResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  on(event: 'finish', listener: () => void): unknown;
};

/** Tags each request with an `x-request-id` and records it once the response is sent. */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware<AccessRequest, AccessResponse> {
  constructor(
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  use(req: AccessRequest, res: AccessResponse, next: () => void): void {
    const start = Date.now();
    const requestId = req.headers['x-request-id']?.toString() || randomUUID();
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const durationMs = Date.now() - start;
      // labels stay bounded: unknown paths share one series
      const routePath = req.route?.path;
      const route = typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : UNMATCHED_ROUTE;
      this.metrics.record(route, req.method, res.statusCode, durationMs);
      this.logger.log(
        {
          type: 'http_access',
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs,
          requestId
        },
        RequestLoggingMiddleware.name
      );
    });

    next();
  }
}
