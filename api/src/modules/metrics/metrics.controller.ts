import { Controller, Get, Header } from '@nestjs/common';
import { MetricsService } from '../../shared/observability/metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  prometheus(): Promise<string> {
    return this.metrics.toPrometheus();
  }
}
