import { Controller, Get, Header } from '@nestjs/common';
import { ObservabilityService } from '../services/observability.service';

/**
 * Metrics endpoint for Prometheus scraping
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly observability: ObservabilityService) {}

  @Get()
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  async getMetrics(): Promise<string> {
    return this.observability.getMetrics();
  }
}
