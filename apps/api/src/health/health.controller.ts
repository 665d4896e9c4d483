import { Controller, Get, Inject } from '@nestjs/common';
import { KeyValueStore } from '@fxrates/rates';
import { KEY_VALUE_STORE } from '../store/store.module';

export interface HealthReport {
  status: 'UP' | 'DEGRADED';
  timestamp: string;
  checks: {
    cache: 'up' | 'down';
  };
}

/**
 * Health check controller. The cache is optional for correctness, so a
 * down cache reports DEGRADED rather than failing the probe.
 */
@Controller('health')
export class HealthController {
  constructor(@Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore) {}

  @Get()
  async check(): Promise<HealthReport> {
    const cacheHealthy = await this.store.ping();

    return {
      status: cacheHealthy ? 'UP' : 'DEGRADED',
      timestamp: new Date().toISOString(),
      checks: {
        cache: cacheHealthy ? 'up' : 'down',
      },
    };
  }
}
