import { Injectable, Logger } from '@nestjs/common';
import { Counter, Registry } from 'prom-client';
import { CacheKind, RatesMetrics, RefreshStatus, UpstreamCall } from '@fxrates/rates';

/**
 * Observability Service
 *
 * Prometheus metrics for the rate pipeline:
 * - cache lookups by kind and result
 * - cache writes skipped (lock contention or store failure)
 * - upstream requests by call and outcome
 * - refresh cycles by status
 *
 * Exposed at /metrics for scraping. Each instance owns its registry.
 */
@Injectable()
export class ObservabilityService implements RatesMetrics {
  private readonly logger = new Logger(ObservabilityService.name);
  private readonly registry = new Registry();

  private readonly cacheLookupCounter = new Counter({
    name: 'fx_rates_cache_lookups_total',
    help: 'Rate cache lookups',
    labelNames: ['kind', 'result'],
    registers: [this.registry],
  });

  private readonly cacheWriteSkippedCounter = new Counter({
    name: 'fx_rates_cache_writes_skipped_total',
    help: 'Rate cache writes skipped because the write lock or the store was unavailable',
    labelNames: ['kind'],
    registers: [this.registry],
  });

  private readonly upstreamRequestCounter = new Counter({
    name: 'fx_rates_upstream_requests_total',
    help: 'Requests to the upstream rate provider',
    labelNames: ['call', 'outcome'],
    registers: [this.registry],
  });

  private readonly refreshCycleCounter = new Counter({
    name: 'fx_rates_refresh_cycles_total',
    help: 'Background refresh cycles',
    labelNames: ['status'],
    registers: [this.registry],
  });

  constructor() {
    this.logger.log('Prometheus metrics initialized');
  }

  recordCacheLookup(kind: CacheKind, hit: boolean): void {
    this.cacheLookupCounter.inc({ kind, result: hit ? 'hit' : 'miss' });
  }

  recordCacheWriteSkipped(kind: CacheKind): void {
    this.cacheWriteSkippedCounter.inc({ kind });
  }

  recordUpstreamRequest(call: UpstreamCall, outcome: 'success' | 'failure'): void {
    this.upstreamRequestCounter.inc({ call, outcome });
  }

  recordRefreshCycle(status: RefreshStatus): void {
    this.refreshCycleCounter.inc({ status });
  }

  /**
   * Get Prometheus metrics for /metrics endpoint
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
