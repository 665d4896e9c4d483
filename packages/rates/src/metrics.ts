export type CacheKind = 'latest' | 'historical';
export type UpstreamCall = 'latest' | 'timeseries';
export type RefreshStatus = 'completed' | 'skipped';

/**
 * Hooks the rates components report through. The API app backs this with prom-client.
 */
export interface RatesMetrics {
  recordCacheLookup(kind: CacheKind, hit: boolean): void;
  recordCacheWriteSkipped(kind: CacheKind): void;
  recordUpstreamRequest(call: UpstreamCall, outcome: 'success' | 'failure'): void;
  recordRefreshCycle(status: RefreshStatus): void;
}

export const noopMetrics: RatesMetrics = {
  recordCacheLookup: () => undefined,
  recordCacheWriteSkipped: () => undefined,
  recordUpstreamRequest: () => undefined,
  recordRefreshCycle: () => undefined,
};
