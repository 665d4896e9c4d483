import { Provider } from '@nestjs/common';
import {
  BackgroundTasks,
  CachedRateRepository,
  FrankfurterClient,
  KeyValueStore,
  RateCache,
  RateProviderClient,
  RateRefresher,
  RateRepository,
  RateService,
} from '@fxrates/rates';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { KEY_VALUE_STORE } from '../store/store.module';
import { ObservabilityService } from '../services/observability.service';

export const RATE_PROVIDER_CLIENT = Symbol('RATE_PROVIDER_CLIENT');
export const RATE_REPOSITORY = Symbol('RATE_REPOSITORY');

/**
 * Wires the framework-free rates components into the Nest container
 */
export const rateProviders: Provider[] = [
  {
    provide: RATE_PROVIDER_CLIENT,
    useFactory: (config: AppConfig, metrics: ObservabilityService): RateProviderClient =>
      new FrankfurterClient(config.upstream, metrics),
    inject: [APP_CONFIG, ObservabilityService],
  },
  {
    provide: RateCache,
    useFactory: (store: KeyValueStore, config: AppConfig, metrics: ObservabilityService) =>
      new RateCache(
        store,
        { latestTtlMs: config.cache.latestTtlMs, historicalTtlMs: config.cache.historicalTtlMs },
        metrics,
      ),
    inject: [KEY_VALUE_STORE, APP_CONFIG, ObservabilityService],
  },
  {
    provide: BackgroundTasks,
    useFactory: () => new BackgroundTasks(),
  },
  {
    provide: RATE_REPOSITORY,
    useFactory: (client: RateProviderClient, cache: RateCache, tasks: BackgroundTasks): RateRepository =>
      new CachedRateRepository(client, cache, tasks),
    inject: [RATE_PROVIDER_CLIENT, RateCache, BackgroundTasks],
  },
  {
    provide: RateService,
    useFactory: (repository: RateRepository, config: AppConfig) =>
      new RateService(repository, {
        historyDaysLimit: config.historyDaysLimit,
        dateFormat: config.dateFormat,
      }),
    inject: [RATE_REPOSITORY, APP_CONFIG],
  },
  {
    provide: RateRefresher,
    useFactory: (
      store: KeyValueStore,
      client: RateProviderClient,
      cache: RateCache,
      config: AppConfig,
      metrics: ObservabilityService,
    ) => new RateRefresher(store, client, cache, { intervalMs: config.refresh.intervalMs }, metrics),
    inject: [KEY_VALUE_STORE, RATE_PROVIDER_CLIENT, RateCache, APP_CONFIG, ObservabilityService],
  },
];
