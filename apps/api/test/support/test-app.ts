import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { BackgroundTasks, InMemoryKeyValueStore, RateProviderClient } from '@fxrates/rates';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { APP_CONFIG, AppConfig } from '../../src/config/app-config';
import { KEY_VALUE_STORE } from '../../src/store/store.module';
import { RATE_PROVIDER_CLIENT } from '../../src/rates/rates.providers';

export const testConfig: AppConfig = {
  env: 'test',
  port: 0,
  corsOrigin: '*',
  logLevels: ['error'],
  upstream: {
    baseUrl: 'http://127.0.0.1:1',
    timeoutMs: 1_000,
    maxRetries: 0,
    retryBaseDelayMs: 1,
  },
  cache: {
    store: 'memory',
    latestTtlMs: 60_000,
    historicalTtlMs: 60_000,
  },
  redis: {
    host: 'localhost',
    port: 6379,
    password: '',
    db: 0,
  },
  refresh: {
    enabled: false,
    intervalMs: 60_000,
  },
  historyDaysLimit: 90,
  dateFormat: 'YYYY-MM-DD',
};

export interface TestApp {
  app: INestApplication;
  store: InMemoryKeyValueStore;
  upstream: jest.Mocked<RateProviderClient>;
  tasks: BackgroundTasks;
}

/**
 * Full application with an in-memory store and a scripted upstream
 */
export async function createTestApp(config: AppConfig = testConfig): Promise<TestApp> {
  const store = new InMemoryKeyValueStore();
  const upstream: jest.Mocked<RateProviderClient> = {
    name: 'stub',
    fetchLatestRates: jest.fn(),
    fetchTimeSeriesRates: jest.fn(),
  };

  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(APP_CONFIG)
    .useValue(config)
    .overrideProvider(KEY_VALUE_STORE)
    .useValue(store)
    .overrideProvider(RATE_PROVIDER_CLIENT)
    .useValue(upstream)
    .compile();

  const app = moduleFixture.createNestApplication({ logger: false });
  configureApp(app);
  await app.init();

  return { app, store, upstream, tasks: app.get(BackgroundTasks) };
}
