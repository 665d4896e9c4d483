import { Global, Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { InMemoryKeyValueStore, KeyValueStore, RedisKeyValueStore } from '@fxrates/rates';
import { APP_CONFIG, AppConfig } from '../config/app-config';

export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');

/**
 * Shared key-value store (Redis, or in-process memory for single-instance runs)
 */
@Global()
@Module({
  providers: [
    {
      provide: KEY_VALUE_STORE,
      useFactory: (config: AppConfig): KeyValueStore => {
        const logger = new Logger(StoreModule.name);
        if (config.cache.store === 'memory') {
          logger.warn('Using in-memory cache store; locks only cover this process');
          return new InMemoryKeyValueStore();
        }

        logger.log(`Using Redis cache store at ${config.redis.host}:${config.redis.port}/${config.redis.db}`);
        return RedisKeyValueStore.connect(config.redis);
      },
      inject: [APP_CONFIG],
    },
  ],
  exports: [KEY_VALUE_STORE],
})
export class StoreModule implements OnApplicationShutdown {
  constructor(@Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore) {}

  async onApplicationShutdown(): Promise<void> {
    await this.store.close();
  }
}
