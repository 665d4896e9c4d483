import Redis, { RedisOptions } from 'ioredis';
import { Logger } from '@nestjs/common';
import { KeyValueStore } from './key-value-store';

// Compare-and-delete as one server-side step
const DELETE_IF_EQUALS_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
else
  return 0
end
`;

export interface RedisStoreOptions {
  host: string;
  port: number;
  password?: string;
  db: number;
}

export class RedisKeyValueStore implements KeyValueStore {
  private readonly logger = new Logger(RedisKeyValueStore.name);

  constructor(private readonly client: Redis) {
    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });
  }

  static connect(options: RedisStoreOptions): RedisKeyValueStore {
    const redisOptions: RedisOptions = {
      host: options.host,
      port: options.port,
      db: options.db,
      password: options.password || undefined,
      lazyConnect: true,
      maxRetriesPerRequest: 2,
    };

    return new RedisKeyValueStore(new Redis(redisOptions));
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.client.set(key, value, 'PX', ttlMs);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(key, value, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const deleted = await this.client.eval(DELETE_IF_EQUALS_SCRIPT, 1, key, expected);
    return deleted === 1;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(`Redis ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.status === 'end') {
      return;
    }
    if (this.client.status === 'wait') {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }
}
