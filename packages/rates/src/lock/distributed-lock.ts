import { randomUUID } from 'crypto';
import { Logger } from '@nestjs/common';
import { KeyValueStore } from '../store/key-value-store';
import { LockTimeoutError } from '../errors';
import { sleep } from '../util/timing';

export const DEFAULT_LOCK_RETRY_INTERVAL_MS = 100;

/**
 * Mutex over a shared KeyValueStore. The holder token is unique per instance;
 * the key's TTL frees the lock if its holder dies without releasing.
 */
export class DistributedLock {
  private readonly logger = new Logger(DistributedLock.name);
  private readonly token = randomUUID();

  constructor(
    private readonly store: KeyValueStore,
    readonly key: string,
    private readonly ttlMs: number,
    private readonly retryIntervalMs: number = DEFAULT_LOCK_RETRY_INTERVAL_MS,
  ) {}

  /**
   * Polls set-if-absent until it wins, `maxWaitMs` runs out or `signal` aborts.
   *
   * @throws LockTimeoutError when the lock is still held by someone else at the deadline
   * @throws the signal's abort reason when waiting is cancelled
   */
  async acquire(maxWaitMs: number, signal?: AbortSignal): Promise<true> {
    const deadline = Date.now() + maxWaitMs;

    for (;;) {
      signal?.throwIfAborted();
      if (await this.store.setIfAbsent(this.key, this.token, this.ttlMs)) {
        return true;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(this.key, maxWaitMs);
      }

      await sleep(Math.min(this.retryIntervalMs, remaining), signal);
    }
  }

  /**
   * Deletes the key only while it still holds this instance's token.
   * Returns false when the lock had expired or passed to another holder.
   */
  async release(): Promise<boolean> {
    const released = await this.store.deleteIfEquals(this.key, this.token);
    if (!released) {
      this.logger.warn(`Lock ${this.key} not released: it expired or is owned by someone else`);
    }
    return released;
  }
}
