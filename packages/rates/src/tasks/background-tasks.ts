import { Logger } from '@nestjs/common';
import { errorMessage } from '../errors';

/**
 * Runs detached work whose outcome the caller does not wait for.
 * Failures are logged here and never reach the caller.
 */
export class BackgroundTasks {
  private readonly logger = new Logger(BackgroundTasks.name);
  private readonly inflight = new Set<Promise<void>>();

  run(name: string, task: () => Promise<void>): void {
    const execution = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.logger.error(`Background task ${name} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inflight.delete(execution);
      });

    this.inflight.add(execution);
  }

  get pending(): number {
    return this.inflight.size;
  }

  /**
   * Resolves once every task started so far, and any task they start, has settled
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }
}
