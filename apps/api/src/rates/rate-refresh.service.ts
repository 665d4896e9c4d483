import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { BackgroundTasks, RateRefresher } from '@fxrates/rates';
import { APP_CONFIG, AppConfig } from '../config/app-config';

/**
 * Runs the background refresher for the lifetime of the application and
 * lets pending cache write-backs finish before the store is closed.
 */
@Injectable()
export class RateRefreshService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RateRefreshService.name);

  constructor(
    private readonly refresher: RateRefresher,
    private readonly tasks: BackgroundTasks,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.config.refresh.enabled) {
      this.logger.log('Background refresh disabled');
      return;
    }
    this.refresher.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.refresher.stop();
    await this.tasks.drain();
  }
}
