import { Module } from '@nestjs/common';
import { RatesController } from './rates.controller';
import { RatesService } from './rates.service';
import { RateRefreshService } from './rate-refresh.service';
import { rateProviders } from './rates.providers';

/**
 * Module for exchange-rate queries and the background cache refresher
 */
@Module({
  controllers: [RatesController],
  providers: [...rateProviders, RatesService, RateRefreshService],
  exports: [RatesService],
})
export class RatesModule {}
