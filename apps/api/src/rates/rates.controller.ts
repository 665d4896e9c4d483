import { Controller, Get, Query } from '@nestjs/common';
import { ConversionResult, HistoricalRatesResponse, LatestRatesResponse } from '@fxrates/shared';
import { RatesService } from './rates.service';
import { LatestQueryDto } from './dto/latest-query.dto';
import { ConvertQueryDto } from './dto/convert-query.dto';
import { HistoricalQueryDto } from './dto/historical-query.dto';
import { RequestAbortSignal } from '../common/decorators/abort-signal.decorator';

/**
 * Controller for exchange-rate queries
 */
@Controller('v1')
export class RatesController {
  constructor(private readonly ratesService: RatesService) {}

  @Get('latest')
  async getLatest(
    @Query() query: LatestQueryDto,
    @RequestAbortSignal() signal: AbortSignal,
  ): Promise<LatestRatesResponse> {
    return this.ratesService.getLatest(query, signal);
  }

  @Get('convert')
  async convert(
    @Query() query: ConvertQueryDto,
    @RequestAbortSignal() signal: AbortSignal,
  ): Promise<ConversionResult> {
    return this.ratesService.convert(query, signal);
  }

  @Get('historical')
  async getHistorical(
    @Query() query: HistoricalQueryDto,
    @RequestAbortSignal() signal: AbortSignal,
  ): Promise<HistoricalRatesResponse> {
    return this.ratesService.getHistorical(query, signal);
  }
}
