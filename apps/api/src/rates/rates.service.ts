import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import {
  RateNotFoundError,
  RateService,
  RateValidationError,
  UpstreamError,
} from '@fxrates/rates';
import {
  ConversionResult,
  HistoricalRatesResponse,
  LatestRatesResponse,
} from '@fxrates/shared';
import { LatestQueryDto } from './dto/latest-query.dto';
import { ConvertQueryDto } from './dto/convert-query.dto';
import { HistoricalQueryDto } from './dto/historical-query.dto';

/**
 * NestJS wrapper for the rate service.
 * Turns query DTOs into domain calls and domain errors into HTTP exceptions.
 */
@Injectable()
export class RatesService {
  constructor(private readonly rateService: RateService) {}

  async getLatest(query: LatestQueryDto, signal?: AbortSignal): Promise<LatestRatesResponse> {
    return this.translate(async () => {
      const base = this.rateService.validateCurrency(query.base);
      const target = this.rateService.validateCurrency(query.symbol);
      return this.rateService.getLatestRates(base, target, signal);
    });
  }

  async convert(query: ConvertQueryDto, signal?: AbortSignal): Promise<ConversionResult> {
    return this.translate(async () => {
      const from = this.rateService.validateCurrency(query.from);
      const to = this.rateService.validateCurrency(query.to);
      const date = query.date ? this.rateService.validateDate(query.date) : undefined;
      return this.rateService.convert({ from, to, amount: query.amount, date }, signal);
    });
  }

  async getHistorical(query: HistoricalQueryDto, signal?: AbortSignal): Promise<HistoricalRatesResponse> {
    return this.translate(async () => {
      const startDate = query.startDate || query.endDate;
      const endDate = query.endDate || query.startDate;
      if (!startDate || !endDate) {
        throw new RateValidationError('at least one of startDate or endDate query parameters is required');
      }

      const base = this.rateService.validateCurrency(query.base);
      const target = this.rateService.validateCurrency(query.symbol);
      return this.rateService.getHistoricalRates(startDate, endDate, base, target, signal);
    });
  }

  private async translate<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof RateValidationError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof RateNotFoundError) {
        throw new NotFoundException(error.message);
      }
      if (error instanceof UpstreamError) {
        throw new InternalServerErrorException(error.message, { cause: error });
      }
      throw error;
    }
  }
}
