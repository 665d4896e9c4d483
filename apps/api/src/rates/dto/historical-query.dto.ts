import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { SINGLE_SYMBOL_MESSAGE } from './latest-query.dto';

export class HistoricalQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'base query parameter is required' })
  base!: string;

  @Matches(/^[^,]*$/, { message: SINGLE_SYMBOL_MESSAGE })
  @IsString()
  @IsNotEmpty({ message: 'symbol query parameter is required' })
  symbol!: string;

  /** Defaults to endDate when omitted */
  @IsOptional()
  @IsString()
  startDate?: string;

  /** Defaults to startDate when omitted */
  @IsOptional()
  @IsString()
  endDate?: string;
}
