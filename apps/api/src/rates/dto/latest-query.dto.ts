import { IsNotEmpty, IsString, Matches } from 'class-validator';

export const SINGLE_SYMBOL_MESSAGE = 'More than one target currency provided, specify one';

export class LatestQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'base query parameter is required' })
  base!: string;

  @Matches(/^[^,]*$/, { message: SINGLE_SYMBOL_MESSAGE })
  @IsString()
  @IsNotEmpty({ message: 'symbol query parameter is required' })
  symbol!: string;
}
