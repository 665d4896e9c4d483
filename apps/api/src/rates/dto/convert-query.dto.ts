import { Type } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString } from 'class-validator';

export class ConvertQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'from query parameter is required' })
  from!: string;

  @IsString()
  @IsNotEmpty({ message: 'to query parameter is required' })
  to!: string;

  @Type(() => Number)
  @IsPositive({ message: 'amount must be a positive number' })
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'amount must be a positive number' })
  amount!: number;

  @IsOptional()
  @IsString()
  date?: string;
}
