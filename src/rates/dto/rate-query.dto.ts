import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Matches, Min } from 'class-validator';

const CODE = /^[A-Za-z0-9]{2,5}$/;
const CODE_MESSAGE = 'must be a 2-5 character code';

export class GetRateDto {
  @IsString()
  @Matches(CODE, { message: `from ${CODE_MESSAGE}` })
  from!: string;

  @IsString()
  @Matches(CODE, { message: `to ${CODE_MESSAGE}` })
  to!: string;
}

export class UpdateRatesDto {
  @IsOptional()
  @IsIn(['coingecko', 'exchangerate'], { message: 'source must be coingecko or exchangerate' })
  source?: string;
}

export class ShowRatesDto {
  @IsOptional()
  @Matches(CODE, { message: `currency ${CODE_MESSAGE}` })
  currency?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'top must be an integer' })
  @Min(1, { message: 'top must be at least 1' })
  top?: number;
}

export class ShowHistoryDto {
  @IsOptional()
  @Matches(CODE, { message: `currency ${CODE_MESSAGE}` })
  currency?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'limit must be an integer' })
  @Min(1, { message: 'limit must be at least 1' })
  limit?: number;
}
