import { IsOptional, Matches } from 'class-validator';

export class ShowPortfolioDto {
  @IsOptional()
  @Matches(/^[A-Za-z0-9]{2,5}$/, { message: 'base must be a 2-5 character code' })
  base?: string;
}
