import { Type } from 'class-transformer';
import { IsNumber, IsPositive, IsString, Matches } from 'class-validator';

// Flags of deposit, buy and sell
export class TradeDto {
  @IsString()
  @Matches(/^[A-Za-z0-9]{2,5}$/, { message: 'currency must be a 2-5 character code' })
  currency!: string;

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'amount must be a number' })
  @IsPositive({ message: 'amount must be positive' })
  amount!: number;
}
