import Decimal from 'decimal.js';
import {
  InsufficientFundsError,
  InvalidTradeError,
  PersistenceError,
  PrecisionUnderflowError,
  StaleRateError,
  UnknownPairError,
} from '../../common/errors/wallet.errors';

export enum TradeSide {
  BUY = 'buy',
  SELL = 'sell',
  DEPOSIT = 'deposit',
}

// Transient request to move a balance. Amount is in units of `currency`.
export interface TradeIntent {
  currency: string;
  amount: Decimal.Value;
  side: TradeSide;
}

// Record of one committed trade with exact Decimal values.
// Deposits carry rate 1 and are costed in the deposited currency.
export interface TradeReceipt {
  tradeId: string;            // uuid
  userId: number;
  side: TradeSide;
  currency: string;
  quantity: Decimal;          // rounded to the currency's precision
  rate: number;               // base per one unit of currency
  base: string;
  cost: Decimal;              // rounded to the base's precision
  balancesBefore: Record<string, Decimal>;
  balancesAfter: Record<string, Decimal>;
  executedAt: Date;
}

export type TradeRejection =
  | InvalidTradeError
  | InsufficientFundsError
  | UnknownPairError
  | StaleRateError
  | PrecisionUnderflowError
  | PersistenceError;

export type TradeResult =
  | { status: 'committed'; receipt: TradeReceipt }
  | { status: 'rejected'; error: TradeRejection };

export function isTradeRejection(error: unknown): error is TradeRejection {
  return (
    error instanceof InvalidTradeError ||
    error instanceof InsufficientFundsError ||
    error instanceof UnknownPairError ||
    error instanceof StaleRateError ||
    error instanceof PrecisionUnderflowError ||
    error instanceof PersistenceError
  );
}
