import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import {
  InsufficientFundsError,
  InvalidTradeError,
  PrecisionUnderflowError,
} from '../common/errors/wallet.errors';
import { ActionEntry, ActionLogService } from '../common/logging/action-log.service';
import { Clock } from '../common/utils/clock';
import { roundToPrecision, toFixed } from '../common/utils/decimal.util';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { logOperation } from '../common/utils/operation-log.util';
import { CurrencyCatalogService } from '../currency/currency-catalog.service';
import { Currency } from '../currency/entities/currency.entity';
import { RateManagerService } from '../rates/rate-manager.service';
import { Wallet, balanceOf, walletEntries } from './entities/portfolio.entity';
import {
  TradeIntent,
  TradeReceipt,
  TradeResult,
  TradeSide,
  isTradeRejection,
} from './entities/trade.entity';
import { PortfolioStoreService } from './portfolio-store.service';

// Buy, sell and deposit against the cached rate table with exact Decimal arithmetic.
// A trade either commits in full or leaves the stored portfolio untouched.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);
  private readonly userLocks = new KeyedMutex();

  constructor(
    private readonly store: PortfolioStoreService,
    private readonly rates: RateManagerService,
    private readonly catalog: CurrencyCatalogService,
    private readonly clock: Clock,
    private readonly actions: ActionLogService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  buy(userId: number, currency: string, amount: Decimal.Value): Promise<TradeResult> {
    return this.execute(userId, { currency, amount, side: TradeSide.BUY });
  }

  sell(userId: number, currency: string, amount: Decimal.Value): Promise<TradeResult> {
    return this.execute(userId, { currency, amount, side: TradeSide.SELL });
  }

  /** Credits a known currency (the base included) without a rate lookup */
  deposit(userId: number, currency: string, amount: Decimal.Value): Promise<TradeResult> {
    return this.execute(userId, { currency, amount, side: TradeSide.DEPOSIT });
  }

  /**
   * Validates, prices and applies one intent under the user's lock.
   * Domain failures come back as a rejected result; anything else propagates.
   */
  async execute(userId: number, intent: TradeIntent): Promise<TradeResult> {
    const result = await logOperation(
      this.logger,
      'TRADE',
      { userId, side: intent.side, currency: intent.currency, amount: String(intent.amount) },
      () => this.userLocks.runExclusive(String(userId), () => this.apply(userId, intent)),
      (result) =>
        result.status === 'committed'
          ? {
              outcome: 'ok',
              tradeId: result.receipt.tradeId,
              rate: result.receipt.rate,
              cost: result.receipt.cost.toString(),
            }
          : { outcome: 'error', errorKind: result.error.kind, reason: result.error.message },
    );
    this.actions.record(toActionEntry(userId, intent, result));
    return result;
  }

  private async apply(userId: number, intent: TradeIntent): Promise<TradeResult> {
    try {
      return { status: 'committed', receipt: await this.settle(userId, intent) };
    } catch (error) {
      if (isTradeRejection(error)) {
        return { status: 'rejected', error };
      }
      throw error;
    }
  }

  private async settle(userId: number, intent: TradeIntent): Promise<TradeReceipt> {
    const currency = this.validate(intent);
    const amount = parseAmount(intent.amount);
    const quantity = roundToPrecision(amount, currency.precision);

    let base = this.config.baseCurrency;
    let rate = 1;
    let cost = quantity;

    if (intent.side !== TradeSide.DEPOSIT) {
      const pair = await this.rates.getRate(currency.code, base);
      rate = pair.rate;
      cost = roundToPrecision(quantity.times(rate), this.catalog.precisionOf(base));
    } else {
      base = currency.code;
    }

    if (quantity.isZero() || cost.isZero()) {
      throw new PrecisionUnderflowError(
        `${amount.toString()} ${currency.code} rounds to zero at ${currency.precision} decimal places`,
      );
    }

    const portfolio = await this.store.load(userId);
    const before = walletEntries(portfolio.wallet);
    const wallet: Wallet = new Map(portfolio.wallet);

    switch (intent.side) {
      case TradeSide.BUY:
        this.debit(wallet, base, cost);
        this.credit(wallet, currency.code, quantity);
        break;
      case TradeSide.SELL:
        this.debit(wallet, currency.code, quantity);
        this.credit(wallet, base, cost);
        break;
      case TradeSide.DEPOSIT:
        this.credit(wallet, currency.code, quantity);
        break;
    }

    await this.store.save({ userId, wallet });

    return {
      tradeId: uuidv4(),
      userId,
      side: intent.side,
      currency: currency.code,
      quantity,
      rate,
      base,
      cost,
      balancesBefore: before,
      balancesAfter: walletEntries(wallet),
      executedAt: this.clock.now(),
    };
  }

  private validate(intent: TradeIntent): Currency {
    const currency = this.catalog.find(intent.currency);
    if (!currency) {
      throw new InvalidTradeError(`Unknown currency '${intent.currency}'`);
    }
    if (intent.side !== TradeSide.DEPOSIT && currency.code === this.config.baseCurrency) {
      throw new InvalidTradeError(`Cannot ${intent.side} ${currency.code} against itself`);
    }
    return currency;
  }

  private debit(wallet: Wallet, code: string, amount: Decimal): void {
    const available = balanceOf(wallet, code);
    if (available.lessThan(amount)) {
      const places = this.catalog.precisionOf(code);
      throw new InsufficientFundsError(code, toFixed(available, places), toFixed(amount, places));
    }
    wallet.set(code, available.minus(amount));
  }

  private credit(wallet: Wallet, code: string, amount: Decimal): void {
    wallet.set(code, balanceOf(wallet, code).plus(amount));
  }
}

const ACTIONS: Record<TradeSide, ActionEntry['action']> = {
  [TradeSide.BUY]: 'BUY',
  [TradeSide.SELL]: 'SELL',
  [TradeSide.DEPOSIT]: 'DEPOSIT',
};

function toActionEntry(userId: number, intent: TradeIntent, result: TradeResult): ActionEntry {
  const action = ACTIONS[intent.side];
  if (result.status === 'rejected') {
    return {
      action,
      userId,
      currency: intent.currency,
      amount: String(intent.amount),
      result: 'ERROR',
      errorType: result.error.kind,
      errorMessage: result.error.message,
    };
  }
  const { receipt } = result;
  return {
    action,
    userId,
    currency: receipt.currency,
    amount: receipt.quantity.toFixed(),
    rate: receipt.rate,
    base: receipt.base,
    cost: receipt.cost.toFixed(),
    result: 'OK',
  };
}

function parseAmount(raw: Decimal.Value): Decimal {
  let amount: Decimal;
  try {
    amount = new Decimal(raw);
  } catch {
    throw new InvalidTradeError(`Amount '${String(raw)}' is not a number`);
  }
  if (!amount.isFinite() || !amount.greaterThan(0)) {
    throw new InvalidTradeError(`Amount must be a positive number, got ${amount.toString()}`);
  }
  return amount;
}
