import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { UnknownPairError } from '../common/errors/wallet.errors';
import { roundToPrecision } from '../common/utils/decimal.util';
import { CurrencyCatalogService } from '../currency/currency-catalog.service';
import { RateManagerService } from '../rates/rate-manager.service';
import { HoldingView, PortfolioView } from './dto/portfolio-view.dto';
import { PortfolioStoreService } from './portfolio-store.service';

// Read-only valuation of a wallet. Queries are kept apart from the trade path.
@Injectable()
export class PortfolioQueryService {
  constructor(
    private readonly store: PortfolioStoreService,
    private readonly rates: RateManagerService,
    private readonly catalog: CurrencyCatalogService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Holdings valued in `base` (the configured base currency by default).
   * Stale rates still produce a value but flag the holding; a pair that
   * cannot be resolved at all leaves the value null and out of the total.
   *
   * @throws UnknownPairError when `base` is not a catalog currency
   */
  async getPortfolio(userId: number, base?: string): Promise<PortfolioView> {
    const target = this.catalog.find(base ?? this.config.baseCurrency);
    if (!target) {
      throw new UnknownPairError(String(base), String(base), 'unknown base currency');
    }

    const portfolio = await this.store.load(userId);
    const codes = Array.from(portfolio.wallet.keys()).sort();

    const holdings: HoldingView[] = [];
    for (const code of codes) {
      const balance = portfolio.wallet.get(code) ?? new Decimal(0);
      holdings.push(await this.valueHolding(code, balance, target.code, target.precision));
    }

    const total = holdings.reduce(
      (sum, h) => (h.value ? sum.plus(h.value) : sum),
      new Decimal(0),
    );

    return {
      userId,
      base: target.code,
      holdings,
      total: roundToPrecision(total, target.precision),
      hasStaleRates: holdings.some((h) => h.stale),
    };
  }

  private async valueHolding(
    currency: string,
    balance: Decimal,
    base: string,
    places: number,
  ): Promise<HoldingView> {
    try {
      const pair = await this.rates.resolveRate(currency, base);
      return {
        currency,
        balance,
        value: roundToPrecision(balance.times(pair.rate), places),
        rate: pair.rate,
        stale: !this.rates.isFresh(pair),
      };
    } catch (error) {
      if (error instanceof UnknownPairError) {
        return { currency, balance, value: null, rate: null, stale: false };
      }
      throw error;
    }
  }
}
