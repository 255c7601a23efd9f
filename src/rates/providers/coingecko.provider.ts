import { z } from 'zod';
import { ProviderError } from '../../common/errors/wallet.errors';
import { HttpGetJson, fetchJson } from '../../common/http/fetch-json';
import { CurrencyKind } from '../../currency/entities/currency.entity';
import { PairKey, pairKey } from '../entities/rate-pair.entity';
import { ProviderQuote, RateProvider } from './rate-provider.interface';

// CoinGecko coin ids for the catalog's crypto codes
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  LTC: 'litecoin',
  XRP: 'ripple',
  ADA: 'cardano',
  DOT: 'polkadot',
};

// { "bitcoin": { "usd": 59337.21 }, ... }
const simplePriceSchema = z.record(z.record(z.number().positive()));

export type CoinGeckoProviderOptions = {
  url: string;
  baseCurrency: string;
  tracked: string[];
  http?: HttpGetJson;
};

/**
 * Crypto quotes from CoinGecko's /simple/price.
 * Produces CRYPTO_BASE pairs (units of base per coin).
 */
export class CoinGeckoProvider implements RateProvider {
  readonly name = 'coingecko';
  readonly label = 'CoinGecko';
  readonly kind = CurrencyKind.CRYPTO;

  private readonly url: string;
  private readonly base: string;
  private readonly coins: Array<{ code: string; id: string }>;
  private readonly http: HttpGetJson;

  constructor(opts: CoinGeckoProviderOptions) {
    this.url = opts.url;
    this.base = opts.baseCurrency;
    this.coins = opts.tracked.flatMap((code) => {
      const id = COINGECKO_IDS[code];
      return id ? [{ code, id }] : [];
    });
    this.http = opts.http ?? fetchJson;
  }

  pairs(): PairKey[] {
    return this.coins.map(({ code }) => pairKey(code, this.base));
  }

  async fetchRates(signal: AbortSignal): Promise<ProviderQuote> {
    if (this.coins.length === 0) {
      return { rates: {}, statusCode: 200 };
    }

    const res = await this.http(this.url, {
      query: {
        ids: this.coins.map((c) => c.id).join(','),
        vs_currencies: this.base.toLowerCase(),
      },
      signal,
    });

    const parsed = simplePriceSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape', res.status);
    }

    const vs = this.base.toLowerCase();
    const rates: Record<string, number> = {};
    for (const { code, id } of this.coins) {
      const price = parsed.data[id]?.[vs];
      if (price !== undefined) {
        rates[pairKey(code, this.base)] = price;
      }
    }
    return { rates, statusCode: res.status };
  }
}
