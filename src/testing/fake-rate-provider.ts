import { CurrencyKind } from '../currency/entities/currency.entity';
import { PairKey } from '../rates/entities/rate-pair.entity';
import { ProviderQuote, RateProvider } from '../rates/providers/rate-provider.interface';

export type FakeBehaviour =
  | { mode: 'quote'; rates: Record<string, number>; statusCode?: number }
  | { mode: 'fail'; error: Error }
  | { mode: 'hang' };

/** In-memory provider: answers with fixed rates, throws, or never answers until aborted */
export class FakeRateProvider implements RateProvider {
  calls = 0;

  constructor(
    readonly name: string,
    readonly kind: CurrencyKind,
    private readonly keys: PairKey[],
    public behaviour: FakeBehaviour,
    readonly label: string = name,
  ) {}

  pairs(): PairKey[] {
    return [...this.keys];
  }

  fetchRates(signal: AbortSignal): Promise<ProviderQuote> {
    this.calls += 1;
    const behaviour = this.behaviour;
    switch (behaviour.mode) {
      case 'quote':
        return Promise.resolve({ rates: { ...behaviour.rates }, statusCode: behaviour.statusCode ?? 200 });
      case 'fail':
        return Promise.reject(behaviour.error);
      case 'hang':
        return new Promise<ProviderQuote>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
    }
  }
}

export function cryptoProvider(rates: Record<string, number>): FakeRateProvider {
  return new FakeRateProvider('coingecko', CurrencyKind.CRYPTO, ['BTC_USD'], { mode: 'quote', rates }, 'CoinGecko');
}

export function fiatProvider(rates: Record<string, number>): FakeRateProvider {
  return new FakeRateProvider('exchangerate', CurrencyKind.FIAT, ['USD_EUR'], { mode: 'quote', rates }, 'ExchangeRate-API');
}
