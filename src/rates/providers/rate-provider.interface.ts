import { CurrencyKind } from '../../currency/entities/currency.entity';
import { PairKey } from '../entities/rate-pair.entity';

export const RATE_PROVIDERS = Symbol('RATE_PROVIDERS');

export interface ProviderQuote {
  rates: Record<string, number>;   // keyed by PairKey
  statusCode: number;
}

/**
 * External rate source. One `fetchRates` call returns every pair the
 * provider covers; the Rate Manager bounds it with a timeout via `signal`.
 */
export interface RateProvider {
  readonly name: string;           // CLI --source value
  readonly label: string;          // stored as RatePair.source
  readonly kind: CurrencyKind;
  pairs(): PairKey[];
  fetchRates(signal: AbortSignal): Promise<ProviderQuote>;
}
