import { ProviderError } from '../../common/errors/wallet.errors';
import { PairKey } from './rate-pair.entity';

export enum RefreshScope {
  ALL = 'all',
  CRYPTO = 'crypto',
  FIAT = 'fiat',
}

export interface RefreshOptions {
  scope?: RefreshScope;
  source?: string;        // provider name, e.g. "coingecko"
}

export type PairRefreshOutcome =
  | { status: 'updated'; pair: PairKey; source: string; rate: number; latencyMs: number }
  | { status: 'failed'; pair: PairKey; source: string; error: ProviderError };

// Per-pair result of one refresh. Partial failure is a normal outcome.
export interface RefreshReport {
  scope: RefreshScope;
  startedAt: string;
  finishedAt: string;
  outcomes: PairRefreshOutcome[];
  updated: number;
  failed: number;
}
