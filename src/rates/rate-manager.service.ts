import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import {
  ProviderError,
  StaleRateError,
  UnknownPairError,
  describeError,
} from '../common/errors/wallet.errors';
import { HttpStatusError } from '../common/http/fetch-json';
import { Clock } from '../common/utils/clock';
import { roundToPrecision } from '../common/utils/decimal.util';
import { logOperation } from '../common/utils/operation-log.util';
import { withTimeout } from '../common/utils/timeout.util';
import { CurrencyCatalogService } from '../currency/currency-catalog.service';
import { CurrencyKind } from '../currency/entities/currency.entity';
import { RatePair, pairKey, splitPairKey } from './entities/rate-pair.entity';
import { RateHistoryFilter, RateRecord } from './entities/rate-record.entity';
import {
  PairRefreshOutcome,
  RefreshOptions,
  RefreshReport,
  RefreshScope,
} from './entities/refresh-report.entity';
import { ProviderQuote, RATE_PROVIDERS, RateProvider } from './providers/rate-provider.interface';
import { RateCacheSnapshot, RateCacheStore } from './rate-cache.store';
import { RateHistoryLog } from './rate-history.store';

export interface Conversion {
  amount: Decimal;        // rounded to the target currency's precision
  pair: RatePair;
}

export interface RateListing {
  pairs: RatePair[];
  lastRefresh: string | null;
}

type ProviderFetch =
  | { provider: RateProvider; ok: true; quote: ProviderQuote; latencyMs: number }
  | { provider: RateProvider; ok: false; error: ProviderError; latencyMs: number };

const IDENTITY_SOURCE = 'identity';

/**
 * Answers "what is the rate for FROM→TO" under the staleness policy and
 * refreshes the cache from the configured providers.
 *
 * Resolution order: identity, direct pair, reciprocal of the inverse pair.
 * A direct pair always wins over the inverse, even when the inverse is newer.
 * `resolveRate` additionally crosses through the base currency.
 */
@Injectable()
export class RateManagerService {
  private readonly logger = new Logger(RateManagerService.name);

  constructor(
    private readonly cache: RateCacheStore,
    private readonly journal: RateHistoryLog,
    private readonly catalog: CurrencyCatalogService,
    private readonly clock: Clock,
    @Inject(RATE_PROVIDERS) private readonly providers: RateProvider[],
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Fresh rate for the pair, from the cache only.
   * @throws UnknownPairError if either code is not in the catalog
   * @throws StaleRateError if nothing is cached or the entry is older than maxAgeSeconds
   */
  async getRate(from: string, to: string, maxAgeSeconds = this.config.ratesTtlSeconds): Promise<RatePair> {
    const [src, dst] = this.requireKnown(from, to);
    if (src === dst) {
      return this.identity(src);
    }

    const pair = this.lookup(await this.cache.snapshot(), src, dst);
    if (!pair) {
      throw new StaleRateError(src, dst, null, maxAgeSeconds);
    }
    this.assertFresh(pair, maxAgeSeconds);
    return pair;
  }

  /**
   * Best available rate regardless of age: direct, reciprocal, then a cross
   * rate through the base currency.
   * @throws UnknownPairError if nothing resolves
   */
  async resolveRate(from: string, to: string): Promise<RatePair> {
    const [src, dst] = this.requireKnown(from, to);
    if (src === dst) {
      return this.identity(src);
    }

    const snapshot = await this.cache.snapshot();
    const pair = this.lookup(snapshot, src, dst) ?? this.cross(snapshot, src, dst);
    if (!pair) {
      throw new UnknownPairError(src, dst, 'neither direction is cached');
    }
    return pair;
  }

  isFresh(pair: RatePair, maxAgeSeconds = this.config.ratesTtlSeconds): boolean {
    const updatedAt = Date.parse(pair.updatedAt);
    if (Number.isNaN(updatedAt)) {
      return false;
    }
    return this.clock.now().getTime() - updatedAt <= maxAgeSeconds * 1000;
  }

  /**
   * amount × rate, rounded half-even to the target's precision.
   * @throws UnknownPairError | StaleRateError
   */
  async convert(
    amount: Decimal,
    from: string,
    to: string,
    maxAgeSeconds = this.config.ratesTtlSeconds,
  ): Promise<Conversion> {
    const pair = await this.resolveRate(from, to);
    this.assertFresh(pair, maxAgeSeconds);
    return {
      pair,
      amount: roundToPrecision(amount.times(pair.rate), this.catalog.precisionOf(pair.to)),
    };
  }

  /**
   * Cached pairs sorted by key. `currency` keeps pairs touching that code;
   * `top` keeps the N highest-priced crypto pairs.
   */
  async listRates(filter: { currency?: string; top?: number } = {}): Promise<RateListing> {
    const snapshot = await this.cache.snapshot();
    let pairs = snapshot.list().sort((a, b) => pairKey(a.from, a.to).localeCompare(pairKey(b.from, b.to)));

    if (filter.currency) {
      const code = filter.currency.toUpperCase();
      pairs = pairs.filter((p) => p.from === code || p.to === code);
    }

    if (filter.top !== undefined && filter.top > 0) {
      pairs = pairs
        .filter((p) => this.catalog.find(p.from)?.kind === CurrencyKind.CRYPTO)
        .sort((a, b) => b.rate - a.rate)
        .slice(0, filter.top);
    }

    return { pairs, lastRefresh: snapshot.lastRefresh };
  }

  /** Journal entries, oldest first */
  history(filter: RateHistoryFilter = {}): AsyncIterable<RateRecord> {
    return this.journal.query(filter);
  }

  /**
   * Pulls every pair of the selected providers. Each provider gets one call,
   * bounded by REQUEST_TIMEOUT_MS. Per pair the journal entry is appended
   * before the cache entry is replaced. A provider failure marks its pairs
   * failed and does not stop the others. Pairs committed before a crash or
   * a PersistenceError stay committed.
   */
  refresh(options: RefreshOptions = {}): Promise<RefreshReport> {
    const scope = options.scope ?? RefreshScope.ALL;

    return logOperation(
      this.logger,
      'REFRESH',
      { scope, source: options.source },
      async () => {
        const startedAt = this.clock.now().toISOString();
        const selected = this.providers.filter(
          (p) => matchesScope(p, scope) && (!options.source || p.name === options.source),
        );

        const fetched = await Promise.all(selected.map((p) => this.fetchFrom(p)));

        const outcomes: PairRefreshOutcome[] = [];
        for (const result of fetched) {
          outcomes.push(...(await this.commitFetch(result)));
        }

        const updated = outcomes.filter((o) => o.status === 'updated').length;
        return {
          scope,
          startedAt,
          finishedAt: this.clock.now().toISOString(),
          outcomes,
          updated,
          failed: outcomes.length - updated,
        };
      },
      (report) => ({
        outcome: report.failed > 0 ? 'error' : 'ok',
        updated: report.updated,
        failed: report.failed,
      }),
    );
  }

  private async fetchFrom(provider: RateProvider): Promise<ProviderFetch> {
    const started = Date.now();
    try {
      const quote = await withTimeout(`${provider.name} request`, this.config.requestTimeoutMs, (signal) =>
        provider.fetchRates(signal),
      );
      return { provider, ok: true, quote, latencyMs: Date.now() - started };
    } catch (error) {
      const providerError = toProviderError(provider, error);
      this.logger.warn(`fetch from ${provider.name} failed: ${providerError.message}`);
      return { provider, ok: false, error: providerError, latencyMs: Date.now() - started };
    }
  }

  private async commitFetch(result: ProviderFetch): Promise<PairRefreshOutcome[]> {
    const { provider } = result;
    if (!result.ok) {
      return provider.pairs().map((pair) => ({
        status: 'failed' as const,
        pair,
        source: provider.label,
        error: result.error,
      }));
    }

    const observedAt = this.clock.now().toISOString();
    const outcomes: PairRefreshOutcome[] = [];

    for (const key of provider.pairs()) {
      const rate = result.quote.rates[key];
      const parts = splitPairKey(key);
      if (!parts || rate === undefined || !(rate > 0)) {
        outcomes.push({
          status: 'failed',
          pair: key,
          source: provider.label,
          error: new ProviderError(provider.name, `no quote for ${key} in response`, result.quote.statusCode),
        });
        continue;
      }

      const { from, to } = parts;
      await this.journal.append({
        id: `${key}_${observedAt}`,
        from,
        to,
        rate,
        timestamp: observedAt,
        source: provider.label,
        meta: { requestMs: result.latencyMs, statusCode: result.quote.statusCode },
      });
      await this.cache.put({ from, to, rate, updatedAt: observedAt, source: provider.label });

      outcomes.push({ status: 'updated', pair: key, source: provider.label, rate, latencyMs: result.latencyMs });
    }
    return outcomes;
  }

  private requireKnown(from: string, to: string): [string, string] {
    const src = this.catalog.find(from);
    const dst = this.catalog.find(to);
    if (!src || !dst) {
      const unknown = [!src ? from : undefined, !dst ? to : undefined].filter(Boolean).join(', ');
      throw new UnknownPairError(from.toUpperCase(), to.toUpperCase(), `unknown currency ${unknown}`);
    }
    return [src.code, dst.code];
  }

  private identity(code: string): RatePair {
    return { from: code, to: code, rate: 1, updatedAt: this.clock.now().toISOString(), source: IDENTITY_SOURCE };
  }

  private lookup(snapshot: RateCacheSnapshot, from: string, to: string): RatePair | undefined {
    const direct = snapshot.get(from, to);
    if (direct) {
      return direct;
    }
    const inverse = snapshot.get(to, from);
    if (inverse) {
      return { from, to, rate: 1 / inverse.rate, updatedAt: inverse.updatedAt, source: inverse.source };
    }
    return undefined;
  }

  // FROM→BASE→TO; dated by the older leg
  private cross(snapshot: RateCacheSnapshot, from: string, to: string): RatePair | undefined {
    const base = this.config.baseCurrency;
    if (from === base || to === base) {
      return undefined;
    }
    const first = this.lookup(snapshot, from, base);
    const second = this.lookup(snapshot, base, to);
    if (!first || !second) {
      return undefined;
    }
    const older = Date.parse(first.updatedAt) <= Date.parse(second.updatedAt) ? first : second;
    return {
      from,
      to,
      rate: new Decimal(first.rate).times(second.rate).toNumber(),
      updatedAt: older.updatedAt,
      source: first.source === second.source ? first.source : `${first.source}+${second.source}`,
    };
  }

  private assertFresh(pair: RatePair, maxAgeSeconds: number): void {
    if (!this.isFresh(pair, maxAgeSeconds)) {
      throw new StaleRateError(pair.from, pair.to, pair.updatedAt, maxAgeSeconds);
    }
  }
}

function matchesScope(provider: RateProvider, scope: RefreshScope): boolean {
  switch (scope) {
    case RefreshScope.CRYPTO:
      return provider.kind === CurrencyKind.CRYPTO;
    case RefreshScope.FIAT:
      return provider.kind === CurrencyKind.FIAT;
    default:
      return true;
  }
}

function toProviderError(provider: RateProvider, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const statusCode = error instanceof HttpStatusError ? error.status : undefined;
  return new ProviderError(provider.name, describeError(error), statusCode, { cause: error });
}
