import { z } from 'zod';
import { ProviderError } from '../../common/errors/wallet.errors';
import { HttpGetJson, fetchJson } from '../../common/http/fetch-json';
import { CurrencyKind } from '../../currency/entities/currency.entity';
import { PairKey, pairKey } from '../entities/rate-pair.entity';
import { ProviderQuote, RateProvider } from './rate-provider.interface';

const latestSchema = z.object({
  result: z.string(),
  'error-type': z.string().optional(),
  conversion_rates: z.record(z.number().positive()).optional(),
});

export type ExchangeRateApiProviderOptions = {
  url: string;
  apiKey: string;
  baseCurrency: string;
  tracked: string[];
  http?: HttpGetJson;
};

/**
 * Fiat quotes from ExchangeRate-API v6 `/latest/{base}`.
 * `conversion_rates` are units of fiat per one base, so pairs are BASE_FIAT;
 * FIAT_BASE is served as the reciprocal by the Rate Manager.
 */
export class ExchangeRateApiProvider implements RateProvider {
  readonly name = 'exchangerate';
  readonly label = 'ExchangeRate-API';
  readonly kind = CurrencyKind.FIAT;

  private readonly http: HttpGetJson;

  constructor(private readonly opts: ExchangeRateApiProviderOptions) {
    this.http = opts.http ?? fetchJson;
  }

  pairs(): PairKey[] {
    return this.opts.tracked.map((code) => pairKey(this.opts.baseCurrency, code));
  }

  async fetchRates(signal: AbortSignal): Promise<ProviderQuote> {
    if (!this.opts.apiKey) {
      throw new ProviderError(this.name, 'EXCHANGERATE_API_KEY is not set');
    }

    const res = await this.http(`${this.opts.url}/${this.opts.apiKey}/latest/${this.opts.baseCurrency}`, {
      signal,
    });

    const parsed = latestSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape', res.status);
    }
    if (parsed.data.result !== 'success') {
      throw new ProviderError(this.name, `API error: ${parsed.data['error-type'] ?? 'unknown'}`, res.status);
    }

    const quoted = parsed.data.conversion_rates ?? {};
    const rates: Record<string, number> = {};
    for (const code of this.opts.tracked) {
      const rate = quoted[code];
      if (rate !== undefined) {
        rates[pairKey(this.opts.baseCurrency, code)] = rate;
      }
    }
    return { rates, statusCode: res.status };
  }
}
