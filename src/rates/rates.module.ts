import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { CoinGeckoProvider } from './providers/coingecko.provider';
import { ExchangeRateApiProvider } from './providers/exchangerate-api.provider';
import { RATE_PROVIDERS, RateProvider } from './providers/rate-provider.interface';
import { RateCacheStore } from './rate-cache.store';
import { RateHistoryLog } from './rate-history.store';
import { RateManagerService } from './rate-manager.service';

@Module({
  providers: [
    RateCacheStore,
    RateHistoryLog,
    {
      provide: RATE_PROVIDERS,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): RateProvider[] => [
        new CoinGeckoProvider({
          url: config.coingeckoUrl,
          baseCurrency: config.baseCurrency,
          tracked: config.trackedCrypto,
        }),
        new ExchangeRateApiProvider({
          url: config.exchangeRateApiUrl,
          apiKey: config.exchangeRateApiKey,
          baseCurrency: config.baseCurrency,
          tracked: config.trackedFiat,
        }),
      ],
    },
    RateManagerService, // getRate, resolveRate, convert, listRates, refresh
  ],
  exports: [RateManagerService],
})
export class RatesModule {}
