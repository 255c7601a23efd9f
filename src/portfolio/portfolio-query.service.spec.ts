import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { UnknownPairError } from '../common/errors/wallet.errors';
import { Clock } from '../common/utils/clock';
import { ConfigModule } from '../config/config.module';
import { CurrencyCatalogService } from '../currency/currency-catalog.service';
import { PersistenceService } from '../persistence/persistence.service';
import { RATE_PROVIDERS } from '../rates/providers/rate-provider.interface';
import { RateCacheStore } from '../rates/rate-cache.store';
import { RateHistoryLog } from '../rates/rate-history.store';
import { RateManagerService } from '../rates/rate-manager.service';
import { FixedClock } from '../testing/fixed-clock';
import { makeDataDir, removeDataDir, testConfig } from '../testing/test-config';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStoreService } from './portfolio-store.service';

const NOW = '2025-01-01T12:00:00.000Z';

describe('PortfolioQueryService - Queries', () => {
  let service: PortfolioQueryService;
  let store: PortfolioStoreService;
  let cache: RateCacheStore;
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeDataDir();

    const module: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule.forRoot(testConfig(dataDir))],
      providers: [
        PersistenceService,
        CurrencyCatalogService,
        RateCacheStore,
        RateHistoryLog,
        { provide: Clock, useValue: new FixedClock(new Date(NOW)) },
        { provide: RATE_PROVIDERS, useValue: [] },
        RateManagerService,
        PortfolioStoreService,
        PortfolioQueryService,
      ],
    }).compile();

    service = module.get<PortfolioQueryService>(PortfolioQueryService);
    store = module.get<PortfolioStoreService>(PortfolioStoreService);
    cache = module.get<RateCacheStore>(RateCacheStore);

    await store.save({
      userId: 7,
      wallet: new Map([
        ['USD', new Decimal('33.14')],
        ['BTC', new Decimal('0.05')],
        ['EUR', new Decimal('100')],
      ]),
    });
  });

  afterEach(async () => {
    await removeDataDir(dataDir);
  });

  it('should value every holding in the base currency, sorted by code', async () => {
    await cache.put({ from: 'BTC', to: 'USD', rate: 59337.21, updatedAt: NOW, source: 'CoinGecko' });
    await cache.put({ from: 'USD', to: 'EUR', rate: 0.8, updatedAt: NOW, source: 'ExchangeRate-API' });

    const view = await service.getPortfolio(7);

    expect(view.base).toBe('USD');
    expect(view.holdings.map((h) => [h.currency, h.value?.toString() ?? null])).toEqual([
      ['BTC', '2966.86'],
      ['EUR', '125'],
      ['USD', '33.14'],
    ]);
    expect(view.total.toString()).toBe('3125');
    expect(view.hasStaleRates).toBe(false);
  });

  it('should still value a holding with a stale rate but flag it', async () => {
    await cache.put({ from: 'BTC', to: 'USD', rate: 59337.21, updatedAt: '2025-01-01T09:00:00.000Z', source: 'CoinGecko' });

    const view = await service.getPortfolio(7);
    const btc = view.holdings.find((h) => h.currency === 'BTC');

    expect(btc?.value?.toString()).toBe('2966.86');
    expect(btc?.stale).toBe(true);
    expect(view.hasStaleRates).toBe(true);
  });

  it('should leave a holding without any rate out of the total', async () => {
    const view = await service.getPortfolio(7);
    const eur = view.holdings.find((h) => h.currency === 'EUR');

    expect(eur).toMatchObject({ value: null, rate: null, stale: false });
    expect(view.total.toString()).toBe('33.14');
  });

  it('should value in another base through a cross rate', async () => {
    await cache.put({ from: 'BTC', to: 'USD', rate: 60000, updatedAt: NOW, source: 'CoinGecko' });
    await cache.put({ from: 'USD', to: 'EUR', rate: 0.9, updatedAt: NOW, source: 'ExchangeRate-API' });

    const view = await service.getPortfolio(7, 'eur');
    const btc = view.holdings.find((h) => h.currency === 'BTC');

    expect(view.base).toBe('EUR');
    expect(btc?.value?.toString()).toBe('2700');
  });

  it('should return an empty view for a user without holdings', async () => {
    const view = await service.getPortfolio(99);
    expect(view.holdings).toEqual([]);
    expect(view.total.toString()).toBe('0');
  });

  it('should reject an unknown base currency', async () => {
    await expect(service.getPortfolio(7, 'XYZ')).rejects.toThrow(UnknownPairError);
  });
});
