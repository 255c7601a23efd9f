import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { promises as fs } from 'fs';
import path from 'path';
import { ConfigModule } from '../config/config.module';
import { PersistenceService } from '../persistence/persistence.service';
import { makeDataDir, removeDataDir, testConfig } from '../testing/test-config';
import { PortfolioStoreService } from './portfolio-store.service';

describe('PortfolioStoreService', () => {
  let store: PortfolioStoreService;
  let dataDir: string;
  let file: string;

  beforeEach(async () => {
    dataDir = await makeDataDir();
    const module: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule.forRoot(testConfig(dataDir))],
      providers: [PersistenceService, PortfolioStoreService],
    }).compile();

    store = module.get<PortfolioStoreService>(PortfolioStoreService);
    file = path.join(dataDir, 'portfolios.json');
  });

  afterEach(async () => {
    await removeDataDir(dataDir);
  });

  it('should return an empty wallet for a user without an entry', async () => {
    const portfolio = await store.load(7);
    expect(portfolio.userId).toBe(7);
    expect(portfolio.wallet.size).toBe(0);
  });

  it('should keep every digit of large balances across a save and load', async () => {
    await store.save({
      userId: 1,
      wallet: new Map([
        ['USD', new Decimal('1234567890123456.78')],
        ['BTC', new Decimal('123456789.00000001')],
      ]),
    });

    const { wallet } = await store.load(1);

    expect(wallet.get('USD')?.toFixed()).toBe('1234567890123456.78');
    expect(wallet.get('BTC')?.toFixed()).toBe('123456789.00000001');
  });

  it('should write balances as decimal strings', async () => {
    await store.save({ userId: 1, wallet: new Map([['BTC', new Decimal('0.00000001')]]) });

    const raw: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(raw).toEqual([{ user_id: 1, wallets: { BTC: { balance: '0.00000001' } } }]);
  });

  it('should load numeric balances written by older versions', async () => {
    await fs.writeFile(file, JSON.stringify([{ user_id: 1, wallets: { USD: { balance: 150.5 } } }]));

    const { wallet } = await store.load(1);

    expect(wallet.get('USD')?.toFixed()).toBe('150.5');
  });

  it('should replace only the saved user entry', async () => {
    await store.create(1);
    await store.create(2);

    await store.save({ userId: 2, wallet: new Map([['EUR', new Decimal('10')]]) });

    expect((await store.load(1)).wallet.size).toBe(0);
    expect((await store.load(2)).wallet.get('EUR')?.toFixed()).toBe('10');
  });
});
