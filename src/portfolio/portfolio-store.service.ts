import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { PersistenceService } from '../persistence/persistence.service';
import { defineStore } from '../persistence/store-definition';
import { Portfolio, Wallet } from './entities/portfolio.entity';

// Balances are decimal strings so no digit is lost; plain numbers from older files still load
const storedBalance = z.union([z.string().regex(/^\d+(\.\d+)?$/), z.number().nonnegative()]);

const storedPortfolioSchema = z.object({
  user_id: z.number().int(),
  wallets: z.record(z.object({ balance: storedBalance })),
});

type StoredPortfolio = z.infer<typeof storedPortfolioSchema>;

export const PORTFOLIOS_STORE = defineStore<StoredPortfolio[]>({
  id: 'portfolios',
  fileName: 'portfolios.json',
  schema: z.array(storedPortfolioSchema),
  empty: () => [],
});

function toStored(portfolio: Portfolio): StoredPortfolio {
  const wallets: StoredPortfolio['wallets'] = {};
  for (const [code, balance] of portfolio.wallet) {
    wallets[code] = { balance: balance.toFixed() };
  }
  return { user_id: portfolio.userId, wallets };
}

function fromStored(stored: StoredPortfolio): Portfolio {
  const wallet: Wallet = new Map();
  for (const [code, { balance }] of Object.entries(stored.wallets)) {
    wallet.set(code, new Decimal(balance));
  }
  return { userId: stored.user_id, wallet };
}

// Per-user wallets in portfolios.json. Writes replace one user's entry under the store lock.
@Injectable()
export class PortfolioStoreService {
  constructor(private readonly persistence: PersistenceService) {}

  /** Stored portfolio, or an empty wallet when the user has none yet */
  async load(userId: number): Promise<Portfolio> {
    const all = await this.persistence.load(PORTFOLIOS_STORE);
    const stored = all.find((p) => p.user_id === userId);
    return stored ? fromStored(stored) : { userId, wallet: new Map() };
  }

  /** Full replace of the user's entry; durable when this resolves */
  async save(portfolio: Portfolio): Promise<void> {
    const next = toStored(portfolio);
    await this.persistence.update(PORTFOLIOS_STORE, (all) => {
      const index = all.findIndex((p) => p.user_id === portfolio.userId);
      return index === -1 ? [...all, next] : all.map((p, i) => (i === index ? next : p));
    });
  }

  /** Idempotent: an existing portfolio is left as is */
  async create(userId: number): Promise<Portfolio> {
    const all = await this.persistence.update(PORTFOLIOS_STORE, (current) =>
      current.some((p) => p.user_id === userId)
        ? current
        : [...current, toStored({ userId, wallet: new Map() })],
    );
    const stored = all.find((p) => p.user_id === userId);
    return stored ? fromStored(stored) : { userId, wallet: new Map() };
  }
}
