import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { PersistenceService } from '../persistence/persistence.service';
import { defineStore } from '../persistence/store-definition';
import { PairKey, RatePair, pairKey, splitPairKey } from './entities/rate-pair.entity';

const cachedPairSchema = z.object({
  rate: z.number().positive(),
  updated_at: z.string(),
  source: z.string(),
});

const ratesDocumentSchema = z.object({
  pairs: z.record(cachedPairSchema),
  last_refresh: z.string().nullable().default(null),
});

export type RatesDocument = z.infer<typeof ratesDocumentSchema>;

export const RATES_STORE = defineStore<RatesDocument>({
  id: 'rates',
  fileName: 'rates.json',
  schema: ratesDocumentSchema,
  empty: () => ({ pairs: {}, last_refresh: null }),
});

/**
 * Point-in-time view of the cache. Every lookup made through one snapshot
 * sees the same file contents, so a direct/inverse resolution never mixes
 * two refreshes.
 */
export class RateCacheSnapshot {
  private readonly pairs: Map<PairKey, RatePair>;
  readonly lastRefresh: string | null;

  constructor(document: RatesDocument) {
    this.pairs = new Map();
    for (const [key, entry] of Object.entries(document.pairs)) {
      const parts = splitPairKey(key);
      if (!parts) continue;
      this.pairs.set(pairKey(parts.from, parts.to), {
        from: parts.from,
        to: parts.to,
        rate: entry.rate,
        updatedAt: entry.updated_at,
        source: entry.source,
      });
    }
    this.lastRefresh = document.last_refresh;
  }

  get(from: string, to: string): RatePair | undefined {
    return this.pairs.get(pairKey(from, to));
  }

  list(): RatePair[] {
    return Array.from(this.pairs.values());
  }

  get size(): number {
    return this.pairs.size;
  }
}

// Current rate per ordered pair, persisted as rates.json.
@Injectable()
export class RateCacheStore {
  constructor(private readonly persistence: PersistenceService) {}

  async snapshot(): Promise<RateCacheSnapshot> {
    return new RateCacheSnapshot(await this.persistence.load(RATES_STORE));
  }

  async get(from: string, to: string): Promise<RatePair | undefined> {
    return (await this.snapshot()).get(from, to);
  }

  /** Replaces the pair and stamps last_refresh; durable when this resolves */
  async put(pair: RatePair): Promise<void> {
    await this.persistence.update(RATES_STORE, (doc) => ({
      pairs: {
        ...doc.pairs,
        [pairKey(pair.from, pair.to)]: {
          rate: pair.rate,
          updated_at: pair.updatedAt,
          source: pair.source,
        },
      },
      last_refresh: pair.updatedAt,
    }));
  }
}
