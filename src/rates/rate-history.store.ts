import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { PersistenceService } from '../persistence/persistence.service';
import { defineStore } from '../persistence/store-definition';
import { RateHistoryFilter, RateRecord } from './entities/rate-record.entity';

const recordSchema = z.object({
  id: z.string(),
  from_currency: z.string(),
  to_currency: z.string(),
  rate: z.number(),
  timestamp: z.string(),
  source: z.string(),
  meta: z
    .object({
      request_ms: z.number().default(0),
      status_code: z.number().default(0),
    })
    .default({}),
});

const historyDocumentSchema = z.object({
  records: z.array(recordSchema),
});

export type HistoryDocument = z.infer<typeof historyDocumentSchema>;
type StoredRecord = HistoryDocument['records'][number];

export const HISTORY_STORE = defineStore<HistoryDocument>({
  id: 'exchange_rates',
  fileName: 'exchange_rates.json',
  schema: historyDocumentSchema,
  empty: () => ({ records: [] }),
});

function toStored(record: RateRecord): StoredRecord {
  return {
    id: record.id,
    from_currency: record.from,
    to_currency: record.to,
    rate: record.rate,
    timestamp: record.timestamp,
    source: record.source,
    meta: { request_ms: record.meta.requestMs, status_code: record.meta.statusCode },
  };
}

function fromStored(stored: StoredRecord): RateRecord {
  return {
    id: stored.id,
    from: stored.from_currency,
    to: stored.to_currency,
    rate: stored.rate,
    timestamp: stored.timestamp,
    source: stored.source,
    meta: { requestMs: stored.meta.request_ms, statusCode: stored.meta.status_code },
  };
}

function matches(record: RateRecord, filter: RateHistoryFilter): boolean {
  if (filter.currency && record.from !== filter.currency && record.to !== filter.currency) {
    return false;
  }
  const at = Date.parse(record.timestamp);
  if (filter.from && at < filter.from.getTime()) return false;
  if (filter.to && at > filter.to.getTime()) return false;
  return true;
}

/**
 * Append-only journal of every rate observation (exchange_rates.json).
 * Entries are never replaced or removed.
 */
@Injectable()
export class RateHistoryLog {
  constructor(private readonly persistence: PersistenceService) {}

  /** Durable when this resolves */
  async append(record: RateRecord): Promise<void> {
    await this.persistence.update(HISTORY_STORE, (doc) => ({
      records: [...doc.records, toStored(record)],
    }));
  }

  /**
   * Matching records, oldest first. Each iteration re-reads the journal,
   * so the sequence can be walked again and sees appends made in between.
   */
  query(filter: RateHistoryFilter = {}): AsyncIterable<RateRecord> {
    return {
      [Symbol.asyncIterator]: () => this.scan(filter),
    };
  }

  private async *scan(filter: RateHistoryFilter): AsyncGenerator<RateRecord> {
    const doc = await this.persistence.load(HISTORY_STORE);
    const ordered = doc.records
      .map(fromStored)
      .map((record, index) => ({ record, index, at: Date.parse(record.timestamp) }))
      .sort((a, b) => a.at - b.at || a.index - b.index);

    for (const { record } of ordered) {
      if (matches(record, filter)) {
        yield record;
      }
    }
  }
}
