// Ordered (from, to) key, persisted as "FROM_TO".
export type PairKey = `${string}_${string}`;

export function pairKey(from: string, to: string): PairKey {
  return `${from}_${to}`;
}

export function splitPairKey(key: string): { from: string; to: string } | undefined {
  const parts = key.split('_');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return undefined;
  }
  return { from: parts[0], to: parts[1] };
}

// Current best-known rate for one ordered pair.
// One per pair in the cache; overwritten on refresh, never deleted.
export interface RatePair {
  from: string;
  to: string;
  rate: number;           // units of `to` per one `from`, > 0
  updatedAt: string;      // ISO timestamp of the observation
  source: string;         // provider that produced it
}
