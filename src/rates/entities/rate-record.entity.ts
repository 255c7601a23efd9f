// Immutable journal entry for one rate observation.
// id is `${FROM}_${TO}_${timestamp}`; not enforced unique.
export interface RateRecord {
  id: string;
  from: string;
  to: string;
  rate: number;
  timestamp: string;      // ISO
  source: string;
  meta: {
    requestMs: number;    // provider round-trip
    statusCode: number;
  };
}

export interface RateHistoryFilter {
  currency?: string;      // either side of the pair
  from?: Date;            // inclusive
  to?: Date;              // inclusive
}
