import Decimal from 'decimal.js';

// One wallet line valued in the view's base currency
export interface HoldingView {
  currency: string;
  balance: Decimal;
  value: Decimal | null;        // null when no rate resolves
  rate: number | null;
  stale: boolean;               // valued with a rate older than the TTL
}

// Complete portfolio snapshot
export interface PortfolioView {
  userId: number;
  base: string;
  holdings: HoldingView[];      // sorted by code
  total: Decimal;               // sum of the known values
  hasStaleRates: boolean;
}
