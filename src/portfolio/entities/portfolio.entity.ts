import Decimal from 'decimal.js';

// Balances by currency code. An absent code is a zero balance.
export type Wallet = Map<string, Decimal>;

// One per registered user; mutated only by the transaction engine.
export interface Portfolio {
  userId: number;
  wallet: Wallet;
}

export function balanceOf(wallet: Wallet, code: string): Decimal {
  return wallet.get(code) ?? new Decimal(0);
}

/** Plain-object copy for receipts and views */
export function walletEntries(wallet: Wallet): Record<string, Decimal> {
  return Object.fromEntries(Array.from(wallet.entries()).sort(([a], [b]) => a.localeCompare(b)));
}
