import { CurrencyDefinition, CurrencyKind } from './entities/currency.entity';

export const CURRENCY_DEFINITIONS: readonly CurrencyDefinition[] = [
  { code: 'USD', name: 'US Dollar', kind: CurrencyKind.FIAT },
  { code: 'EUR', name: 'Euro', kind: CurrencyKind.FIAT },
  { code: 'GBP', name: 'British Pound', kind: CurrencyKind.FIAT },
  { code: 'JPY', name: 'Japanese Yen', kind: CurrencyKind.FIAT, precision: 0 },
  { code: 'CHF', name: 'Swiss Franc', kind: CurrencyKind.FIAT },
  { code: 'RUB', name: 'Russian Ruble', kind: CurrencyKind.FIAT },
  { code: 'CNY', name: 'Chinese Yuan', kind: CurrencyKind.FIAT },
  { code: 'CAD', name: 'Canadian Dollar', kind: CurrencyKind.FIAT },
  { code: 'AUD', name: 'Australian Dollar', kind: CurrencyKind.FIAT },
  { code: 'BTC', name: 'Bitcoin', kind: CurrencyKind.CRYPTO },
  { code: 'ETH', name: 'Ethereum', kind: CurrencyKind.CRYPTO },
  { code: 'SOL', name: 'Solana', kind: CurrencyKind.CRYPTO },
  { code: 'LTC', name: 'Litecoin', kind: CurrencyKind.CRYPTO },
  { code: 'XRP', name: 'Ripple', kind: CurrencyKind.CRYPTO, precision: 6 },
  { code: 'ADA', name: 'Cardano', kind: CurrencyKind.CRYPTO, precision: 6 },
  { code: 'DOT', name: 'Polkadot', kind: CurrencyKind.CRYPTO },
];
