export enum CurrencyKind {
  FIAT = 'fiat',
  CRYPTO = 'crypto',
}

// Decimal places per kind; an entry may override with its own precision.
export const PRECISION_BY_KIND: Readonly<Record<CurrencyKind, number>> = {
  [CurrencyKind.FIAT]: 2,
  [CurrencyKind.CRYPTO]: 8,
};

export interface CurrencyDefinition {
  code: string;
  name: string;
  kind: CurrencyKind;
  precision?: number;
}

// Immutable catalog entry with the precision rule resolved.
export interface Currency {
  readonly code: string;
  readonly name: string;
  readonly kind: CurrencyKind;
  readonly precision: number;
}

const CODE_PATTERN = /^[A-Z0-9]{2,5}$/;

/** Upper-cases and trims user input; returns undefined when it cannot be a code */
export function normalizeCurrencyCode(raw: string): string | undefined {
  const code = raw.trim().toUpperCase();
  return CODE_PATTERN.test(code) ? code : undefined;
}
