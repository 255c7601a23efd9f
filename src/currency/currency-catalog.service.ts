import { Injectable } from '@nestjs/common';
import { CURRENCY_DEFINITIONS } from './currencies';
import {
  Currency,
  CurrencyKind,
  PRECISION_BY_KIND,
  normalizeCurrencyCode,
} from './entities/currency.entity';

/**
 * Static symbol table: code -> kind and precision.
 * Precision is looked up by kind unless the definition carries its own.
 */
@Injectable()
export class CurrencyCatalogService {
  private readonly byCode: ReadonlyMap<string, Currency>;

  constructor() {
    this.byCode = new Map(
      CURRENCY_DEFINITIONS.map((def): [string, Currency] => [
        def.code,
        Object.freeze({
          code: def.code,
          name: def.name,
          kind: def.kind,
          precision: def.precision ?? PRECISION_BY_KIND[def.kind],
        }),
      ]),
    );
  }

  /** Accepts raw user input (any case, surrounding spaces) */
  find(rawCode: string): Currency | undefined {
    const code = normalizeCurrencyCode(rawCode);
    return code ? this.byCode.get(code) : undefined;
  }

  has(rawCode: string): boolean {
    return this.find(rawCode) !== undefined;
  }

  /** Precision of a known code; unknown codes fall back to the crypto rule */
  precisionOf(code: string): number {
    return this.find(code)?.precision ?? PRECISION_BY_KIND[CurrencyKind.CRYPTO];
  }

  list(kind?: CurrencyKind): Currency[] {
    const all = Array.from(this.byCode.values());
    return kind ? all.filter((c) => c.kind === kind) : all;
  }
}
