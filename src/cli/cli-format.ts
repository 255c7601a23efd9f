import Decimal from 'decimal.js';
import { toFixed } from '../common/utils/decimal.util';
import { PortfolioView } from '../portfolio/dto/portfolio-view.dto';
import { TradeReceipt, TradeSide } from '../portfolio/entities/trade.entity';
import { RatePair } from '../rates/entities/rate-pair.entity';
import { RateRecord } from '../rates/entities/rate-record.entity';
import { RefreshReport } from '../rates/entities/refresh-report.entity';

type PrecisionOf = (code: string) => number;

const VERB: Record<TradeSide, string> = {
  [TradeSide.BUY]: 'Bought',
  [TradeSide.SELL]: 'Sold',
  [TradeSide.DEPOSIT]: 'Deposited',
};

/** Up to 10 significant digits, never in exponent form */
export function formatRate(rate: number): string {
  return new Decimal(rate).toSignificantDigits(10).toString();
}

export function formatAmount(value: Decimal, code: string, precisionOf: PrecisionOf): string {
  return `${toFixed(value, precisionOf(code))} ${code}`;
}

export function formatReceipt(receipt: TradeReceipt, precisionOf: PrecisionOf): string[] {
  const quantity = formatAmount(receipt.quantity, receipt.currency, precisionOf);
  const lines =
    receipt.side === TradeSide.DEPOSIT
      ? [`${VERB[receipt.side]} ${quantity}`]
      : [
          `${VERB[receipt.side]} ${quantity} at ${formatRate(receipt.rate)} ${receipt.base}/${receipt.currency}` +
            ` for ${formatAmount(receipt.cost, receipt.base, precisionOf)}`,
        ];

  const touched = Array.from(new Set([receipt.base, receipt.currency])).sort();
  for (const code of touched) {
    const before = receipt.balancesBefore[code] ?? new Decimal(0);
    const after = receipt.balancesAfter[code] ?? new Decimal(0);
    const places = precisionOf(code);
    lines.push(`  ${code}: ${toFixed(before, places)} -> ${toFixed(after, places)}`);
  }
  lines.push(`Trade id: ${receipt.tradeId}`);
  return lines;
}

export function formatPortfolio(view: PortfolioView, username: string, precisionOf: PrecisionOf): string[] {
  if (view.holdings.length === 0) {
    return [`Portfolio of '${username}' is empty. Deposit funds with: wallet deposit --currency ${view.base} --amount <n>`];
  }

  const lines = [`Portfolio of '${username}' (base ${view.base}):`];
  for (const h of view.holdings) {
    const balance = formatAmount(h.balance, h.currency, precisionOf).padStart(22);
    const value = h.value ? formatAmount(h.value, view.base, precisionOf) : 'n/a (no rate)';
    lines.push(`  ${h.currency.padEnd(5)}${balance}  = ${value}${h.stale ? ' *' : ''}`);
  }
  lines.push(`Total: ${formatAmount(view.total, view.base, precisionOf)}`);
  if (view.hasStaleRates) {
    lines.push('* valued with an outdated rate; run update-rates');
  }
  return lines;
}

export function formatPair(pair: RatePair): string {
  return `${`${pair.from}_${pair.to}`.padEnd(10)} ${formatRate(pair.rate).padStart(18)}  ${pair.updatedAt}  ${pair.source}`;
}

export function formatRecord(record: RateRecord): string {
  return `${record.timestamp}  ${`${record.from}_${record.to}`.padEnd(10)} ${formatRate(record.rate).padStart(18)}  ${record.source}`;
}

export function formatRefreshReport(report: RefreshReport): string[] {
  const lines = report.outcomes.map((o) =>
    o.status === 'updated'
      ? `  OK      ${o.pair.padEnd(10)} ${formatRate(o.rate).padStart(18)}  ${o.source} (${o.latencyMs}ms)`
      : `  FAILED  ${o.pair.padEnd(10)} ${o.error.message}`,
  );
  lines.push(`Updated ${report.updated} pair(s), ${report.failed} failed. Last refresh: ${report.finishedAt}`);
  return lines;
}
