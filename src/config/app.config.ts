import path from 'path';
import { z } from 'zod';
import type { LogLevel } from '@nestjs/common';
import { ConfigurationError } from '../common/errors/wallet.errors';
import { CURRENCY_DEFINITIONS } from '../currency/currencies';
import { CurrencyKind, normalizeCurrencyCode } from '../currency/entities/currency.entity';
import { loadEnvFiles } from './env';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type AppConfig = {
  dataDir: string;
  ratesTtlSeconds: number;
  baseCurrency: string;
  requestTimeoutMs: number;
  trackedCrypto: string[];
  trackedFiat: string[];
  exchangeRateApiKey: string;
  coingeckoUrl: string;
  exchangeRateApiUrl: string;
  logLevels: LogLevel[];
  actionLog: ActionLogConfig;
};

/** Size-rotated file of user actions; `file` is null when the log is off */
export type ActionLogConfig = {
  file: string | null;
  maxBytes: number;
  backupCount: number;
};

// Nest levels from most to least severe; LOG_LEVEL enables its level and everything above it
const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const KNOWN_CODES = new Map(
  CURRENCY_DEFINITIONS.map((def): [string, CurrencyKind] => [def.code, def.kind]),
);

const currencyCode = (kind?: CurrencyKind) =>
  z
    .string()
    .transform((raw) => normalizeCurrencyCode(raw) ?? raw)
    .refine((code) => KNOWN_CODES.has(code) && (!kind || KNOWN_CODES.get(code) === kind), {
      message: kind ? `must be a known ${kind} currency` : 'must be a known currency',
    });

const csvOf = (kind: CurrencyKind, fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((csv) => csv.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(currencyCode(kind)).min(1));

const envSchema = z.object({
  DATA_DIR: z.string().trim().min(1).optional(),
  RATES_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  BASE_CURRENCY: currencyCode().default('USD'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TRACKED_CRYPTO: csvOf(CurrencyKind.CRYPTO, 'BTC,ETH,SOL,LTC,XRP,ADA,DOT'),
  TRACKED_FIAT: csvOf(CurrencyKind.FIAT, 'EUR,GBP,RUB,JPY,CHF,CNY,CAD,AUD'),
  EXCHANGERATE_API_KEY: z.string().trim().default(''),
  COINGECKO_URL: z.string().url().default('https://api.coingecko.com/api/v3/simple/price'),
  EXCHANGERATE_API_URL: z.string().url().default('https://v6.exchangerate-api.com/v6'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']).default('warn'),
  ACTION_LOG_FILE: z.string().trim().default('logs/actions.log'),
  ACTION_LOG_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  ACTION_LOG_BACKUP_COUNT: z.coerce.number().int().min(0).default(5),
});

const TIPS: Record<string, string> = {
  RATES_TTL_SECONDS: 'Use a positive integer number of seconds; defaults to 300',
  BASE_CURRENCY: 'Use a catalog code such as USD or EUR',
  TRACKED_CRYPTO: 'CSV of crypto codes, e.g. BTC,ETH',
  TRACKED_FIAT: 'CSV of fiat codes, e.g. EUR,GBP',
  LOG_LEVEL: 'One of fatal, error, warn, log, debug, verbose',
  ACTION_LOG_FILE: 'Path of the action log, relative to cwd; empty turns it off',
  ACTION_LOG_MAX_BYTES: 'Use a positive number of bytes; defaults to 10485760',
  ACTION_LOG_BACKUP_COUNT: 'Use 0 or more rotated files to keep; defaults to 5',
};

/**
 * Validates an environment map into AppConfig.
 * @throws ConfigurationError listing every invalid variable
 */
export function parseAppConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const key = String(issue.path[0] ?? issue.code);
        const tip = TIPS[key] ? ` Tip: ${TIPS[key]}.` : '';
        return `- ${key}: ${issue.message}.${tip}`;
      })
      .join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${details}`);
  }

  const parsed = result.data;
  const baseCurrency = parsed.BASE_CURRENCY;

  return {
    dataDir: path.resolve(cwd, parsed.DATA_DIR ?? 'data'),
    ratesTtlSeconds: parsed.RATES_TTL_SECONDS,
    baseCurrency,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    trackedCrypto: parsed.TRACKED_CRYPTO.filter((code) => code !== baseCurrency),
    trackedFiat: parsed.TRACKED_FIAT.filter((code) => code !== baseCurrency),
    exchangeRateApiKey: parsed.EXCHANGERATE_API_KEY,
    coingeckoUrl: parsed.COINGECKO_URL,
    exchangeRateApiUrl: parsed.EXCHANGERATE_API_URL.replace(/\/$/, ''),
    logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(parsed.LOG_LEVEL) + 1),
    actionLog: {
      file: parsed.ACTION_LOG_FILE ? path.resolve(cwd, parsed.ACTION_LOG_FILE) : null,
      maxBytes: parsed.ACTION_LOG_MAX_BYTES,
      backupCount: parsed.ACTION_LOG_BACKUP_COUNT,
    },
  };
}

/** Reads .env files, then validates process.env */
export function loadAppConfig(cwd: string = process.cwd()): AppConfig {
  loadEnvFiles(cwd);
  return parseAppConfig(process.env, cwd);
}
