import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AppConfig } from '../config/app.config';

export function testConfig(dataDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    dataDir,
    ratesTtlSeconds: 300,
    baseCurrency: 'USD',
    requestTimeoutMs: 200,
    trackedCrypto: ['BTC'],
    trackedFiat: ['EUR'],
    exchangeRateApiKey: 'test-key',
    coingeckoUrl: 'http://coingecko.test/api/v3/simple/price',
    exchangeRateApiUrl: 'http://exchangerate.test/v6',
    logLevels: ['error'],
    actionLog: { file: path.join(dataDir, 'logs', 'actions.log'), maxBytes: 1024 * 1024, backupCount: 2 },
    ...overrides,
  };
}

/** Fresh directory under the OS temp dir; remove it with `removeDataDir` */
export function makeDataDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'wallet-test-'));
}

export function removeDataDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}
