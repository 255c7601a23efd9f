import { Inject, Injectable } from '@nestjs/common';
import pino, { Logger as PinoLogger } from 'pino';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { describeError, isWalletError } from '../errors/wallet.errors';
import { Clock } from '../utils/clock';
import { RotatingFileDestination } from './rotating-file.destination';

export interface ActionEntry {
  action: 'REGISTER' | 'LOGIN' | 'LOGOUT' | 'BUY' | 'SELL' | 'DEPOSIT';
  result: 'OK' | 'ERROR';
  userId?: number;
  username?: string;
  currency?: string;
  amount?: string;
  rate?: number;
  base?: string;
  cost?: string;
  errorType?: string;
  errorMessage?: string;
}

export type ActionContext = Omit<ActionEntry, 'result' | 'errorType' | 'errorMessage'>;

/**
 * Audit trail of user actions, one NDJSON line each, in a size-rotated file.
 * Independent of LOG_LEVEL: successful actions are always recorded.
 */
@Injectable()
export class ActionLogService {
  private readonly sink: PinoLogger | null;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    private readonly clock: Clock,
  ) {
    const { file, maxBytes, backupCount } = config.actionLog;
    this.sink = file
      ? pino(
          {
            level: 'info',
            base: null,
            timestamp: () => `,"time":"${this.clock.now().toISOString()}"`,
            formatters: {
              level(label) {
                return { level: label };
              },
            },
            redact: { paths: ['password', '*.password'], censor: '[*****]' },
          },
          new RotatingFileDestination({ file, maxBytes, backupCount }),
        )
      : null;
  }

  record(entry: ActionEntry): void {
    if (!this.sink) {
      return;
    }
    if (entry.result === 'OK') {
      this.sink.info(entry, entry.action);
    } else {
      this.sink.error(entry, entry.action);
    }
  }

  /** Runs the action and records its outcome; errors are recorded then rethrown */
  async track<T>(
    context: ActionContext,
    action: () => Promise<T>,
    describe?: (value: T) => Partial<ActionContext>,
  ): Promise<T> {
    try {
      const value = await action();
      this.record({ ...context, ...describe?.(value), result: 'OK' });
      return value;
    } catch (error) {
      this.record({
        ...context,
        result: 'ERROR',
        errorType: isWalletError(error) ? error.kind : 'UnexpectedError',
        errorMessage: describeError(error),
      });
      throw error;
    }
  }
}
