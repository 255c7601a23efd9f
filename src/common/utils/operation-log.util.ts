import { Logger } from '@nestjs/common';
import { describeError, isWalletError } from '../errors/wallet.errors';

export type OperationContext = Record<string, string | number | boolean | null | undefined>;

export type OperationSummary = OperationContext & { outcome: 'ok' | 'error' };

/**
 * Scoped structured logging around a domain operation.
 * Entry at debug, success at log, failure at warn; every line carries the
 * action, the caller's context and the duration.
 *
 * `summarize` lets operations that report failure as a value (trade results,
 * refresh reports) pick the level the same way a thrown error would.
 */
export async function logOperation<T>(
  logger: Logger,
  action: string,
  context: OperationContext,
  operation: () => Promise<T>,
  summarize?: (value: T) => OperationSummary,
): Promise<T> {
  const startedAt = Date.now();
  logger.debug({ action, ...context, phase: 'start' });

  try {
    const value = await operation();
    const summary = summarize ? summarize(value) : { outcome: 'ok' as const };
    const entry = { action, ...context, ...summary, durationMs: Date.now() - startedAt };
    if (summary.outcome === 'ok') {
      logger.log(entry);
    } else {
      logger.warn(entry);
    }
    return value;
  } catch (error) {
    logger.warn({
      action,
      ...context,
      outcome: 'error',
      errorKind: isWalletError(error) ? error.kind : 'UnexpectedError',
      errorMessage: describeError(error),
      durationMs: Date.now() - startedAt,
    });
    throw error;
  }
}
