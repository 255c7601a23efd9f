export type WalletErrorKind =
  | 'InvalidTradeError'
  | 'InsufficientFundsError'
  | 'UnknownPairError'
  | 'StaleRateError'
  | 'PrecisionUnderflowError'
  | 'PersistenceError'
  | 'ProviderError'
  | 'AuthenticationError'
  | 'RegistrationError'
  | 'NotLoggedInError'
  | 'ConfigurationError';

/**
 * Root of the domain error taxonomy.
 * `kind` is what the CLI prints and what callers switch on.
 */
export abstract class WalletError extends Error {
  abstract readonly kind: WalletErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad trade input: non-positive amount, unknown currency, trading the base against itself */
export class InvalidTradeError extends WalletError {
  readonly kind = 'InvalidTradeError';
}

export class InsufficientFundsError extends WalletError {
  readonly kind = 'InsufficientFundsError';

  constructor(
    readonly currency: string,
    readonly available: string,
    readonly required: string,
  ) {
    super(`Insufficient funds: available ${available} ${currency}, required ${required} ${currency}`);
  }
}

export class UnknownPairError extends WalletError {
  readonly kind = 'UnknownPairError';

  constructor(readonly from: string, readonly to: string, detail?: string) {
    super(`No rate available for ${from}→${to}${detail ? `: ${detail}` : ''}`);
  }
}

export class StaleRateError extends WalletError {
  readonly kind = 'StaleRateError';

  constructor(
    readonly from: string,
    readonly to: string,
    readonly updatedAt: string | null,
    readonly maxAgeSeconds: number,
  ) {
    super(
      updatedAt
        ? `Rate ${from}→${to} from ${updatedAt} is older than ${maxAgeSeconds}s; run update-rates`
        : `Rate ${from}→${to} is not cached; run update-rates`,
    );
  }
}

export class PrecisionUnderflowError extends WalletError {
  readonly kind = 'PrecisionUnderflowError';
}

export class PersistenceError extends WalletError {
  readonly kind = 'PersistenceError';

  constructor(readonly storeId: string, message: string, options?: { cause?: unknown }) {
    super(`[${storeId}] ${message}`, options);
  }
}

/** Per-pair provider failure, collected into a RefreshReport rather than thrown out of refresh */
export class ProviderError extends WalletError {
  readonly kind = 'ProviderError';

  constructor(
    readonly provider: string,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

export class AuthenticationError extends WalletError {
  readonly kind = 'AuthenticationError';
}

export class RegistrationError extends WalletError {
  readonly kind = 'RegistrationError';
}

export class NotLoggedInError extends WalletError {
  readonly kind = 'NotLoggedInError';

  constructor() {
    super('Log in first: wallet login --username <name> --password <password>');
  }
}

export class ConfigurationError extends WalletError {
  readonly kind = 'ConfigurationError';
}

export function isWalletError(error: unknown): error is WalletError {
  return error instanceof WalletError;
}

/** Message of any thrown value, for logs and reports */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/** Node errno check that also holds for errors raised in another realm */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
