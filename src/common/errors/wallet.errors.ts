import { AccountType } from '../../wallet/entities/account-type.entity';

export type WalletErrorKind =
  | 'AuthError'
  | 'PermissionError'
  | 'TransportError'
  | 'PricingUnavailable'
  | 'AccountUnavailable';

// Base for every failure the aggregation layer carries around as a value.
export abstract class WalletError extends Error {
  abstract readonly kind: WalletErrorKind;

  constructor(
    message: string,
    readonly code?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or expired credential */
export class AuthError extends WalletError {
  readonly kind = 'AuthError';
}

/** Credential lacks a read scope or the caller IP is not whitelisted */
export class PermissionError extends WalletError {
  readonly kind = 'PermissionError';
}

/** Network failure, timeout or malformed request. Retryable by the caller. */
export class TransportError extends WalletError {
  readonly kind = 'TransportError';
}

/** The price endpoint failed. Fatal for the aggregation pass. */
export class PricingUnavailableError extends WalletError {
  readonly kind = 'PricingUnavailable';
}

/**
 * One account type could not be read for one credential.
 * The aggregator decides whether this is fatal (spot, usdt_futures) or tolerated.
 */
export class AccountUnavailableError extends WalletError {
  readonly kind = 'AccountUnavailable';

  constructor(
    readonly accountType: AccountType,
    readonly reason: WalletError,
  ) {
    super(`${accountType} unavailable: ${reason.message}`, reason.code, { cause: reason });
  }
}
