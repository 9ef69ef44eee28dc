import {
  AuthError,
  PermissionError,
  TransportError,
  WalletError,
} from '../common/errors/wallet.errors';

/**
 * Failure reported by the exchange REST API, or by the transport under it.
 * `code` is the exchange's numeric error code when the body carried one.
 */
export class ExchangeApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly code?: number,
    readonly timedOut: boolean = false,
  ) {
    super(message);
    this.name = 'ExchangeApiError';
  }
}

type WalletErrorClass = new (message: string, code?: number, options?: { cause?: unknown }) => WalletError;

const CODE_TABLE: Record<number, { type: WalletErrorClass; message: string }> = {
  [-2015]: { type: PermissionError, message: 'Invalid API key, IP, or permissions for action' },
  [-2014]: { type: AuthError, message: 'API key format invalid or IP not whitelisted' },
  [-1022]: { type: AuthError, message: 'Invalid request signature' },
  [-1021]: { type: TransportError, message: 'Request timestamp outside recvWindow' },
  [-1102]: { type: TransportError, message: 'Mandatory parameter missing or malformed' },
};

/**
 * Maps anything thrown by an exchange call onto the wallet error taxonomy.
 * Already-classified errors pass through unchanged.
 */
export function classifyExchangeError(error: unknown): WalletError {
  if (error instanceof WalletError) {
    return error;
  }
  if (!(error instanceof ExchangeApiError)) {
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, undefined, { cause: error });
  }

  if (error.code !== undefined) {
    const known = CODE_TABLE[error.code];
    if (known) {
      return new known.type(`${known.message} (code ${error.code})`, error.code, { cause: error });
    }
  }
  if (error.status === 401) {
    return new AuthError(error.message, error.code, { cause: error });
  }
  if (error.status === 403) {
    return new PermissionError(error.message, error.code, { cause: error });
  }
  if (error.timedOut) {
    return new TransportError(`Request timed out: ${error.message}`, error.code, { cause: error });
  }
  return new TransportError(error.message, error.code, { cause: error });
}
