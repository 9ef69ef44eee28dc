import { AccountUnavailableError } from '../../common/errors/wallet.errors';
import { classifyExchangeError } from '../../exchange/exchange-errors';
import { ExchangeClient } from '../../exchange/exchange-client.interface';
import { AccountType, AssetBalance, BalanceRecords } from '../entities/account-type.entity';

export interface ReaderContext {
  quoteAsset: string;
}

export type ReaderResult<T extends AccountType> =
  | { ok: true; records: BalanceRecords[T] }
  | { ok: false; failure: AccountUnavailableError };

/**
 * Normalizes one account type's exchange payload.
 * Never throws: failures come back as AccountUnavailableError values.
 */
export interface AccountReader<T extends AccountType> {
  readonly type: T;
  read(client: ExchangeClient, ctx: ReaderContext): Promise<ReaderResult<T>>;
}

/** Runs a load and captures any failure as AccountUnavailable for `type` */
export async function readAccount<T extends AccountType>(
  type: T,
  load: () => Promise<BalanceRecords[T]>,
): Promise<ReaderResult<T>> {
  try {
    return { ok: true, records: await load() };
  } catch (error) {
    return { ok: false, failure: new AccountUnavailableError(type, classifyExchangeError(error)) };
  }
}

/** Keeps entries with quantity > 0 */
export function positiveOnly(balances: AssetBalance[]): AssetBalance[] {
  return balances.filter((balance) => balance.quantity.greaterThan(0));
}
