import Decimal from 'decimal.js';
import { ACCOUNT_TYPES, AccountType, WalletValueMap } from './account-type.entity';
import { ZERO, add } from '../../common/utils/decimal.util';

/**
 * Builds a WalletValueMap from whatever values are known.
 * Every account type that is missing, or whose read failed, becomes zero.
 * This is the only place a wallet value defaults to zero.
 */
export function coalesceWalletValues(
  partial: Partial<Record<AccountType, Decimal>> = {},
): WalletValueMap {
  return Object.freeze({
    [AccountType.SPOT]: partial[AccountType.SPOT] ?? ZERO,
    [AccountType.USDT_FUTURES]: partial[AccountType.USDT_FUTURES] ?? ZERO,
    [AccountType.COIN_FUTURES]: partial[AccountType.COIN_FUTURES] ?? ZERO,
    [AccountType.CROSS_MARGIN]: partial[AccountType.CROSS_MARGIN] ?? ZERO,
    [AccountType.ISOLATED_MARGIN]: partial[AccountType.ISOLATED_MARGIN] ?? ZERO,
  });
}

/** Per-type sum over any number of maps */
export function sumWalletValues(maps: WalletValueMap[]): WalletValueMap {
  const totals: Partial<Record<AccountType, Decimal>> = {};
  for (const type of ACCOUNT_TYPES) {
    totals[type] = add(...maps.map((map) => map[type]));
  }
  return coalesceWalletValues(totals);
}

/** Grand total across every account type */
export function totalOf(map: WalletValueMap): Decimal {
  return add(...ACCOUNT_TYPES.map((type) => map[type]));
}

/** Serializes a map for JSON, e.g. { spot: 100, usdt_futures: 50, ... } */
export function walletValuesToNumbers(
  map: WalletValueMap,
  convert: (value: Decimal) => number,
): Record<AccountType, number> {
  return {
    [AccountType.SPOT]: convert(map[AccountType.SPOT]),
    [AccountType.USDT_FUTURES]: convert(map[AccountType.USDT_FUTURES]),
    [AccountType.COIN_FUTURES]: convert(map[AccountType.COIN_FUTURES]),
    [AccountType.CROSS_MARGIN]: convert(map[AccountType.CROSS_MARGIN]),
    [AccountType.ISOLATED_MARGIN]: convert(map[AccountType.ISOLATED_MARGIN]),
  };
}
